import { z } from 'zod';
import { RequirementCategory, UNBOUNDED_MAX, UNBOUNDED_MIN } from '../../domain/entities/Requirement.js';
import { SpecialFeature } from '../../domain/entities/SpecialFeature.js';

const bound = z.number().int().min(0);

const sizeApplicabilitySchema = z
  .object({
    min_sqm: bound.default(UNBOUNDED_MIN),
    max_sqm: bound.default(UNBOUNDED_MAX),
  })
  .default({})
  .refine(range => range.min_sqm <= range.max_sqm, { message: 'min_sqm exceeds max_sqm' });

const capacityApplicabilitySchema = z
  .object({
    min_people: bound.default(UNBOUNDED_MIN),
    max_people: bound.default(UNBOUNDED_MAX),
  })
  .default({})
  .refine(range => range.min_people <= range.max_people, { message: 'min_people exceeds max_people' });

export const requirementRecordSchema = z.object({
  requirement_id: z.string().min(1),
  chapter: z.number().int().nonnegative(),
  section: z.string().min(1),
  category: z.nativeEnum(RequirementCategory).default(RequirementCategory.GENERAL),
  title_hebrew: z.string().min(1),
  content_hebrew: z.string().default(''),
  size_applicability: sizeApplicabilitySchema,
  capacity_applicability: capacityApplicabilitySchema,
  special_features: z
    .array(z.nativeEnum(SpecialFeature))
    .default([])
    .refine(features => new Set(features).size === features.length, {
      message: 'special_features must be unique',
    }),
  israeli_standards: z.array(z.string()).default([]),
  certifications: z.array(z.string()).default([]),
});

const triggerTypeSchema = z.enum(['maximum', 'minimum']).default('maximum');

const areaThresholdSchema = z.object({
  threshold_sqm: bound,
  trigger_type: triggerTypeSchema,
  context_hebrew: z.string().default(''),
  section: z.string().default(''),
  chapter: z.number().int().nonnegative().default(0),
});

const capacityThresholdSchema = z.object({
  threshold_people: bound,
  trigger_type: triggerTypeSchema,
  context_hebrew: z.string().default(''),
  section: z.string().default(''),
  chapter: z.number().int().nonnegative().default(0),
});

const combinedThresholdSchema = z.object({
  threshold_sqm: bound,
  threshold_people: bound,
  context_hebrew: z.string().default(''),
  section: z.string().default(''),
});

const ruleThresholdsRecordSchema = z.object({
  small_business_max_sqm: z.number().int().positive().optional(),
  small_business_max_people: z.number().int().positive().optional(),
  large_business_min_sqm: z.number().int().positive().optional(),
  large_business_min_people: z.number().int().positive().optional(),
  complex_feature_count: z.number().int().min(1).optional(),
});

export const catalogDocumentSchema = z
  .object({
    metadata: z
      .object({
        source_file: z.string().optional(),
        extraction_date: z.string().optional(),
        chapters_processed: z.array(z.number().int()).default([]),
      })
      .default({}),
    business_thresholds: z
      .object({
        area_thresholds: z.array(areaThresholdSchema).default([]),
        capacity_thresholds: z.array(capacityThresholdSchema).default([]),
        combined_thresholds: z.array(combinedThresholdSchema).default([]),
      })
      .default({}),
    rule_thresholds: ruleThresholdsRecordSchema.optional(),
    requirements: z.array(requirementRecordSchema),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.requirements.forEach((requirement, index) => {
      if (seen.has(requirement.requirement_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['requirements', index, 'requirement_id'],
          message: `Duplicate requirement_id: ${requirement.requirement_id}`,
        });
      }
      seen.add(requirement.requirement_id);
    });
  });

export type CatalogDocument = z.infer<typeof catalogDocumentSchema>;
export type RequirementRecord = z.infer<typeof requirementRecordSchema>;
