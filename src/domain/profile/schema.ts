import { z } from 'zod';
import { SpecialFeature } from '../entities/SpecialFeature.js';

export const MAX_SIZE_SQM = 5000;
export const MAX_CAPACITY_PEOPLE = 5000;

export const businessProfileSchema = z.object({
  sizeSqm: z
    .number()
    .int()
    .positive()
    .max(MAX_SIZE_SQM, 'Business size seems unusually large for a restaurant'),
  capacityPeople: z.number().int().positive().max(MAX_CAPACITY_PEOPLE),
  specialFeatures: z
    .array(z.nativeEnum(SpecialFeature))
    .default([])
    .refine(features => new Set(features).size === features.length, {
      message: 'Special features must be unique',
    }),
  businessType: z.string().min(1).default('restaurant'),
  businessName: z.string().optional(),
  notes: z.string().optional(),
});

export type BusinessProfileInput = z.input<typeof businessProfileSchema>;

const questionnaireFields = z.object({
  businessSizeSqm: z.number().int(),
  seatingCapacity: z.number().int(),
  usesGas: z.boolean().default(false),
  servesMeat: z.boolean().default(false),
  offersDelivery: z.boolean().default(false),
  servesAlcohol: z.boolean().default(false),
  businessName: z.string().optional(),
  additionalNotes: z.string().optional(),
});

type QuestionnaireField = keyof z.infer<typeof questionnaireFields>;

/** Field labels of the printed questionnaire, accepted in place of the English keys. */
export const QUESTIONNAIRE_ALIASES: Record<string, QuestionnaireField> = {
  'גודל העסק': 'businessSizeSqm',
  'מספר מקומות ישיבה': 'seatingCapacity',
  'שימוש בגז': 'usesGas',
  'מגיש בשר': 'servesMeat',
  'משלוחים': 'offersDelivery',
  'משקאות משכרים': 'servesAlcohol',
  'שם העסק': 'businessName',
  'הערות נוספות': 'additionalNotes',
};

function renameAliases(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }
  return Object.fromEntries(
    Object.entries(input).map(([key, value]): [string, unknown] => [
      Object.hasOwn(QUESTIONNAIRE_ALIASES, key) ? QUESTIONNAIRE_ALIASES[key] : key,
      value,
    ])
  );
}

export const questionnaireSchema = z.preprocess(renameAliases, questionnaireFields);

export type QuestionnaireResponse = z.infer<typeof questionnaireFields>;
