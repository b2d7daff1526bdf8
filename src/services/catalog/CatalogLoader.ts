import { readFile } from 'fs/promises';
import { config } from '../../config/index.js';
import type { RuleThresholds } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { CatalogLoadError, CatalogValidationError } from '../../utils/errors.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import type { RequirementCatalog } from '../../domain/entities/Catalog.js';
import { catalogDocumentSchema, type CatalogDocument, type RequirementRecord } from './catalog.schema.js';

/**
 * Turns the extractor's JSON document into a frozen, validated catalog.
 * Malformed documents are rejected here; nothing downstream re-validates.
 */
export class CatalogLoader {
  constructor(private defaultRules: RuleThresholds = config.rules) {}

  async loadFromFile(path: string = config.catalog.path): Promise<RequirementCatalog> {
    let raw: unknown;
    try {
      const content = await readFile(path, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      logger.error({ error, path }, 'Failed to read requirement catalog');
      throw new CatalogLoadError(`Failed to read requirement catalog from ${path}`, error);
    }

    const catalog = this.parse(raw);
    logger.info(
      { path, requirements: catalog.requirements.length },
      'Requirement catalog loaded'
    );
    return catalog;
  }

  parse(raw: unknown): RequirementCatalog {
    const parsed = catalogDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));
      logger.error({ issues }, 'Requirement catalog rejected');
      throw new CatalogValidationError('Malformed requirement catalog', issues);
    }

    return this.toCatalog(parsed.data);
  }

  private toCatalog(document: CatalogDocument): RequirementCatalog {
    const declared = document.rule_thresholds ?? {};
    const thresholds = document.business_thresholds;

    return Object.freeze({
      metadata: Object.freeze({
        sourceFile: document.metadata.source_file,
        extractionDate: document.metadata.extraction_date,
        chaptersProcessed: Object.freeze([...document.metadata.chapters_processed]),
      }),
      requirements: Object.freeze(document.requirements.map(record => this.toRequirement(record))),
      thresholds: Object.freeze({
        area: Object.freeze(
          thresholds.area_thresholds.map(t =>
            Object.freeze({
              thresholdSqm: t.threshold_sqm,
              triggerType: t.trigger_type,
              context: t.context_hebrew,
              section: t.section,
              chapter: t.chapter,
            })
          )
        ),
        capacity: Object.freeze(
          thresholds.capacity_thresholds.map(t =>
            Object.freeze({
              thresholdPeople: t.threshold_people,
              triggerType: t.trigger_type,
              context: t.context_hebrew,
              section: t.section,
              chapter: t.chapter,
            })
          )
        ),
        combined: Object.freeze(
          thresholds.combined_thresholds.map(t =>
            Object.freeze({
              thresholdSqm: t.threshold_sqm,
              thresholdPeople: t.threshold_people,
              context: t.context_hebrew,
              section: t.section,
            })
          )
        ),
      }),
      rules: Object.freeze({
        smallBusinessMaxSqm: declared.small_business_max_sqm ?? this.defaultRules.smallBusinessMaxSqm,
        smallBusinessMaxPeople: declared.small_business_max_people ?? this.defaultRules.smallBusinessMaxPeople,
        largeBusinessMinSqm: declared.large_business_min_sqm ?? this.defaultRules.largeBusinessMinSqm,
        largeBusinessMinPeople: declared.large_business_min_people ?? this.defaultRules.largeBusinessMinPeople,
        complexFeatureCount: declared.complex_feature_count ?? this.defaultRules.complexFeatureCount,
      }),
    });
  }

  private toRequirement(record: RequirementRecord): Requirement {
    return Object.freeze({
      id: record.requirement_id,
      chapter: record.chapter,
      section: record.section,
      category: record.category,
      title: record.title_hebrew,
      bodyText: record.content_hebrew,
      sizeRange: Object.freeze({
        min: record.size_applicability.min_sqm,
        max: record.size_applicability.max_sqm,
      }),
      capacityRange: Object.freeze({
        min: record.capacity_applicability.min_people,
        max: record.capacity_applicability.max_people,
      }),
      requiredFeatures: Object.freeze([...record.special_features]),
      standards: Object.freeze([...record.israeli_standards]),
      certifications: Object.freeze([...record.certifications]),
    });
  }
}
