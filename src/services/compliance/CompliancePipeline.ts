import { logger } from '../../utils/logger.js';
import { CatalogUnavailableError, InvalidProfileError } from '../../utils/errors.js';
import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';
import type { RequirementCatalog } from '../../domain/entities/Catalog.js';
import { questionnaireToProfile, validateProfile } from '../../domain/profile/validation.js';
import { SAMPLE_PROFILES, isSampleProfileName } from '../../domain/profile/samples.js';
import { CatalogLoader } from '../catalog/CatalogLoader.js';
import { getCatalogStatistics, type CatalogStatistics } from '../catalog/statistics.js';
import { getApplicableThresholds, type ApplicableThresholds } from '../catalog/thresholds.js';
import { RequirementMatcher } from '../matching/RequirementMatcher.js';
import { RuleProcessor } from '../rules/RuleProcessor.js';
import { RuleSession } from '../rules/RuleSession.js';
import { ResultFormatter } from '../formatting/ResultFormatter.js';
import type { FormattedResult } from '../formatting/types.js';

export interface CompliancePipelineOptions {
  now?: () => Date;
}

/**
 * profile → match → rules → format. Each evaluation gets its own
 * RuleSession; the catalog is shared read-only across evaluations.
 */
export class CompliancePipeline {
  private matcher = new RequirementMatcher();
  private formatter = new ResultFormatter();

  constructor(
    private catalog: RequirementCatalog | null,
    private options: CompliancePipelineOptions = {}
  ) {}

  static async fromFile(path?: string, options?: CompliancePipelineOptions): Promise<CompliancePipeline> {
    const catalog = await new CatalogLoader().loadFromFile(path);
    return new CompliancePipeline(catalog, options);
  }

  isCatalogLoaded(): boolean {
    return this.catalog !== null && this.catalog.requirements.length > 0;
  }

  evaluate(input: unknown): FormattedResult {
    return this.run(validateProfile(input));
  }

  evaluateQuestionnaire(input: unknown): FormattedResult {
    return this.run(questionnaireToProfile(input));
  }

  evaluateSample(name: string): FormattedResult {
    if (!isSampleProfileName(name)) {
      throw new InvalidProfileError(`Sample profile '${name}' not found`);
    }
    return this.evaluate(SAMPLE_PROFILES[name]);
  }

  getCatalogStatistics(): CatalogStatistics {
    return getCatalogStatistics(this.requireCatalog());
  }

  getApplicableThresholds(input: unknown): ApplicableThresholds {
    return getApplicableThresholds(this.requireCatalog(), validateProfile(input));
  }

  private run(profile: BusinessProfile): FormattedResult {
    const catalog = this.requireCatalog();
    const processor = new RuleProcessor(catalog.rules);
    const session = new RuleSession();

    const rawMatches = this.matcher.match(profile, catalog);
    const { matches } = processor.process(rawMatches, profile, session);

    const result = this.formatter.format(matches, profile, session.conflicts(), {
      warnings: session.warnings(),
      now: this.options.now,
    });

    logger.info(
      { sessionId: session.id, total: result.totalRequirements, conflicts: result.conflictsResolved.length },
      'Evaluation complete'
    );
    return result;
  }

  private requireCatalog(): RequirementCatalog {
    if (!this.catalog || this.catalog.requirements.length === 0) {
      throw new CatalogUnavailableError('No requirement catalog loaded');
    }
    return this.catalog;
  }
}
