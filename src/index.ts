export * from './domain/entities/index.js';
export { CATEGORY_LABELS, FEATURE_LABELS, PRIORITY_LABELS } from './domain/labels.js';
export { validateProfile, questionnaireToProfile, hasFeature } from './domain/profile/validation.js';
export { summarizeProfile } from './domain/profile/summary.js';
export { SAMPLE_PROFILES, type SampleProfileName } from './domain/profile/samples.js';
export type { BusinessProfileInput, QuestionnaireResponse } from './domain/profile/schema.js';

export { CatalogLoader } from './services/catalog/CatalogLoader.js';
export { getCatalogStatistics, type CatalogStatistics } from './services/catalog/statistics.js';
export { getApplicableThresholds, type ApplicableThresholds } from './services/catalog/thresholds.js';
export { RequirementMatcher } from './services/matching/RequirementMatcher.js';
export { RuleProcessor, type RuleProcessingResult } from './services/rules/RuleProcessor.js';
export { RuleSession } from './services/rules/RuleSession.js';
export { ResultFormatter } from './services/formatting/ResultFormatter.js';
export { createPromptContext } from './services/formatting/promptContext.js';
export type * from './services/formatting/types.js';
export { CompliancePipeline, type CompliancePipelineOptions } from './services/compliance/CompliancePipeline.js';

export {
  CatalogUnavailableError,
  CatalogValidationError,
  CatalogLoadError,
  InvalidProfileError,
  ConfigurationError,
} from './utils/errors.js';
export type { RuleThresholds } from './config/validation.js';
