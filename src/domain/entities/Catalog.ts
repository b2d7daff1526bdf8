import type { RuleThresholds } from '../../config/validation.js';
import type { Requirement } from './Requirement.js';

export type TriggerType = 'maximum' | 'minimum';

export interface AreaThreshold {
  thresholdSqm: number;
  triggerType: TriggerType;
  context: string;
  section: string;
  chapter: number;
}

export interface CapacityThreshold {
  thresholdPeople: number;
  triggerType: TriggerType;
  context: string;
  section: string;
  chapter: number;
}

export interface CombinedThreshold {
  thresholdSqm: number;
  thresholdPeople: number;
  context: string;
  section: string;
}

export interface BusinessThresholds {
  area: readonly AreaThreshold[];
  capacity: readonly CapacityThreshold[];
  combined: readonly CombinedThreshold[];
}

export interface CatalogMetadata {
  sourceFile?: string;
  extractionDate?: string;
  chaptersProcessed: readonly number[];
}

export interface RequirementCatalog {
  metadata: CatalogMetadata;
  requirements: readonly Requirement[];
  thresholds: BusinessThresholds;
  rules: Readonly<RuleThresholds>;
}
