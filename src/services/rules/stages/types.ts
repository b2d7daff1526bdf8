import type { RuleThresholds } from '../../../config/validation.js';
import type { BusinessProfile } from '../../../domain/entities/BusinessProfile.js';
import type { RequirementMatch } from '../../../domain/entities/RequirementMatch.js';
import type { RuleConflict } from '../../../domain/entities/RuleConflict.js';

export interface StageContext {
  profile: BusinessProfile;
  rules: Readonly<RuleThresholds>;
}

export interface StageResult {
  matches: RequirementMatch[];
  conflicts: RuleConflict[];
}
