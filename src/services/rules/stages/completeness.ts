import { RequirementCategory } from '../../../domain/entities/Requirement.js';
import type { RequirementMatch } from '../../../domain/entities/RequirementMatch.js';
import type { DataQualityWarning } from '../../../domain/entities/RuleConflict.js';
import { SpecialFeature } from '../../../domain/entities/SpecialFeature.js';
import type { BusinessProfile } from '../../../domain/entities/BusinessProfile.js';
import { hasFeature } from '../../../domain/profile/validation.js';

export const MANDATORY_CATEGORIES: readonly RequirementCategory[] = [
  RequirementCategory.FIRE_EQUIPMENT,
  RequirementCategory.CERTIFICATIONS,
];

export function checkCompleteness(
  matches: readonly RequirementMatch[],
  profile: BusinessProfile
): DataQualityWarning[] {
  const present = new Set(matches.map(m => m.requirement.category));
  const warnings: DataQualityWarning[] = [];

  const missing = MANDATORY_CATEGORIES.filter(category => !present.has(category));
  if (missing.length > 0) {
    warnings.push({
      code: 'MISSING_MANDATORY_CATEGORY',
      message: `Missing mandatory categories: ${missing.join(', ')}`,
      details: { missing },
    });
  }

  if (hasFeature(profile, SpecialFeature.GAS_USAGE) && !present.has(RequirementCategory.GAS)) {
    warnings.push({
      code: 'GAS_WITHOUT_GAS_REQUIREMENTS',
      message: 'Gas usage specified but no gas requirements found',
    });
  }

  return warnings;
}
