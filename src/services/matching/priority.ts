import type { RuleThresholds } from '../../config/validation.js';
import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';
import { RequirementCategory } from '../../domain/entities/Requirement.js';
import type { Priority } from '../../domain/entities/RequirementMatch.js';
import { SpecialFeature } from '../../domain/entities/SpecialFeature.js';
import { hasFeature } from '../../domain/profile/validation.js';

export const DEFAULT_CATEGORY_PRIORITY: Record<RequirementCategory, Priority> = {
  [RequirementCategory.FIRE_EQUIPMENT]: 1,
  [RequirementCategory.ELECTRICAL]: 1,
  [RequirementCategory.CERTIFICATIONS]: 1,
  [RequirementCategory.GAS]: 2,
  [RequirementCategory.SIGNAGE]: 2,
  [RequirementCategory.GENERAL]: 3,
};

export function isLargeBusiness(profile: BusinessProfile, rules: RuleThresholds): boolean {
  return profile.sizeSqm > rules.largeBusinessMinSqm || profile.capacityPeople > rules.largeBusinessMinPeople;
}

export function initialPriority(
  category: RequirementCategory,
  profile: BusinessProfile,
  rules: RuleThresholds
): Priority {
  switch (category) {
    case RequirementCategory.FIRE_EQUIPMENT:
    case RequirementCategory.ELECTRICAL:
    case RequirementCategory.CERTIFICATIONS:
      return 1;
    case RequirementCategory.GAS:
      if (hasFeature(profile, SpecialFeature.GAS_USAGE)) return 1;
      break;
    case RequirementCategory.SIGNAGE:
      if (isLargeBusiness(profile, rules)) return 2;
      break;
    case RequirementCategory.GENERAL:
      break;
  }
  return DEFAULT_CATEGORY_PRIORITY[category];
}
