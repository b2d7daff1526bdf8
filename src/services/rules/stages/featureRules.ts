import { logger } from '../../../utils/logger.js';
import { RequirementCategory } from '../../../domain/entities/Requirement.js';
import type { Priority, RequirementMatch } from '../../../domain/entities/RequirementMatch.js';
import { SPECIAL_FEATURES, SpecialFeature } from '../../../domain/entities/SpecialFeature.js';
import type { StageContext } from './types.js';

export const DELIVERY_SIGNAGE_REASON = 'נדרש עבור שירותי משלוחים';
export const COMPLEX_BUSINESS_REASON = 'עסק מורכב עם מאפיינים מרובים';

type MatchTransform = (matches: readonly RequirementMatch[]) => RequirementMatch[];

const forceGasCritical: MatchTransform = matches =>
  matches.map((match): RequirementMatch =>
    match.requirement.category === RequirementCategory.GAS ? { ...match, priority: 1 } : match
  );

const noteDeliverySignage: MatchTransform = matches =>
  matches.map((match): RequirementMatch =>
    match.requirement.category === RequirementCategory.SIGNAGE
      ? { ...match, matchReasons: [...match.matchReasons, DELIVERY_SIGNAGE_REASON] }
      : match
  );

// Alcohol- and meat-specific requirements are already selected by the feature gate.
const unchanged: MatchTransform = matches => [...matches];

const FEATURE_RULES: Record<SpecialFeature, MatchTransform> = {
  [SpecialFeature.GAS_USAGE]: forceGasCritical,
  [SpecialFeature.DELIVERY]: noteDeliverySignage,
  [SpecialFeature.ALCOHOL]: unchanged,
  [SpecialFeature.MEAT]: unchanged,
};

export function raisePriority(priority: Priority): Priority {
  switch (priority) {
    case 1:
    case 2:
      return 1;
    case 3:
      return 2;
  }
}

const escalateComplexBusiness: MatchTransform = matches =>
  matches.map((match): RequirementMatch =>
    match.priority > 1
      ? {
          ...match,
          priority: raisePriority(match.priority),
          matchReasons: [...match.matchReasons, COMPLEX_BUSINESS_REASON],
        }
      : match
  );

export function applyFeatureRules(
  matches: readonly RequirementMatch[],
  { profile, rules }: StageContext
): RequirementMatch[] {
  let result = [...matches];

  for (const feature of SPECIAL_FEATURES) {
    if (profile.specialFeatures.includes(feature)) {
      result = FEATURE_RULES[feature](result);
    }
  }

  const distinctFeatures = new Set(profile.specialFeatures).size;
  if (distinctFeatures >= rules.complexFeatureCount) {
    logger.info({ features: distinctFeatures }, 'Complex business - escalating requirement priorities');
    result = escalateComplexBusiness(result);
  }

  return result;
}
