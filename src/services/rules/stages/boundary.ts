import { logger } from '../../../utils/logger.js';
import { LARGE_BUSINESS_CHAPTER, SMALL_BUSINESS_CHAPTER } from '../../../domain/entities/Requirement.js';
import type { RequirementMatch } from '../../../domain/entities/RequirementMatch.js';
import type { RuleConflict } from '../../../domain/entities/RuleConflict.js';
import { findConflict } from '../conflicts.js';
import type { StageContext, StageResult } from './types.js';

/**
 * Either dimension sitting exactly on its small-business threshold makes the
 * small-business chapter authoritative over conflicting large-business matches.
 */
export function applyThresholdBoundary(
  matches: readonly RequirementMatch[],
  { profile, rules }: StageContext
): StageResult {
  const atBoundary =
    profile.sizeSqm === rules.smallBusinessMaxSqm || profile.capacityPeople === rules.smallBusinessMaxPeople;

  const smallBusiness = matches.filter(m => m.requirement.chapter === SMALL_BUSINESS_CHAPTER);
  const largeBusiness = matches.filter(m => m.requirement.chapter === LARGE_BUSINESS_CHAPTER);

  if (!atBoundary || smallBusiness.length === 0 || largeBusiness.length === 0) {
    return { matches: [...matches], conflicts: [] };
  }

  logger.info('Business at chapter 5 threshold boundary - applying chapter 5 rules');

  const conflicts: RuleConflict[] = [];
  const kept = matches.filter(match => {
    if (match.requirement.chapter !== LARGE_BUSINESS_CHAPTER) {
      return true;
    }
    const hit = findConflict(match, smallBusiness);
    if (!hit) {
      return true;
    }
    conflicts.push({
      keptRequirementId: hit.match.requirement.id,
      droppedRequirementId: match.requirement.id,
      conflictType: 'threshold_boundary',
      basis: hit.basis,
      resolution: `Business at chapter ${SMALL_BUSINESS_CHAPTER} threshold; prefer chapter ${SMALL_BUSINESS_CHAPTER} requirement`,
    });
    return false;
  });

  return { matches: kept, conflicts };
}
