import { logger } from '../../../utils/logger.js';
import { LARGE_BUSINESS_CHAPTER, SMALL_BUSINESS_CHAPTER } from '../../../domain/entities/Requirement.js';
import type { BusinessProfile } from '../../../domain/entities/BusinessProfile.js';
import type { RuleThresholds } from '../../../config/validation.js';
import type { RequirementMatch } from '../../../domain/entities/RequirementMatch.js';
import type { RuleConflict } from '../../../domain/entities/RuleConflict.js';
import { findConflict } from '../conflicts.js';
import type { StageContext, StageResult } from './types.js';

export function primaryChapter(profile: BusinessProfile, rules: RuleThresholds): number {
  return profile.sizeSqm <= rules.smallBusinessMaxSqm && profile.capacityPeople <= rules.smallBusinessMaxPeople
    ? SMALL_BUSINESS_CHAPTER
    : LARGE_BUSINESS_CHAPTER;
}

export function reconcileChapters(
  matches: readonly RequirementMatch[],
  { profile, rules }: StageContext
): StageResult {
  const smallBusiness = matches.filter(m => m.requirement.chapter === SMALL_BUSINESS_CHAPTER);
  const largeBusiness = matches.filter(m => m.requirement.chapter === LARGE_BUSINESS_CHAPTER);

  if (smallBusiness.length === 0 || largeBusiness.length === 0) {
    return { matches: [...matches], conflicts: [] };
  }

  logger.info(
    { chapter5: smallBusiness.length, chapter6: largeBusiness.length },
    'Resolving conflicts between chapters'
  );

  const primary = primaryChapter(profile, rules);
  const secondary = primary === SMALL_BUSINESS_CHAPTER ? LARGE_BUSINESS_CHAPTER : SMALL_BUSINESS_CHAPTER;
  const primaryMatches = primary === SMALL_BUSINESS_CHAPTER ? smallBusiness : largeBusiness;

  const conflicts: RuleConflict[] = [];
  const kept = matches.filter(match => {
    if (match.requirement.chapter !== secondary) {
      return true;
    }
    const hit = findConflict(match, primaryMatches);
    if (!hit) {
      return true;
    }
    conflicts.push({
      keptRequirementId: hit.match.requirement.id,
      droppedRequirementId: match.requirement.id,
      conflictType: 'chapter_overlap',
      basis: hit.basis,
      resolution: `Prefer chapter ${primary} requirement`,
    });
    return false;
  });

  if (conflicts.length > 0) {
    logger.info({ resolved: conflicts.length, primaryChapter: primary }, 'Resolved chapter conflicts');
  }

  return { matches: kept, conflicts };
}
