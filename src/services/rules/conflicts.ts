import { RequirementCategory, type Requirement } from '../../domain/entities/Requirement.js';
import type { RequirementMatch } from '../../domain/entities/RequirementMatch.js';
import type { ConflictBasis } from '../../domain/entities/RuleConflict.js';

const OVERLAPPING_CATEGORIES: ReadonlySet<RequirementCategory> = new Set([
  RequirementCategory.FIRE_EQUIPMENT,
  RequirementCategory.ELECTRICAL,
  RequirementCategory.SIGNAGE,
]);

export function conflictBasis(a: Requirement, b: Requirement): ConflictBasis | null {
  if (a.chapter === b.chapter) {
    return null;
  }
  if (a.category === b.category && OVERLAPPING_CATEGORIES.has(a.category)) {
    return 'same_category';
  }
  if (a.title === b.title) {
    return 'identical_title';
  }
  return null;
}

export interface ConflictHit {
  match: RequirementMatch;
  basis: ConflictBasis;
}

export function findConflict(
  candidate: RequirementMatch,
  against: readonly RequirementMatch[]
): ConflictHit | null {
  for (const match of against) {
    const basis = conflictBasis(match.requirement, candidate.requirement);
    if (basis) {
      return { match, basis };
    }
  }
  return null;
}
