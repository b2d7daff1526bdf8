import { logger } from '../../../utils/logger.js';
import type { RequirementMatch } from '../../../domain/entities/RequirementMatch.js';
import { sortMatches } from '../../matching/ordering.js';

/**
 * First occurrence of a requirement id wins. Input is expected in
 * (priority, chapter, section) order, as the matcher emits it, so the kept
 * copy is the highest-priority one.
 */
export function deduplicateMatches(matches: readonly RequirementMatch[]): RequirementMatch[] {
  const seen = new Set<string>();
  const unique: RequirementMatch[] = [];

  for (const match of matches) {
    if (!seen.has(match.requirement.id)) {
      seen.add(match.requirement.id);
      unique.push(match);
    }
  }

  if (unique.length !== matches.length) {
    logger.info({ removed: matches.length - unique.length }, 'Removed duplicate requirements');
  }

  return sortMatches(unique);
}
