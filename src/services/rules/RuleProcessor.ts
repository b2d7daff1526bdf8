import type { RuleThresholds } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';
import type { RequirementMatch } from '../../domain/entities/RequirementMatch.js';
import { RuleSession } from './RuleSession.js';
import { applyThresholdBoundary } from './stages/boundary.js';
import { reconcileChapters } from './stages/reconcile.js';
import { applyFeatureRules } from './stages/featureRules.js';
import { deduplicateMatches } from './stages/deduplicate.js';
import { checkCompleteness } from './stages/completeness.js';
import type { StageContext } from './stages/types.js';

export interface RuleProcessingResult {
  matches: RequirementMatch[];
  session: RuleSession;
}

export class RuleProcessor {
  /** Pass the catalog's own `rules` so matching and rule stages share cut-offs. */
  constructor(private rules: Readonly<RuleThresholds>) {}

  /**
   * Runs the refinement stages in order. Input matches are never mutated;
   * conflicts and warnings are appended to the given session, which the
   * caller owns and resets between independent evaluations.
   */
  process(
    matches: readonly RequirementMatch[],
    profile: BusinessProfile,
    session: RuleSession = new RuleSession()
  ): RuleProcessingResult {
    logger.info({ sessionId: session.id, count: matches.length }, 'Processing raw matches through business rules');

    const context: StageContext = { profile, rules: this.rules };

    const boundary = applyThresholdBoundary(matches, context);
    session.recordConflicts(boundary.conflicts);

    const reconciled = reconcileChapters(boundary.matches, context);
    session.recordConflicts(reconciled.conflicts);

    const adjusted = applyFeatureRules(reconciled.matches, context);
    const finalMatches = deduplicateMatches(adjusted);

    const warnings = checkCompleteness(finalMatches, profile);
    for (const warning of warnings) {
      logger.warn({ sessionId: session.id, code: warning.code, details: warning.details }, warning.message);
    }
    session.recordWarnings(warnings);

    logger.info(
      {
        sessionId: session.id,
        count: finalMatches.length,
        categories: [...new Set(finalMatches.map(m => m.requirement.category))],
      },
      'Validation complete'
    );

    return { matches: finalMatches, session };
  }
}
