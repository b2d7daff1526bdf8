import { logger } from '../../utils/logger.js';
import { CatalogUnavailableError } from '../../utils/errors.js';
import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';
import type { RequirementCatalog } from '../../domain/entities/Catalog.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import type { RequirementMatch } from '../../domain/entities/RequirementMatch.js';
import { checkCapacityGate, checkFeatureGate, checkSizeGate, type GateResult } from './gates.js';
import { initialPriority } from './priority.js';
import { sortMatches } from './ordering.js';

export class RequirementMatcher {
  /**
   * Evaluates every catalog requirement against the profile. A missing or
   * empty catalog raises CatalogUnavailableError so that callers never
   * mistake it for a profile with nothing applicable.
   */
  match(profile: BusinessProfile, catalog: RequirementCatalog | null | undefined): RequirementMatch[] {
    if (!catalog || catalog.requirements.length === 0) {
      logger.error('No requirement catalog loaded');
      throw new CatalogUnavailableError('No requirement catalog loaded');
    }

    logger.info(
      {
        sizeSqm: profile.sizeSqm,
        capacityPeople: profile.capacityPeople,
        features: profile.specialFeatures,
      },
      'Matching requirements'
    );

    const matches: RequirementMatch[] = [];
    for (const requirement of catalog.requirements) {
      const match = this.evaluate(requirement, profile, catalog);
      if (match) {
        matches.push(match);
      }
    }

    logger.info({ count: matches.length }, 'Found applicable requirements');
    return sortMatches(matches);
  }

  private evaluate(
    requirement: Requirement,
    profile: BusinessProfile,
    catalog: RequirementCatalog
  ): RequirementMatch | null {
    const gates: GateResult[] = [
      checkSizeGate(requirement.sizeRange, profile.sizeSqm),
      checkCapacityGate(requirement.capacityRange, profile.capacityPeople),
      checkFeatureGate(requirement.requiredFeatures, profile.specialFeatures),
    ];

    const matchReasons: string[] = [];
    for (const gate of gates) {
      if (!gate.passed) {
        return null;
      }
      if (gate.reason) {
        matchReasons.push(gate.reason);
      }
    }

    return {
      requirement,
      matchReasons,
      priority: initialPriority(requirement.category, profile, catalog.rules),
    };
  }
}
