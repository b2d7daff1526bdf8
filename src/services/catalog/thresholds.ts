import type {
  AreaThreshold,
  CapacityThreshold,
  CombinedThreshold,
  RequirementCatalog,
  TriggerType,
} from '../../domain/entities/Catalog.js';
import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';

export interface ApplicableThresholds {
  area: AreaThreshold[];
  capacity: CapacityThreshold[];
  combined: CombinedThreshold[];
}

function triggers(triggerType: TriggerType, value: number, threshold: number): boolean {
  switch (triggerType) {
    case 'maximum':
      return value <= threshold;
    case 'minimum':
      return value >= threshold;
  }
}

export function getApplicableThresholds(
  catalog: RequirementCatalog,
  profile: BusinessProfile
): ApplicableThresholds {
  return {
    area: catalog.thresholds.area.filter(t => triggers(t.triggerType, profile.sizeSqm, t.thresholdSqm)),
    capacity: catalog.thresholds.capacity.filter(t =>
      triggers(t.triggerType, profile.capacityPeople, t.thresholdPeople)
    ),
    combined: catalog.thresholds.combined.filter(
      t => profile.sizeSqm >= t.thresholdSqm && profile.capacityPeople >= t.thresholdPeople
    ),
  };
}
