import { UNBOUNDED_MAX, UNBOUNDED_MIN, type ApplicabilityRange } from '../../domain/entities/Requirement.js';
import type { SpecialFeature } from '../../domain/entities/SpecialFeature.js';
import { FEATURE_LABELS } from '../../domain/labels.js';

export type GateResult = { passed: false } | { passed: true; reason: string | null };

interface RangeWording {
  subject: string;
  unit: string;
}

const SIZE_WORDING: RangeWording = { subject: 'גודל העסק', unit: 'מ"ר' };
const CAPACITY_WORDING: RangeWording = { subject: 'תפוסת העסק', unit: 'איש' };

function checkRange(range: ApplicabilityRange, value: number, wording: RangeWording): GateResult {
  if (value < range.min || value > range.max) {
    return { passed: false };
  }

  const hasMin = range.min > UNBOUNDED_MIN;
  const hasMax = range.max < UNBOUNDED_MAX;
  const { subject, unit } = wording;
  const measured = `${subject} (${value} ${unit})`;

  if (hasMin && hasMax) {
    return { passed: true, reason: `${measured} בטווח ${range.min}-${range.max} ${unit}` };
  }
  if (hasMin) {
    return { passed: true, reason: `${measured} מעל ${range.min} ${unit}` };
  }
  if (hasMax) {
    return { passed: true, reason: `${measured} עד ${range.max} ${unit}` };
  }
  return { passed: true, reason: null };
}

export function checkSizeGate(range: ApplicabilityRange, sizeSqm: number): GateResult {
  return checkRange(range, sizeSqm, SIZE_WORDING);
}

export function checkCapacityGate(range: ApplicabilityRange, capacityPeople: number): GateResult {
  return checkRange(range, capacityPeople, CAPACITY_WORDING);
}

/**
 * Passes vacuously when the requirement names no features; otherwise at
 * least one named feature must be declared by the business.
 */
export function checkFeatureGate(
  requiredFeatures: readonly SpecialFeature[],
  businessFeatures: readonly SpecialFeature[]
): GateResult {
  if (requiredFeatures.length === 0) {
    return { passed: true, reason: null };
  }

  const matching = requiredFeatures.filter(feature => businessFeatures.includes(feature));
  if (matching.length === 0) {
    return { passed: false };
  }

  return {
    passed: true,
    reason: `מאפיינים מיוחדים: ${matching.map(feature => FEATURE_LABELS[feature]).join(', ')}`,
  };
}
