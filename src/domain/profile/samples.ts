import { SpecialFeature } from '../entities/SpecialFeature.js';
import type { BusinessProfileInput } from './schema.js';

export type SampleProfileName =
  | 'small_simple'
  | 'medium_gas'
  | 'large_complex'
  | 'edge_case_chapter5'
  | 'edge_case_chapter6';

export const SAMPLE_PROFILES: Record<SampleProfileName, BusinessProfileInput> = {
  small_simple: {
    sizeSqm: 80,
    capacityPeople: 30,
    specialFeatures: [],
    businessName: 'קפה קטן',
  },
  medium_gas: {
    sizeSqm: 150,
    capacityPeople: 80,
    specialFeatures: [SpecialFeature.GAS_USAGE],
    businessName: 'מסעדה בינונית',
  },
  large_complex: {
    sizeSqm: 400,
    capacityPeople: 200,
    specialFeatures: [SpecialFeature.GAS_USAGE, SpecialFeature.DELIVERY, SpecialFeature.ALCOHOL],
    businessName: 'מסעדה גדולה',
  },
  // exactly on both small-business thresholds
  edge_case_chapter5: {
    sizeSqm: 150,
    capacityPeople: 50,
    specialFeatures: [SpecialFeature.GAS_USAGE],
    businessName: 'בדיקת גבול פרק 5',
  },
  edge_case_chapter6: {
    sizeSqm: 151,
    capacityPeople: 51,
    specialFeatures: [SpecialFeature.GAS_USAGE, SpecialFeature.DELIVERY],
    businessName: 'בדיקת גבול פרק 6',
  },
};

export function isSampleProfileName(name: string): name is SampleProfileName {
  return Object.prototype.hasOwnProperty.call(SAMPLE_PROFILES, name);
}
