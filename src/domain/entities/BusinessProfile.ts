import type { SpecialFeature } from './SpecialFeature.js';

export interface BusinessProfile {
  sizeSqm: number;
  capacityPeople: number;
  specialFeatures: readonly SpecialFeature[];
  businessType: string;
  businessName?: string;
  notes?: string;
}

export type SizeCategory = 'Small' | 'Medium' | 'Large';
export type CapacityCategory = 'Low' | 'Medium' | 'High';

export interface BusinessProfileSummary {
  sizeCategory: SizeCategory;
  capacityCategory: CapacityCategory;
  featureCount: number;
  /** 0..1 */
  complexityScore: number;
}
