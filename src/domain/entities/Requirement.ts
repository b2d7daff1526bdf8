import type { SpecialFeature } from './SpecialFeature.js';

export enum RequirementCategory {
  FIRE_EQUIPMENT = 'fire_equipment',
  ELECTRICAL = 'electrical',
  GAS = 'gas',
  SIGNAGE = 'signage',
  CERTIFICATIONS = 'certifications',
  GENERAL = 'general',
}

/** Sentinel bounds the extractor writes when the text names no limit. */
export const UNBOUNDED_MIN = 0;
export const UNBOUNDED_MAX = 9999;

export const SMALL_BUSINESS_CHAPTER = 5;
export const LARGE_BUSINESS_CHAPTER = 6;

/** Inclusive on both ends. */
export interface ApplicabilityRange {
  min: number;
  max: number;
}

export interface Requirement {
  id: string;
  chapter: number;
  section: string;
  category: RequirementCategory;
  title: string;
  bodyText: string;
  sizeRange: ApplicabilityRange;
  capacityRange: ApplicabilityRange;
  requiredFeatures: readonly SpecialFeature[];
  standards: readonly string[];
  certifications: readonly string[];
}
