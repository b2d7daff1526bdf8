import type {
  BusinessProfile,
  BusinessProfileSummary,
  CapacityCategory,
  SizeCategory,
} from '../entities/BusinessProfile.js';

function sizeCategory(sizeSqm: number): SizeCategory {
  if (sizeSqm <= 100) return 'Small';
  if (sizeSqm <= 300) return 'Medium';
  return 'Large';
}

function capacityCategory(capacityPeople: number): CapacityCategory {
  if (capacityPeople <= 50) return 'Low';
  if (capacityPeople <= 200) return 'Medium';
  return 'High';
}

export function summarizeProfile(profile: BusinessProfile): BusinessProfileSummary {
  const sizeComponent = Math.min(profile.sizeSqm / 1000, 0.5);
  const capacityComponent = Math.min(profile.capacityPeople / 500, 0.3);
  const featureComponent = profile.specialFeatures.length * 0.05;

  return {
    sizeCategory: sizeCategory(profile.sizeSqm),
    capacityCategory: capacityCategory(profile.capacityPeople),
    featureCount: profile.specialFeatures.length,
    complexityScore: Math.min(sizeComponent + capacityComponent + featureComponent, 1),
  };
}
