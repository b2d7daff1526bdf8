export * from './SpecialFeature.js';
export * from './Requirement.js';
export * from './BusinessProfile.js';
export * from './RequirementMatch.js';
export * from './RuleConflict.js';
export * from './Catalog.js';
