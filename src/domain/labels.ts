import { RequirementCategory } from './entities/Requirement.js';
import { SpecialFeature } from './entities/SpecialFeature.js';
import type { Priority } from './entities/RequirementMatch.js';

export const CATEGORY_LABELS: Record<RequirementCategory, string> = {
  [RequirementCategory.FIRE_EQUIPMENT]: 'ציוד כיבוי',
  [RequirementCategory.ELECTRICAL]: 'מערכות חשמל',
  [RequirementCategory.GAS]: 'מערכות גז',
  [RequirementCategory.SIGNAGE]: 'שילוט',
  [RequirementCategory.CERTIFICATIONS]: 'אישורים',
  [RequirementCategory.GENERAL]: 'דרישות כלליות',
};

export const FEATURE_LABELS: Record<SpecialFeature, string> = {
  [SpecialFeature.GAS_USAGE]: 'שימוש בגז',
  [SpecialFeature.DELIVERY]: 'משלוחים',
  [SpecialFeature.ALCOHOL]: 'משקאות משכרים',
  [SpecialFeature.MEAT]: 'מגיש בשר',
};

export const PRIORITY_LABELS: Record<Priority, string> = {
  1: 'קריטי',
  2: 'חשוב',
  3: 'מומלץ',
};
