export enum SpecialFeature {
  GAS_USAGE = 'gas_usage',
  DELIVERY = 'delivery',
  ALCOHOL = 'alcohol',
  MEAT = 'meat',
}

export const SPECIAL_FEATURES: readonly SpecialFeature[] = [
  SpecialFeature.GAS_USAGE,
  SpecialFeature.DELIVERY,
  SpecialFeature.ALCOHOL,
  SpecialFeature.MEAT,
];
