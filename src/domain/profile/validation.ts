import { ZodError } from 'zod';
import { InvalidProfileError } from '../../utils/errors.js';
import { SpecialFeature } from '../entities/SpecialFeature.js';
import type { BusinessProfile } from '../entities/BusinessProfile.js';
import { businessProfileSchema, questionnaireSchema } from './schema.js';

function describeIssues(error: ZodError): Array<{ field: string; message: string }> {
  return error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }));
}

/**
 * Rejects anything that breaks the profile invariants before it can reach
 * the matcher. The returned profile is frozen.
 */
export function validateProfile(input: unknown): BusinessProfile {
  const parsed = businessProfileSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidProfileError('Invalid business profile', describeIssues(parsed.error));
  }

  const { specialFeatures, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    specialFeatures: Object.freeze([...specialFeatures]),
  });
}

export function questionnaireToProfile(input: unknown): BusinessProfile {
  const parsed = questionnaireSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidProfileError('Invalid questionnaire response', describeIssues(parsed.error));
  }

  const answers = parsed.data;
  const specialFeatures: SpecialFeature[] = [];
  if (answers.usesGas) specialFeatures.push(SpecialFeature.GAS_USAGE);
  if (answers.servesMeat) specialFeatures.push(SpecialFeature.MEAT);
  if (answers.offersDelivery) specialFeatures.push(SpecialFeature.DELIVERY);
  if (answers.servesAlcohol) specialFeatures.push(SpecialFeature.ALCOHOL);

  return validateProfile({
    sizeSqm: answers.businessSizeSqm,
    capacityPeople: answers.seatingCapacity,
    specialFeatures,
    businessName: answers.businessName,
    notes: answers.additionalNotes,
  });
}

export function hasFeature(profile: BusinessProfile, feature: SpecialFeature): boolean {
  return profile.specialFeatures.includes(feature);
}
