import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';
import type { RequirementMatch } from '../../domain/entities/RequirementMatch.js';
import { FEATURE_LABELS } from '../../domain/labels.js';

export const FULL_TEXT_SEPARATOR = `\n\n${'='.repeat(50)}\n\n`;

export function renderFullText(matches: readonly RequirementMatch[]): string {
  return matches
    .map(({ requirement, matchReasons }) =>
      [
        `פרק ${requirement.chapter} - סעיף ${requirement.section}`,
        requirement.title,
        '',
        requirement.bodyText,
        '',
        `סיבת החלה: ${matchReasons.join(' | ')}`,
      ].join('\n')
    )
    .join(FULL_TEXT_SEPARATOR);
}

export function renderSummaryText(matches: readonly RequirementMatch[]): string {
  const bullets = matches
    .filter(match => match.priority <= 2)
    .map(({ requirement, matchReasons }) => {
      const line = `סעיף ${requirement.section}: ${requirement.title}`;
      const firstReason = matchReasons[0];
      return firstReason ? `• ${line} (${firstReason})` : `• ${line}`;
    });

  return ['דרישות מרכזיות:', ...bullets].join('\n');
}

export function renderProfileText(profile: BusinessProfile): string {
  const features = profile.specialFeatures.map(feature => FEATURE_LABELS[feature]);
  const lines = ['פרופיל העסק:'];

  if (profile.businessName) {
    lines.push(`• שם העסק: ${profile.businessName}`);
  }
  lines.push(
    `• גודל: ${profile.sizeSqm} מ"ר`,
    `• תפוסה: ${profile.capacityPeople} איש`,
    `• מאפיינים מיוחדים: ${features.length > 0 ? features.join(', ') : 'ללא'}`,
    `• סוג עסק: ${profile.businessType}`
  );

  return lines.join('\n');
}

export function renderCategoryText(matches: readonly RequirementMatch[]): string {
  return matches
    .map(({ requirement }) => `סעיף ${requirement.section}: ${requirement.title}\n${requirement.bodyText}`)
    .join('\n\n');
}
