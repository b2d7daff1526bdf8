import type { RequirementMatch } from '../../domain/entities/RequirementMatch.js';

const NUMERIC_SEGMENT = /^\d+$/;

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// numeric segments sort before any other segment
function compareSegments(left: string, right: string): number {
  const leftNumeric = NUMERIC_SEGMENT.test(left);
  const rightNumeric = NUMERIC_SEGMENT.test(right);

  if (leftNumeric && rightNumeric) {
    return Number(left) - Number(right) || compareText(left, right);
  }
  if (leftNumeric !== rightNumeric) {
    return leftNumeric ? -1 : 1;
  }
  return compareText(left, right);
}

/** Dotted sections compare segment by segment; a section sorts after its own prefix. */
export function compareSections(a: string, b: string): number {
  const left = a.split('.');
  const right = b.split('.');
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const order = compareSegments(left[i] ?? '', right[i] ?? '');
    if (order !== 0) return order;
  }

  return left.length - right.length;
}

export function compareMatches(a: RequirementMatch, b: RequirementMatch): number {
  return (
    a.priority - b.priority ||
    a.requirement.chapter - b.requirement.chapter ||
    compareSections(a.requirement.section, b.requirement.section)
  );
}

export function sortMatches(matches: readonly RequirementMatch[]): RequirementMatch[] {
  return [...matches].sort(compareMatches);
}
