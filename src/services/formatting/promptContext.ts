import type { FormattedResult } from './types.js';

const REPORT_GUIDELINES = [
  'התמקד בדרישות הקריטיות והחשובות בלבד',
  'הסבר בשפה פשוטה ועסקית, לא משפטית',
  'תן עדיפות לצעדים מעשיים וברורים',
  'ציין זמני יישום ועלויות משוערות כאשר זה רלוונטי',
  'הדגש את הסיכונים של אי-עמידה בדרישות',
];

/** Context block handed to the report generator alongside its own prompt. */
export function createPromptContext(result: FormattedResult): string {
  const importantCategories = result.requirementsByCategory
    .filter(group => group.priority <= 2)
    .map(group => `${group.categoryLabel} (${group.requirementCount} דרישות)`);

  const categoriesText = importantCategories.length > 0 ? importantCategories.join(', ') : 'ללא קטגוריות מיוחדות';
  const { byPriority } = result.matchStatistics;

  return [
    result.profileText,
    '',
    `קטגוריות דרישות חשובות: ${categoriesText}`,
    '',
    result.summaryText,
    '',
    `סה"כ דרישות חלות: ${result.totalRequirements}`,
    `דרישות קריטיות: ${byPriority.critical}`,
    `דרישות חשובות: ${byPriority.important}`,
    '',
    'הנחיות לכתיבת הדוח:',
    ...REPORT_GUIDELINES.map((line, index) => `${index + 1}. ${line}`),
  ].join('\n');
}
