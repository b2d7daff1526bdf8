import { logger } from '../../utils/logger.js';
import type { BusinessProfile } from '../../domain/entities/BusinessProfile.js';
import type { RequirementCategory } from '../../domain/entities/Requirement.js';
import type { Priority, RequirementMatch } from '../../domain/entities/RequirementMatch.js';
import type { RuleConflict } from '../../domain/entities/RuleConflict.js';
import { CATEGORY_LABELS, PRIORITY_LABELS } from '../../domain/labels.js';
import { summarizeProfile } from '../../domain/profile/summary.js';
import { renderCategoryText, renderFullText, renderProfileText, renderSummaryText } from './renderers.js';
import type {
  CategoryGroup,
  FormatOptions,
  FormattedRequirement,
  FormattedResult,
  MatchStatistics,
} from './types.js';

export class ResultFormatter {
  format(
    matches: readonly RequirementMatch[],
    profile: BusinessProfile,
    conflicts: readonly RuleConflict[] = [],
    options: FormatOptions = {}
  ): FormattedResult {
    logger.debug({ count: matches.length }, 'Formatting requirement matches');

    const now = options.now ?? (() => new Date());

    return {
      businessProfile: profile,
      businessSummary: summarizeProfile(profile),
      applicableRequirements: matches.map(match => this.toRecord(match)),
      requirementsByCategory: this.groupByCategory(matches),
      priorityRequirements: matches.filter(match => match.priority === 1).map(match => this.toRecord(match)),
      fullText: renderFullText(matches),
      summaryText: renderSummaryText(matches),
      profileText: renderProfileText(profile),
      totalRequirements: matches.length,
      processingTimestamp: now().toISOString(),
      matchStatistics: this.computeStatistics(matches),
      conflictsResolved: conflicts.map(conflict => ({ ...conflict })),
      dataQualityWarnings: (options.warnings ?? []).map(warning => ({ ...warning })),
    };
  }

  computeStatistics(matches: readonly RequirementMatch[]): MatchStatistics {
    const byCategory: Partial<Record<RequirementCategory, number>> = {};
    const byChapter: Record<string, number> = {};
    const byPriority: Record<Priority, number> = { 1: 0, 2: 0, 3: 0 };

    for (const { requirement, priority } of matches) {
      byCategory[requirement.category] = (byCategory[requirement.category] ?? 0) + 1;
      const chapterKey = `Chapter ${requirement.chapter}`;
      byChapter[chapterKey] = (byChapter[chapterKey] ?? 0) + 1;
      byPriority[priority] += 1;
    }

    // ties go to the category seen first
    let mostCommonCategory: RequirementCategory | null = null;
    let highest = 0;
    for (const { requirement } of matches) {
      const count = byCategory[requirement.category] ?? 0;
      if (count > highest) {
        highest = count;
        mostCommonCategory = requirement.category;
      }
    }

    return {
      totalRequirements: matches.length,
      byCategory,
      byPriority: {
        critical: byPriority[1],
        important: byPriority[2],
        recommended: byPriority[3],
      },
      byChapter,
      mostCommonCategory,
    };
  }

  private toRecord({ requirement, matchReasons, priority }: RequirementMatch): FormattedRequirement {
    return {
      requirementId: requirement.id,
      chapter: requirement.chapter,
      section: requirement.section,
      category: requirement.category,
      categoryLabel: CATEGORY_LABELS[requirement.category],
      title: requirement.title,
      bodyText: requirement.bodyText,
      matchReasons: [...matchReasons],
      priority,
      priorityLabel: PRIORITY_LABELS[priority],
      standards: [...requirement.standards],
      certifications: [...requirement.certifications],
    };
  }

  private groupByCategory(matches: readonly RequirementMatch[]): CategoryGroup[] {
    const groups = new Map<RequirementCategory, RequirementMatch[]>();
    for (const match of matches) {
      const group = groups.get(match.requirement.category);
      if (group) {
        group.push(match);
      } else {
        groups.set(match.requirement.category, [match]);
      }
    }

    const categories: CategoryGroup[] = [];
    for (const [category, categoryMatches] of groups) {
      categories.push({
        category,
        categoryLabel: CATEGORY_LABELS[category],
        priority: categoryMatches.reduce<Priority>((lowest, m) => (m.priority < lowest ? m.priority : lowest), 3),
        requirements: categoryMatches.map(match => this.toRecord(match)),
        combinedText: renderCategoryText(categoryMatches),
        requirementCount: categoryMatches.length,
      });
    }

    return categories.sort(
      (a, b) => a.priority - b.priority || (a.category < b.category ? -1 : a.category > b.category ? 1 : 0)
    );
  }
}
