import type { BusinessProfile, BusinessProfileSummary } from '../../domain/entities/BusinessProfile.js';
import type { RequirementCategory } from '../../domain/entities/Requirement.js';
import type { Priority } from '../../domain/entities/RequirementMatch.js';
import type { DataQualityWarning, RuleConflict } from '../../domain/entities/RuleConflict.js';

export interface FormattedRequirement {
  requirementId: string;
  chapter: number;
  section: string;
  category: RequirementCategory;
  categoryLabel: string;
  title: string;
  bodyText: string;
  matchReasons: string[];
  priority: Priority;
  priorityLabel: string;
  standards: string[];
  certifications: string[];
}

export interface CategoryGroup {
  category: RequirementCategory;
  categoryLabel: string;
  /** Lowest priority number among the group's requirements. */
  priority: Priority;
  requirements: FormattedRequirement[];
  combinedText: string;
  requirementCount: number;
}

export interface MatchStatistics {
  totalRequirements: number;
  byCategory: Partial<Record<RequirementCategory, number>>;
  byPriority: {
    critical: number;
    important: number;
    recommended: number;
  };
  byChapter: Record<string, number>;
  mostCommonCategory: RequirementCategory | null;
}

export interface FormattedResult {
  businessProfile: BusinessProfile;
  businessSummary: BusinessProfileSummary;
  applicableRequirements: FormattedRequirement[];
  requirementsByCategory: CategoryGroup[];
  priorityRequirements: FormattedRequirement[];
  /** Every match with its body text and justification. */
  fullText: string;
  /** Bullets for priority 1 and 2 matches only. */
  summaryText: string;
  profileText: string;
  totalRequirements: number;
  processingTimestamp: string;
  matchStatistics: MatchStatistics;
  conflictsResolved: RuleConflict[];
  dataQualityWarnings: DataQualityWarning[];
}

export interface FormatOptions {
  warnings?: readonly DataQualityWarning[];
  now?: () => Date;
}
