import type { RequirementCatalog } from '../../domain/entities/Catalog.js';
import type { RequirementCategory } from '../../domain/entities/Requirement.js';

export interface CatalogStatistics {
  totalRequirements: number;
  requirementsByCategory: Partial<Record<RequirementCategory, number>>;
  requirementsByChapter: Record<string, number>;
  totalThresholds: {
    area: number;
    capacity: number;
    combined: number;
  };
}

export function getCatalogStatistics(catalog: RequirementCatalog): CatalogStatistics {
  const requirementsByCategory: Partial<Record<RequirementCategory, number>> = {};
  const requirementsByChapter: Record<string, number> = {};

  for (const requirement of catalog.requirements) {
    requirementsByCategory[requirement.category] = (requirementsByCategory[requirement.category] ?? 0) + 1;
    const chapterKey = `Chapter ${requirement.chapter}`;
    requirementsByChapter[chapterKey] = (requirementsByChapter[chapterKey] ?? 0) + 1;
  }

  return {
    totalRequirements: catalog.requirements.length,
    requirementsByCategory,
    requirementsByChapter,
    totalThresholds: {
      area: catalog.thresholds.area.length,
      capacity: catalog.thresholds.capacity.length,
      combined: catalog.thresholds.combined.length,
    },
  };
}
