export type ConflictType = 'threshold_boundary' | 'chapter_overlap';

export type ConflictBasis = 'same_category' | 'identical_title';

export interface RuleConflict {
  keptRequirementId: string;
  droppedRequirementId: string;
  conflictType: ConflictType;
  basis: ConflictBasis;
  resolution: string;
}

export type DataQualityWarningCode = 'MISSING_MANDATORY_CATEGORY' | 'GAS_WITHOUT_GAS_REQUIREMENTS';

export interface DataQualityWarning {
  code: DataQualityWarningCode;
  message: string;
  details?: Record<string, unknown>;
}
