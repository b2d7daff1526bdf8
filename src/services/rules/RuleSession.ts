import { generateSessionId } from '../../utils/ids.js';
import type { DataQualityWarning, RuleConflict } from '../../domain/entities/RuleConflict.js';

/**
 * Per-evaluation log of resolved conflicts and data-quality warnings.
 * Entries accumulate across process() calls until reset().
 */
export class RuleSession {
  readonly id: string;
  private conflictLog: RuleConflict[] = [];
  private warningLog: DataQualityWarning[] = [];

  constructor(id: string = generateSessionId()) {
    this.id = id;
  }

  recordConflicts(conflicts: readonly RuleConflict[]): void {
    this.conflictLog.push(...conflicts);
  }

  recordWarnings(warnings: readonly DataQualityWarning[]): void {
    this.warningLog.push(...warnings);
  }

  conflicts(): RuleConflict[] {
    return [...this.conflictLog];
  }

  warnings(): DataQualityWarning[] {
    return [...this.warningLog];
  }

  reset(): void {
    this.conflictLog = [];
    this.warningLog = [];
  }
}
