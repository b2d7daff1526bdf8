import type { Requirement } from './Requirement.js';

/** 1 = critical, 2 = important, 3 = recommended */
export type Priority = 1 | 2 | 3;

export interface RequirementMatch {
  readonly requirement: Requirement;
  readonly matchReasons: readonly string[];
  readonly priority: Priority;
}
