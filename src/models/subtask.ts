/**
 * Task analysis and subtask models
 */

import { TaskComplexity, TaskStatus } from './enums';

/**
 * Result of classifying a raw task description.
 * Produced once per raw task and never mutated.
 */
export interface TaskAnalysis {
  readonly description: string;
  readonly complexity: TaskComplexity;
  /** Domain tags, highest score first */
  readonly domains: readonly string[];
  readonly domainScores: Readonly<Record<string, number>>;
  readonly requiresDecomposition: boolean;
  readonly estimatedSubtasks: number;
  /** Requirement fragments extracted from the description */
  readonly requirements: readonly string[];
}

/**
 * Unit of work produced by decomposition.
 *
 * `parentId` records tree lineage only; scheduling uses `dependencies`.
 * `status` is the status at decomposition time - runtime status lives in
 * the TaskStateTracker.
 */
export interface SubTask {
  readonly id: string;
  readonly description: string;
  readonly parentId?: string;
  readonly dependencies: readonly string[];
  readonly domain: string;
  readonly complexity: TaskComplexity;
  readonly status: TaskStatus;
  readonly createdAt: string;
}

export interface SubTaskInput {
  id: string;
  description: string;
  parentId?: string;
  dependencies?: readonly string[];
  domain?: string;
  complexity?: TaskComplexity;
}

/**
 * Create a subtask, de-duplicating its dependency list
 */
export function createSubTask(input: SubTaskInput): SubTask {
  return {
    id: input.id,
    description: input.description,
    parentId: input.parentId,
    dependencies: [...new Set(input.dependencies ?? [])],
    domain: input.domain ?? 'general',
    complexity: input.complexity ?? TaskComplexity.SIMPLE,
    status: TaskStatus.PENDING,
    createdAt: new Date().toISOString(),
  };
}
