/**
 * Tracked task and result models
 */

import { TaskStatus } from './enums';

/**
 * Readonly view of a task's runtime state.
 * Only the TaskStateTracker produces these.
 */
export interface TrackedTask {
  readonly taskId: string;
  readonly description: string;
  readonly dependencies: readonly string[];
  readonly status: TaskStatus;
  readonly workerId?: string;
  /** 0.0 to 1.0 */
  readonly progress: number;
  readonly result?: unknown;
  readonly error?: string;
  /** Clarification questions reported by the worker when BLOCKED */
  readonly questions?: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createdAt: string;
  readonly assignedAt?: string;
  readonly startedAt?: string;
  readonly completedAt?: string;
}

/**
 * Output recorded for one successful dispatch
 */
export interface Result {
  readonly resultId: string;
  readonly taskId: string;
  readonly workerId: string;
  readonly output: unknown;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
}
