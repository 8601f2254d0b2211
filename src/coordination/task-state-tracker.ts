/**
 * Task State Tracker
 *
 * Sole owner of runtime task state for one workflow run.
 * Every transition is checked against the task lifecycle:
 *
 *   PENDING -> ASSIGNED -> IN_PROGRESS -> COMPLETED | FAILED | BLOCKED
 *
 * Callers only ever receive frozen snapshots.
 */

import { TaskStatus, isValidTaskTransition } from '../models/enums';
import type { TrackedTask } from '../models/tracked-task';
import { ErrorCode } from '../errors/error-codes';
import { InvalidTransitionError, OrchestratorError } from '../errors/orchestrator-error';
import type { WorkflowLogger } from '../logging/workflow-logger';

interface TaskEntry {
  taskId: string;
  description: string;
  dependencies: string[];
  status: TaskStatus;
  workerId?: string;
  progress: number;
  result?: unknown;
  error?: string;
  questions?: string[];
  metadata: Record<string, unknown>;
  createdAt: string;
  assignedAt?: string;
  startedAt?: string;
  completedAt?: string;
}

export interface TrackerStats {
  totalTasks: number;
  statusCounts: Record<TaskStatus, number>;
  overallProgress: number;
  readyTasks: number;
}

function snapshot(entry: TaskEntry): TrackedTask {
  return Object.freeze({
    ...entry,
    dependencies: Object.freeze([...entry.dependencies]),
    questions: entry.questions ? Object.freeze([...entry.questions]) : undefined,
    metadata: Object.freeze({ ...entry.metadata }),
  });
}

function emptyStatusCounts(): Record<TaskStatus, number> {
  return {
    [TaskStatus.PENDING]: 0,
    [TaskStatus.ASSIGNED]: 0,
    [TaskStatus.IN_PROGRESS]: 0,
    [TaskStatus.COMPLETED]: 0,
    [TaskStatus.FAILED]: 0,
    [TaskStatus.BLOCKED]: 0,
  };
}

export class TaskStateTracker {
  private readonly tasks: Map<string, TaskEntry> = new Map();
  private readonly logger?: WorkflowLogger;
  private readonly workflowId?: string;

  constructor(options: { logger?: WorkflowLogger; workflowId?: string } = {}) {
    this.logger = options.logger;
    this.workflowId = options.workflowId;
  }

  /**
   * Register a task as PENDING. A repeated id leaves the existing task untouched.
   */
  addTask(
    taskId: string,
    description: string,
    dependencies: readonly string[] = [],
    metadata: Record<string, unknown> = {}
  ): TrackedTask {
    const existing = this.tasks.get(taskId);
    if (existing) {
      this.logger?.warn('TASK_STATE', `Task ${taskId} already tracked`, {
        taskId,
        workflowId: this.workflowId,
      });
      return snapshot(existing);
    }

    const entry: TaskEntry = {
      taskId,
      description,
      dependencies: [...new Set(dependencies)],
      status: TaskStatus.PENDING,
      progress: 0,
      metadata: { ...metadata },
      createdAt: new Date().toISOString(),
    };
    this.tasks.set(taskId, entry);

    this.logger?.debug('TASK_STATE', `Tracking task ${taskId}`, {
      taskId,
      workflowId: this.workflowId,
      details: { dependencies: entry.dependencies },
    });

    return snapshot(entry);
  }

  assign(taskId: string, workerId: string): TrackedTask {
    const entry = this.transition(taskId, TaskStatus.ASSIGNED);
    entry.workerId = workerId;
    entry.assignedAt = new Date().toISOString();
    return snapshot(entry);
  }

  start(taskId: string): TrackedTask {
    const entry = this.transition(taskId, TaskStatus.IN_PROGRESS);
    entry.startedAt = new Date().toISOString();
    return snapshot(entry);
  }

  /**
   * Record worker progress, clamped to [0, 1]. Ignored unless the task is
   * IN_PROGRESS.
   */
  updateProgress(taskId: string, progress: number): TrackedTask {
    const entry = this.require(taskId);

    if (typeof progress !== 'number' || !Number.isFinite(progress)) {
      throw new OrchestratorError(ErrorCode.E303_PROGRESS_OUT_OF_RANGE, `${taskId}: ${String(progress)}`, {
        taskId,
      });
    }

    if (entry.status !== TaskStatus.IN_PROGRESS) {
      this.logger?.debug('TASK_STATE', `Progress ignored for ${taskId} in ${entry.status}`, {
        taskId,
        workflowId: this.workflowId,
      });
      return snapshot(entry);
    }

    entry.progress = Math.min(1, Math.max(0, progress));
    return snapshot(entry);
  }

  complete(taskId: string, result?: unknown): TrackedTask {
    const entry = this.transition(taskId, TaskStatus.COMPLETED);
    entry.progress = 1;
    entry.result = result;
    entry.completedAt = new Date().toISOString();
    return snapshot(entry);
  }

  fail(taskId: string, error: string): TrackedTask {
    const entry = this.transition(taskId, TaskStatus.FAILED);
    entry.error = error;
    entry.completedAt = new Date().toISOString();
    return snapshot(entry);
  }

  /**
   * Park a task that needs input the worker could not resolve
   */
  block(taskId: string, questions: readonly string[]): TrackedTask {
    const entry = this.transition(taskId, TaskStatus.BLOCKED);
    entry.questions = [...questions];
    entry.completedAt = new Date().toISOString();
    return snapshot(entry);
  }

  getTask(taskId: string): TrackedTask | undefined {
    const entry = this.tasks.get(taskId);
    return entry ? snapshot(entry) : undefined;
  }

  getTasks(): TrackedTask[] {
    return [...this.tasks.values()].map(snapshot);
  }

  getTasksByStatus(status: TaskStatus): TrackedTask[] {
    return [...this.tasks.values()].filter((t) => t.status === status).map(snapshot);
  }

  getTasksByWorker(workerId: string): TrackedTask[] {
    return [...this.tasks.values()].filter((t) => t.workerId === workerId).map(snapshot);
  }

  /**
   * PENDING task ids whose dependencies are all COMPLETED
   */
  getReadyTasks(): string[] {
    const ready: string[] = [];
    for (const entry of this.tasks.values()) {
      if (entry.status !== TaskStatus.PENDING) {
        continue;
      }
      const satisfied = entry.dependencies.every(
        (dep) => this.tasks.get(dep)?.status === TaskStatus.COMPLETED
      );
      if (satisfied) {
        ready.push(entry.taskId);
      }
    }
    return ready;
  }

  /**
   * Mean progress over all tracked tasks; 0 when nothing is tracked
   */
  getOverallProgress(): number {
    if (this.tasks.size === 0) {
      return 0;
    }
    let total = 0;
    for (const entry of this.tasks.values()) {
      total += entry.progress;
    }
    return total / this.tasks.size;
  }

  getStats(): TrackerStats {
    const statusCounts = emptyStatusCounts();
    for (const entry of this.tasks.values()) {
      statusCounts[entry.status]++;
    }
    return {
      totalTasks: this.tasks.size,
      statusCounts,
      overallProgress: this.getOverallProgress(),
      readyTasks: this.getReadyTasks().length,
    };
  }

  clear(): void {
    this.tasks.clear();
  }

  private require(taskId: string): TaskEntry {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      throw new OrchestratorError(ErrorCode.E301_TASK_NOT_FOUND, taskId, { taskId });
    }
    return entry;
  }

  private transition(taskId: string, to: TaskStatus): TaskEntry {
    const entry = this.require(taskId);
    const from = entry.status;

    if (!isValidTaskTransition(from, to)) {
      this.logger?.error('TASK_STATE', `Rejected transition ${from} -> ${to}`, {
        taskId,
        workflowId: this.workflowId,
      });
      throw new InvalidTransitionError(taskId, from, to);
    }

    entry.status = to;
    this.logger?.info('TASK_STATE', `${from} -> ${to}`, { taskId, workflowId: this.workflowId });
    return entry;
  }
}
