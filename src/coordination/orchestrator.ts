/**
 * Orchestrator
 *
 * Drives one workflow run end to end:
 *
 *   IDLE -> PLANNING -> EXECUTING -> COMPLETED | FAILED
 *
 * Planning runs analyzer, decomposer, dependency mapper and execution planner
 * in order. Execution walks the plan step by step, dispatching ready tasks to
 * workers and publishing lifecycle messages on a per-run event bus.
 *
 * Structural problems (cycles, unknown references, duplicate ids) fail the
 * run and reject. Per-task failures only degrade it.
 */

import { v4 as uuidv4 } from 'uuid';
import { MessageType, OrchestratorState, TaskStatus, isValidOrchestratorTransition } from '../models/enums';
import { createMessage, type Message } from '../models/message';
import type { SubTask, TaskAnalysis } from '../models/subtask';
import type { TrackedTask } from '../models/tracked-task';
import { ErrorCode } from '../errors/error-codes';
import { CyclicDependencyError, OrchestratorError } from '../errors/orchestrator-error';
import { WorkflowLogger } from '../logging/workflow-logger';
import {
  ConfigurationManager,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from '../config/configuration-manager';
import { TaskAnalyzer } from '../planning/task-analyzer';
import { TaskDecomposer, type ITaskDecomposer } from '../planning/task-decomposer';
import { DependencyMapper } from '../planning/dependency-mapper';
import { ExecutionPlanner, type ExecutionPlan } from '../planning/execution-planner';
import { isWorkerResult, type IWorker, type WorkerHooks, type WorkerResolver } from '../worker/worker';
import { EventBus, type EventBusStats, type HistoryFilter, type MessageCallback } from './event-bus';
import { TaskStateTracker, type TrackerStats } from './task-state-tracker';
import {
  ResultAggregator,
  type AggregatorStats,
  type OutputFormat,
  type WorkflowAggregation,
} from './result-aggregator';

export const ORCHESTRATOR_ID = 'orchestrator';

export type WorkflowStatus = 'completed' | 'degraded';

export interface WorkflowResult {
  workflowId: string;
  description: string;
  /** `degraded` when any task ended BLOCKED, FAILED or was never dispatched */
  status: WorkflowStatus;
  analysis: {
    complexity: TaskAnalysis['complexity'];
    domains: string[];
    requiresDecomposition: boolean;
    estimatedSubtasks: number;
  };
  strategy: string;
  totalSteps: number;
  canParallelize: boolean;
  criticalPath: string[];
  criticalPathLength: number;
  criticalPathMinutes: number;
  estimatedDurationMinutes: number;
  overallProgress: number;
  taskCounts: Record<TaskStatus, number>;
  blockedTasks: string[];
  failedTasks: string[];
  /** Tasks left PENDING because a dependency did not complete */
  skippedTasks: string[];
  aggregation: WorkflowAggregation;
  startedAt: string;
  completedAt: string;
}

export interface WorkflowProgress {
  workflowId?: string;
  state: OrchestratorState;
  overallProgress: number;
  taskStats: TrackerStats;
  resultStats: AggregatorStats;
  busStats: EventBusStats;
}

export interface OrchestratorOptions {
  /** One worker for every task, or a resolver choosing per task */
  worker: IWorker | WorkerResolver<SubTask>;
  config?: OrchestratorConfigInput;
  logger?: WorkflowLogger;
  analyzer?: TaskAnalyzer;
  decomposer?: ITaskDecomposer;
  mapper?: DependencyMapper;
  planner?: ExecutionPlanner;
}

interface WorkflowRun {
  workflowId: string;
  bus: EventBus;
  tracker: TaskStateTracker;
  aggregator: ResultAggregator;
  subtasks: SubTask[];
}

interface PlannedWorkflow {
  analysis: TaskAnalysis;
  subtasks: SubTask[];
  strategy: string;
  plan: ExecutionPlan;
}

interface ExternalSubscription {
  type: MessageType;
  callback: MessageCallback;
  subscriberId: string;
  detach?: () => void;
}

/**
 * Run jobs with at most `limit` in flight. Rejects with the first job error
 * after every started job has settled.
 */
async function runWithLimit<T>(
  limit: number,
  items: readonly T[],
  job: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next];
      next++;
      if (item !== undefined) {
        await job(item);
      }
    }
  };

  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => lane());
  const settled = await Promise.allSettled(lanes);
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Orchestrator {
  private readonly worker: IWorker | WorkerResolver<SubTask>;
  private readonly config: Readonly<OrchestratorConfig>;
  private readonly logger: WorkflowLogger;
  private readonly analyzer: TaskAnalyzer;
  private readonly decomposer: ITaskDecomposer;
  private readonly mapper: DependencyMapper;
  private readonly planner: ExecutionPlanner;
  private readonly subscriptions: ExternalSubscription[] = [];
  private state: OrchestratorState = OrchestratorState.IDLE;
  private run: WorkflowRun | null = null;

  constructor(options: OrchestratorOptions) {
    this.worker = options.worker;
    this.config = new ConfigurationManager().resolve(options.config ?? {});
    this.logger =
      options.logger ??
      new WorkflowLogger({
        maxEntries: this.config.logging.max_entries,
        minLevel: this.config.logging.level,
      });
    this.analyzer = options.analyzer ?? new TaskAnalyzer({ logger: this.logger });
    this.decomposer =
      options.decomposer ??
      new TaskDecomposer({
        maxGenericSubtasks: this.config.decomposition.max_generic_subtasks,
        logger: this.logger,
      });
    this.mapper = options.mapper ?? new DependencyMapper({ logger: this.logger });
    this.planner =
      options.planner ??
      new ExecutionPlanner({ weights: this.config.complexity_weights, logger: this.logger });
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getConfig(): Readonly<OrchestratorConfig> {
    return this.config;
  }

  getLogger(): WorkflowLogger {
    return this.logger;
  }

  /**
   * Plan and execute one workflow.
   * @throws OrchestratorError E401 while another run is in flight
   * @throws CyclicDependencyError, UnknownTaskReferenceError, DuplicateTaskIdError on a bad decomposition
   */
  async executeTask(description: string, context: Record<string, unknown> = {}): Promise<WorkflowResult> {
    if (this.state === OrchestratorState.PLANNING || this.state === OrchestratorState.EXECUTING) {
      throw new OrchestratorError(ErrorCode.E401_WORKFLOW_ALREADY_RUNNING, this.run?.workflowId, {
        state: this.state,
      });
    }

    const startedAt = new Date().toISOString();
    const run = this.createRun();
    this.run = run;
    this.attachSubscriptions(run);
    this.transitionTo(OrchestratorState.PLANNING);
    run.bus.start();

    this.publishSystemEvent(run, 'workflow_started', { description });
    this.logger.info('WORKFLOW', `Workflow started: ${description.slice(0, 100)}`, {
      workflowId: run.workflowId,
    });

    try {
      const planned = this.planWorkflow(run, description);
      run.subtasks = planned.subtasks;

      for (const task of planned.subtasks) {
        run.tracker.addTask(task.id, task.description, task.dependencies, {
          domain: task.domain,
          complexity: task.complexity,
          parentId: task.parentId,
        });
      }

      this.transitionTo(OrchestratorState.EXECUTING);
      this.publishSystemEvent(run, 'execution_started', {
        totalSteps: planned.plan.totalSteps,
        canParallelize: planned.plan.canParallelize,
      });

      await this.executePlan(run, planned.plan, context);

      const result = this.buildResult(run, description, planned, startedAt);
      this.transitionTo(OrchestratorState.COMPLETED);
      this.publishSystemEvent(run, 'workflow_completed', { status: result.status });
      this.logger.info('WORKFLOW', `Workflow finished as ${result.status}`, {
        workflowId: run.workflowId,
        details: { taskCounts: result.taskCounts },
      });

      await run.bus.stop();
      return result;
    } catch (error) {
      if (this.state !== OrchestratorState.COMPLETED) {
        this.transitionTo(OrchestratorState.FAILED);
      }
      this.publishSystemEvent(run, 'workflow_failed', { error: errorMessage(error) });
      this.logger.logError('Workflow failed', error, { workflowId: run.workflowId });
      await run.bus.stop();
      throw error;
    }
  }

  /**
   * Register a callback on every run's event bus, current and future
   */
  subscribe(type: MessageType, callback: MessageCallback, subscriberId: string): () => void {
    const subscription: ExternalSubscription = { type, callback, subscriberId };
    this.subscriptions.push(subscription);
    if (this.run) {
      subscription.detach = this.run.bus.subscribe(type, callback, subscriberId);
    }

    return () => {
      subscription.detach?.();
      const index = this.subscriptions.indexOf(subscription);
      if (index >= 0) {
        this.subscriptions.splice(index, 1);
      }
    };
  }

  getProgress(): WorkflowProgress {
    const run = this.run ?? this.createRun();
    return {
      workflowId: this.run?.workflowId,
      state: this.state,
      overallProgress: run.tracker.getOverallProgress(),
      taskStats: run.tracker.getStats(),
      resultStats: run.aggregator.getStats(),
      busStats: run.bus.getStats(),
    };
  }

  getTaskStatus(taskId: string): TrackedTask | null {
    return this.run?.tracker.getTask(taskId) ?? null;
  }

  /**
   * Format results of the latest run; all of its tasks when no ids are given
   * @throws OrchestratorError E404 before any run
   */
  getResults(taskIds?: readonly string[], format: OutputFormat = 'summary'): string {
    if (!this.run) {
      throw new OrchestratorError(ErrorCode.E404_NO_WORKFLOW_RUN);
    }
    const ids = taskIds && taskIds.length > 0 ? taskIds : this.run.tracker.getTasks().map((t) => t.taskId);
    return this.run.aggregator.formatFinalOutput(ids, format);
  }

  getMessageHistory(filter: HistoryFilter = {}): Message[] {
    return this.run?.bus.getHistory(filter) ?? [];
  }

  /**
   * Drop the latest run's state. Subscriptions are kept.
   */
  cleanup(): void {
    if (this.state === OrchestratorState.PLANNING || this.state === OrchestratorState.EXECUTING) {
      throw new OrchestratorError(ErrorCode.E401_WORKFLOW_ALREADY_RUNNING, this.run?.workflowId);
    }
    if (this.run) {
      this.run.tracker.clear();
      this.run.aggregator.clearAll();
      this.run.bus.clearHistory();
    }
    for (const subscription of this.subscriptions) {
      subscription.detach?.();
      subscription.detach = undefined;
    }
    this.run = null;
    this.logger.info('WORKFLOW', 'Orchestrator cleaned up');
  }

  // ============================================================
  // Planning
  // ============================================================

  private planWorkflow(run: WorkflowRun, description: string): PlannedWorkflow {
    const analysis = this.analyzer.analyze(description);
    const decomposition = this.decomposer.decompose(analysis, this.config.decomposition.max_depth);
    const subtasks = decomposition.subtasks;

    const graph = this.mapper.buildGraph(subtasks);
    if (graph.hasCycles) {
      throw new CyclicDependencyError(graph.cycle ?? []);
    }

    const plan = this.planner.createPlan(graph, subtasks);
    if (plan.error !== undefined) {
      throw new OrchestratorError(ErrorCode.E204_PLAN_CREATION_FAILURE, plan.error);
    }

    this.publishSystemEvent(run, 'plan_created', {
      strategy: decomposition.strategy,
      subtaskIds: subtasks.map((t) => t.id),
      steps: plan.steps.map((s) => s.taskIds),
      criticalPath: plan.criticalPath,
    });

    return { analysis, subtasks, strategy: decomposition.strategy, plan };
  }

  // ============================================================
  // Execution
  // ============================================================

  private async executePlan(
    run: WorkflowRun,
    plan: ExecutionPlan,
    context: Record<string, unknown>
  ): Promise<void> {
    const byId = new Map(run.subtasks.map((t) => [t.id, t]));
    const { mode, max_concurrency } = this.config.dispatch;

    for (const step of plan.steps) {
      const ready = new Set(run.tracker.getReadyTasks());
      const dispatchable: SubTask[] = [];

      for (const taskId of step.taskIds) {
        const task = byId.get(taskId);
        if (task && ready.has(taskId)) {
          dispatchable.push(task);
        } else {
          this.logger.warn('DISPATCH', 'Skipped: dependencies not completed', {
            taskId,
            workflowId: run.workflowId,
          });
        }
      }

      this.logger.info('DISPATCH', `Step ${step.stepNumber}/${plan.totalSteps}: ${dispatchable.length} task(s)`, {
        workflowId: run.workflowId,
        details: { taskIds: dispatchable.map((t) => t.id), mode },
      });

      if (mode === 'parallel' && dispatchable.length > 1) {
        await runWithLimit(max_concurrency, dispatchable, (task) => this.dispatchTask(run, task, context));
      } else {
        for (const task of dispatchable) {
          await this.dispatchTask(run, task, context);
        }
      }
    }
  }

  private async dispatchTask(run: WorkflowRun, task: SubTask, context: Record<string, unknown>): Promise<void> {
    let worker: IWorker;
    try {
      worker = this.resolveWorker(task);
    } catch (error) {
      // Tasks only fail from IN_PROGRESS, so walk the lifecycle under the orchestrator's id
      run.tracker.assign(task.id, ORCHESTRATOR_ID);
      run.tracker.start(task.id);
      const failure = new OrchestratorError(
        ErrorCode.E402_WORKER_FAILURE,
        `${task.id}: no worker resolved: ${errorMessage(error)}`
      );
      this.failTask(run, task.id, ORCHESTRATOR_ID, failure.message);
      return;
    }
    const workerId = worker.workerId;

    run.tracker.assign(task.id, workerId);
    this.publish(run, MessageType.TASK_ASSIGNED, ORCHESTRATOR_ID, {
      taskId: task.id,
      description: task.description,
      workerId,
    });

    run.tracker.start(task.id);
    this.publish(run, MessageType.TASK_STARTED, workerId, { taskId: task.id });

    const hooks: WorkerHooks = {
      onProgress: (progress: number) => {
        if (!Number.isFinite(progress)) {
          this.logger.warn('DISPATCH', `Ignored progress ${String(progress)}`, {
            taskId: task.id,
            workflowId: run.workflowId,
          });
          return;
        }
        const snapshot = run.tracker.updateProgress(task.id, progress);
        if (snapshot.status === TaskStatus.IN_PROGRESS) {
          this.publish(run, MessageType.TASK_PROGRESS, workerId, {
            taskId: task.id,
            progress: snapshot.progress,
          });
        }
      },
    };

    let outcome: unknown;
    try {
      outcome = await worker.execute(task.description, this.buildWorkerContext(run, task, context), hooks);
    } catch (error) {
      const failure = new OrchestratorError(ErrorCode.E402_WORKER_FAILURE, `${task.id}: ${errorMessage(error)}`);
      this.failTask(run, task.id, workerId, failure.message);
      return;
    }

    if (!isWorkerResult(outcome)) {
      const failure = new OrchestratorError(ErrorCode.E403_INVALID_WORKER_RESULT, task.id);
      this.failTask(run, task.id, workerId, failure.message);
      return;
    }

    switch (outcome.status) {
      case 'completed':
        run.tracker.complete(task.id, outcome.output);
        run.aggregator.addResult(task.id, workerId, outcome.output, outcome.metadata ?? {});
        this.publish(run, MessageType.TASK_COMPLETED, workerId, {
          taskId: task.id,
          result: outcome.output,
        });
        break;
      case 'clarification_needed':
        run.tracker.block(task.id, outcome.questions);
        this.logger.warn('DISPATCH', 'Task requires clarification', {
          taskId: task.id,
          workflowId: run.workflowId,
          details: { questions: outcome.questions },
        });
        this.publish(run, MessageType.TASK_FAILED, workerId, {
          taskId: task.id,
          reason: 'clarification_needed',
          questions: [...outcome.questions],
        });
        break;
      case 'error':
        this.failTask(run, task.id, workerId, outcome.message);
        break;
    }
  }

  private failTask(run: WorkflowRun, taskId: string, workerId: string, error: string): void {
    run.tracker.fail(taskId, error);
    this.logger.error('DISPATCH', `Task failed: ${error}`, { taskId, workflowId: run.workflowId });
    this.publish(run, MessageType.TASK_FAILED, workerId, { taskId, reason: 'error', error });
  }

  private buildWorkerContext(
    run: WorkflowRun,
    task: SubTask,
    context: Record<string, unknown>
  ): Record<string, unknown> {
    const dependencyOutputs: Record<string, unknown> = {};
    for (const dep of task.dependencies) {
      dependencyOutputs[dep] = run.tracker.getTask(dep)?.result;
    }
    return {
      ...context,
      workflowId: run.workflowId,
      taskId: task.id,
      parentId: task.parentId,
      domain: task.domain,
      complexity: task.complexity,
      dependencyOutputs,
    };
  }

  private resolveWorker(task: SubTask): IWorker {
    return typeof this.worker === 'function' ? this.worker(task) : this.worker;
  }

  // ============================================================
  // Results
  // ============================================================

  private buildResult(
    run: WorkflowRun,
    description: string,
    planned: PlannedWorkflow,
    startedAt: string
  ): WorkflowResult {
    const stats = run.tracker.getStats();
    const idsWith = (status: TaskStatus): string[] =>
      run.tracker.getTasksByStatus(status).map((t) => t.taskId);

    const blockedTasks = idsWith(TaskStatus.BLOCKED);
    const failedTasks = idsWith(TaskStatus.FAILED);
    const skippedTasks = idsWith(TaskStatus.PENDING);
    const degraded = blockedTasks.length + failedTasks.length + skippedTasks.length > 0;
    const { analysis, plan } = planned;

    return {
      workflowId: run.workflowId,
      description,
      status: degraded ? 'degraded' : 'completed',
      analysis: {
        complexity: analysis.complexity,
        domains: [...analysis.domains],
        requiresDecomposition: analysis.requiresDecomposition,
        estimatedSubtasks: analysis.estimatedSubtasks,
      },
      strategy: planned.strategy,
      totalSteps: plan.totalSteps,
      canParallelize: plan.canParallelize,
      criticalPath: [...plan.criticalPath],
      criticalPathLength: plan.criticalPath.length,
      criticalPathMinutes: plan.criticalPathMinutes,
      estimatedDurationMinutes: plan.estimatedDurationMinutes,
      overallProgress: stats.overallProgress,
      taskCounts: stats.statusCounts,
      blockedTasks,
      failedTasks,
      skippedTasks,
      aggregation: run.aggregator.aggregateWorkflowResults(planned.subtasks.map((t) => t.id)),
      startedAt,
      completedAt: new Date().toISOString(),
    };
  }

  // ============================================================
  // Internals
  // ============================================================

  private createRun(): WorkflowRun {
    const workflowId = `wf-${uuidv4()}`;
    const bus = new EventBus({ historyLimit: this.config.event_bus.history_limit, logger: this.logger });
    return {
      workflowId,
      bus,
      tracker: new TaskStateTracker({ logger: this.logger, workflowId }),
      aggregator: new ResultAggregator({ logger: this.logger }),
      subtasks: [],
    };
  }

  private attachSubscriptions(run: WorkflowRun): void {
    for (const subscription of this.subscriptions) {
      subscription.detach?.();
      subscription.detach = run.bus.subscribe(subscription.type, subscription.callback, subscription.subscriberId);
    }
  }

  private transitionTo(next: OrchestratorState): void {
    if (!isValidOrchestratorTransition(this.state, next)) {
      throw new OrchestratorError(ErrorCode.E401_WORKFLOW_ALREADY_RUNNING, `${this.state} -> ${next}`);
    }
    this.logger.debug('WORKFLOW', `${this.state} -> ${next}`, { workflowId: this.run?.workflowId });
    this.state = next;
  }

  private publish(run: WorkflowRun, type: MessageType, sender: string, payload: Record<string, unknown>): void {
    run.bus.publish(createMessage(type, sender, { workflowId: run.workflowId, ...payload }));
  }

  private publishSystemEvent(run: WorkflowRun, event: string, payload: Record<string, unknown>): void {
    this.publish(run, MessageType.SYSTEM_EVENT, ORCHESTRATOR_ID, { event, ...payload });
  }
}
