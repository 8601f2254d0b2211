/**
 * Execution Planner
 *
 * Turns a dependency graph into ordered execution steps, estimates the total
 * duration and finds the critical path. A cyclic graph never yields steps.
 */

import { ErrorCode, getErrorMessage } from '../errors/error-codes';
import { TaskComplexity } from '../models/enums';
import type { SubTask } from '../models/subtask';
import type { DependencyGraph } from './dependency-mapper';
import type { ComplexityWeightsConfig } from '../config/configuration-manager';
import type { WorkflowLogger } from '../logging/workflow-logger';

/**
 * Task ids that may be dispatched together
 */
export interface ExecutionStep {
  stepNumber: number;
  taskIds: string[];
  canParallelize: boolean;
}

export interface ExecutionPlan {
  steps: ExecutionStep[];
  totalSteps: number;
  /** True when any step holds more than one task */
  canParallelize: boolean;
  estimatedDurationMinutes: number;
  criticalPath: string[];
  criticalPathMinutes: number;
  createdAt: string;
  error?: string;
}

export const DEFAULT_COMPLEXITY_WEIGHTS: Readonly<ComplexityWeightsConfig> = Object.freeze({
  simple: 5,
  medium: 15,
  complex: 30,
});

type WeightedTask = Pick<SubTask, 'id' | 'complexity'>;

export class ExecutionPlanner {
  private readonly weights: Readonly<ComplexityWeightsConfig>;
  private readonly logger?: WorkflowLogger;

  constructor(options: { weights?: ComplexityWeightsConfig; logger?: WorkflowLogger } = {}) {
    this.weights = options.weights ?? DEFAULT_COMPLEXITY_WEIGHTS;
    this.logger = options.logger;
  }

  createPlan(graph: DependencyGraph, subtasks: readonly WeightedTask[]): ExecutionPlan {
    const createdAt = new Date().toISOString();

    if (graph.hasCycles) {
      const error = `${getErrorMessage(ErrorCode.E204_PLAN_CREATION_FAILURE)}: ${
        graph.error ?? getErrorMessage(ErrorCode.E201_CYCLIC_DEPENDENCY)
      }`;
      this.logger?.error('PLANNING', error, { details: { cycle: graph.cycle } });
      return {
        steps: [],
        totalSteps: 0,
        canParallelize: false,
        estimatedDurationMinutes: 0,
        criticalPath: [],
        criticalPathMinutes: 0,
        createdAt,
        error,
      };
    }

    const steps: ExecutionStep[] = graph.parallelGroups.map((group, index) => ({
      stepNumber: index + 1,
      taskIds: [...group],
      canParallelize: group.length > 1,
    }));

    const criticalPath = this.getCriticalPath(graph, subtasks);
    const plan: ExecutionPlan = {
      steps,
      totalSteps: steps.length,
      canParallelize: steps.some((step) => step.canParallelize),
      estimatedDurationMinutes: this.estimateDuration(subtasks),
      criticalPath,
      criticalPathMinutes: this.getPathWeight(criticalPath, subtasks),
      createdAt,
    };

    this.logger?.info('PLANNING', `Execution plan: ${plan.totalSteps} step(s), parallel=${plan.canParallelize}`, {
      details: {
        estimatedDurationMinutes: plan.estimatedDurationMinutes,
        criticalPath,
      },
    });

    return plan;
  }

  /**
   * Sum of per-task weights across every subtask
   */
  estimateDuration(subtasks: readonly WeightedTask[]): number {
    return subtasks.reduce((total, task) => total + this.weightOf(task.complexity), 0);
  }

  /**
   * Longest weighted path through the DAG.
   *
   * dist[v] is the longest finish time of any predecessor chain reaching v;
   * the path ends at the node with the greatest dist[v] + weight(v), the
   * first such node in topological order on ties.
   */
  getCriticalPath(graph: DependencyGraph, subtasks: readonly WeightedTask[]): string[] {
    if (graph.hasCycles || graph.executionOrder.length === 0) {
      return [];
    }

    const weight = new Map<string, number>();
    for (const task of subtasks) {
      weight.set(task.id, this.weightOf(task.complexity));
    }
    const weightOf = (id: string): number => weight.get(id) ?? this.weights.simple;

    const dist = new Map<string, number>();
    const predecessor = new Map<string, string>();
    for (const id of graph.executionOrder) {
      dist.set(id, 0);
    }

    for (const id of graph.executionOrder) {
      const finish = (dist.get(id) ?? 0) + weightOf(id);
      for (const next of graph.adjacency[id] ?? []) {
        if (finish > (dist.get(next) ?? 0)) {
          dist.set(next, finish);
          predecessor.set(next, id);
        }
      }
    }

    let end: string | undefined;
    let longest = -1;
    for (const id of graph.executionOrder) {
      const finish = (dist.get(id) ?? 0) + weightOf(id);
      if (finish > longest) {
        longest = finish;
        end = id;
      }
    }

    const path: string[] = [];
    let current = end;
    while (current !== undefined) {
      path.push(current);
      current = predecessor.get(current);
    }

    return path.reverse();
  }

  getPathWeight(path: readonly string[], subtasks: readonly WeightedTask[]): number {
    const complexityById = new Map(subtasks.map((task) => [task.id, task.complexity]));
    return path.reduce(
      (total, id) => total + this.weightOf(complexityById.get(id) ?? TaskComplexity.SIMPLE),
      0
    );
  }

  private weightOf(complexity: TaskComplexity): number {
    switch (complexity) {
      case TaskComplexity.COMPLEX:
        return this.weights.complex;
      case TaskComplexity.MEDIUM:
        return this.weights.medium;
      default:
        return this.weights.simple;
    }
  }
}
