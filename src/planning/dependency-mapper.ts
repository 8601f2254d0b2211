/**
 * Dependency Mapper
 *
 * Builds the subtask DAG:
 * - Validates references (duplicate ids, dangling dependencies) before building
 * - Detects cycles with an iterative DFS
 * - Topological order via Kahn's algorithm
 * - Parallel groups by BFS depth level
 */

import { DuplicateTaskIdError, UnknownTaskReferenceError } from '../errors/orchestrator-error';
import { getErrorMessage, ErrorCode } from '../errors/error-codes';
import type { SubTask } from '../models/subtask';
import type { WorkflowLogger } from '../logging/workflow-logger';

/**
 * Derived, recomputable dependency structure.
 * When `hasCycles` is true, `executionOrder` and `parallelGroups` are empty.
 */
export interface DependencyGraph {
  /** id -> ids of tasks that depend on it */
  adjacency: Record<string, string[]>;
  inDegree: Record<string, number>;
  hasCycles: boolean;
  executionOrder: string[];
  /** One group per depth level, ascending */
  parallelGroups: string[][];
  /** Closed cycle path (first id repeated at the end) when one was found */
  cycle?: string[];
  error?: string;
}

type SubtaskShape = Pick<SubTask, 'id' | 'dependencies'>;

/**
 * Reject duplicate ids and dependencies on ids outside the batch
 * @throws DuplicateTaskIdError
 * @throws UnknownTaskReferenceError
 */
export function validateSubtasks(subtasks: readonly SubtaskShape[]): void {
  const ids = new Set<string>();
  for (const task of subtasks) {
    if (ids.has(task.id)) {
      throw new DuplicateTaskIdError(task.id);
    }
    ids.add(task.id);
  }
  for (const task of subtasks) {
    for (const dep of task.dependencies) {
      if (!ids.has(dep)) {
        throw new UnknownTaskReferenceError(task.id, dep);
      }
    }
  }
}

export class DependencyMapper {
  private readonly logger?: WorkflowLogger;

  constructor(options: { logger?: WorkflowLogger } = {}) {
    this.logger = options.logger;
  }

  /**
   * Build the dependency graph for one decomposition batch.
   * Pure: the same subtask list always yields a deep-equal graph.
   */
  buildGraph(subtasks: readonly SubtaskShape[]): DependencyGraph {
    validateSubtasks(subtasks);

    const adjacency: Record<string, string[]> = {};
    const inDegree: Record<string, number> = {};
    const nodes = subtasks.map((t) => t.id);

    for (const id of nodes) {
      adjacency[id] = [];
      inDegree[id] = 0;
    }
    for (const task of subtasks) {
      for (const dep of new Set(task.dependencies)) {
        adjacency[dep]?.push(task.id);
        inDegree[task.id] = (inDegree[task.id] ?? 0) + 1;
      }
    }

    const cycle = findCycle(nodes, adjacency);
    if (cycle) {
      const error = `${getErrorMessage(ErrorCode.E201_CYCLIC_DEPENDENCY)}: ${cycle.join(' -> ')}`;
      this.logger?.error('GRAPH', error, { details: { cycle } });
      return {
        adjacency,
        inDegree,
        hasCycles: true,
        executionOrder: [],
        parallelGroups: [],
        cycle,
        error,
      };
    }

    const executionOrder = topologicalSort(nodes, adjacency, inDegree);
    const parallelGroups = groupByDepth(nodes, adjacency, inDegree);

    this.logger?.debug('GRAPH', `Built graph with ${nodes.length} node(s) in ${parallelGroups.length} level(s)`, {
      details: { executionOrder, parallelGroups },
    });

    return {
      adjacency,
      inDegree,
      hasCycles: false,
      executionOrder,
      parallelGroups,
    };
  }

  /**
   * Ids not yet completed whose dependencies are all completed
   */
  getReadyTasks(completed: ReadonlySet<string>, subtasks: readonly SubtaskShape[]): string[] {
    return subtasks
      .filter((task) => !completed.has(task.id))
      .filter((task) => task.dependencies.every((dep) => completed.has(dep)))
      .map((task) => task.id);
  }
}

const WHITE = 0;
const GREY = 1;
const BLACK = 2;

/**
 * Iterative DFS with an explicit stack. Returns the first cycle found as a
 * closed path, or null for a DAG.
 */
export function findCycle(nodes: readonly string[], adjacency: Record<string, string[]>): string[] | null {
  const color = new Map<string, number>();
  for (const node of nodes) {
    color.set(node, WHITE);
  }

  for (const start of nodes) {
    if (color.get(start) !== WHITE) {
      continue;
    }

    const path: string[] = [start];
    const cursor: number[] = [0];
    color.set(start, GREY);

    while (path.length > 0) {
      const top = path.length - 1;
      const node = path[top];
      const index = cursor[top];
      if (node === undefined || index === undefined) {
        break;
      }
      const neighbors = adjacency[node] ?? [];

      if (index >= neighbors.length) {
        color.set(node, BLACK);
        path.pop();
        cursor.pop();
        continue;
      }

      cursor[top] = index + 1;
      const next = neighbors[index];
      if (next === undefined) {
        continue;
      }
      const state = color.get(next);

      if (state === GREY) {
        // Back edge into the active stack
        return [...path.slice(path.indexOf(next)), next];
      }
      if (state === WHITE) {
        color.set(next, GREY);
        path.push(next);
        cursor.push(0);
      }
    }
  }

  return null;
}

/**
 * Kahn's algorithm. Roots are seeded in insertion order.
 */
export function topologicalSort(
  nodes: readonly string[],
  adjacency: Record<string, string[]>,
  inDegree: Record<string, number>
): string[] {
  const remaining: Record<string, number> = { ...inDegree };
  const queue = nodes.filter((node) => remaining[node] === 0);
  const order: string[] = [];

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (node === undefined) {
      break;
    }
    order.push(node);
    for (const neighbor of adjacency[node] ?? []) {
      const degree = (remaining[neighbor] ?? 0) - 1;
      remaining[neighbor] = degree;
      if (degree === 0) {
        queue.push(neighbor);
      }
    }
  }

  return order;
}

/**
 * BFS depth levels using the same in-degree decrement as Kahn's algorithm.
 * A node's depth is the depth of the predecessor that released it plus one;
 * nodes within a level keep insertion order.
 */
export function groupByDepth(
  nodes: readonly string[],
  adjacency: Record<string, string[]>,
  inDegree: Record<string, number>
): string[][] {
  const remaining: Record<string, number> = { ...inDegree };
  const depth = new Map<string, number>();
  const queue: Array<[string, number]> = nodes
    .filter((node) => remaining[node] === 0)
    .map((node): [string, number] => [node, 0]);

  for (let head = 0; head < queue.length; head++) {
    const entry = queue[head];
    if (entry === undefined) {
      break;
    }
    const [node, level] = entry;
    depth.set(node, level);
    for (const neighbor of adjacency[node] ?? []) {
      const degree = (remaining[neighbor] ?? 0) - 1;
      remaining[neighbor] = degree;
      if (degree === 0) {
        queue.push([neighbor, level + 1]);
      }
    }
  }

  const levels: string[][] = [];
  for (const node of nodes) {
    const level = depth.get(node);
    if (level === undefined) {
      continue;
    }
    while (levels.length <= level) {
      levels.push([]);
    }
    levels[level]?.push(node);
  }

  return levels.filter((group) => group.length > 0);
}
