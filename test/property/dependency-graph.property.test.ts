/**
 * Property-based tests for dependency graphs and execution plans
 *
 * - Execution order is a topological order of every task
 * - Parallel groups place each task strictly after its dependencies
 * - Cycles are always detected and reported as a closed path
 * - Building a graph is deterministic
 * - The critical path is the heaviest dependency chain
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as fc from 'fast-check';
import { DependencyMapper } from '../../src/planning/dependency-mapper';
import { ExecutionPlanner, DEFAULT_COMPLEXITY_WEIGHTS } from '../../src/planning/execution-planner';
import { TaskComplexity } from '../../src/models/enums';
import { cyclicArb, dagArb, type GeneratedTask } from '../helpers/graph-arbitraries';

const MIN_RUNS = 100;

function weightOf(complexity: TaskComplexity): number {
  switch (complexity) {
    case TaskComplexity.COMPLEX:
      return DEFAULT_COMPLEXITY_WEIGHTS.complex;
    case TaskComplexity.MEDIUM:
      return DEFAULT_COMPLEXITY_WEIGHTS.medium;
    default:
      return DEFAULT_COMPLEXITY_WEIGHTS.simple;
  }
}

/**
 * Heaviest finish time over all dependency chains, by memoised recursion
 */
function heaviestChain(tasks: readonly GeneratedTask[]): number {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const memo = new Map<string, number>();
  const finish = (id: string): number => {
    const cached = memo.get(id);
    if (cached !== undefined) {
      return cached;
    }
    const task = byId.get(id);
    if (!task) {
      return 0;
    }
    const start = Math.max(0, ...task.dependencies.map(finish));
    const value = start + weightOf(task.complexity);
    memo.set(id, value);
    return value;
  };
  return Math.max(...tasks.map((t) => finish(t.id)));
}

describe('Dependency graph (Property-based)', () => {
  const mapper = new DependencyMapper();
  const planner = new ExecutionPlanner();

  it('should order every task after all of its dependencies', () => {
    fc.assert(
      fc.property(dagArb, (tasks) => {
        const graph = mapper.buildGraph(tasks);
        assert.equal(graph.hasCycles, false);
        assert.deepEqual([...graph.executionOrder].sort(), tasks.map((t) => t.id).sort());

        const position = new Map(graph.executionOrder.map((id, index) => [id, index]));
        for (const task of tasks) {
          for (const dep of task.dependencies) {
            assert.ok((position.get(dep) ?? -1) < (position.get(task.id) ?? -1));
          }
        }
      }),
      { numRuns: MIN_RUNS }
    );
  });

  it('should place each task in exactly one group after its dependencies', () => {
    fc.assert(
      fc.property(dagArb, (tasks) => {
        const graph = mapper.buildGraph(tasks);
        const level = new Map<string, number>();
        graph.parallelGroups.forEach((group, index) => {
          for (const id of group) {
            assert.equal(level.has(id), false);
            level.set(id, index);
          }
        });
        assert.equal(level.size, tasks.length);

        for (const task of tasks) {
          for (const dep of task.dependencies) {
            assert.ok((level.get(dep) ?? Infinity) < (level.get(task.id) ?? -1));
          }
        }
        // The first group holds exactly the roots
        assert.deepEqual(
          [...(graph.parallelGroups[0] ?? [])].sort(),
          tasks.filter((t) => t.dependencies.length === 0).map((t) => t.id).sort()
        );
      }),
      { numRuns: MIN_RUNS }
    );
  });

  it('should build the same graph for the same input', () => {
    fc.assert(
      fc.property(dagArb, (tasks) => {
        assert.deepEqual(mapper.buildGraph(tasks), mapper.buildGraph(tasks));
      }),
      { numRuns: MIN_RUNS }
    );
  });

  it('should detect every cycle as a closed path of real edges', () => {
    fc.assert(
      fc.property(cyclicArb, (tasks) => {
        const graph = mapper.buildGraph(tasks);
        assert.equal(graph.hasCycles, true);
        assert.deepEqual(graph.executionOrder, []);
        assert.deepEqual(graph.parallelGroups, []);

        const cycle = graph.cycle ?? [];
        assert.ok(cycle.length >= 2);
        assert.equal(cycle[0], cycle[cycle.length - 1]);
        for (let i = 0; i + 1 < cycle.length; i++) {
          const from = cycle[i] ?? '';
          assert.ok((graph.adjacency[from] ?? []).includes(cycle[i + 1] ?? ''));
        }

        const plan = planner.createPlan(graph, tasks);
        assert.deepEqual(plan.steps, []);
        assert.ok(plan.error?.startsWith('Execution plan could not be created: ') ?? false);
      }),
      { numRuns: MIN_RUNS }
    );
  });

  it('should follow the heaviest dependency chain on the critical path', () => {
    fc.assert(
      fc.property(dagArb, (tasks) => {
        const plan = planner.createPlan(mapper.buildGraph(tasks), tasks);
        const byId = new Map(tasks.map((t) => [t.id, t]));

        assert.equal(plan.criticalPathMinutes, heaviestChain(tasks));
        assert.ok(plan.criticalPathMinutes <= plan.estimatedDurationMinutes);
        assert.deepEqual(byId.get(plan.criticalPath[0] ?? '')?.dependencies, []);
        for (let i = 0; i + 1 < plan.criticalPath.length; i++) {
          const next = byId.get(plan.criticalPath[i + 1] ?? '');
          assert.ok(next?.dependencies.includes(plan.criticalPath[i] ?? ''));
        }
      }),
      { numRuns: MIN_RUNS }
    );
  });
});
