/**
 * Result Aggregator
 *
 * Collects worker outputs per task and folds them into per-task and
 * per-workflow summaries.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Result } from '../models/tracked-task';
import type { WorkflowLogger } from '../logging/workflow-logger';

export type OutputFormat = 'summary' | 'detailed' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['summary', 'detailed', 'json'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

export interface AggregatedOutput {
  workerId: string;
  output: unknown;
  metadata: Readonly<Record<string, unknown>>;
  timestamp: string;
}

export interface TaskAggregation {
  taskId: string;
  status: 'completed' | 'no_results';
  outputs: AggregatedOutput[];
  resultCount: number;
  /** Distinct worker ids in first-seen order */
  workers: string[];
  firstResultAt?: string;
  lastResultAt?: string;
}

export interface WorkflowAggregation {
  workflow: {
    totalTasks: number;
    totalResults: number;
    uniqueWorkers: number;
    workers: string[];
  };
  taskResults: Record<string, TaskAggregation>;
}

export interface AggregatorStats {
  totalResults: number;
  uniqueTasks: number;
  uniqueWorkers: number;
}

const RULE_WIDTH = 60;

/**
 * JSON replacer for opaque worker output: bigints become strings and a
 * reference back to an enclosing object becomes "[Circular]". Shared
 * references that are not cycles render in full.
 */
function outputReplacer(): (this: unknown, key: string, value: unknown) => unknown {
  const ancestors: unknown[] = [];
  return function (this: unknown, _key: string, value: unknown): unknown {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value !== 'object' || value === null) {
      return value;
    }
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }
    if (ancestors.includes(value)) {
      return '[Circular]';
    }
    ancestors.push(value);
    return value;
  };
}

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export class ResultAggregator {
  private readonly results: Map<string, Result> = new Map();
  private readonly resultsByTask: Map<string, string[]> = new Map();
  private readonly logger?: WorkflowLogger;

  constructor(options: { logger?: WorkflowLogger } = {}) {
    this.logger = options.logger;
  }

  /**
   * Record one output for a task
   * @returns the new result id
   */
  addResult(
    taskId: string,
    workerId: string,
    output: unknown,
    metadata: Record<string, unknown> = {}
  ): string {
    const resultId = `res-${uuidv4()}`;
    const result: Result = Object.freeze({
      resultId,
      taskId,
      workerId,
      output,
      metadata: Object.freeze({ ...metadata }),
      timestamp: new Date().toISOString(),
    });

    this.results.set(resultId, result);
    const ids = this.resultsByTask.get(taskId) ?? [];
    ids.push(resultId);
    this.resultsByTask.set(taskId, ids);

    this.logger?.debug('RESULTS', `Result ${resultId} recorded from ${workerId}`, { taskId });
    return resultId;
  }

  getResult(resultId: string): Result | undefined {
    return this.results.get(resultId);
  }

  getTaskResults(taskId: string): Result[] {
    const ids = this.resultsByTask.get(taskId) ?? [];
    const results: Result[] = [];
    for (const id of ids) {
      const result = this.results.get(id);
      if (result) {
        results.push(result);
      }
    }
    return results;
  }

  aggregateTaskResults(taskId: string): TaskAggregation {
    const results = this.getTaskResults(taskId);

    if (results.length === 0) {
      return {
        taskId,
        status: 'no_results',
        outputs: [],
        resultCount: 0,
        workers: [],
      };
    }

    // Array.prototype.sort is stable, so equal timestamps keep insertion order
    const outputs: AggregatedOutput[] = results
      .map((r) => ({
        workerId: r.workerId,
        output: r.output,
        metadata: r.metadata,
        timestamp: r.timestamp,
      }))
      .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));

    return {
      taskId,
      status: 'completed',
      outputs,
      resultCount: outputs.length,
      workers: distinct(results.map((r) => r.workerId)),
      firstResultAt: outputs[0]?.timestamp,
      lastResultAt: outputs[outputs.length - 1]?.timestamp,
    };
  }

  aggregateWorkflowResults(taskIds: readonly string[]): WorkflowAggregation {
    const taskResults: Record<string, TaskAggregation> = {};
    for (const taskId of taskIds) {
      taskResults[taskId] = this.aggregateTaskResults(taskId);
    }

    const aggregations = Object.values(taskResults);
    const workers = distinct(aggregations.flatMap((a) => a.workers));

    return {
      workflow: {
        totalTasks: taskIds.length,
        totalResults: aggregations.reduce((sum, a) => sum + a.resultCount, 0),
        uniqueWorkers: workers.length,
        workers,
      },
      taskResults,
    };
  }

  getWorkerResults(workerId: string): Result[] {
    return [...this.results.values()].filter((r) => r.workerId === workerId);
  }

  clearTaskResults(taskId: string): void {
    const ids = this.resultsByTask.get(taskId);
    if (!ids) {
      return;
    }
    for (const id of ids) {
      this.results.delete(id);
    }
    this.resultsByTask.delete(taskId);
    this.logger?.debug('RESULTS', 'Cleared task results', { taskId });
  }

  clearAll(): void {
    this.results.clear();
    this.resultsByTask.clear();
    this.logger?.info('RESULTS', 'Cleared all results');
  }

  getStats(): AggregatorStats {
    const results = [...this.results.values()];
    return {
      totalResults: results.length,
      uniqueTasks: this.resultsByTask.size,
      uniqueWorkers: new Set(results.map((r) => r.workerId)).size,
    };
  }

  /**
   * Render the workflow aggregation for people (summary, detailed) or
   * machines (json)
   */
  formatFinalOutput(taskIds: readonly string[], format: OutputFormat = 'summary'): string {
    const aggregation = this.aggregateWorkflowResults(taskIds);
    const { workflow } = aggregation;

    if (format === 'json') {
      return this.stringify(aggregation, 2);
    }

    if (format === 'detailed') {
      const lines: string[] = [
        '='.repeat(RULE_WIDTH),
        'WORKFLOW RESULTS',
        '='.repeat(RULE_WIDTH),
        `\nTotal Tasks: ${workflow.totalTasks}`,
        `Total Results: ${workflow.totalResults}`,
        `Agents Involved: ${workflow.workers.join(', ')}`,
        '\n' + '-'.repeat(RULE_WIDTH),
      ];

      for (const [taskId, task] of Object.entries(aggregation.taskResults)) {
        lines.push(`\nTask: ${taskId}`);
        lines.push(`Status: ${task.status}`);
        task.outputs.forEach((output, index) => {
          lines.push(`\n  Result ${index + 1} (from ${output.workerId}):`);
          lines.push(`    ${this.renderOutput(output.output)}`);
        });
      }

      lines.push('\n' + '='.repeat(RULE_WIDTH));
      return lines.join('\n');
    }

    return [
      `Workflow results for ${workflow.totalTasks} tasks`,
      `Total results: ${workflow.totalResults}`,
      `Agents: ${workflow.workers.join(', ')}`,
    ].join('\n');
  }

  private renderOutput(output: unknown): string {
    return typeof output === 'string' ? output : this.stringify(output);
  }

  /**
   * JSON.stringify that never throws on worker output. A value that still
   * cannot be serialised (a throwing toJSON, say) falls back to String().
   */
  private stringify(value: unknown, space?: number): string {
    try {
      return JSON.stringify(value, outputReplacer(), space) ?? String(value);
    } catch (error) {
      this.logger?.warn('RESULTS', 'Output could not be serialised as JSON', {
        details: { reason: error instanceof Error ? error.message : String(error) },
      });
      return String(value);
    }
  }
}
