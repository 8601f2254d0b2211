import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { ResultAggregator, isOutputFormat } from '../../../src/coordination/result-aggregator';

describe('ResultAggregator', () => {
  let aggregator: ResultAggregator;

  beforeEach(() => {
    aggregator = new ResultAggregator();
  });

  it('should store results under generated ids', () => {
    const id = aggregator.addResult('t1', 'w1', 'hello', { tokens: 3 });
    assert.ok(id.startsWith('res-'));
    const result = aggregator.getResult(id);
    assert.ok(result);
    assert.equal(result.taskId, 't1');
    assert.equal(result.workerId, 'w1');
    assert.equal(result.output, 'hello');
    assert.deepEqual(result.metadata, { tokens: 3 });
  });

  it('should aggregate a task with no results', () => {
    assert.deepEqual(aggregator.aggregateTaskResults('t9'), {
      taskId: 't9',
      status: 'no_results',
      outputs: [],
      resultCount: 0,
      workers: [],
    });
  });

  it('should aggregate outputs in timestamp order with distinct workers', () => {
    aggregator.addResult('t1', 'w1', 'first');
    aggregator.addResult('t1', 'w2', 'second');
    aggregator.addResult('t1', 'w1', 'third');

    const aggregation = aggregator.aggregateTaskResults('t1');
    assert.equal(aggregation.status, 'completed');
    assert.equal(aggregation.resultCount, 3);
    assert.deepEqual(aggregation.outputs.map((o) => o.output), ['first', 'second', 'third']);
    assert.deepEqual(aggregation.workers, ['w1', 'w2']);
    assert.equal(aggregation.firstResultAt, aggregation.outputs[0]?.timestamp);
    assert.equal(aggregation.lastResultAt, aggregation.outputs[2]?.timestamp);
  });

  it('should aggregate a workflow across tasks', () => {
    aggregator.addResult('t1', 'w1', 'a');
    aggregator.addResult('t2', 'w2', 'b');
    aggregator.addResult('t2', 'w1', 'c');

    const workflow = aggregator.aggregateWorkflowResults(['t1', 't2', 't3']);
    assert.deepEqual(workflow.workflow, {
      totalTasks: 3,
      totalResults: 3,
      uniqueWorkers: 2,
      workers: ['w1', 'w2'],
    });
    assert.equal(workflow.taskResults['t3']?.status, 'no_results');
  });

  it('should list results by worker', () => {
    aggregator.addResult('t1', 'w1', 'a');
    aggregator.addResult('t2', 'w2', 'b');
    assert.deepEqual(aggregator.getWorkerResults('w2').map((r) => r.taskId), ['t2']);
  });

  it('should clear one task or everything', () => {
    aggregator.addResult('t1', 'w1', 'a');
    aggregator.addResult('t2', 'w1', 'b');

    aggregator.clearTaskResults('t1');
    assert.deepEqual(aggregator.getTaskResults('t1'), []);
    assert.deepEqual(aggregator.getStats(), { totalResults: 1, uniqueTasks: 1, uniqueWorkers: 1 });

    aggregator.clearAll();
    assert.deepEqual(aggregator.getStats(), { totalResults: 0, uniqueTasks: 0, uniqueWorkers: 0 });
  });

  describe('formatFinalOutput', () => {
    beforeEach(() => {
      aggregator.addResult('t1', 'w1', 'hello');
      aggregator.addResult('t2', 'w2', { rows: 2 });
    });

    it('should render a summary', () => {
      assert.equal(
        aggregator.formatFinalOutput(['t1', 't2']),
        'Workflow results for 2 tasks\nTotal results: 2\nAgents: w1, w2'
      );
    });

    it('should render a detailed report', () => {
      const rule = '='.repeat(60);
      const expected = [
        rule,
        'WORKFLOW RESULTS',
        rule,
        '\nTotal Tasks: 2',
        'Total Results: 2',
        'Agents Involved: w1, w2',
        '\n' + '-'.repeat(60),
        '\nTask: t1',
        'Status: completed',
        '\n  Result 1 (from w1):',
        '    hello',
        '\nTask: t2',
        'Status: completed',
        '\n  Result 1 (from w2):',
        '    {"rows":2}',
        '\n' + rule,
      ].join('\n');
      assert.equal(aggregator.formatFinalOutput(['t1', 't2'], 'detailed'), expected);
    });

    it('should render JSON matching the workflow aggregation', () => {
      const parsed: unknown = JSON.parse(aggregator.formatFinalOutput(['t1', 't2'], 'json'));
      assert.deepEqual(parsed, JSON.parse(JSON.stringify(aggregator.aggregateWorkflowResults(['t1', 't2']))));
    });
  });

  describe('unusual worker output', () => {
    function detailedOutputLine(rendered: string): string {
      const lines = rendered.split('\n');
      const index = lines.indexOf('  Result 1 (from w1):');
      return lines[index + 1] ?? '';
    }

    function jsonOutput(rendered: string): unknown {
      const parsed: unknown = JSON.parse(rendered);
      assert.ok(typeof parsed === 'object' && parsed !== null && 'taskResults' in parsed);
      const taskResults: unknown = parsed.taskResults;
      assert.ok(typeof taskResults === 'object' && taskResults !== null && 't1' in taskResults);
      const task: unknown = taskResults.t1;
      assert.ok(typeof task === 'object' && task !== null && 'outputs' in task && Array.isArray(task.outputs));
      const first: unknown = task.outputs[0];
      assert.ok(typeof first === 'object' && first !== null && 'output' in first);
      return first.output;
    }

    it('should render bigint values as strings', () => {
      aggregator.addResult('t1', 'w1', { n: 10n });

      assert.equal(detailedOutputLine(aggregator.formatFinalOutput(['t1'], 'detailed')), '    {"n":"10"}');
      assert.deepEqual(jsonOutput(aggregator.formatFinalOutput(['t1'], 'json')), { n: '10' });
    });

    it('should mark self references as circular', () => {
      const loop: Record<string, unknown> = { name: 'loop' };
      loop['self'] = loop;
      aggregator.addResult('t1', 'w1', loop);

      assert.equal(
        detailedOutputLine(aggregator.formatFinalOutput(['t1'], 'detailed')),
        '    {"name":"loop","self":"[Circular]"}'
      );
      assert.deepEqual(jsonOutput(aggregator.formatFinalOutput(['t1'], 'json')), {
        name: 'loop',
        self: '[Circular]',
      });
    });

    it('should render shared references that are not cycles in full', () => {
      const shared = { id: 1 };
      aggregator.addResult('t1', 'w1', { a: shared, b: shared });

      assert.equal(
        detailedOutputLine(aggregator.formatFinalOutput(['t1'], 'detailed')),
        '    {"a":{"id":1},"b":{"id":1}}'
      );
    });
  });

  it('isOutputFormat should accept the three formats', () => {
    assert.equal(isOutputFormat('detailed'), true);
    assert.equal(isOutputFormat('xml'), false);
  });
});
