import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { TaskAnalyzer } from '../../../src/planning/task-analyzer';
import { TaskDecomposer, ROOT_TASK_ID, buildTaskTree } from '../../../src/planning/task-decomposer';
import { TaskComplexity } from '../../../src/models/enums';
import { createSubTask, type TaskAnalysis } from '../../../src/models/subtask';

function genericAnalysis(requirements: string[]): TaskAnalysis {
  return {
    description: 'Sort out the chores',
    complexity: TaskComplexity.MEDIUM,
    domains: ['general'],
    domainScores: {},
    requiresDecomposition: true,
    estimatedSubtasks: 3,
    requirements,
  };
}

describe('TaskDecomposer', () => {
  let analyzer: TaskAnalyzer;
  let decomposer: TaskDecomposer;

  beforeEach(() => {
    analyzer = new TaskAnalyzer();
    decomposer = new TaskDecomposer();
  });

  it('should keep a simple task as a single subtask', () => {
    const result = decomposer.decompose(analyzer.analyze('Create a simple Python function'));
    assert.equal(result.strategy, 'single');
    assert.equal(result.subtasks.length, 1);
    assert.equal(result.subtasks[0]?.id, ROOT_TASK_ID);
    assert.equal(result.rootTask.complexity, TaskComplexity.SIMPLE);
    assert.deepEqual(result.taskTree, { task_0: [] });
  });

  it('should chain devops phases for a complete web application', () => {
    const description = 'Build a complete web application with authentication, database, and deployment';
    const analysis = analyzer.analyze(description);
    assert.equal(analysis.complexity, TaskComplexity.COMPLEX);
    assert.deepEqual(analysis.domains, ['devops', 'data', 'development', 'design']);
    assert.equal(analysis.estimatedSubtasks, 7);

    const result = decomposer.decompose(analysis);
    assert.equal(result.strategy, 'devops');
    assert.deepEqual(
      result.subtasks.map((t) => [t.id, t.dependencies]),
      [
        ['task_1', []],
        ['task_2', ['task_1']],
        ['task_3', ['task_2']],
        ['task_4', ['task_3']],
        ['task_5', ['task_4']],
      ]
    );
    assert.equal(result.subtasks[2]?.description, `Deployment pipeline for ${description}`);
  });

  it('should use the primary domain template as a dependency chain', () => {
    const description = 'Implement a REST api with several endpoints';
    const result = decomposer.decompose(analyzer.analyze(description));

    assert.equal(result.strategy, 'development');
    assert.deepEqual(
      result.subtasks.map((t) => t.id),
      ['task_1', 'task_2', 'task_3', 'task_4', 'task_5']
    );
    assert.equal(result.subtasks[0]?.description, `Requirements analysis for ${description}`);
    assert.deepEqual(result.subtasks[0]?.dependencies, []);
    assert.deepEqual(result.subtasks[3]?.dependencies, ['task_3']);
    assert.equal(result.subtasks[1]?.domain, 'design');
    assert.equal(result.subtasks[3]?.domain, 'testing');
    assert.ok(result.subtasks.every((t) => t.parentId === ROOT_TASK_ID));
    assert.deepEqual(result.taskTree[ROOT_TASK_ID], ['task_1', 'task_2', 'task_3', 'task_4', 'task_5']);
  });

  it('should pick the template of the highest-ranked domain', () => {
    const result = decomposer.decompose(analyzer.analyze('Build a full data dashboard and deploy it to the cloud'));
    assert.equal(result.strategy, 'devops');
    assert.equal(result.subtasks[0]?.description, 'Infrastructure setup for Build a full data dashboard and deploy it to the cloud');
  });

  it('should turn requirement fragments into a generic chain', () => {
    const result = decomposer.decompose(
      analyzer.analyze('Handle several chores, tidy the garage and water plants')
    );
    assert.equal(result.strategy, 'general');
    assert.deepEqual(
      result.subtasks.map((t) => [t.id, t.description, t.dependencies]),
      [
        ['task_1', 'Handle several chores', []],
        ['task_2', 'tidy the garage', ['task_1']],
        ['task_3', 'water plants', ['task_2']],
      ]
    );
  });

  it('should fall back to the general phases without requirements', () => {
    const result = decomposer.decompose(genericAnalysis([]));
    assert.deepEqual(
      result.subtasks.map((t) => t.description),
      ['Analyze requirements', 'Plan approach', 'Execute task', 'Verify results']
    );
  });

  it('should cap generic subtasks', () => {
    const capped = new TaskDecomposer({ maxGenericSubtasks: 2 });
    const result = capped.decompose(genericAnalysis(['first part', 'second part', 'third part']));
    assert.deepEqual(result.subtasks.map((t) => t.id), ['task_1', 'task_2']);
  });

  it('should not decompose when maxDepth is below one', () => {
    const result = decomposer.decompose(analyzer.analyze('Implement a REST api with several endpoints'), 0);
    assert.equal(result.strategy, 'single');
    assert.deepEqual(result.subtasks.map((t) => t.id), [ROOT_TASK_ID]);
  });

  it('should accept custom templates', () => {
    const custom = new TaskDecomposer({
      templates: { general: [{ title: 'Only step', domain: 'general' }] },
    });
    const result = custom.decompose(genericAnalysis([]));
    assert.deepEqual(result.subtasks.map((t) => t.description), ['Only step']);
  });

  describe('buildTaskTree', () => {
    it('should map parents to children and ignore unknown parents', () => {
      const tree = buildTaskTree([
        createSubTask({ id: 'root', description: 'r' }),
        createSubTask({ id: 'a', description: 'a', parentId: 'root' }),
        createSubTask({ id: 'b', description: 'b', parentId: 'elsewhere' }),
      ]);
      assert.deepEqual(tree, { root: ['a'], a: [], b: [] });
    });
  });
});
