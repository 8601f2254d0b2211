import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { TaskAnalyzer, GENERAL_DOMAIN } from '../../../src/planning/task-analyzer';
import { TaskComplexity } from '../../../src/models/enums';
import { WorkflowLogger } from '../../../src/logging/workflow-logger';

describe('TaskAnalyzer', () => {
  let analyzer: TaskAnalyzer;

  beforeEach(() => {
    analyzer = new TaskAnalyzer();
  });

  it('should classify a simple single-domain task', () => {
    const analysis = analyzer.analyze('Create a simple Python function');
    assert.equal(analysis.complexity, TaskComplexity.SIMPLE);
    assert.deepEqual(analysis.domains, ['development']);
    assert.deepEqual(analysis.domainScores, { development: 2 });
    assert.equal(analysis.requiresDecomposition, false);
    assert.equal(analysis.estimatedSubtasks, 2);
    assert.deepEqual(analysis.requirements, ['Create a simple Python function']);
  });

  it('should classify a complex multi-domain task with priority bonuses', () => {
    const analysis = analyzer.analyze('Build a full data dashboard and deploy it to the cloud');
    assert.equal(analysis.complexity, TaskComplexity.COMPLEX);
    assert.deepEqual(analysis.domainScores, { development: 1, devops: 2.5, data: 2.5, design: 1 });
    assert.deepEqual(analysis.domains, ['devops', 'data', 'development', 'design']);
    assert.equal(analysis.requiresDecomposition, true);
    assert.equal(analysis.estimatedSubtasks, 7);
    assert.deepEqual(analysis.requirements, ['Build a full data dashboard', 'deploy it to the cloud']);
  });

  it('should fall back to a medium marker when no action verb appears', () => {
    const analysis = analyzer.analyze('Handle several reports');
    assert.equal(analysis.complexity, TaskComplexity.MEDIUM);
    assert.deepEqual(analysis.domains, ['data']);
    assert.equal(analysis.estimatedSubtasks, 3);
  });

  it('should treat more than three action verbs as complex', () => {
    assert.equal(analyzer.analyze('create, build, test and deploy').complexity, TaskComplexity.COMPLEX);
  });

  it('should resolve empty input to simple and general', () => {
    const analysis = analyzer.analyze('');
    assert.equal(analysis.complexity, TaskComplexity.SIMPLE);
    assert.deepEqual(analysis.domains, [GENERAL_DOMAIN]);
    assert.deepEqual(analysis.domainScores, {});
    assert.deepEqual(analysis.requirements, []);
    assert.equal(analysis.estimatedSubtasks, 1);
  });

  it('should split requirements on commas and "and", dropping short fragments', () => {
    const analysis = analyzer.analyze('Write docs, add tests and ship');
    assert.deepEqual(analysis.requirements, ['Write docs', 'add tests']);
  });

  it('should cap requirements at ten', () => {
    const parts = Array.from({ length: 12 }, (_, i) => `requirement ${i}`);
    assert.equal(analyzer.analyze(parts.join(', ')).requirements.length, 10);
  });

  it('should cap estimated subtasks at ten', () => {
    const analysis = analyzer.analyze(
      'create build develop design implement deploy test analyze integrate configure'
    );
    assert.equal(analysis.estimatedSubtasks, 10);
  });

  it('should return a frozen analysis', () => {
    const analysis = analyzer.analyze('Create a simple Python function');
    assert.ok(Object.isFrozen(analysis));
    assert.ok(Object.isFrozen(analysis.domains));
  });

  it('should be deterministic', () => {
    const text = 'Build a full data dashboard and deploy it to the cloud';
    assert.deepEqual(analyzer.analyze(text), analyzer.analyze(text));
  });

  it('should log the classification', () => {
    const logger = new WorkflowLogger();
    new TaskAnalyzer({ logger }).analyze('Handle several reports');
    const entries = logger.getByCategory('ANALYSIS');
    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.message, 'Classified task as medium (data)');
  });

  describe('determineComplexity', () => {
    it('should prefer simple markers over a single action verb', () => {
      assert.equal(analyzer.determineComplexity('just build it', 1), TaskComplexity.SIMPLE);
    });

    it('should return medium for two verbs alongside a simple marker', () => {
      assert.equal(analyzer.determineComplexity('just build and test', 2), TaskComplexity.MEDIUM);
    });
  });
});
