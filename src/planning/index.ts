/**
 * Task Planning Module
 *
 * Exports:
 * - TaskAnalyzer: complexity and domain classification
 * - TaskDecomposer: template-driven subtask generation
 * - DependencyMapper: DAG construction, cycle detection, parallel groups
 * - ExecutionPlanner: execution steps, duration estimate, critical path
 */

export {
  TaskAnalyzer,
  DEFAULT_VOCABULARY,
  GENERAL_DOMAIN,
  type AnalyzerVocabulary,
} from './task-analyzer';

export {
  TaskDecomposer,
  buildTaskTree,
  DEFAULT_PHASE_TEMPLATES,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_GENERIC_SUBTASKS,
  ROOT_TASK_ID,
  type Decomposition,
  type ITaskDecomposer,
  type PhaseTemplate,
  type PhaseTemplates,
  type TaskDecomposerOptions,
} from './task-decomposer';

export {
  DependencyMapper,
  validateSubtasks,
  findCycle,
  topologicalSort,
  groupByDepth,
  type DependencyGraph,
} from './dependency-mapper';

export {
  ExecutionPlanner,
  DEFAULT_COMPLEXITY_WEIGHTS,
  type ExecutionPlan,
  type ExecutionStep,
} from './execution-planner';
