/**
 * Coordination Module
 *
 * Exports:
 * - EventBus: async publish/subscribe with bounded history
 * - TaskStateTracker: per-task lifecycle and readiness
 * - ResultAggregator: per-task and per-workflow result folding
 * - Orchestrator: workflow state machine and worker dispatch
 */

export {
  EventBus,
  DEFAULT_HISTORY_LIMIT,
  type EventBusOptions,
  type EventBusStats,
  type HistoryFilter,
  type MessageCallback,
} from './event-bus';

export { TaskStateTracker, type TrackerStats } from './task-state-tracker';

export {
  ResultAggregator,
  OUTPUT_FORMATS,
  isOutputFormat,
  type AggregatedOutput,
  type AggregatorStats,
  type OutputFormat,
  type TaskAggregation,
  type WorkflowAggregation,
} from './result-aggregator';

export {
  Orchestrator,
  ORCHESTRATOR_ID,
  type OrchestratorOptions,
  type WorkflowProgress,
  type WorkflowResult,
  type WorkflowStatus,
} from './orchestrator';
