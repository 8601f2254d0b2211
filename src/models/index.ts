/**
 * Models Module Index
 */

export {
  TaskComplexity,
  TaskStatus,
  MessageType,
  OrchestratorState,
  isValidTaskTransition,
  isTerminalTaskStatus,
  isValidOrchestratorTransition,
  isTaskComplexity,
} from './enums';

export { createSubTask, type TaskAnalysis, type SubTask, type SubTaskInput } from './subtask';

export { createMessage, isBroadcast, type Message } from './message';

export type { TrackedTask, Result } from './tracked-task';
