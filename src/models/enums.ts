/**
 * Enumerations shared across planning and coordination
 */

/**
 * Complexity tier of a task or subtask
 */
export enum TaskComplexity {
  SIMPLE = 'simple',
  MEDIUM = 'medium',
  COMPLEX = 'complex',
}

/**
 * Runtime status of a tracked task
 * PENDING -> ASSIGNED -> IN_PROGRESS -> COMPLETED | FAILED | BLOCKED
 */
export enum TaskStatus {
  PENDING = 'PENDING',
  ASSIGNED = 'ASSIGNED',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  BLOCKED = 'BLOCKED',
}

/**
 * Event bus message types
 */
export enum MessageType {
  TASK_ASSIGNED = 'TASK_ASSIGNED',
  TASK_STARTED = 'TASK_STARTED',
  TASK_PROGRESS = 'TASK_PROGRESS',
  TASK_COMPLETED = 'TASK_COMPLETED',
  TASK_FAILED = 'TASK_FAILED',
  AGENT_REQUEST = 'AGENT_REQUEST',
  AGENT_RESPONSE = 'AGENT_RESPONSE',
  SYSTEM_EVENT = 'SYSTEM_EVENT',
}

/**
 * Workflow-level orchestrator state
 */
export enum OrchestratorState {
  IDLE = 'IDLE',
  PLANNING = 'PLANNING',
  EXECUTING = 'EXECUTING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  [TaskStatus.PENDING]: [TaskStatus.ASSIGNED],
  [TaskStatus.ASSIGNED]: [TaskStatus.IN_PROGRESS],
  [TaskStatus.IN_PROGRESS]: [TaskStatus.COMPLETED, TaskStatus.FAILED, TaskStatus.BLOCKED],
  [TaskStatus.COMPLETED]: [],
  [TaskStatus.FAILED]: [],
  [TaskStatus.BLOCKED]: [],
};

export function isValidTaskTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TASK_TRANSITIONS[status].length === 0;
}

const ORCHESTRATOR_TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  [OrchestratorState.IDLE]: [OrchestratorState.PLANNING],
  [OrchestratorState.PLANNING]: [OrchestratorState.EXECUTING, OrchestratorState.FAILED],
  [OrchestratorState.EXECUTING]: [OrchestratorState.COMPLETED, OrchestratorState.FAILED],
  [OrchestratorState.COMPLETED]: [OrchestratorState.PLANNING],
  [OrchestratorState.FAILED]: [OrchestratorState.PLANNING],
};

export function isValidOrchestratorTransition(from: OrchestratorState, to: OrchestratorState): boolean {
  return ORCHESTRATOR_TRANSITIONS[from].includes(to);
}

export function isTaskComplexity(value: unknown): value is TaskComplexity {
  return (
    value === TaskComplexity.SIMPLE ||
    value === TaskComplexity.MEDIUM ||
    value === TaskComplexity.COMPLEX
  );
}
