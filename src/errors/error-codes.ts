/**
 * Error Codes for the DAG task orchestrator
 *
 * E1xx: Configuration errors - prevent orchestrator construction
 * E2xx: Planning errors - abort the planning phase of a workflow
 * E3xx: Task state errors - rejected tracker operations
 * E4xx: Workflow errors - orchestrator run and worker boundary
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  PLANNING = 'PLANNING',
  TASK_STATE = 'TASK_STATE',
  WORKFLOW = 'WORKFLOW',
}

/**
 * Error Codes
 */
export enum ErrorCode {
  // E1xx: Configuration
  E101_CONFIG_FILE_NOT_FOUND = 'E101',
  E102_CONFIG_PARSE_FAILURE = 'E102',
  E103_CONFIG_VALUE_OUT_OF_RANGE = 'E103',
  E104_INVALID_ARGUMENT = 'E104',

  // E2xx: Planning
  E201_CYCLIC_DEPENDENCY = 'E201',
  E202_UNKNOWN_TASK_REFERENCE = 'E202',
  E203_DUPLICATE_TASK_ID = 'E203',
  E204_PLAN_CREATION_FAILURE = 'E204',

  // E3xx: Task state
  E301_TASK_NOT_FOUND = 'E301',
  E302_INVALID_STATE_TRANSITION = 'E302',
  E303_PROGRESS_OUT_OF_RANGE = 'E303',

  // E4xx: Workflow
  E401_WORKFLOW_ALREADY_RUNNING = 'E401',
  E402_WORKER_FAILURE = 'E402',
  E403_INVALID_WORKER_RESULT = 'E403',
  E404_NO_WORKFLOW_RUN = 'E404',
}

const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.E101_CONFIG_FILE_NOT_FOUND]: 'Configuration file not found',
  [ErrorCode.E102_CONFIG_PARSE_FAILURE]: 'Configuration file could not be parsed',
  [ErrorCode.E103_CONFIG_VALUE_OUT_OF_RANGE]: 'Configuration value out of range',
  [ErrorCode.E104_INVALID_ARGUMENT]: 'Invalid command-line arguments',

  [ErrorCode.E201_CYCLIC_DEPENDENCY]: 'Circular dependency detected',
  [ErrorCode.E202_UNKNOWN_TASK_REFERENCE]: 'Dependency references an unknown task',
  [ErrorCode.E203_DUPLICATE_TASK_ID]: 'Duplicate task id in decomposition',
  [ErrorCode.E204_PLAN_CREATION_FAILURE]: 'Execution plan could not be created',

  [ErrorCode.E301_TASK_NOT_FOUND]: 'Task not found',
  [ErrorCode.E302_INVALID_STATE_TRANSITION]: 'Invalid task state transition',
  [ErrorCode.E303_PROGRESS_OUT_OF_RANGE]: 'Progress must be a finite number',

  [ErrorCode.E401_WORKFLOW_ALREADY_RUNNING]: 'A workflow is already running on this orchestrator',
  [ErrorCode.E402_WORKER_FAILURE]: 'Worker failed to execute task',
  [ErrorCode.E403_INVALID_WORKER_RESULT]: 'Worker returned an invalid result',
  [ErrorCode.E404_NO_WORKFLOW_RUN]: 'No workflow has been executed yet',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (code.startsWith('E2')) {
    return ErrorCategory.PLANNING;
  }
  if (code.startsWith('E3')) {
    return ErrorCategory.TASK_STATE;
  }
  return ErrorCategory.WORKFLOW;
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code] ?? `Unknown error: ${code}`;
}

/**
 * Structural errors abort planning and reach the caller
 */
export function isPlanningError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.PLANNING;
}

export function isTaskStateError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.TASK_STATE;
}
