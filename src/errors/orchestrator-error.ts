/**
 * Orchestrator Error - base error class and typed failures
 */

import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './error-codes';

/**
 * Base error class for the orchestrator
 */
export class OrchestratorError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'OrchestratorError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised when a dependency graph contains a cycle
 */
export class CyclicDependencyError extends OrchestratorError {
  public readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(
      ErrorCode.E201_CYCLIC_DEPENDENCY,
      cycle.length > 0 ? cycle.join(' -> ') : undefined,
      { cycle: [...cycle] }
    );
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

/**
 * Raised when a subtask depends on an id outside its decomposition batch
 */
export class UnknownTaskReferenceError extends OrchestratorError {
  public readonly taskId: string;
  public readonly missingDependency: string;

  constructor(taskId: string, missingDependency: string) {
    super(ErrorCode.E202_UNKNOWN_TASK_REFERENCE, `${taskId} -> ${missingDependency}`, {
      taskId,
      missingDependency,
    });
    this.name = 'UnknownTaskReferenceError';
    this.taskId = taskId;
    this.missingDependency = missingDependency;
  }
}

export class DuplicateTaskIdError extends OrchestratorError {
  public readonly taskId: string;

  constructor(taskId: string) {
    super(ErrorCode.E203_DUPLICATE_TASK_ID, taskId, { taskId });
    this.name = 'DuplicateTaskIdError';
    this.taskId = taskId;
  }
}

/**
 * Raised when a tracked task is asked to move to a state its
 * current state cannot reach
 */
export class InvalidTransitionError extends OrchestratorError {
  public readonly taskId: string;
  public readonly from: string;
  public readonly to: string;

  constructor(taskId: string, from: string, to: string) {
    super(ErrorCode.E302_INVALID_STATE_TRANSITION, `${taskId}: ${from} -> ${to}`, {
      taskId,
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export class ConfigurationError extends OrchestratorError {
  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    super(code, context, details);
    this.name = 'ConfigurationError';
  }
}
