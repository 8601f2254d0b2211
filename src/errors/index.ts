export {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isPlanningError,
  isTaskStateError,
} from './error-codes';

export {
  OrchestratorError,
  CyclicDependencyError,
  UnknownTaskReferenceError,
  DuplicateTaskIdError,
  InvalidTransitionError,
  ConfigurationError,
} from './orchestrator-error';
