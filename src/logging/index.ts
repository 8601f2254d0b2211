export {
  WorkflowLogger,
  createConsoleSubscriber,
  formatLogEntry,
  isLogLevel,
  type LogLevel,
  type LogCategory,
  type LogEntry,
  type LogSubscriber,
  type LogOptions,
  type WorkflowLoggerOptions,
} from './workflow-logger';
