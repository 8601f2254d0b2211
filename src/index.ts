/**
 * DAG Task Orchestrator
 *
 * Decomposes a task description into a dependency graph of subtasks, plans
 * parallel execution steps and dispatches them to pluggable workers.
 */

export * from './errors';
export * from './logging';
export * from './config';
export * from './models';
export * from './planning';
export * from './worker';
export * from './coordination';
export {
  CLI,
  CLIError,
  EchoWorker,
  parseArgs,
  validateArgs,
  generateHelp,
  EXIT_COMPLETED,
  EXIT_DEGRADED,
  EXIT_ERROR,
  type CLIOptions,
  type CLIResult,
  type ParsedArgs,
  type ValidatedArgs,
} from './cli/cli-interface';
