/**
 * CLI Interface for the task DAG orchestrator
 *
 * Commands:
 *   run "<description>"   plan and execute with the built-in echo worker
 *   plan "<description>"  print the analysis and execution plan only
 */

import { ErrorCode } from '../errors/error-codes';
import { OrchestratorError } from '../errors/orchestrator-error';
import { ConfigurationManager, type OrchestratorConfig } from '../config/configuration-manager';
import { WorkflowLogger, createConsoleSubscriber, formatLogEntry } from '../logging/workflow-logger';
import { TaskAnalyzer } from '../planning/task-analyzer';
import { TaskDecomposer } from '../planning/task-decomposer';
import { DependencyMapper } from '../planning/dependency-mapper';
import { ExecutionPlanner } from '../planning/execution-planner';
import { Orchestrator } from '../coordination/orchestrator';
import { isOutputFormat, type OutputFormat } from '../coordination/result-aggregator';
import type { IWorker, WorkerHooks, WorkerResult } from '../worker/worker';

/**
 * CLI Error class
 */
export class CLIError extends OrchestratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.E104_INVALID_ARGUMENT, message, details);
    this.name = 'CLIError';
  }
}

export type CLICommand = 'run' | 'plan';

const COMMANDS: readonly CLICommand[] = ['run', 'plan'];

function isCommand(value: string): value is CLICommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command?: string;
  description?: string;
  configPath?: string;
  format?: string;
  sequential?: boolean;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

export interface ValidatedArgs {
  command?: CLICommand;
  description: string;
  configPath?: string;
  format: OutputFormat;
  sequential: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export const EXIT_COMPLETED = 0;
export const EXIT_ERROR = 1;
export const EXIT_DEGRADED = 2;

export interface CLIResult {
  exitCode: number;
  output: string;
}

export interface CLIOptions {
  version: string;
  /** Sink for log lines in --verbose mode */
  logSink?: (line: string) => void;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {};
  let i = 0;

  if (args.includes('--version') || args.includes('-v')) {
    result.version = true;
    return result;
  }

  while (i < args.length) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--config') {
      result.configPath = args[++i];
    } else if (arg === '--format') {
      result.format = args[++i];
    } else if (arg === '--sequential') {
      result.sequential = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg.startsWith('-')) {
      throw new CLIError(`Unknown option: ${arg}`, { option: arg });
    } else if (!result.command) {
      result.command = arg;
    } else if (result.description === undefined) {
      result.description = arg;
    } else {
      result.description = `${result.description} ${arg}`;
    }

    i++;
  }

  return result;
}

/**
 * Validate parsed arguments
 */
export function validateArgs(args: ParsedArgs): ValidatedArgs {
  const validated: ValidatedArgs = {
    description: args.description ?? '',
    configPath: args.configPath,
    format: 'summary',
    sequential: args.sequential ?? false,
    verbose: args.verbose ?? false,
    help: args.help ?? false,
    version: args.version ?? false,
  };

  if (validated.version || (validated.help && !args.command)) {
    return validated;
  }

  if (!args.command) {
    throw new CLIError('No command specified. Use --help for usage information.');
  }
  if (!isCommand(args.command)) {
    throw new CLIError(`Unknown command: ${args.command}`, { command: args.command });
  }
  validated.command = args.command;

  if (validated.help) {
    return validated;
  }

  if (validated.description.trim() === '') {
    throw new CLIError(`${args.command} command requires a task description`);
  }

  if (args.format !== undefined) {
    if (!isOutputFormat(args.format)) {
      throw new CLIError(`--format must be summary, detailed or json, got ${args.format}`, {
        format: args.format,
      });
    }
    validated.format = args.format;
  }

  if (Object.prototype.hasOwnProperty.call(args, 'configPath') && !args.configPath) {
    throw new CLIError('--config requires a path');
  }

  return validated;
}

/**
 * Generate help text
 */
export function generateHelp(command?: CLICommand): string {
  if (command === 'run') {
    return `Usage: task-dag run "<description>" [options]

Options:
  --format <type>     Output format (summary, detailed, json)
  --config <path>     Path to a JSON settings file
  --sequential        Dispatch one task at a time
  --verbose           Print log entries while running
  --help              Show this help message

Exit codes: 0 completed, 2 degraded, 1 error`;
  }

  if (command === 'plan') {
    return `Usage: task-dag plan "<description>" [options]

Options:
  --config <path>     Path to a JSON settings file
  --help              Show this help message`;
  }

  return `Task DAG Orchestrator

Commands:
  run "<description>"   Plan and execute a task
  plan "<description>"  Show the analysis and execution plan

Options:
  --help              Show help message
  --version           Show version

Use "task-dag <command> --help" for command-specific options.`;
}

/**
 * Worker used by `run`: completes every task with a line describing it
 */
export class EchoWorker implements IWorker {
  readonly workerId: string;

  constructor(workerId: string = 'echo-worker') {
    this.workerId = workerId;
  }

  async execute(description: string, context: Record<string, unknown>, hooks?: WorkerHooks): Promise<WorkerResult> {
    hooks?.onProgress(0.5);
    const taskId = typeof context['taskId'] === 'string' ? context['taskId'] : 'task';
    return {
      status: 'completed',
      output: `[${taskId}] ${description}`,
      metadata: { domain: context['domain'] },
    };
  }
}

/**
 * CLI class
 */
export class CLI {
  private readonly options: CLIOptions;

  constructor(options: CLIOptions) {
    this.options = options;
  }

  /**
   * Run one command. Usage and configuration problems are reported through
   * the result with EXIT_ERROR; anything else propagates.
   */
  async run(argv: readonly string[]): Promise<CLIResult> {
    let args: ValidatedArgs;
    let config: Readonly<OrchestratorConfig>;
    try {
      args = validateArgs(parseArgs(argv));
      if (args.version) {
        return { exitCode: EXIT_COMPLETED, output: this.options.version };
      }
      if (args.help) {
        return { exitCode: EXIT_COMPLETED, output: generateHelp(args.command) };
      }
      config = new ConfigurationManager().load(args.configPath);
    } catch (error) {
      if (error instanceof OrchestratorError) {
        return { exitCode: EXIT_ERROR, output: error.message };
      }
      throw error;
    }

    const logger = this.createLogger(config, args.verbose);

    if (args.command === 'plan') {
      return this.plan(args.description, config, logger);
    }
    return this.execute(args, config, logger);
  }

  private async execute(
    args: ValidatedArgs,
    config: Readonly<OrchestratorConfig>,
    logger: WorkflowLogger
  ): Promise<CLIResult> {
    const orchestrator = new Orchestrator({
      worker: new EchoWorker(),
      config: args.sequential ? { ...config, dispatch: { ...config.dispatch, mode: 'sequential' } } : config,
      logger,
    });

    try {
      const result = await orchestrator.executeTask(args.description);
      const body = orchestrator.getResults(undefined, args.format);
      const output = args.format === 'json' ? body : `${body}\nStatus: ${result.status}`;
      return {
        exitCode: result.status === 'completed' ? EXIT_COMPLETED : EXIT_DEGRADED,
        output,
      };
    } catch (error) {
      if (error instanceof OrchestratorError) {
        return { exitCode: EXIT_ERROR, output: error.message };
      }
      throw error;
    }
  }

  private plan(description: string, config: Readonly<OrchestratorConfig>, logger: WorkflowLogger): CLIResult {
    try {
      const analysis = new TaskAnalyzer({ logger }).analyze(description);
      const decomposition = new TaskDecomposer({
        maxGenericSubtasks: config.decomposition.max_generic_subtasks,
        logger,
      }).decompose(analysis, config.decomposition.max_depth);
      const graph = new DependencyMapper({ logger }).buildGraph(decomposition.subtasks);
      const plan = new ExecutionPlanner({ weights: config.complexity_weights, logger }).createPlan(
        graph,
        decomposition.subtasks
      );

      const output = JSON.stringify(
        {
          analysis,
          strategy: decomposition.strategy,
          subtasks: decomposition.subtasks.map((t) => ({
            id: t.id,
            description: t.description,
            dependencies: t.dependencies,
            domain: t.domain,
            complexity: t.complexity,
          })),
          parallelGroups: graph.parallelGroups,
          plan,
        },
        null,
        2
      );
      return { exitCode: plan.error === undefined ? EXIT_COMPLETED : EXIT_ERROR, output };
    } catch (error) {
      if (error instanceof OrchestratorError) {
        return { exitCode: EXIT_ERROR, output: error.message };
      }
      throw error;
    }
  }

  private createLogger(config: Readonly<OrchestratorConfig>, verbose: boolean): WorkflowLogger {
    const logger = new WorkflowLogger({
      maxEntries: config.logging.max_entries,
      minLevel: verbose ? 'debug' : config.logging.level,
    });
    if (verbose) {
      const sink = this.options.logSink;
      logger.subscribe(sink ? { onLog: (entry) => sink(formatLogEntry(entry)) } : createConsoleSubscriber());
    }
    return logger;
  }
}
