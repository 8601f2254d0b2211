/**
 * Worker interface
 *
 * A worker performs one subtask and reports a structured outcome. Timeouts
 * and cancellation belong to the worker; the orchestrator only treats a
 * thrown error or an error result as a failed task.
 */

export interface WorkerCompletedResult {
  status: 'completed';
  output: unknown;
  metadata?: Record<string, unknown>;
}

export interface WorkerClarificationResult {
  status: 'clarification_needed';
  questions: string[];
}

export interface WorkerErrorResult {
  status: 'error';
  message: string;
}

export type WorkerResult = WorkerCompletedResult | WorkerClarificationResult | WorkerErrorResult;

/**
 * Optional callbacks a worker may use while running
 */
export interface WorkerHooks {
  /** Report progress between 0 and 1 */
  onProgress(progress: number): void;
}

export interface IWorker {
  /** Stable identifier recorded on tracked tasks and results */
  readonly workerId: string;
  execute(description: string, context: Record<string, unknown>, hooks?: WorkerHooks): Promise<WorkerResult>;
}

/**
 * Chooses the worker for a subtask
 */
export type WorkerResolver<T> = (task: T) => IWorker;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an untrusted worker result
 */
export function isWorkerResult(value: unknown): value is WorkerResult {
  if (!isRecord(value)) {
    return false;
  }

  switch (value['status']) {
    case 'completed':
      return 'output' in value && (value['metadata'] === undefined || isRecord(value['metadata']));
    case 'clarification_needed': {
      const questions = value['questions'];
      return Array.isArray(questions) && questions.every((q) => typeof q === 'string');
    }
    case 'error':
      return typeof value['message'] === 'string';
    default:
      return false;
  }
}
