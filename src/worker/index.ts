export {
  isWorkerResult,
  type IWorker,
  type WorkerHooks,
  type WorkerResolver,
  type WorkerResult,
  type WorkerCompletedResult,
  type WorkerClarificationResult,
  type WorkerErrorResult,
} from './worker';
