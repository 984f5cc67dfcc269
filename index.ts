export { ClusterQueueService } from "./src/service.js";
export type { ClusterQueueServiceParams, GetOptions, JobReport, PollOptions } from "./src/service.js";
export { Queue, DEFAULT_MISS_LIMIT } from "./src/queue.js";
export type {
  JobOutcome,
  QueueOptions,
  QueueStats,
  RefreshResult,
  WaitOptions,
  WaitResult,
} from "./src/queue.js";
export {
  JobRecord,
  QueueChild,
  QueueJob,
  aggregateState,
  childKey,
  parseChildKey,
} from "./src/records.js";
export type { JobRecordView, RecordKind } from "./src/records.js";
export { LocalWorkerPool, createLocalAdapter, normalizeLocalState } from "./src/local-pool.js";
export {
  ResultRetriever,
  createLocalOutputReader,
  createRemoteOutputReader,
} from "./src/retriever.js";
export type { JobResult, OutputReader } from "./src/retriever.js";
export {
  FUNCTION_RESULT_MARKER,
  FunctionCallSchema,
  buildFunctionJob,
  parseFunctionResult,
} from "./src/function-job.js";
export type { FunctionCall, FunctionJobOptions } from "./src/function-job.js";
export { parallelChunks, parallelMap, splitIntoChunks } from "./src/parallel.js";
export type { FunctionRef, ParallelOptions } from "./src/parallel.js";
export { createSlurmAdapter, normalizeSlurmState, renderSlurmScript } from "./src/slurm.js";
export { createTorqueAdapter, normalizeTorqueState, renderTorqueScript } from "./src/torque.js";
export {
  JobSpecSchema,
  ResourceRequestSchema,
  validateJobSpec,
  withDefaultOutputs,
} from "./src/spec.js";
export type { JobSpec, ResourceRequest } from "./src/spec.js";
export { LOCAL_BACKEND, loadClusterQueueConfig, parseClusterQueueConfig } from "./src/config.js";
export { createConsoleLogger, silentLogger } from "./src/logger.js";
export { defaultCommandRunner } from "./src/exec.js";
export * from "./src/errors.js";
export { isTerminal, TERMINAL_STATES } from "./src/types.js";
export type {
  BatchSystemAdapter,
  ClusterProfile,
  ClusterQueueConfig,
  CommandResult,
  CommandRunner,
  JobState,
  NormalizedState,
  OutputLocations,
  QueueLogger,
  SnapshotEntry,
} from "./src/types.js";
