import path from "node:path";
import { LOCAL_BACKEND } from "./config.js";
import { ClusterQueueError, NotFinishedError, SubmissionError, describeError } from "./errors.js";
import { defaultCommandRunner } from "./exec.js";
import {
  buildFunctionJob,
  parseFunctionResult,
  type FunctionCall,
  type FunctionJobOptions,
} from "./function-job.js";
import { LocalWorkerPool, createLocalAdapter } from "./local-pool.js";
import { silentLogger } from "./logger.js";
import { Queue, type JobOutcome, type QueueStats, type RefreshResult, type WaitResult } from "./queue.js";
import type { JobRecordView } from "./records.js";
import {
  ResultRetriever,
  createLocalOutputReader,
  createRemoteOutputReader,
  type JobResult,
  type OutputReader,
} from "./retriever.js";
import { createSlurmAdapter } from "./slurm.js";
import { validateJobSpec, withDefaultOutputs } from "./spec.js";
import { createTorqueAdapter } from "./torque.js";
import type {
  BatchSystemAdapter,
  ClusterProfile,
  ClusterQueueConfig,
  CommandRunner,
  JobState,
  QueueLogger,
} from "./types.js";

export type ClusterQueueServiceParams = {
  config: ClusterQueueConfig;
  /** Cluster profile id or `"local"`; falls back to `defaultCluster`, then the local pool. */
  backend?: string;
  workspaceDir: string;
  runner?: CommandRunner;
  now?: () => Date;
  logger?: QueueLogger;
};

export type PollOptions = {
  pollIntervalSeconds?: number;
  signal?: AbortSignal;
};

export type GetOptions = PollOptions & {
  maxWaitSeconds?: number;
  /** Read the outputs of every target that finished. */
  collectOutputs?: boolean;
};

export type JobReport = JobOutcome & {
  result?: JobResult;
  /** Per-task results of an array job, keyed `parent[index]`. */
  results?: Record<string, JobResult>;
  outputError?: string;
};

type BackendBinding = {
  id: string;
  adapter: BatchSystemAdapter;
  reader: OutputReader;
  pool?: LocalWorkerPool;
};

/**
 * One backend, one Queue, one ResultRetriever. Submissions are tracked only
 * after the backend accepted them.
 */
export class ClusterQueueService {
  readonly backend: string;
  readonly queue: Queue;
  readonly retriever: ResultRetriever;
  private readonly config: ClusterQueueConfig;
  private readonly adapter: BatchSystemAdapter;
  private readonly pool: LocalWorkerPool | undefined;
  private readonly logger: QueueLogger;
  private starting: Promise<void> | null = null;

  constructor(params: ClusterQueueServiceParams) {
    this.config = params.config;
    this.logger = params.logger ?? silentLogger;
    const binding = this.bind(params);
    this.backend = binding.id;
    this.adapter = binding.adapter;
    this.pool = binding.pool;
    this.queue = new Queue({
      adapter: binding.adapter,
      missLimit: this.config.polling.missLimit,
      queryTimeoutMs: this.config.polling.queryTimeoutSeconds * 1000,
      logger: this.logger,
      now: params.now,
    });
    this.retriever = new ResultRetriever({ queue: this.queue, reader: binding.reader });
  }

  async submit(input: unknown): Promise<JobRecordView> {
    const spec = withDefaultOutputs(validateJobSpec(input));
    await this.ready();

    let id: string;
    try {
      id = await this.adapter.submit(spec);
    } catch (err) {
      const error =
        err instanceof ClusterQueueError
          ? err
          : new SubmissionError(this.adapter.kind, describeError(err), { cause: err });
      this.logger.warn(`[cluster-queue] ${this.backend}: ${error.message}`);
      throw error;
    }

    const view = spec.arrayIndices
      ? this.queue.registerArray(id, spec, spec.arrayIndices)
      : this.queue.register(id, spec);
    this.logger.info(
      `[cluster-queue] ${this.backend}: submitted job ${id}${
        spec.arrayIndices ? ` (${spec.arrayIndices.length} tasks)` : ""
      }`,
    );
    return view;
  }

  /** Submits a call to an exported function; see {@link functionResult}. */
  async submitFunction(
    call: FunctionCall,
    options: FunctionJobOptions = {},
  ): Promise<JobRecordView> {
    return await this.submit(buildFunctionJob(call, options));
  }

  /** Waits for a function job, then returns what the function returned. */
  async functionResult(
    id: string,
    options: Omit<GetOptions, "collectOutputs"> = {},
  ): Promise<unknown> {
    const outcome = (await this.get([id], { ...options, collectOutputs: false }))[id];
    if (!outcome?.terminal) {
      throw new NotFinishedError(id, outcome?.state ?? this.queue.status(id));
    }
    const { stdout } = await this.retriever.fetch(id);
    return parseFunctionResult(id, stdout);
  }

  async refresh(): Promise<RefreshResult> {
    await this.ready();
    return await this.queue.refresh();
  }

  async get(ids: readonly string[], options: GetOptions = {}): Promise<Record<string, JobReport>> {
    await this.ready();
    const outcomes = await this.queue.get(
      ids,
      this.interval(options),
      options.maxWaitSeconds,
      { signal: options.signal },
    );
    if (!options.collectOutputs) {
      return outcomes;
    }

    const reports: Record<string, JobReport> = {};
    for (const [id, outcome] of Object.entries(outcomes)) {
      reports[id] = outcome.terminal ? await this.collect(id, outcome) : outcome;
    }
    return reports;
  }

  async wait(ids: readonly string[], options: PollOptions = {}): Promise<WaitResult> {
    await this.ready();
    return await this.queue.wait(ids, this.interval(options), { signal: options.signal });
  }

  status(id: string): JobState {
    return this.queue.status(id);
  }

  record(id: string): JobRecordView {
    return this.queue.record(id);
  }

  list(): string[] {
    return this.queue.list();
  }

  async fetch(id: string): Promise<JobResult> {
    return await this.retriever.fetch(id);
  }

  /** Deletes a finished job's outputs and, for a whole job, the script it was submitted with. */
  async clean(id: string): Promise<string[]> {
    const removed = await this.retriever.clean(id);
    if (this.queue.record(id).kind !== "child" && this.adapter.release) {
      removed.push(...(await this.adapter.release(id)));
    }
    return removed;
  }

  discard(id: string): boolean {
    return this.queue.discard(id);
  }

  prune(filter?: (record: JobRecordView) => boolean): string[] {
    return this.queue.prune(filter);
  }

  stats(): QueueStats {
    return this.queue.stats();
  }

  /** Stops the local pool after its running tasks finish. Cluster jobs keep running. */
  async close(): Promise<void> {
    if (this.starting) {
      await this.starting;
    }
    await this.pool?.stop();
    this.starting = null;
  }

  private interval(options: PollOptions): number {
    return options.pollIntervalSeconds ?? this.config.polling.intervalSeconds;
  }

  private async ready(): Promise<void> {
    if (!this.pool) {
      return;
    }
    if (!this.starting) {
      const pool = this.pool;
      this.starting = pool.start().catch((err: unknown) => {
        this.starting = null;
        throw err;
      });
    }
    await this.starting;
  }

  private async collect(id: string, outcome: JobOutcome): Promise<JobReport> {
    try {
      if (this.queue.record(id).kind === "array") {
        return { ...outcome, results: await this.retriever.fetchArray(id) };
      }
      return { ...outcome, result: await this.retriever.fetch(id) };
    } catch (err) {
      this.logger.warn(`[cluster-queue] ${this.backend}: outputs of ${id}: ${describeError(err)}`);
      return { ...outcome, outputError: describeError(err) };
    }
  }

  private bind(params: ClusterQueueServiceParams): BackendBinding {
    const workspaceDir = path.resolve(params.workspaceDir);
    const runner = params.runner ?? defaultCommandRunner;
    const requested = params.backend?.trim() || this.config.defaultCluster || LOCAL_BACKEND;

    if (requested === LOCAL_BACKEND) {
      const pool = new LocalWorkerPool({
        workers: this.config.local.workers,
        ledgerDir: path.resolve(workspaceDir, this.config.local.ledgerDir),
        runner,
        now: params.now,
        logger: this.logger,
      });
      return {
        id: LOCAL_BACKEND,
        adapter: createLocalAdapter(pool),
        reader: createLocalOutputReader(),
        pool,
      };
    }

    const cluster = this.resolveCluster(requested);
    const scriptDir = path.resolve(workspaceDir, this.config.localRunsDir, cluster.id);
    const adapterParams = {
      profile: cluster,
      runner,
      scriptDir,
      now: params.now,
      commandTimeoutMs: this.config.polling.queryTimeoutSeconds * 1000,
    };
    return {
      id: cluster.id,
      adapter:
        cluster.scheduler === "torque"
          ? createTorqueAdapter(adapterParams)
          : createSlurmAdapter(adapterParams),
      reader: cluster.sshTarget
        ? createRemoteOutputReader(runner, cluster.sshTarget)
        : createLocalOutputReader(),
    };
  }

  private resolveCluster(clusterId: string): ClusterProfile {
    const cluster = this.config.clusters[clusterId];
    if (!cluster) {
      throw new Error(
        `Unknown cluster "${clusterId}". Available: ${Object.keys(this.config.clusters).join(", ") || "none"}`,
      );
    }
    return cluster;
  }
}
