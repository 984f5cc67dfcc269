import fs from "node:fs/promises";
import path from "node:path";
import {
  AdapterQueryError,
  ClusterQueueError,
  SubmissionError,
  describeError,
} from "./errors.js";
import { defaultCommandRunner } from "./exec.js";
import { Mutex } from "./lock.js";
import { silentLogger } from "./logger.js";
import { planScript, renderScriptBody } from "./script.js";
import {
  expandOutputTemplate,
  parseWallTime,
  validateJobSpec,
  withDefaultOutputs,
  type JobSpec,
} from "./spec.js";
import { loadLedger, saveLedger, emptyLedger, type LedgerTask, type LocalLedger } from "./store.js";
import type {
  BatchSystemAdapter,
  CommandResult,
  CommandRunner,
  NormalizedState,
  QueueLogger,
  SnapshotEntry,
} from "./types.js";

type TaskRef = { jobId: string; task: number };

/** Unbounded multi-producer, multi-consumer FIFO. */
export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /** Resolves with the next item, or undefined once the queue is closed. */
  async pull(): Promise<T | undefined> {
    if (this.closed) {
      return undefined;
    }
    const next = this.items.shift();
    if (next !== undefined) {
      return next;
    }
    return await new Promise<T | undefined>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}

export type LocalWorkerPoolOptions = {
  workers: number;
  ledgerDir: string;
  runner?: CommandRunner;
  now?: () => Date;
  logger?: QueueLogger;
};

/**
 * Stand-in batch system for machines without a scheduler. Every task runs as
 * its own `bash` process; at most `workers` run at once and the rest wait in
 * FIFO order. Task states are kept in a ledger on disk so `snapshot` answers
 * for jobs submitted before a restart.
 */
export class LocalWorkerPool {
  private readonly workers: number;
  private readonly ledgerDir: string;
  private readonly runner: CommandRunner;
  private readonly now: () => Date;
  private readonly logger: QueueLogger;
  private readonly writes = new Mutex();
  private ledger: LocalLedger = emptyLedger();
  private queue = new WorkQueue<TaskRef>();
  private loops: Promise<void>[] = [];
  private running = false;
  private outstanding = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: LocalWorkerPoolOptions) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new Error("workers must be a positive integer");
    }
    this.workers = options.workers;
    this.ledgerDir = path.resolve(options.ledgerDir);
    this.runner = options.runner ?? defaultCommandRunner;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.ledger = await loadLedger(this.ledgerDir);
    this.queue = new WorkQueue<TaskRef>();

    const requeued: TaskRef[] = [];
    let interrupted = 0;
    for (const job of Object.values(this.ledger.jobs)) {
      job.tasks.forEach((task, index) => {
        if (task.state === "running") {
          // the process that ran it is gone, and so is its exit status
          task.state = "failed";
          task.finishedAt = this.now().toISOString();
          task.note = "interrupted by pool restart";
          interrupted += 1;
        } else if (task.state === "queued") {
          requeued.push({ jobId: job.id, task: index });
        }
      });
    }
    if (interrupted > 0) {
      await this.persist();
      this.logger.warn(`[cluster-queue] local pool marked ${interrupted} interrupted task(s) failed`);
    }

    this.running = true;
    for (const ref of requeued) {
      this.enqueue(ref);
    }
    this.loops = Array.from({ length: this.workers }, (_, index) => this.workerLoop(index + 1));
    this.logger.info(
      `[cluster-queue] local pool started (${this.workers} worker${this.workers === 1 ? "" : "s"}, ${requeued.length} task(s) resumed)`,
    );
  }

  /** Stops taking tasks and waits for running ones. Queued tasks stay in the ledger. */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.queue.close();
    await Promise.all(this.loops);
    this.loops = [];
    this.outstanding = 0;
    this.notifyIdle();
  }

  /** Resolves once nothing is queued or running. */
  async idle(): Promise<void> {
    if (this.outstanding === 0) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async submit(input: JobSpec): Promise<string> {
    if (!this.running) {
      throw new Error("local worker pool is not running");
    }
    const spec = withDefaultOutputs(validateJobSpec(input));
    return await this.writes.run(async () => {
      const id = String(this.ledger.nextId);
      const base = spec.cwd ? path.resolve(spec.cwd) : process.cwd();
      const indices: Array<number | undefined> = spec.arrayIndices ?? [undefined];
      const tasks = indices.map((arrayIndex): LedgerTask => ({
        ...(arrayIndex != null ? { arrayIndex } : {}),
        state: "queued",
        outputs: {
          stdout: path.resolve(base, expandOutputTemplate(spec.outputPath ?? "%j.out", id, arrayIndex)),
          stderr: path.resolve(base, expandOutputTemplate(spec.errorPath ?? "%j.err", id, arrayIndex)),
        },
      }));

      this.ledger.nextId += 1;
      this.ledger.jobs[id] = { id, spec, submittedAt: this.now().toISOString(), tasks };
      try {
        await saveLedger(this.ledgerDir, this.ledger);
      } catch (err) {
        delete this.ledger.jobs[id];
        throw err;
      }

      tasks.forEach((_, task) => this.enqueue({ jobId: id, task }));
      this.logger.debug?.(`[cluster-queue] local job ${id} queued (${tasks.length} task(s))`);
      return id;
    });
  }

  async snapshot(): Promise<SnapshotEntry[]> {
    if (!this.running) {
      throw new Error("local worker pool is not running");
    }
    const entries: SnapshotEntry[] = [];
    for (const job of Object.values(this.ledger.jobs)) {
      for (const task of job.tasks) {
        entries.push({
          id: job.id,
          rawState: task.state,
          ...(task.arrayIndex != null ? { arrayIndex: task.arrayIndex } : {}),
          ...(task.exitCode != null ? { exitCode: task.exitCode } : {}),
          outputs: { ...task.outputs },
        });
      }
    }
    return entries;
  }

  private enqueue(ref: TaskRef): void {
    this.outstanding += 1;
    this.queue.push(ref);
  }

  private notifyIdle(): void {
    if (this.outstanding > 0) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  private async persist(): Promise<void> {
    await this.writes.run(async () => await saveLedger(this.ledgerDir, this.ledger));
  }

  private async workerLoop(worker: number): Promise<void> {
    for (;;) {
      const ref = await this.queue.pull();
      if (!ref) {
        return;
      }
      try {
        await this.execute(ref, worker);
      } catch (err) {
        this.logger.error(
          `[cluster-queue] local worker ${worker} could not record job ${ref.jobId}: ${describeError(err)}`,
        );
      } finally {
        this.outstanding = Math.max(0, this.outstanding - 1);
        this.notifyIdle();
      }
    }
  }

  private async execute(ref: TaskRef, worker: number): Promise<void> {
    const job = this.ledger.jobs[ref.jobId];
    const task = job?.tasks[ref.task];
    if (!job || !task) {
      throw new Error(`task ${ref.task} of job ${ref.jobId} is not in the ledger`);
    }

    task.state = "running";
    task.startedAt = this.now().toISOString();
    try {
      await this.persist();
    } catch (err) {
      // The task never ran. The ledger on disk still lists it as queued, so
      // a restarted pool runs it; this process reports it failed.
      delete task.startedAt;
      task.state = "failed";
      task.finishedAt = this.now().toISOString();
      task.note = `not started: ledger write failed: ${describeError(err)}`;
      throw err;
    }
    this.logger.debug?.(`[cluster-queue] local worker ${worker} running job ${job.id}`);

    const result = await this.run(job.id, job.spec, task.arrayIndex);
    try {
      await writeOutput(task.outputs.stdout, result.stdout);
      await writeOutput(task.outputs.stderr, result.stderr);
    } catch (err) {
      task.note = `output not written: ${describeError(err)}`;
    }

    task.state = result.code === 0 && !task.note ? "done" : "failed";
    task.exitCode = result.code;
    task.finishedAt = this.now().toISOString();
    await this.persist();
  }

  private async run(jobId: string, spec: JobSpec, arrayIndex?: number): Promise<CommandResult> {
    const script = renderScriptBody(planScript(spec), spec.command).join("\n");
    const env: Record<string, string> = {
      ...spec.env,
      JOB_ID: jobId,
      ...(arrayIndex != null ? { ARRAY_INDEX: String(arrayIndex) } : {}),
    };
    const timeoutMs = spec.resources?.time ? parseWallTime(spec.resources.time) * 1000 : undefined;
    try {
      return await this.runner("bash", ["-c", script], { cwd: spec.cwd, env, timeoutMs });
    } catch (err) {
      // spawn failures (missing bash, bad cwd) count as a failed run
      return { code: 127, stdout: "", stderr: `${describeError(err)}\n` };
    }
  }
}

async function writeOutput(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, "utf8");
}

const LOCAL_STATES: Record<string, NormalizedState> = {
  queued: "Pending",
  running: "Running",
  done: "Completed",
  failed: "Failed",
};

export function normalizeLocalState(rawState: string): NormalizedState {
  return LOCAL_STATES[rawState.trim().toLowerCase()] ?? "Pending";
}

/** Adapter over a pool; the Queue sees it exactly like a cluster scheduler. */
export function createLocalAdapter(pool: LocalWorkerPool): BatchSystemAdapter {
  return {
    kind: "local",

    async submit(spec) {
      try {
        return await pool.submit(spec);
      } catch (err) {
        if (err instanceof ClusterQueueError) {
          throw err;
        }
        throw new SubmissionError("local", describeError(err), { cause: err });
      }
    },

    async snapshot() {
      try {
        return await pool.snapshot();
      } catch (err) {
        throw new AdapterQueryError("local", describeError(err), { cause: err });
      }
    },

    normalizeState: normalizeLocalState,
  };
}
