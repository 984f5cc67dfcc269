import { AdapterQueryError, DuplicateJobError, UnknownJobError, describeError } from "./errors.js";
import { silentLogger } from "./logger.js";
import {
  JobRecord,
  QueueJob,
  childKey,
  parseChildKey,
  type JobRecordView,
  type ReconcileContext,
} from "./records.js";
import type { JobSpec } from "./spec.js";
import type { BatchSystemAdapter, JobState, QueueLogger, SnapshotEntry } from "./types.js";
import { isTerminal } from "./types.js";

export const DEFAULT_MISS_LIMIT = 3;

export type QueueOptions = {
  adapter: BatchSystemAdapter;
  /** Consecutive snapshot misses before a vanished job is inferred Completed. */
  missLimit?: number;
  /** A snapshot that takes longer counts as a failed query. */
  queryTimeoutMs?: number;
  logger?: QueueLogger;
  now?: () => Date;
};

export type RefreshResult =
  | { ok: true; at: Date; observed: number; missing: number }
  | { ok: false; at: Date; error: AdapterQueryError };

export type JobOutcome = {
  id: string;
  state: JobState;
  terminal: boolean;
  inferred: boolean;
  exitCode?: number;
  lastObservedAt?: Date;
};

export type WaitOptions = {
  signal?: AbortSignal;
};

export type WaitResult = {
  done: boolean;
  states: Record<string, JobState>;
};

export type QueueStats = {
  tracked: number;
  passes: number;
  failures: number;
  consecutiveFailures: number;
  lastSuccessAt?: Date;
  lastError?: AdapterQueryError;
};

let queueCounter = 0;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// setTimeout fires at once for delays beyond this.
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Settles with `work`'s value, or with `undefined` once `ms` elapse or
 * `signal` aborts. `work` keeps running either way. With no time left,
 * work that settles within the current tick still wins.
 */
function within<T>(work: Promise<T>, ms: number, signal?: AbortSignal): Promise<T | undefined> {
  if (signal?.aborted) {
    return Promise.resolve(undefined);
  }
  return new Promise<T | undefined>((resolve, reject) => {
    const giveUp = () => {
      cleanup();
      resolve(undefined);
    };
    const timer = ms <= MAX_TIMER_MS ? setTimeout(giveUp, Math.max(0, ms)) : undefined;
    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener("abort", giveUp);
    };
    signal?.addEventListener("abort", giveUp, { once: true });
    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

function indexSnapshot(entries: readonly SnapshotEntry[]): Map<string, SnapshotEntry> {
  const index = new Map<string, SnapshotEntry>();
  for (const entry of entries) {
    const key = entry.arrayIndex == null ? entry.id : childKey(entry.id, entry.arrayIndex);
    index.set(key, entry);
  }
  return index;
}

function assertInterval(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${field} must be a positive number of seconds`);
  }
}

/**
 * Tracks every submitted job and reconciles it against backend snapshots.
 *
 * The mapping is only changed by `register`, `registerArray`, `discard`,
 * `prune` and the apply step of `refresh`. Each of those runs to completion
 * without yielding, so readers always see either the state before a pass or
 * the state after it. Passes are serialized: concurrent callers join the one
 * in flight.
 */
export class Queue {
  readonly id: string;
  private readonly adapter: BatchSystemAdapter;
  private readonly missLimit: number;
  private readonly queryTimeoutMs: number | undefined;
  private readonly logger: QueueLogger;
  private readonly now: () => Date;
  private readonly jobs = new Map<string, JobRecord>();
  private sequence = 0;
  private inFlight: Promise<RefreshResult> | null = null;
  private lastResult: RefreshResult | undefined;
  private passes = 0;
  private failures = 0;
  private consecutiveFailures = 0;
  private lastSuccessAt: Date | undefined;
  private lastError: AdapterQueryError | undefined;

  constructor(options: QueueOptions) {
    const missLimit = options.missLimit ?? DEFAULT_MISS_LIMIT;
    if (!Number.isInteger(missLimit) || missLimit < 2) {
      throw new Error("missLimit must be an integer >= 2");
    }
    queueCounter += 1;
    this.id = `${options.adapter.kind}-${queueCounter}`;
    this.adapter = options.adapter;
    this.missLimit = missLimit;
    if (options.queryTimeoutMs != null && !(options.queryTimeoutMs > 0)) {
      throw new Error("queryTimeoutMs must be positive");
    }
    this.queryTimeoutMs = options.queryTimeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  register(id: string, spec: JobSpec): JobRecordView {
    const key = this.claimKey(id);
    const record = new JobRecord({
      id: key,
      spec,
      queueId: this.id,
      registeredAt: this.now(),
      sequence: ++this.sequence,
    });
    this.jobs.set(key, record);
    this.logger.debug?.(`[cluster-queue] tracking job ${key}`);
    return record.view();
  }

  registerArray(parentId: string, spec: JobSpec, childIndices: readonly number[]): JobRecordView {
    if (childIndices.length === 0) {
      throw new Error("childIndices must not be empty");
    }
    for (const index of childIndices) {
      if (!Number.isInteger(index) || index < 0) {
        throw new Error(`Invalid array index: ${index}`);
      }
    }
    if (new Set(childIndices).size !== childIndices.length) {
      throw new Error("childIndices must be distinct");
    }
    const key = this.claimKey(parentId);
    const record = new QueueJob({
      id: key,
      spec,
      queueId: this.id,
      registeredAt: this.now(),
      sequence: ++this.sequence,
      childIndices,
    });
    this.jobs.set(key, record);
    this.logger.debug?.(`[cluster-queue] tracking array job ${key} (${childIndices.length} tasks)`);
    return record.view();
  }

  /**
   * One reconciliation pass. A failed backend query never changes any
   * record; it is reported through the result and retried on the next call.
   * With `maxAgeMs`, a successful pass that finished within that window is
   * reused instead of querying the backend again.
   */
  async refresh(options: { maxAgeMs?: number } = {}): Promise<RefreshResult> {
    if (this.inFlight) {
      return await this.inFlight;
    }
    const last = this.lastResult;
    if (
      options.maxAgeMs != null &&
      last?.ok &&
      this.now().getTime() - last.at.getTime() <= options.maxAgeMs
    ) {
      return last;
    }
    const pass = this.runPass().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = pass;
    return await pass;
  }

  async get(
    ids: readonly string[],
    pollIntervalSeconds: number,
    maxWaitSeconds = Number.POSITIVE_INFINITY,
    options: WaitOptions = {},
  ): Promise<Record<string, JobOutcome>> {
    assertInterval(pollIntervalSeconds, "pollIntervalSeconds");
    if (Number.isNaN(maxWaitSeconds) || maxWaitSeconds < 0) {
      throw new Error("maxWaitSeconds must be >= 0");
    }
    const targets = Array.from(new Set(ids));
    for (const id of targets) {
      this.resolve(id);
    }

    const intervalMs = pollIntervalSeconds * 1000;
    const deadline = this.now().getTime() + maxWaitSeconds * 1000;
    const { signal } = options;

    for (;;) {
      if (!signal?.aborted) {
        // A slow backend query keeps running and applies when it settles;
        // the caller is not held past its deadline or its abort.
        await within(this.refresh({ maxAgeMs: intervalMs / 2 }), deadline - this.now().getTime(), signal);
      }
      const outcomes = this.outcomes(targets);
      const finished = Object.values(outcomes).every((outcome) => outcome.terminal);
      const remaining = deadline - this.now().getTime();
      if (finished || signal?.aborted || remaining <= 0) {
        return outcomes;
      }
      await sleep(Math.min(intervalMs, remaining), signal);
    }
  }

  async wait(
    ids: readonly string[],
    pollIntervalSeconds: number,
    options: WaitOptions = {},
  ): Promise<WaitResult> {
    const outcomes = await this.get(ids, pollIntervalSeconds, Number.POSITIVE_INFINITY, options);
    const states: Record<string, JobState> = {};
    for (const [id, outcome] of Object.entries(outcomes)) {
      states[id] = outcome.state;
    }
    return {
      done: Object.values(outcomes).every((outcome) => outcome.terminal),
      states,
    };
  }

  status(id: string): JobState {
    return this.resolve(id).state;
  }

  record(id: string): JobRecordView {
    return this.resolve(id).view();
  }

  has(id: string): boolean {
    return this.lookup(id) !== undefined;
  }

  list(): string[] {
    return [...this.jobs.keys()];
  }

  discard(id: string): boolean {
    const removed = this.jobs.delete(id);
    if (removed) {
      this.logger.debug?.(`[cluster-queue] discarded job ${id}`);
    }
    return removed;
  }

  /** Drops records matching `filter`; terminal records when no filter is given. */
  prune(filter: (record: JobRecordView) => boolean = (record) => isTerminal(record.state)): string[] {
    const removed: string[] = [];
    for (const [id, record] of this.jobs) {
      if (filter(record.view())) {
        this.jobs.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  stats(): QueueStats {
    return {
      tracked: this.jobs.size,
      passes: this.passes,
      failures: this.failures,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastError: this.lastError,
    };
  }

  private claimKey(id: string): string {
    const key = id.trim();
    if (!key) {
      throw new Error("job id is required");
    }
    if (this.jobs.has(key)) {
      throw new DuplicateJobError(key);
    }
    return key;
  }

  private lookup(id: string): JobRecord | undefined {
    const direct = this.jobs.get(id);
    if (direct) {
      return direct;
    }
    const parsed = parseChildKey(id);
    if (!parsed) {
      return undefined;
    }
    const parent = this.jobs.get(parsed.parentId);
    return parent instanceof QueueJob ? parent.child(parsed.index) : undefined;
  }

  private resolve(id: string): JobRecord {
    const record = this.lookup(id);
    if (!record) {
      throw new UnknownJobError(id);
    }
    return record;
  }

  private outcomes(ids: readonly string[]): Record<string, JobOutcome> {
    const result: Record<string, JobOutcome> = {};
    for (const id of ids) {
      const record = this.resolve(id);
      result[id] = {
        id,
        state: record.state,
        terminal: isTerminal(record.state),
        inferred: record.inferred,
        exitCode: record.exitCode,
        lastObservedAt: record.lastObservedAt,
      };
    }
    return result;
  }

  private async runPass(): Promise<RefreshResult> {
    this.passes += 1;
    // Jobs registered while the backend is being queried cannot appear in
    // this snapshot, so they are left for the next pass.
    const horizon = this.sequence;
    let snapshot: SnapshotEntry[];
    try {
      snapshot = await this.takeSnapshot();
    } catch (err) {
      const error =
        err instanceof AdapterQueryError
          ? err
          : new AdapterQueryError(this.adapter.kind, describeError(err), { cause: err });
      this.failures += 1;
      this.consecutiveFailures += 1;
      this.lastError = error;
      this.logger.warn(
        `[cluster-queue] ${error.message} (attempt ${this.consecutiveFailures}); ${this.jobs.size} tracked job(s) left unchanged`,
      );
      const result: RefreshResult = { ok: false, at: this.now(), error };
      this.lastResult = result;
      return result;
    }

    const result = this.apply(snapshot, horizon);
    this.consecutiveFailures = 0;
    this.lastSuccessAt = result.at;
    this.lastResult = result;
    return result;
  }

  private async takeSnapshot(): Promise<SnapshotEntry[]> {
    const pending = this.adapter.snapshot();
    const limit = this.queryTimeoutMs;
    if (limit == null) {
      return await pending;
    }
    return await new Promise<SnapshotEntry[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new AdapterQueryError(this.adapter.kind, `no answer within ${limit}ms`));
      }, limit);
      pending.then(
        (entries) => {
          clearTimeout(timer);
          resolve(entries);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  private apply(
    snapshot: readonly SnapshotEntry[],
    horizon: number,
  ): { ok: true; at: Date; observed: number; missing: number } {
    const at = this.now();
    const index = indexSnapshot(snapshot);
    const ctx: ReconcileContext = {
      at,
      missLimit: this.missLimit,
      normalize: (rawState) => this.adapter.normalizeState(rawState),
    };
    let observed = 0;
    let missing = 0;

    for (const record of this.jobs.values()) {
      if (record.sequence > horizon) {
        continue;
      }
      if (record instanceof QueueJob) {
        const counts = record.reconcileChildren((key) => index.get(key), ctx);
        observed += counts.observed;
        missing += counts.missing;
        continue;
      }
      const entry = index.get(record.id);
      record.reconcile(entry, ctx);
      if (entry) {
        observed += 1;
      } else {
        missing += 1;
      }
    }

    if (missing > 0) {
      this.logger.debug?.(`[cluster-queue] ${missing} tracked job(s) absent from ${this.adapter.kind} snapshot`);
    }
    return { ok: true, at, observed, missing };
  }
}
