import type { JobSpec } from "./spec.js";
import type {
  JobState,
  NormalizedState,
  OutputLocations,
  SnapshotEntry,
} from "./types.js";
import { isTerminal } from "./types.js";

export type RecordKind = "job" | "array" | "child";

/** Immutable copy of a record handed to callers. */
export type JobRecordView = {
  id: string;
  kind: RecordKind;
  queueId: string;
  state: JobState;
  spec: JobSpec;
  registeredAt: Date;
  lastObservedAt?: Date;
  misses: number;
  inferred: boolean;
  exitCode?: number;
  outputs?: OutputLocations;
  parentId?: string;
  arrayIndex?: number;
  children?: JobRecordView[];
};

export type ReconcileContext = {
  at: Date;
  missLimit: number;
  normalize: (rawState: string) => NormalizedState;
};

const ACTIVITY_RANK: Record<JobState, number> = {
  Running: 4,
  Pending: 3,
  Unknown: 2,
  Failed: 1,
  Completed: 0,
};

export function childKey(parentId: string, index: number): string {
  return `${parentId}[${index}]`;
}

export function parseChildKey(key: string): { parentId: string; index: number } | undefined {
  const match = /^(.+)\[(\d+)\]$/.exec(key);
  if (!match?.[1] || match[2] == null) {
    return undefined;
  }
  return { parentId: match[1], index: Number(match[2]) };
}

/**
 * Aggregate state of an array job: Completed only when every child is,
 * Failed once a child failed and nothing is still pending or running,
 * otherwise the most active child state.
 */
export function aggregateState(states: readonly JobState[]): JobState {
  if (states.length === 0) {
    return "Unknown";
  }
  if (states.every((state) => state === "Completed")) {
    return "Completed";
  }
  const active = states.some((state) => state === "Pending" || state === "Running");
  if (!active && states.includes("Failed")) {
    return "Failed";
  }
  return states.reduce((best, state) => (ACTIVITY_RANK[state] > ACTIVITY_RANK[best] ? state : best));
}

export class JobRecord {
  readonly id: string;
  readonly spec: JobSpec;
  readonly queueId: string;
  readonly registeredAt: Date;
  /** Registration order within the owning Queue. */
  readonly sequence: number;

  protected current: JobState = "Pending";
  protected observedAt: Date | undefined;
  private missCount = 0;
  private inferredCompletion = false;
  private reportedTerminal = false;
  private code: number | undefined;
  private locations: OutputLocations | undefined;

  constructor(params: {
    id: string;
    spec: JobSpec;
    queueId: string;
    registeredAt: Date;
    sequence: number;
  }) {
    this.id = params.id;
    this.spec = params.spec;
    this.queueId = params.queueId;
    this.registeredAt = params.registeredAt;
    this.sequence = params.sequence;
  }

  get kind(): RecordKind {
    return "job";
  }

  get state(): JobState {
    return this.current;
  }

  get lastObservedAt(): Date | undefined {
    return this.observedAt;
  }

  get misses(): number {
    return this.missCount;
  }

  get inferred(): boolean {
    return this.inferredCompletion;
  }

  get exitCode(): number | undefined {
    return this.code;
  }

  get outputs(): OutputLocations | undefined {
    return this.locations;
  }

  /**
   * Applies one snapshot to this record. Only the owning Queue calls this,
   * from inside a reconciliation pass.
   *
   * @internal
   */
  reconcile(entry: SnapshotEntry | undefined, ctx: ReconcileContext): void {
    if (entry) {
      const state = ctx.normalize(entry.rawState);
      this.current = state;
      this.observedAt = ctx.at;
      this.missCount = 0;
      this.inferredCompletion = false;
      this.reportedTerminal = isTerminal(state);
      if (entry.exitCode != null) {
        this.code = entry.exitCode;
      }
      if (entry.outputs) {
        this.locations = { ...entry.outputs };
      }
      return;
    }

    if (this.reportedTerminal) {
      return;
    }
    this.missCount += 1;
    if (this.missCount >= ctx.missLimit) {
      this.current = "Completed";
      this.inferredCompletion = true;
    } else {
      this.current = "Unknown";
    }
  }

  view(): JobRecordView {
    return {
      id: this.id,
      kind: this.kind,
      queueId: this.queueId,
      state: this.state,
      spec: this.spec,
      registeredAt: this.registeredAt,
      lastObservedAt: this.lastObservedAt,
      misses: this.misses,
      inferred: this.inferred,
      exitCode: this.exitCode,
      outputs: this.outputs ? { ...this.outputs } : undefined,
    };
  }
}

export class QueueChild extends JobRecord {
  /** Parent backend ID, resolved through the Queue rather than held as a reference. */
  readonly parentId: string;
  readonly arrayIndex: number;

  constructor(params: {
    parentId: string;
    arrayIndex: number;
    spec: JobSpec;
    queueId: string;
    registeredAt: Date;
    sequence: number;
  }) {
    super({ ...params, id: childKey(params.parentId, params.arrayIndex) });
    this.parentId = params.parentId;
    this.arrayIndex = params.arrayIndex;
  }

  override get kind(): RecordKind {
    return "child";
  }

  override view(): JobRecordView {
    return { ...super.view(), parentId: this.parentId, arrayIndex: this.arrayIndex };
  }
}

export class QueueJob extends JobRecord {
  private readonly byIndex = new Map<number, QueueChild>();

  constructor(params: {
    id: string;
    spec: JobSpec;
    queueId: string;
    registeredAt: Date;
    sequence: number;
    childIndices: readonly number[];
  }) {
    super(params);
    for (const index of [...params.childIndices].sort((a, b) => a - b)) {
      this.byIndex.set(
        index,
        new QueueChild({
          parentId: params.id,
          arrayIndex: index,
          spec: params.spec,
          queueId: params.queueId,
          registeredAt: params.registeredAt,
          sequence: params.sequence,
        }),
      );
    }
  }

  override get kind(): RecordKind {
    return "array";
  }

  override get lastObservedAt(): Date | undefined {
    let latest: Date | undefined;
    for (const child of this.byIndex.values()) {
      const at = child.lastObservedAt;
      if (at && (!latest || at.getTime() > latest.getTime())) {
        latest = at;
      }
    }
    return latest;
  }

  override get inferred(): boolean {
    return this.current === "Completed" && this.children().some((child) => child.inferred);
  }

  get indices(): number[] {
    return [...this.byIndex.keys()];
  }

  child(index: number): QueueChild | undefined {
    return this.byIndex.get(index);
  }

  children(): QueueChild[] {
    return [...this.byIndex.values()];
  }

  /**
   * Reconciles every child by its `(parentId, index)` key, then recomputes
   * the aggregate.
   *
   * @internal
   */
  reconcileChildren(
    lookup: (key: string) => SnapshotEntry | undefined,
    ctx: ReconcileContext,
  ): { observed: number; missing: number } {
    let observed = 0;
    let missing = 0;
    for (const child of this.byIndex.values()) {
      const entry = lookup(child.id);
      child.reconcile(entry, ctx);
      if (entry) {
        observed += 1;
      } else {
        missing += 1;
      }
    }
    this.current = aggregateState(this.children().map((child) => child.state));
    return { observed, missing };
  }

  override view(): JobRecordView {
    return { ...super.view(), children: this.children().map((child) => child.view()) };
  }
}
