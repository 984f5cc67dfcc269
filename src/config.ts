import fs from "node:fs/promises";
import { DEFAULT_MISS_LIMIT } from "./queue.js";
import { parseWallTime } from "./spec.js";
import type {
  ClusterProfile,
  ClusterQueueConfig,
  PollingConfig,
  LocalPoolConfig,
  ResourceDefaults,
  SchedulerKind,
} from "./types.js";

const DEFAULT_LOCAL_RUNS_DIR = ".cluster-queue/runs";
const DEFAULT_LEDGER_DIR = ".cluster-queue/local";
const DEFAULT_WORKERS = 4;
const DEFAULT_INTERVAL_SECONDS = 5;
const DEFAULT_QUERY_TIMEOUT_SECONDS = 60;

/** Backend name that always selects the local worker pool. */
export const LOCAL_BACKEND = "local";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${label} must be an object`);
  }
  return value;
}

function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readBoolean(value: unknown, field: string): boolean | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`${field} must be a boolean`);
  }
  return value;
}

function readInteger(value: unknown, field: string, min = 1): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new Error(`${field} must be an integer >= ${min}`);
  }
  return value;
}

function readSeconds(value: unknown, field: string): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${field} must be a positive number`);
  }
  return value;
}

function readStringArray(value: unknown, field: string, options: { unique?: boolean } = {}): string[] {
  if (value == null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be an array of strings`);
  }
  const entries = value
    .map((entry, idx) => {
      if (typeof entry !== "string") {
        throw new Error(`${field}[${idx}] must be a string`);
      }
      return entry.trim();
    })
    .filter((entry) => entry.length > 0);
  return options.unique ? Array.from(new Set(entries)) : entries;
}

function parseDefaults(value: unknown, field: string): ResourceDefaults {
  if (value == null) {
    return { modules: [] };
  }
  const obj = asObject(value, field);
  const time = readString(obj.time, `${field}.time`);
  if (time) {
    try {
      parseWallTime(time);
    } catch (err) {
      throw new Error(`${field}.time must look like [D-]HH:MM:SS`, { cause: err });
    }
  }
  const mem = readString(obj.mem, `${field}.mem`);
  if (mem && !/^\d+[KMGT]?$/.test(mem)) {
    throw new Error(`${field}.mem must look like 4G or 512M`);
  }
  return {
    partition: readString(obj.partition, `${field}.partition`),
    account: readString(obj.account, `${field}.account`),
    qos: readString(obj.qos, `${field}.qos`),
    time,
    nodes: readInteger(obj.nodes, `${field}.nodes`),
    cpusPerTask: readInteger(obj.cpusPerTask, `${field}.cpusPerTask`),
    mem,
    gpus: readInteger(obj.gpus, `${field}.gpus`),
    modules: readStringArray(obj.modules, `${field}.modules`, { unique: true }),
  };
}

function parseScheduler(value: unknown, field: string): SchedulerKind {
  const scheduler = readString(value, field) ?? "slurm";
  if (scheduler !== "slurm" && scheduler !== "torque") {
    throw new Error(`${field} must be "slurm" or "torque"`);
  }
  return scheduler;
}

function parseCluster(id: string, value: unknown): ClusterProfile {
  const base = `clusters.${id}`;
  const obj = asObject(value, base);
  const sshTarget = readString(obj.sshTarget, `${base}.sshTarget`);
  const remoteRoot = readString(obj.remoteRoot, `${base}.remoteRoot`);
  if (remoteRoot && !sshTarget) {
    throw new Error(`${base}.remoteRoot needs ${base}.sshTarget`);
  }

  return {
    id,
    scheduler: parseScheduler(obj.scheduler, `${base}.scheduler`),
    sshTarget,
    remoteRoot,
    accounting: readBoolean(obj.accounting, `${base}.accounting`) ?? true,
    submitArgs: readStringArray(obj.submitArgs, `${base}.submitArgs`),
    setupCommands: readStringArray(obj.setupCommands, `${base}.setupCommands`),
    defaults: parseDefaults(obj.defaults, `${base}.defaults`),
  };
}

function parseLocal(value: unknown): LocalPoolConfig {
  const obj: Record<string, unknown> = value == null ? {} : asObject(value, "local");
  return {
    workers: readInteger(obj.workers, "local.workers") ?? DEFAULT_WORKERS,
    ledgerDir: readString(obj.ledgerDir, "local.ledgerDir") ?? DEFAULT_LEDGER_DIR,
  };
}

function parsePolling(value: unknown): PollingConfig {
  const obj: Record<string, unknown> = value == null ? {} : asObject(value, "polling");
  return {
    intervalSeconds:
      readSeconds(obj.intervalSeconds, "polling.intervalSeconds") ?? DEFAULT_INTERVAL_SECONDS,
    missLimit: readInteger(obj.missLimit, "polling.missLimit", 2) ?? DEFAULT_MISS_LIMIT,
    queryTimeoutSeconds:
      readSeconds(obj.queryTimeoutSeconds, "polling.queryTimeoutSeconds") ??
      DEFAULT_QUERY_TIMEOUT_SECONDS,
  };
}

export function parseClusterQueueConfig(value: unknown): ClusterQueueConfig {
  const obj: Record<string, unknown> = value == null ? {} : asObject(value, "cluster-queue config");
  const clustersObj: Record<string, unknown> = obj.clusters == null ? {} : asObject(obj.clusters, "clusters");
  const clusters: Record<string, ClusterProfile> = {};

  for (const [id, entry] of Object.entries(clustersObj)) {
    const trimmedId = id.trim();
    if (!trimmedId) {
      continue;
    }
    if (trimmedId === LOCAL_BACKEND) {
      throw new Error(`clusters.${LOCAL_BACKEND} is reserved for the local worker pool`);
    }
    clusters[trimmedId] = parseCluster(trimmedId, entry);
  }

  const defaultCluster = readString(obj.defaultCluster, "defaultCluster");
  if (defaultCluster && defaultCluster !== LOCAL_BACKEND && !clusters[defaultCluster]) {
    throw new Error(
      `defaultCluster "${defaultCluster}" does not exist in clusters (${Object.keys(clusters).join(", ") || "none"})`,
    );
  }

  return {
    defaultCluster,
    localRunsDir: readString(obj.localRunsDir, "localRunsDir") ?? DEFAULT_LOCAL_RUNS_DIR,
    clusters,
    local: parseLocal(obj.local),
    polling: parsePolling(obj.polling),
  };
}

export async function loadClusterQueueConfig(file: string): Promise<ClusterQueueConfig> {
  const raw = await fs.readFile(file, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${file} is not valid JSON`, { cause: err });
  }
  return parseClusterQueueConfig(parsed);
}
