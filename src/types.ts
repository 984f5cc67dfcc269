import type { JobSpec } from "./spec.js";

export type JobState = "Pending" | "Running" | "Completed" | "Failed" | "Unknown";

export type NormalizedState = Exclude<JobState, "Unknown">;

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set(["Completed", "Failed"]);

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export type OutputLocations = {
  stdout: string;
  stderr: string;
};

export type SnapshotEntry = {
  id: string;
  rawState: string;
  arrayIndex?: number;
  exitCode?: number;
  outputs?: OutputLocations;
};

/**
 * Capability contract every backend satisfies. Adding a backend means
 * providing one value of this shape; the Queue never needs to change.
 */
export type BatchSystemAdapter = {
  readonly kind: string;
  submit(spec: JobSpec): Promise<string>;
  snapshot(): Promise<SnapshotEntry[]>;
  normalizeState(rawState: string): NormalizedState;
  /** Deletes files the adapter wrote for a job it submitted. Returns the paths removed. */
  release?(id: string): Promise<string[]>;
};

export type QueueLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type SchedulerKind = "slurm" | "torque";

export type ResourceDefaults = {
  partition?: string;
  account?: string;
  qos?: string;
  time?: string;
  nodes?: number;
  cpusPerTask?: number;
  mem?: string;
  gpus?: number;
  modules: string[];
};

export type ClusterProfile = {
  id: string;
  scheduler: SchedulerKind;
  sshTarget?: string;
  remoteRoot?: string;
  accounting: boolean;
  submitArgs: string[];
  setupCommands: string[];
  defaults: ResourceDefaults;
};

export type LocalPoolConfig = {
  workers: number;
  ledgerDir: string;
};

export type PollingConfig = {
  intervalSeconds: number;
  missLimit: number;
  /** Limit on one backend query; a slower query is a failed poll. */
  queryTimeoutSeconds: number;
};

export type ClusterQueueConfig = {
  defaultCluster?: string;
  localRunsDir: string;
  clusters: Record<string, ClusterProfile>;
  local: LocalPoolConfig;
  polling: PollingConfig;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> },
) => Promise<CommandResult>;
