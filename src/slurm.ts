import {
  removeSubmittedScript,
  runSchedulerQuery,
  submitScript,
  type SubmittedScript,
} from "./backend.js";
import { AdapterQueryError, SubmissionError } from "./errors.js";
import { childKey } from "./records.js";
import { formatIndexRange, planScript, renderScriptBody, type ScriptProfile } from "./script.js";
import { createTransport, type ClusterTransport } from "./shell.js";
import { isArraySpec, type JobSpec } from "./spec.js";
import type {
  BatchSystemAdapter,
  ClusterProfile,
  CommandRunner,
  NormalizedState,
  SnapshotEntry,
} from "./types.js";

const SLURM_STATES: Record<string, NormalizedState> = {
  PENDING: "Pending",
  PD: "Pending",
  CONFIGURING: "Pending",
  CF: "Pending",
  REQUEUED: "Pending",
  RQ: "Pending",
  REQUEUE_FED: "Pending",
  RF: "Pending",
  REQUEUE_HOLD: "Pending",
  RH: "Pending",
  RESV_DEL_HOLD: "Pending",
  RD: "Pending",
  RESIZING: "Pending",
  RS: "Pending",
  SPECIAL_EXIT: "Pending",
  SE: "Pending",
  RUNNING: "Running",
  R: "Running",
  COMPLETING: "Running",
  CG: "Running",
  SUSPENDED: "Running",
  S: "Running",
  STOPPED: "Running",
  ST: "Running",
  SIGNALING: "Running",
  SI: "Running",
  STAGE_OUT: "Running",
  SO: "Running",
  COMPLETED: "Completed",
  CD: "Completed",
  FAILED: "Failed",
  F: "Failed",
  CANCELLED: "Failed",
  CA: "Failed",
  TIMEOUT: "Failed",
  TO: "Failed",
  NODE_FAIL: "Failed",
  NF: "Failed",
  OUT_OF_MEMORY: "Failed",
  OOM: "Failed",
  PREEMPTED: "Failed",
  PR: "Failed",
  BOOT_FAIL: "Failed",
  BF: "Failed",
  DEADLINE: "Failed",
  DL: "Failed",
  REVOKED: "Failed",
  RV: "Failed",
};

const USER_EXPR = '"${USER:-$(id -un)}"';
const ACCOUNTING_WINDOW = "now-1days";

export function normalizeSlurmState(rawState: string): NormalizedState {
  // sacct reports e.g. "CANCELLED by 1234" and "RUNNING+" for requeued steps
  const token = rawState.trim().toUpperCase().split(/\s+/)[0]?.replace(/\+$/, "") ?? "";
  return SLURM_STATES[token] ?? "Pending";
}

function formatDirective(flag: string, value: string | number | undefined): string[] {
  if (value == null || value === "") {
    return [];
  }
  return [`#SBATCH --${flag}=${String(value)}`];
}

/** Maps `%j` to Slurm's `%A` for arrays so every task shares the parent ID. */
export function toSlurmOutputPattern(template: string, array: boolean): string {
  return array ? template.replace(/%(%|j)/g, (match, token: string) => (token === "j" ? "%A" : match)) : template;
}

export function renderSlurmScript(params: { spec: JobSpec; profile?: ScriptProfile }): string {
  const { spec } = params;
  const plan = planScript(spec, params.profile);
  const r = plan.resources;
  const array = isArraySpec(spec);

  const lines: string[] = ["#!/bin/bash"];
  lines.push(...formatDirective("job-name", plan.label));
  lines.push(...formatDirective("partition", r.partition));
  lines.push(...formatDirective("account", r.account));
  lines.push(...formatDirective("qos", r.qos));
  lines.push(...formatDirective("time", r.time));
  lines.push(...formatDirective("nodes", r.nodes));
  lines.push(...formatDirective("cpus-per-task", r.cpusPerTask));
  lines.push(...formatDirective("mem", r.mem));
  lines.push(...formatDirective("gpus", r.gpus));
  lines.push(...formatDirective("chdir", spec.cwd));
  if (spec.outputPath) {
    lines.push(...formatDirective("output", toSlurmOutputPattern(spec.outputPath, array)));
  }
  if (spec.errorPath) {
    lines.push(...formatDirective("error", toSlurmOutputPattern(spec.errorPath, array)));
  }
  if (array && spec.arrayIndices) {
    lines.push(...formatDirective("array", formatIndexRange(spec.arrayIndices)));
  }

  lines.push(...renderScriptBody(plan, spec.command));
  return `${lines.join("\n")}\n`;
}

export function parseSubmittedJobId(stdout: string): string {
  const text = stdout.trim();
  const strict = /Submitted\s+batch\s+job\s+(\d+)/i.exec(text);
  if (strict?.[1]) {
    return strict[1];
  }
  // --parsable prints "jobid" or "jobid;cluster"
  const parsable = /^(\d+)(?:;\S+)?$/.exec(text);
  if (parsable?.[1]) {
    return parsable[1];
  }
  throw new Error(`Unable to parse job id from sbatch output: ${text || "<empty>"}`);
}

// Slurm's own ceiling for array indices (MaxArraySize is at most 4000001).
const MAX_ARRAY_INDEX = 4_000_000;

function expandIndexSpec(spec: string): number[] | null {
  const body = spec.replace(/%\d+$/, "");
  const indices: number[] = [];
  for (const part of body.split(",")) {
    const range = /^(\d+)(?:-(\d+))?(?::(\d+))?$/.exec(part.trim());
    if (!range?.[1]) {
      return null;
    }
    const start = Number(range[1]);
    const end = range[2] != null ? Number(range[2]) : start;
    const step = range[3] != null ? Number(range[3]) : 1;
    if (end < start || step < 1 || end > MAX_ARRAY_INDEX) {
      return null;
    }
    if (indices.length + Math.floor((end - start) / step) + 1 > MAX_ARRAY_INDEX + 1) {
      return null;
    }
    for (let index = start; index <= end; index += step) {
      indices.push(index);
    }
  }
  return indices;
}

/**
 * Expands a Slurm job id field: `123`, `123_4`, `123_[0-3,7%2]`, `123+0`.
 * Returns null when the field is not a job id.
 */
export function parseSlurmJobId(field: string): Array<{ id: string; arrayIndex?: number }> | null {
  const text = field.trim();
  const plain = /^(\d+)(?:\+\d+)?$/.exec(text);
  if (plain?.[1]) {
    return [{ id: plain[1] }];
  }
  const task = /^(\d+)_(\d+)$/.exec(text);
  if (task?.[1] && task[2] != null) {
    return [{ id: task[1], arrayIndex: Number(task[2]) }];
  }
  const pending = /^(\d+)_\[([^\]]+)\]$/.exec(text);
  if (pending?.[1] && pending[2] != null) {
    const id = pending[1];
    const indices = expandIndexSpec(pending[2]);
    return indices ? indices.map((arrayIndex) => ({ id, arrayIndex })) : null;
  }
  return null;
}

function listingLines(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Parses `squeue -h -r -o '%i|%T'`. */
export function parseSqueueListing(stdout: string): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  for (const line of listingLines(stdout)) {
    const [idField, state] = line.split("|");
    const ids = idField != null && state ? parseSlurmJobId(idField) : null;
    if (!ids || !state) {
      throw new AdapterQueryError("slurm", `malformed squeue line: ${line}`);
    }
    for (const ref of ids) {
      entries.push({ ...ref, rawState: state.trim() });
    }
  }
  return entries;
}

function parseExitCode(field: string | undefined): number | undefined {
  const first = field?.trim().split(":")[0] ?? "";
  if (!/^\d+$/.test(first)) {
    return undefined;
  }
  return Number(first);
}

/** Parses `sacct -n -P -X -o JobID,State,ExitCode`. */
export function parseSacctListing(stdout: string): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  for (const line of listingLines(stdout)) {
    const [idField, state, exitField] = line.split("|");
    if (idField?.includes(".")) {
      continue;
    }
    const ids = idField != null && state ? parseSlurmJobId(idField) : null;
    if (!ids || !state) {
      throw new AdapterQueryError("slurm", `malformed sacct line: ${line}`);
    }
    const exitCode = parseExitCode(exitField);
    for (const ref of ids) {
      entries.push({ ...ref, rawState: state.trim(), ...(exitCode != null ? { exitCode } : {}) });
    }
  }
  return entries;
}

function entryKey(entry: SnapshotEntry): string {
  return entry.arrayIndex == null ? entry.id : childKey(entry.id, entry.arrayIndex);
}

export type SlurmAdapterParams = {
  profile: ClusterProfile;
  runner: CommandRunner;
  scriptDir: string;
  now?: () => Date;
  /** Kills a scheduler command that runs longer than this. */
  commandTimeoutMs?: number;
  transport?: ClusterTransport;
};

export function createSlurmAdapter(params: SlurmAdapterParams): BatchSystemAdapter {
  const { profile, scriptDir } = params;
  const now = params.now ?? (() => new Date());
  const transport =
    params.transport ??
    createTransport(params.runner, profile, { timeoutMs: params.commandTimeoutMs });
  const scripts = new Map<string, SubmittedScript>();

  return {
    kind: "slurm",

    async submit(spec) {
      const submitted = await submitScript({
        transport,
        backend: "slurm",
        submitCommand: "sbatch",
        profile,
        spec,
        script: renderSlurmScript({ spec, profile }),
        scriptDir,
        extension: "sbatch",
        now: now(),
      });
      let id: string;
      try {
        id = parseSubmittedJobId(submitted.output);
      } catch (err) {
        throw new SubmissionError("slurm", submitted.output.trim(), { cause: err });
      }
      scripts.set(id, submitted);
      return id;
    },

    async snapshot() {
      const merged = new Map<string, SnapshotEntry>();
      if (profile.accounting) {
        const sacct = await runSchedulerQuery(
          transport,
          "slurm",
          "sacct",
          `sacct -n -P -X -u ${USER_EXPR} -S ${ACCOUNTING_WINDOW} -o JobID,State,ExitCode`,
        );
        for (const entry of parseSacctListing(sacct)) {
          merged.set(entryKey(entry), entry);
        }
      }
      // squeue is authoritative for anything still queued or running
      const squeue = await runSchedulerQuery(
        transport,
        "slurm",
        "squeue",
        `squeue -h -r -u ${USER_EXPR} -o '%i|%T'`,
      );
      for (const entry of parseSqueueListing(squeue)) {
        merged.set(entryKey(entry), entry);
      }
      return [...merged.values()];
    },

    normalizeState: normalizeSlurmState,

    // Only scripts submitted by this adapter instance are known.
    async release(id) {
      const submitted = scripts.get(id);
      if (!submitted) {
        return [];
      }
      const removed = await removeSubmittedScript(transport, submitted);
      scripts.delete(id);
      return removed;
    },
  };
}
