import {
  removeSubmittedScript,
  runSchedulerQuery,
  submitScript,
  type SubmittedScript,
} from "./backend.js";
import { AdapterQueryError, SubmissionError } from "./errors.js";
import { formatIndexRange, planScript, renderScriptBody, type ScriptProfile } from "./script.js";
import { createTransport, shellQuote, type ClusterTransport } from "./shell.js";
import { isArraySpec, parseWallTime, type JobSpec } from "./spec.js";
import type {
  BatchSystemAdapter,
  ClusterProfile,
  CommandRunner,
  NormalizedState,
  SnapshotEntry,
} from "./types.js";

const TORQUE_STATES: Record<string, NormalizedState> = {
  Q: "Pending",
  H: "Pending",
  W: "Pending",
  T: "Pending",
  R: "Running",
  E: "Running",
  S: "Running",
  C: "Completed",
};

/**
 * Maps a qstat state letter. Finished jobs arrive as `C:<exit_status>` from
 * `parseQstatFull`; a non-zero status is a failure.
 */
export function normalizeTorqueState(rawState: string): NormalizedState {
  const [code = "", exit] = rawState.trim().toUpperCase().split(":");
  if (code === "C" && exit != null && exit.trim() !== "0") {
    return "Failed";
  }
  return TORQUE_STATES[code] ?? "Pending";
}

/** Torque wants plain `HH:MM:SS`, so day prefixes fold into hours. */
export function toTorqueWalltime(time: string): string {
  const total = parseWallTime(time);
  const hours = Math.floor(total / 3_600);
  const minutes = Math.floor((total % 3_600) / 60);
  const seconds = total % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

export function toTorqueMemory(mem: string): string {
  const match = /^(\d+)([KMGT]?)$/.exec(mem.trim());
  if (!match?.[1]) {
    throw new Error(`Invalid memory request: ${mem}`);
  }
  const unit = match[2] || "M";
  return `${match[1]}${unit.toLowerCase()}b`;
}

function quoteForDoubleQuotes(value: string): string {
  return value.replace(/[\\"$`]/g, (ch) => `\\${ch}`);
}

/**
 * Torque does not expand placeholders in `-o`/`-e`, so the script redirects
 * its own streams. `%j` becomes the numeric job ID, `%a` the array index.
 */
export function torqueOutputExpression(template: string): string {
  let out = "";
  let rest = template;
  while (rest.length > 0) {
    const at = rest.indexOf("%");
    if (at === -1 || at === rest.length - 1) {
      out += quoteForDoubleQuotes(rest);
      break;
    }
    out += quoteForDoubleQuotes(rest.slice(0, at));
    const token = rest[at + 1];
    if (token === "j") {
      out += "${CQ_JOB_ID}";
    } else if (token === "a") {
      out += "${CQ_ARRAY_INDEX}";
    } else if (token === "%") {
      out += "%";
    } else {
      out += quoteForDoubleQuotes(rest.slice(at, at + 2));
    }
    rest = rest.slice(at + 2);
  }
  return `"${out}"`;
}

function formatDirective(flag: string, value: string | number | undefined): string[] {
  if (value == null || value === "") {
    return [];
  }
  return [`#PBS ${flag} ${String(value)}`];
}

export function renderTorqueScript(params: { spec: JobSpec; profile?: ScriptProfile }): string {
  const { spec } = params;
  const plan = planScript(spec, params.profile);
  const r = plan.resources;

  const lines: string[] = ["#!/bin/bash"];
  lines.push(...formatDirective("-N", plan.label.slice(0, 15)));
  lines.push(...formatDirective("-q", r.partition));
  lines.push(...formatDirective("-A", r.account));
  if (r.time) {
    lines.push(...formatDirective("-l", `walltime=${toTorqueWalltime(r.time)}`));
  }
  if (r.nodes != null || r.cpusPerTask != null || r.gpus != null) {
    const gpus = r.gpus != null ? `:gpus=${r.gpus}` : "";
    lines.push(...formatDirective("-l", `nodes=${r.nodes ?? 1}:ppn=${r.cpusPerTask ?? 1}${gpus}`));
  }
  if (r.mem) {
    lines.push(...formatDirective("-l", `mem=${toTorqueMemory(r.mem)}`));
  }
  if (isArraySpec(spec) && spec.arrayIndices) {
    lines.push(...formatDirective("-t", formatIndexRange(spec.arrayIndices)));
  }
  lines.push("#PBS -o /dev/null", "#PBS -e /dev/null", "");

  lines.push(spec.cwd ? `cd ${shellQuote(spec.cwd)}` : 'cd "${PBS_O_WORKDIR:-$HOME}"');
  lines.push('CQ_JOB_ID="${PBS_JOBID%%[.[]*}"');
  lines.push('CQ_ARRAY_INDEX="${PBS_ARRAYID:-}"');
  if (spec.outputPath) {
    lines.push(`exec >${torqueOutputExpression(spec.outputPath)}`);
  }
  if (spec.errorPath) {
    lines.push(`exec 2>${torqueOutputExpression(spec.errorPath)}`);
  }

  lines.push(...renderScriptBody(plan, spec.command));
  return `${lines.join("\n")}\n`;
}

export function parseQsubJobId(stdout: string): string {
  const line = stdout
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .pop();
  const match = line ? /^(\d+)(?:\[\])?(?:\.\S+)?$/.exec(line) : null;
  if (!match?.[1]) {
    throw new Error(`Unable to parse job id from qsub output: ${stdout.trim() || "<empty>"}`);
  }
  return match[1];
}

type QstatBlock = { idField: string; state?: string; exitStatus?: number };

function blockEntry(block: QstatBlock): SnapshotEntry | undefined {
  const match = /^(\d+)(?:\[(\d*)\])?(?:\.\S*)?$/.exec(block.idField);
  if (!match?.[1] || !block.state) {
    throw new AdapterQueryError("torque", `malformed qstat record: ${block.idField}`);
  }
  // array summaries (`123[]`) repeat what their tasks report
  if (match[2] === "") {
    return undefined;
  }
  const finished = block.state.toUpperCase() === "C" && block.exitStatus != null;
  return {
    id: match[1],
    rawState: finished ? `C:${block.exitStatus}` : block.state,
    ...(match[2] != null ? { arrayIndex: Number(match[2]) } : {}),
    ...(block.exitStatus != null ? { exitCode: block.exitStatus } : {}),
  };
}

/**
 * Parses `qstat -f -t`: one `Job Id:` line per job followed by indented
 * `key = value` attributes. Only `job_state` and `exit_status` are read;
 * wrapped attribute values are ignored.
 */
export function parseQstatFull(stdout: string): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  let block: QstatBlock | undefined;
  const flush = () => {
    const entry = block ? blockEntry(block) : undefined;
    if (entry) {
      entries.push(entry);
    }
  };

  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) {
      continue;
    }
    const header = /^Job Id:\s*(\S+)$/i.exec(line);
    if (header?.[1]) {
      flush();
      block = { idField: header[1] };
      continue;
    }
    if (!block) {
      throw new AdapterQueryError("torque", `unexpected qstat output: ${line}`);
    }
    const attr = /^(\w+)\s*=\s*(.*)$/.exec(line);
    if (attr?.[1] === "job_state") {
      block.state = attr[2]?.trim();
    } else if (attr?.[1] === "exit_status" && /^-?\d+$/.test(attr[2]?.trim() ?? "")) {
      block.exitStatus = Number(attr[2]);
    }
  }
  flush();
  return entries;
}

export type TorqueAdapterParams = {
  profile: ClusterProfile;
  runner: CommandRunner;
  scriptDir: string;
  now?: () => Date;
  /** Kills a scheduler command that runs longer than this. */
  commandTimeoutMs?: number;
  transport?: ClusterTransport;
};

export function createTorqueAdapter(params: TorqueAdapterParams): BatchSystemAdapter {
  const { profile, scriptDir } = params;
  const now = params.now ?? (() => new Date());
  const transport =
    params.transport ??
    createTransport(params.runner, profile, { timeoutMs: params.commandTimeoutMs });
  const scripts = new Map<string, SubmittedScript>();

  return {
    kind: "torque",

    async submit(spec) {
      const submitted = await submitScript({
        transport,
        backend: "torque",
        submitCommand: "qsub",
        profile,
        spec,
        script: renderTorqueScript({ spec, profile }),
        scriptDir,
        extension: "pbs",
        now: now(),
      });
      let id: string;
      try {
        id = parseQsubJobId(submitted.output);
      } catch (err) {
        throw new SubmissionError("torque", submitted.output.trim(), { cause: err });
      }
      scripts.set(id, submitted);
      return id;
    },

    async snapshot() {
      const listing = await runSchedulerQuery(transport, "torque", "qstat", "qstat -f -t");
      return parseQstatFull(listing);
    },

    normalizeState: normalizeTorqueState,

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
