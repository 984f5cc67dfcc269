import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir, sanitizeName, timestampSlug } from "./paths.js";
import { shellQuote } from "./shell.js";
import { jobLabel, type JobSpec, type ResourceRequest } from "./spec.js";
import type { ClusterProfile, ResourceDefaults } from "./types.js";

let scriptSerial = 0;

export type ScriptProfile = Pick<ClusterProfile, "defaults" | "setupCommands">;

export type ScriptPlan = {
  label: string;
  resources: ResourceRequest;
  modules: string[];
  setupCommands: string[];
  env: Record<string, string>;
};

function dedupe(entries: readonly string[]): string[] {
  return Array.from(new Set(entries.map((entry) => entry.trim()))).filter(
    (entry) => entry.length > 0,
  );
}

/** Spec values win over profile defaults; modules and setup commands accumulate. */
export function planScript(spec: JobSpec, profile?: ScriptProfile): ScriptPlan {
  const defaults: ResourceDefaults = profile?.defaults ?? { modules: [] };
  const { modules: defaultModules, ...defaultResources } = defaults;
  return {
    label: jobLabel(spec),
    resources: { ...defaultResources, ...spec.resources },
    modules: dedupe([...defaultModules, ...(spec.modules ?? [])]),
    setupCommands: [...(profile?.setupCommands ?? []), ...(spec.setupCommands ?? [])]
      .map((line) => line.trim())
      .filter((line) => line.length > 0),
    env: { ...spec.env },
  };
}

export function renderScriptBody(plan: ScriptPlan, command: string): string[] {
  const lines: string[] = ["", "set -euo pipefail", ""];

  const envEntries = Object.entries(plan.env);
  for (const [key, value] of envEntries) {
    lines.push(`export ${key}=${shellQuote(value)}`);
  }
  if (envEntries.length > 0) {
    lines.push("");
  }

  for (const mod of plan.modules) {
    lines.push(`module load ${mod}`);
  }
  lines.push(...plan.setupCommands);
  if (plan.modules.length > 0 || plan.setupCommands.length > 0) {
    lines.push("");
  }

  for (const line of command.split(/\r?\n/)) {
    if (line.trim().length > 0) {
      lines.push(line);
    }
  }
  return lines;
}

/** Collapses indices into scheduler range syntax, e.g. `0-2,5`. */
export function formatIndexRange(indices: readonly number[]): string {
  const sorted = Array.from(new Set(indices)).sort((a, b) => a - b);
  const parts: string[] = [];
  let start = sorted[0];
  let prev = sorted[0];
  for (const index of sorted.slice(1)) {
    if (prev != null && index === prev + 1) {
      prev = index;
      continue;
    }
    if (start != null && prev != null) {
      parts.push(start === prev ? String(start) : `${start}-${prev}`);
    }
    start = index;
    prev = index;
  }
  if (start != null && prev != null) {
    parts.push(start === prev ? String(start) : `${start}-${prev}`);
  }
  return parts.join(",");
}

export async function writeJobScript(params: {
  scriptDir: string;
  spec: JobSpec;
  now: Date;
  extension: string;
  script: string;
}): Promise<string> {
  await ensureDir(params.scriptDir);
  scriptSerial += 1;
  const stamp = `${timestampSlug(params.now)}-${scriptSerial}`;
  const name = `${sanitizeName(jobLabel(params.spec))}-${stamp}.${params.extension}`;
  const file = path.join(params.scriptDir, name);
  await fs.writeFile(file, params.script, { encoding: "utf8", mode: 0o755 });
  return file;
}
