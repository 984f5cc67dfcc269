import fs from "node:fs/promises";
import { AdapterQueryError, SubmissionError, describeError } from "./errors.js";
import { commandDetail } from "./exec.js";
import { writeJobScript } from "./script.js";
import { quotePath, shellQuote, type ClusterTransport } from "./shell.js";
import type { JobSpec } from "./spec.js";
import type { ClusterProfile, CommandResult } from "./types.js";

export async function runSchedulerQuery(
  transport: ClusterTransport,
  backend: string,
  label: string,
  command: string,
): Promise<string> {
  let result: CommandResult;
  try {
    result = await transport.exec(command);
  } catch (err) {
    throw new AdapterQueryError(backend, `${label}: ${describeError(err)}`, { cause: err });
  }
  if (result.code !== 0) {
    throw new AdapterQueryError(backend, `${label}: ${commandDetail(label, result)}`);
  }
  return result.stdout;
}

export type SubmittedScript = {
  /** Submit command output, for the caller to parse. */
  output: string;
  localScript: string;
  /** Path the scheduler read; equals `localScript` without ssh. */
  stagedScript: string;
};

/**
 * Writes the rendered script, stages it where the scheduler can read it and
 * runs the submit command.
 */
export async function submitScript(params: {
  transport: ClusterTransport;
  backend: string;
  submitCommand: string;
  profile: Pick<ClusterProfile, "submitArgs" | "setupCommands">;
  spec: JobSpec;
  script: string;
  scriptDir: string;
  extension: string;
  now: Date;
}): Promise<SubmittedScript> {
  const { transport, backend, profile, spec } = params;
  let localScript: string;
  let stagedScript: string;
  try {
    localScript = await writeJobScript({
      scriptDir: params.scriptDir,
      spec,
      now: params.now,
      extension: params.extension,
      script: params.script,
    });
    stagedScript = await transport.stage(localScript, "scripts");
  } catch (err) {
    throw new SubmissionError(backend, describeError(err), { cause: err });
  }

  const submitArgs = [...profile.submitArgs, ...(spec.submitArgs ?? [])]
    .map((arg) => arg.trim())
    .filter((arg) => arg.length > 0)
    .map((arg) => shellQuote(arg));
  const command = [
    ...profile.setupCommands,
    [params.submitCommand, ...submitArgs, quotePath(stagedScript)].join(" "),
  ].join("\n");

  let result: CommandResult;
  try {
    result = await transport.exec(command);
  } catch (err) {
    throw new SubmissionError(backend, describeError(err), { cause: err });
  }
  if (result.code !== 0) {
    throw new SubmissionError(backend, commandDetail(params.submitCommand, result));
  }
  return { output: result.stdout || result.stderr, localScript, stagedScript };
}

/** Deletes a submitted script and its staged copy. Returns the paths removed. */
export async function removeSubmittedScript(
  transport: ClusterTransport,
  script: Pick<SubmittedScript, "localScript" | "stagedScript">,
): Promise<string[]> {
  await fs.rm(script.localScript, { force: true });
  if (script.stagedScript === script.localScript) {
    return [script.localScript];
  }
  const result = await transport.exec(`rm -f ${quotePath(script.stagedScript)}`);
  if (result.code !== 0) {
    throw new Error(commandDetail("rm", result));
  }
  return [script.localScript, script.stagedScript];
}
