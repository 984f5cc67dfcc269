import path from "node:path";
import { runChecked } from "./exec.js";
import { toPosixRemotePath } from "./paths.js";
import type { CommandRunner, CommandResult } from "./types.js";

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/** Quotes a path for a remote shell while keeping a leading `~/` expandable. */
export function quotePath(value: string): string {
  if (value === "~") {
    return "~";
  }
  if (value.startsWith("~/")) {
    return `~/${shellQuote(value.slice(2))}`;
  }
  return shellQuote(value);
}

export function scpTarget(sshTarget: string, remotePath: string): string {
  const normalized = remotePath.replace(/\\/g, "/");
  return `${sshTarget}:${normalized}`;
}

export async function sshExec(
  runner: CommandRunner,
  sshTarget: string,
  remoteCommand: string,
  timeoutMs?: number,
): Promise<CommandResult> {
  return await runChecked(
    runner,
    "ssh",
    ["-o", "BatchMode=yes", sshTarget, remoteCommand],
    timeoutMs != null ? { timeoutMs } : undefined,
  );
}

export async function scpUpload(
  runner: CommandRunner,
  sshTarget: string,
  localPaths: string[],
  remoteDir: string,
  timeoutMs?: number,
): Promise<CommandResult> {
  const args = ["-o", "BatchMode=yes", "-r", ...localPaths, scpTarget(sshTarget, remoteDir)];
  return await runChecked(runner, "scp", args, timeoutMs != null ? { timeoutMs } : undefined);
}

/**
 * Where scheduler commands run: the local shell, or a login node over ssh.
 * `exec` never throws on a non-zero exit; callers decide what a failure means.
 * With `timeoutMs`, a command that hangs is killed and reported as failed.
 */
export type ClusterTransport = {
  exec(command: string): Promise<CommandResult>;
  /** Makes a local file visible to the scheduler and returns the path it should use. */
  stage(localPath: string, subdir: string): Promise<string>;
};

export function createTransport(
  runner: CommandRunner,
  target: { sshTarget?: string; remoteRoot?: string },
  options: { timeoutMs?: number } = {},
): ClusterTransport {
  const { timeoutMs } = options;
  const runOptions = timeoutMs != null ? { timeoutMs } : undefined;
  const sshTarget = target.sshTarget;
  if (!sshTarget) {
    return {
      exec: async (command) => await runner("bash", ["-c", command], runOptions),
      stage: async (localPath) => path.resolve(localPath),
    };
  }

  const remoteRoot = target.remoteRoot ?? "~/.cluster-queue";
  return {
    exec: async (command) =>
      await runner("ssh", ["-o", "BatchMode=yes", sshTarget, command], runOptions),
    stage: async (localPath, subdir) => {
      const remoteDir = toPosixRemotePath(remoteRoot, subdir);
      await sshExec(runner, sshTarget, `mkdir -p ${quotePath(remoteDir)}`, timeoutMs);
      await scpUpload(runner, sshTarget, [localPath], remoteDir, timeoutMs);
      return toPosixRemotePath(remoteDir, path.basename(localPath));
    },
  };
}
