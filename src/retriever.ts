import fs from "node:fs/promises";
import path from "node:path";
import { NotFinishedError, OutputMissingError, describeError } from "./errors.js";
import type { Queue } from "./queue.js";
import type { JobRecordView } from "./records.js";
import { quotePath, sshExec } from "./shell.js";
import { resolveOutputPath, withDefaultOutputs } from "./spec.js";
import type { CommandRunner, OutputLocations } from "./types.js";
import { isTerminal } from "./types.js";

const PRESENT_MARKER = "__CLUSTER_QUEUE_OUTPUT__";

/** Reads and removes job output files wherever the backend wrote them. */
export type OutputReader = {
  /** File contents, or undefined when the file does not exist. */
  read(file: string): Promise<string | undefined>;
  remove(file: string): Promise<void>;
};

export type JobResult = {
  stdout: string;
  stderr: string;
  exitCode?: number;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createLocalOutputReader(): OutputReader {
  return {
    async read(file) {
      try {
        return await fs.readFile(path.resolve(file), "utf8");
      } catch (err) {
        if (isMissingFile(err)) {
          return undefined;
        }
        throw err;
      }
    },
    async remove(file) {
      await fs.rm(path.resolve(file), { force: true });
    },
  };
}

/**
 * Reads files on a login node. The marker line tells an empty file apart
 * from a missing one.
 */
export function createRemoteOutputReader(runner: CommandRunner, sshTarget: string): OutputReader {
  return {
    async read(file) {
      const target = quotePath(file);
      const result = await sshExec(
        runner,
        sshTarget,
        `if [ -f ${target} ]; then echo '${PRESENT_MARKER}'; cat ${target}; fi`,
      );
      const prefix = `${PRESENT_MARKER}\n`;
      if (!result.stdout.startsWith(prefix)) {
        return undefined;
      }
      return result.stdout.slice(prefix.length);
    },
    async remove(file) {
      await sshExec(runner, sshTarget, `rm -f ${quotePath(file)}`);
    },
  };
}

export type ResultRetrieverOptions = {
  queue: Queue;
  reader?: OutputReader;
};

/**
 * Reads the outputs of finished jobs. `fetch` never changes a file or a
 * record; only `clean` deletes anything, and only when asked.
 */
export class ResultRetriever {
  private readonly queue: Queue;
  private readonly reader: OutputReader;

  constructor(options: ResultRetrieverOptions) {
    this.queue = options.queue;
    this.reader = options.reader ?? createLocalOutputReader();
  }

  /** Where a job's outputs live: backend-reported, else the spec's templates. */
  locate(jobId: string): OutputLocations {
    return outputLocations(this.queue.record(jobId));
  }

  async fetch(jobId: string): Promise<JobResult> {
    const view = this.queue.record(jobId);
    if (view.kind === "array") {
      throw new Error(`Job ${jobId} is an array job; fetch its tasks by key (e.g. ${jobId}[0])`);
    }
    if (!isTerminal(view.state)) {
      throw new NotFinishedError(jobId, view.state);
    }
    const locations = outputLocations(view);
    const stdout = await this.readOrThrow(jobId, locations.stdout);
    const stderr = await this.readOrThrow(jobId, locations.stderr);
    return {
      stdout,
      stderr,
      ...(view.exitCode != null ? { exitCode: view.exitCode } : {}),
    };
  }

  /** Fetches every task of an array job, keyed `parent[index]`. */
  async fetchArray(parentId: string): Promise<Record<string, JobResult>> {
    const view = this.queue.record(parentId);
    const results: Record<string, JobResult> = {};
    for (const child of view.children ?? []) {
      results[child.id] = await this.fetch(child.id);
    }
    return results;
  }

  /** Deletes the output files of a finished job (every task, for an array job). */
  async clean(jobId: string): Promise<string[]> {
    const view = this.queue.record(jobId);
    if (!isTerminal(view.state)) {
      throw new NotFinishedError(jobId, view.state);
    }
    const removed: string[] = [];
    for (const leaf of view.children ?? [view]) {
      const locations = outputLocations(leaf);
      for (const file of new Set([locations.stdout, locations.stderr])) {
        await this.reader.remove(file);
        removed.push(file);
      }
    }
    return removed;
  }

  private async readOrThrow(jobId: string, file: string): Promise<string> {
    let content: string | undefined;
    try {
      content = await this.reader.read(file);
    } catch (err) {
      throw new OutputMissingError(jobId, `${file} (${describeError(err)})`, { cause: err });
    }
    if (content === undefined) {
      throw new OutputMissingError(jobId, file);
    }
    return content;
  }
}

function outputLocations(view: JobRecordView): OutputLocations {
  if (view.outputs) {
    return view.outputs;
  }
  const spec = withDefaultOutputs(view.spec);
  const jobId = view.parentId ?? view.id;
  return {
    stdout: resolveOutputPath(spec, spec.outputPath ?? "%j.out", jobId, view.arrayIndex),
    stderr: resolveOutputPath(spec, spec.errorPath ?? "%j.err", jobId, view.arrayIndex),
  };
}
