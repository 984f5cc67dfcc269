import { NotFinishedError } from "./errors.js";
import { isTerminal } from "./types.js";
import type { FunctionCall, FunctionJobOptions } from "./function-job.js";
import type { ClusterQueueService, PollOptions } from "./service.js";

export type FunctionRef = Omit<FunctionCall, "args">;

export type ParallelOptions = FunctionJobOptions &
  PollOptions & {
    /** How many jobs to split the items over. */
    jobs: number;
    /** Passed to the function after its chunk. */
    args?: unknown[];
    /** Delete outputs and scripts and forget the jobs once every result is in. Default true. */
    clean?: boolean;
  };

/**
 * Contiguous chunks whose sizes differ by at most one, larger chunks first.
 * Never returns an empty chunk.
 */
export function splitIntoChunks<T>(items: readonly T[], parts: number): T[][] {
  if (!Number.isInteger(parts) || parts < 1) {
    throw new Error(`Chunk count must be a positive integer, got ${parts}`);
  }
  const count = Math.min(parts, items.length);
  const base = Math.floor(items.length / Math.max(count, 1));
  const extra = items.length - base * count;
  const chunks: T[][] = [];
  let start = 0;
  for (let index = 0; index < count; index += 1) {
    const size = base + (index < extra ? 1 : 0);
    chunks.push(items.slice(start, start + size));
    start += size;
  }
  return chunks;
}

/**
 * Runs `fn(chunk, ...args)` once per chunk as separate jobs and returns each
 * job's result in chunk order. A failed chunk throws FunctionJobError and
 * leaves every output in place.
 */
export async function parallelChunks(
  service: ClusterQueueService,
  fn: FunctionRef,
  items: readonly unknown[],
  options: ParallelOptions,
): Promise<unknown[]> {
  const { jobs, args = [], clean = true, pollIntervalSeconds, signal, ...spec } = options;
  const chunks = splitIntoChunks(items, jobs);
  if (chunks.length === 0) {
    return [];
  }
  const base = spec.name ?? fn.exportName ?? "parallel";

  const ids: string[] = [];
  for (const [index, chunk] of chunks.entries()) {
    const view = await service.submitFunction(
      { ...fn, args: [chunk, ...args] },
      { ...spec, name: `${base}_${index + 1}_of_${chunks.length}` },
    );
    ids.push(view.id);
  }

  const waited = await service.wait(ids, { pollIntervalSeconds, signal });
  for (const [id, state] of Object.entries(waited.states)) {
    if (!isTerminal(state)) {
      throw new NotFinishedError(id, state);
    }
  }

  const results: unknown[] = [];
  for (const id of ids) {
    results.push(await service.functionResult(id, { maxWaitSeconds: 0 }));
  }
  if (clean) {
    for (const id of ids) {
      await service.clean(id);
      service.discard(id);
    }
  }
  return results;
}

/** {@link parallelChunks} for functions that map a chunk to an array; the arrays are joined in order. */
export async function parallelMap(
  service: ClusterQueueService,
  fn: FunctionRef,
  items: readonly unknown[],
  options: ParallelOptions,
): Promise<unknown[]> {
  const results = await parallelChunks(service, fn, items, options);
  return results.flatMap((value, index) => {
    if (!Array.isArray(value)) {
      throw new Error(`Chunk ${index + 1} of ${results.length} returned ${typeof value}, not an array`);
    }
    const entries: unknown[] = value;
    return entries;
  });
}
