import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AdapterQueryError, SpecValidationError, SubmissionError } from "./errors.js";
import { LocalWorkerPool, WorkQueue, createLocalAdapter, normalizeLocalState } from "./local-pool.js";
import { loadLedger, saveLedger } from "./store.js";
import type { CommandResult, CommandRunner } from "./types.js";

const tmpDirs: string[] = [];
const pools: LocalWorkerPool[] = [];

afterEach(async () => {
  await Promise.all(pools.splice(0).map(async (pool) => await pool.stop()));
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "cluster-queue-local-"));
  tmpDirs.push(dir);
  return dir;
}

async function startPool(runner: CommandRunner, workers = 2) {
  const root = await tempDir();
  const pool = new LocalWorkerPool({ workers, ledgerDir: path.join(root, "ledger"), runner });
  pools.push(pool);
  await pool.start();
  return { pool, root };
}

function ok(stdout = ""): CommandResult {
  return { code: 0, stdout, stderr: "" };
}

describe("LocalWorkerPool", () => {
  it("runs a job and writes its outputs", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ code: 0, stdout: "hi\n", stderr: "warn\n" }));
    const { pool, root } = await startPool(runner);

    const id = await pool.submit({ command: "echo hi", cwd: root, env: { MODE: "fast" } });
    await pool.idle();

    expect(id).toBe("1");
    const stdout = path.join(root, "job.1.out");
    const stderr = path.join(root, "job.1.err");
    expect(await pool.snapshot()).toEqual([
      { id: "1", rawState: "done", exitCode: 0, outputs: { stdout, stderr } },
    ]);
    expect(await fs.readFile(stdout, "utf8")).toBe("hi\n");
    expect(await fs.readFile(stderr, "utf8")).toBe("warn\n");

    const call = runner.mock.calls[0];
    expect(call?.[0]).toBe("bash");
    expect(call?.[1][0]).toBe("-c");
    expect(call?.[1][1]).toContain("echo hi");
    expect(call?.[2]).toEqual({ cwd: root, env: { MODE: "fast", JOB_ID: "1" }, timeoutMs: undefined });
  });

  it("runs one task per array index and records exit codes", async () => {
    const runner = vi.fn<CommandRunner>(async (_command, _args, options) =>
      options?.env?.ARRAY_INDEX === "1" ? { code: 3, stdout: "", stderr: "bad\n" } : ok("fine\n"),
    );
    const { pool, root } = await startPool(runner);

    const id = await pool.submit({ command: "run", cwd: root, arrayIndices: [0, 1] });
    await pool.idle();

    expect(await pool.snapshot()).toEqual([
      {
        id,
        rawState: "done",
        arrayIndex: 0,
        exitCode: 0,
        outputs: { stdout: path.join(root, "job.1_0.out"), stderr: path.join(root, "job.1_0.err") },
      },
      {
        id,
        rawState: "failed",
        arrayIndex: 1,
        exitCode: 3,
        outputs: { stdout: path.join(root, "job.1_1.out"), stderr: path.join(root, "job.1_1.err") },
      },
    ]);
  });

  it("never runs more tasks than workers and keeps FIFO order", async () => {
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const started: string[] = [];
    let active = 0;
    let maxActive = 0;
    const runner = vi.fn<CommandRunner>(async (_command, _args, options) => {
      started.push(options?.env?.JOB_ID ?? "?");
      active += 1;
      maxActive = Math.max(maxActive, active);
      await gate;
      active -= 1;
      return ok();
    });
    const { pool, root } = await startPool(runner, 2);

    for (let i = 0; i < 4; i += 1) {
      await pool.submit({ command: "sleep 1", cwd: root });
    }
    await vi.waitFor(() => expect(runner).toHaveBeenCalledTimes(2));
    expect((await pool.snapshot()).map((entry) => entry.rawState)).toEqual([
      "running",
      "running",
      "queued",
      "queued",
    ]);

    open();
    await pool.idle();
    expect(started).toEqual(["1", "2", "3", "4"]);
    expect(maxActive).toBe(2);
  });

  it("passes the wall time as a time limit", async () => {
    const runner = vi.fn<CommandRunner>(async () => ok());
    const { pool, root } = await startPool(runner);

    await pool.submit({ command: "true", cwd: root, resources: { time: "00:01:30" } });
    await pool.idle();

    expect(runner.mock.calls[0]?.[2]?.timeoutMs).toBe(90_000);
  });

  it("records a process that could not start as failed", async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw new Error("spawn bash ENOENT");
    });
    const { pool, root } = await startPool(runner);

    await pool.submit({ command: "true", cwd: root });
    await pool.idle();

    const [entry] = await pool.snapshot();
    expect(entry).toMatchObject({ rawState: "failed", exitCode: 127 });
    expect(await fs.readFile(path.join(root, "job.1.err"), "utf8")).toBe("spawn bash ENOENT\n");
  });

  it("resumes queued tasks and fails interrupted ones after a restart", async () => {
    const root = await tempDir();
    const ledgerDir = path.join(root, "ledger");
    const outputs = (name: string) => ({
      stdout: path.join(root, `${name}.out`),
      stderr: path.join(root, `${name}.err`),
    });
    await saveLedger(ledgerDir, {
      nextId: 3,
      jobs: {
        "1": {
          id: "1",
          spec: { command: "long" },
          submittedAt: "2026-01-01T00:00:00.000Z",
          tasks: [{ state: "running", outputs: outputs("one"), startedAt: "2026-01-01T00:00:01.000Z" }],
        },
        "2": {
          id: "2",
          spec: { command: "short" },
          submittedAt: "2026-01-01T00:00:02.000Z",
          tasks: [{ state: "queued", outputs: outputs("two") }],
        },
      },
    });

    const runner = vi.fn<CommandRunner>(async () => ok("done\n"));
    const pool = new LocalWorkerPool({
      workers: 1,
      ledgerDir,
      runner,
      now: () => new Date("2026-01-01T00:01:00.000Z"),
    });
    pools.push(pool);
    await pool.start();
    await pool.idle();

    const snapshot = await pool.snapshot();
    expect(snapshot.map((entry) => [entry.id, entry.rawState, entry.exitCode])).toEqual([
      ["1", "failed", undefined],
      ["2", "done", 0],
    ]);
    expect(runner).toHaveBeenCalledTimes(1);

    const ledger = await loadLedger(ledgerDir);
    expect(ledger.jobs["1"]?.tasks[0]?.note).toBe("interrupted by pool restart");
    expect(await pool.submit({ command: "next", cwd: root })).toBe("3");
  });

  it("fails a task whose start cannot be recorded", async () => {
    const root = await tempDir();
    const ledgerDir = path.join(root, "ledger");
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const runner = vi.fn<CommandRunner>(async () => {
      await gate;
      return ok();
    });
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const pool = new LocalWorkerPool({ workers: 1, ledgerDir, runner, logger });
    pools.push(pool);
    await pool.start();

    await pool.submit({ command: "first", cwd: root });
    await pool.submit({ command: "second", cwd: root });
    await vi.waitFor(() => expect(runner).toHaveBeenCalledTimes(1));

    await fs.rm(ledgerDir, { recursive: true, force: true });
    await fs.writeFile(ledgerDir, "not a directory", "utf8");
    open();
    await pool.idle();

    expect((await pool.snapshot()).map((entry) => [entry.id, entry.rawState])).toEqual([
      ["1", "done"],
      ["2", "failed"],
    ]);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("local worker 1 could not record job 2"));
  });

  it("refuses to start on a corrupt ledger", async () => {
    const root = await tempDir();
    await fs.writeFile(path.join(root, "ledger.json"), JSON.stringify({ nextId: 0, jobs: {} }));
    const pool = new LocalWorkerPool({ workers: 1, ledgerDir: root, runner: vi.fn<CommandRunner>() });

    await expect(pool.start()).rejects.toThrow(`Corrupt ledger ${path.join(root, "ledger.json")}: /nextId`);
    expect(pool.isRunning).toBe(false);
  });

  it("rejects a non-positive worker count", () => {
    expect(() => new LocalWorkerPool({ workers: 0, ledgerDir: os.tmpdir() })).toThrow(
      "workers must be a positive integer",
    );
  });
});

describe("local adapter", () => {
  it("maps ledger states", () => {
    expect(["queued", "running", "done", "failed"].map(normalizeLocalState)).toEqual([
      "Pending",
      "Running",
      "Completed",
      "Failed",
    ]);
  });

  it("keeps validation errors and wraps the rest", async () => {
    const { pool } = await startPool(vi.fn<CommandRunner>(async () => ok()));
    const adapter = createLocalAdapter(pool);

    await expect(adapter.submit({ command: "  " })).rejects.toBeInstanceOf(SpecValidationError);

    await pool.stop();
    await expect(adapter.submit({ command: "true" })).rejects.toBeInstanceOf(SubmissionError);
    await expect(adapter.snapshot()).rejects.toBeInstanceOf(AdapterQueryError);
  });
});

describe("WorkQueue", () => {
  it("hands items to waiting consumers and ends them on close", async () => {
    const queue = new WorkQueue<number>();
    const first = queue.pull();
    queue.push(1);
    queue.push(2);
    expect(await first).toBe(1);
    expect(queue.size).toBe(1);
    expect(await queue.pull()).toBe(2);

    const pending = queue.pull();
    queue.close();
    expect(await pending).toBeUndefined();
    expect(await queue.pull()).toBeUndefined();
  });
});
