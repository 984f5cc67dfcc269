import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AdapterQueryError } from "./errors.js";
import {
  createTorqueAdapter,
  normalizeTorqueState,
  parseQsubJobId,
  parseQstatFull,
  renderTorqueScript,
  toTorqueMemory,
  toTorqueWalltime,
  torqueOutputExpression,
} from "./torque.js";
import type { CommandRunner } from "./types.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

const QSTAT_FULL = [
  "Job Id: 1234.pbs01",
  "    Job_Name = demo",
  "    Job_Owner = alice@login",
  "    job_state = R",
  "    queue = batch",
  "",
  "Job Id: 1235[].pbs01",
  "    Job_Name = arr",
  "    job_state = R",
  "",
  "Job Id: 1235[0].pbs01",
  "    job_state = C",
  "    exit_status = 0",
  "",
  "Job Id: 1235[1].pbs01",
  "    job_state = Q",
  "",
  "Job Id: 1236.pbs01",
  "    job_state = C",
  "    exit_status = 271",
  "    Variable_List = PBS_O_HOME=/home/alice,PBS_O_LANG=C,",
  "\tPBS_O_PATH=/usr/bin",
  "",
].join("\n");

describe("torque states and resources", () => {
  it("normalizes single-letter states", () => {
    expect(["Q", "H", "W", "T"].map(normalizeTorqueState)).toEqual([
      "Pending",
      "Pending",
      "Pending",
      "Pending",
    ]);
    expect(["R", "E", "S"].map(normalizeTorqueState)).toEqual(["Running", "Running", "Running"]);
    expect(normalizeTorqueState("c")).toBe("Completed");
    expect(normalizeTorqueState("C:0")).toBe("Completed");
    expect(normalizeTorqueState("X")).toBe("Pending");
  });

  it("reports a finished job with a non-zero exit status as failed", () => {
    expect(normalizeTorqueState("C:1")).toBe("Failed");
    expect(normalizeTorqueState("C:-11")).toBe("Failed");
  });

  it("folds days into walltime hours", () => {
    expect(toTorqueWalltime("1-02:03:04")).toBe("26:03:04");
    expect(toTorqueWalltime("00:30:00")).toBe("00:30:00");
  });

  it("converts memory requests", () => {
    expect(toTorqueMemory("4G")).toBe("4gb");
    expect(toTorqueMemory("512")).toBe("512mb");
    expect(() => toTorqueMemory("lots")).toThrow("Invalid memory request: lots");
  });

  it("expands output placeholders through shell variables", () => {
    expect(torqueOutputExpression("logs/%j-%a.out")).toBe('"logs/${CQ_JOB_ID}-${CQ_ARRAY_INDEX}.out"');
    expect(torqueOutputExpression("a$b%%")).toBe('"a\\$b%"');
  });
});

describe("torque script rendering", () => {
  it("renders PBS directives and redirects output inside the script", () => {
    const script = renderTorqueScript({
      spec: {
        name: "a-very-long-job-name-here",
        command: "echo hi",
        resources: { partition: "batch", time: "1-00:00:00", nodes: 2, cpusPerTask: 8, mem: "16G" },
        outputPath: "out/%j_%a.log",
        errorPath: "out/%j_%a.err",
        arrayIndices: [1, 2, 3],
      },
    });

    expect(script).toBe(
      [
        "#!/bin/bash",
        "#PBS -N a-very-long-job",
        "#PBS -q batch",
        "#PBS -l walltime=24:00:00",
        "#PBS -l nodes=2:ppn=8",
        "#PBS -l mem=16gb",
        "#PBS -t 1-3",
        "#PBS -o /dev/null",
        "#PBS -e /dev/null",
        "",
        'cd "${PBS_O_WORKDIR:-$HOME}"',
        'CQ_JOB_ID="${PBS_JOBID%%[.[]*}"',
        'CQ_ARRAY_INDEX="${PBS_ARRAYID:-}"',
        'exec >"out/${CQ_JOB_ID}_${CQ_ARRAY_INDEX}.log"',
        'exec 2>"out/${CQ_JOB_ID}_${CQ_ARRAY_INDEX}.err"',
        "",
        "set -euo pipefail",
        "",
        "echo hi",
        "",
      ].join("\n"),
    );
  });

  it("changes into the requested working directory", () => {
    const script = renderTorqueScript({
      spec: { command: "true", cwd: "/data/run 1", resources: { gpus: 1 } },
    });
    expect(script).toContain("\ncd '/data/run 1'\n");
    expect(script).toContain("\n#PBS -l nodes=1:ppn=1:gpus=1\n");
  });
});

describe("torque output parsing", () => {
  it("parses qsub output", () => {
    expect(parseQsubJobId("1234.pbs01.example.org\n")).toBe("1234");
    expect(parseQsubJobId("1235[].pbs01\n")).toBe("1235");
    expect(() => parseQsubJobId("")).toThrow("Unable to parse job id from qsub output: <empty>");
  });

  it("parses full qstat records and skips array summaries", () => {
    expect(parseQstatFull(QSTAT_FULL)).toEqual([
      { id: "1234", rawState: "R" },
      { id: "1235", arrayIndex: 0, rawState: "C:0", exitCode: 0 },
      { id: "1235", arrayIndex: 1, rawState: "Q" },
      { id: "1236", rawState: "C:271", exitCode: 271 },
    ]);
  });

  it("treats empty output as an empty queue and junk as an error", () => {
    expect(parseQstatFull("\n")).toEqual([]);
    expect(() => parseQstatFull("qstat: cannot connect to server")).toThrow(AdapterQueryError);
    expect(() => parseQstatFull("Job Id: 77.pbs01\n    queue = batch\n")).toThrow(
      "malformed qstat record: 77.pbs01",
    );
  });
});

describe("torque adapter", () => {
  it("submits with qsub and snapshots with qstat", async () => {
    const scriptDir = await fs.mkdtemp(path.join(os.tmpdir(), "cluster-queue-torque-"));
    tmpDirs.push(scriptDir);
    const commands: string[] = [];
    const runner: CommandRunner = vi.fn(async (_command, args) => {
      const shellText = args[1] ?? "";
      commands.push(shellText);
      if (shellText.startsWith("qsub")) {
        return { code: 0, stdout: "1240.pbs01\n", stderr: "" };
      }
      return { code: 0, stdout: QSTAT_FULL, stderr: "" };
    });
    const adapter = createTorqueAdapter({
      profile: {
        id: "pbs",
        scheduler: "torque",
        accounting: false,
        submitArgs: [],
        setupCommands: [],
        defaults: { modules: [] },
      },
      runner,
      scriptDir,
    });

    expect(await adapter.submit({ name: "t", command: "true" })).toBe("1240");
    const [file] = await fs.readdir(scriptDir);
    expect(file).toMatch(/^t-.+\.pbs$/);

    const entries = await adapter.snapshot();
    expect(entries).toHaveLength(4);
    expect(commands[1]).toBe("qstat -f -t");
    expect(entries.map((entry) => adapter.normalizeState(entry.rawState))).toEqual([
      "Running",
      "Completed",
      "Pending",
      "Failed",
    ]);

    expect(await adapter.release?.("1240")).toEqual([path.join(scriptDir, file ?? "")]);
    expect(await fs.readdir(scriptDir)).toEqual([]);
  });
});
