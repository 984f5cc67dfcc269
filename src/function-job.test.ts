import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { parseClusterQueueConfig } from "./config.js";
import { FunctionJobError, SpecValidationError } from "./errors.js";
import {
  FUNCTION_RESULT_MARKER,
  buildFunctionJob,
  parseFunctionResult,
} from "./function-job.js";
import { ClusterQueueService } from "./service.js";
import { shellQuote } from "./shell.js";

const tmpDirs: string[] = [];
const services: ClusterQueueService[] = [];

afterEach(async () => {
  await Promise.all(services.splice(0).map(async (service) => await service.close()));
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

describe("buildFunctionJob", () => {
  it("passes the call as the last shell-quoted argument", () => {
    const call = { module: "./m.mjs", exportName: "f", args: [1, "it's"] };
    const job = buildFunctionJob(call, { cwd: "/work", resources: { time: "00:10:00" } });

    expect(job.command.startsWith("node --input-type=module -e '")).toBe(true);
    expect(job.command.endsWith(` ${shellQuote(JSON.stringify(call))}`)).toBe(true);
    expect(job.command).not.toContain("\n");
    expect(job.name).toBe("f");
    expect(job.cwd).toBe("/work");
    expect(job.resources).toEqual({ time: "00:10:00" });
  });

  it("names the job after the caller's choice, else the export", () => {
    expect(buildFunctionJob({ module: "m" }, { name: "fit" }).name).toBe("fit");
    expect(buildFunctionJob({ module: "m" }).name).toBe("function");
    expect(buildFunctionJob({ module: "m" }, { nodeCommand: "/opt/node/bin/node" }).command).toMatch(
      /^\/opt\/node\/bin\/node --input-type=module -e /,
    );
  });

  it("refuses calls that cannot travel as JSON", () => {
    expect(() => buildFunctionJob({ module: "" })).toThrow(SpecValidationError);
    expect(() => buildFunctionJob({ module: "m", args: [10n] })).toThrow(
      /^Invalid job spec: \/args are not JSON-serializable: /,
    );
    expect(() => buildFunctionJob({ module: "m", args: ["x".repeat(100_001)] })).toThrow(
      "Invalid job spec: /args exceed 100000 bytes as JSON",
    );
  });
});

describe("parseFunctionResult", () => {
  it("reads the last result line", () => {
    const stdout = [
      "loading",
      `${FUNCTION_RESULT_MARKER} {"ok":true,"value":1}`,
      `${FUNCTION_RESULT_MARKER} {"ok":true,"value":{"rows":[1,2]}}`,
      "",
    ].join("\n");
    expect(parseFunctionResult("7", stdout)).toEqual({ rows: [1, 2] });
    expect(parseFunctionResult("7", `${FUNCTION_RESULT_MARKER} {"ok":true,"value":null}\r\n`)).toBeNull();
  });

  it("raises FunctionJobError for a thrown error or a missing result", () => {
    expect(() =>
      parseFunctionResult("7", `${FUNCTION_RESULT_MARKER} {"ok":false,"error":"Error: boom"}\n`),
    ).toThrow(new FunctionJobError("7", "Error: boom"));
    expect(() => parseFunctionResult("7", "Killed\n")).toThrow(
      "Function job 7 failed: no result was reported",
    );
    expect(() => parseFunctionResult("7", `${FUNCTION_RESULT_MARKER} {"ok":tru`)).toThrow(
      "Function job 7 failed: result line is not valid JSON",
    );
    expect(() => parseFunctionResult("7", `${FUNCTION_RESULT_MARKER} {"ok":"yes"}`)).toThrow(
      "Function job 7 failed: result line has an unexpected shape",
    );
  });
});

describe("function jobs on the local pool", () => {
  it("runs an exported function under node and returns its value", async () => {
    const workspace = await fs.mkdtemp(path.join(os.tmpdir(), "cluster-queue-fn-"));
    tmpDirs.push(workspace);
    await fs.writeFile(
      path.join(workspace, "math.mjs"),
      [
        "export function scale(values, factor) { return values.map((value) => value * factor); }",
        'export default async function () { throw new Error("boom"); }',
        "",
      ].join("\n"),
      "utf8",
    );
    const service = new ClusterQueueService({
      config: parseClusterQueueConfig({
        local: { workers: 2, ledgerDir: "state" },
        polling: { intervalSeconds: 0.05 },
      }),
      workspaceDir: workspace,
    });
    services.push(service);
    const options = { cwd: workspace, nodeCommand: shellQuote(process.execPath) };

    const scaled = await service.submitFunction(
      { module: "./math.mjs", exportName: "scale", args: [[1, 2], 3] },
      options,
    );
    const failing = await service.submitFunction({ module: "./math.mjs" }, options);

    expect(await service.functionResult(scaled.id)).toEqual([3, 6]);
    await expect(service.functionResult(failing.id)).rejects.toThrow(
      /^Function job 2 failed: Error: boom/,
    );
    expect(service.status(failing.id)).toBe("Failed");
  }, 20_000);
});
