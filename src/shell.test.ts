import { describe, expect, it, vi } from "vitest";
import { createTransport, quotePath, shellQuote } from "./shell.js";
import type { CommandRunner } from "./types.js";

describe("shell quoting", () => {
  it("quotes single quotes", () => {
    expect(shellQuote("a'b")).toBe(`'a'"'"'b'`);
  });

  it("keeps a leading home directory expandable", () => {
    expect(quotePath("~")).toBe("~");
    expect(quotePath("~/runs/a b")).toBe("~/'runs/a b'");
    expect(quotePath("/abs/path")).toBe("'/abs/path'");
  });
});

describe("cluster transport", () => {
  it("runs locally through bash without an ssh target", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ code: 0, stdout: "x", stderr: "" }));
    const transport = createTransport(runner, {});

    await transport.exec("squeue -h");
    expect(runner).toHaveBeenCalledWith("bash", ["-c", "squeue -h"], undefined);
    expect(await transport.stage("/tmp/a.sbatch", "scripts")).toBe("/tmp/a.sbatch");
  });

  it("stages files under the remote root", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ code: 0, stdout: "", stderr: "" }));
    const transport = createTransport(runner, { sshTarget: "login" });

    expect(await transport.stage("/tmp/a.sbatch", "scripts")).toBe("~/.cluster-queue/scripts/a.sbatch");
    expect(runner.mock.calls.map((call) => call.slice(0, 2))).toEqual([
      ["ssh", ["-o", "BatchMode=yes", "login", "mkdir -p ~/'.cluster-queue/scripts'"]],
      ["scp", ["-o", "BatchMode=yes", "-r", "/tmp/a.sbatch", "login:~/.cluster-queue/scripts"]],
    ]);
  });

  it("applies the command time limit to every remote call", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ code: 0, stdout: "", stderr: "" }));
    const transport = createTransport(runner, { sshTarget: "login" }, { timeoutMs: 5_000 });

    await transport.exec("qstat");
    await transport.stage("/tmp/a.pbs", "scripts");
    expect(runner.mock.calls.map((call) => [call[0], call[2]])).toEqual([
      ["ssh", { timeoutMs: 5_000 }],
      ["ssh", { timeoutMs: 5_000 }],
      ["scp", { timeoutMs: 5_000 }],
    ]);
  });

  it("surfaces a failed staging step", async () => {
    const runner = vi.fn<CommandRunner>(async (command) =>
      command === "scp" ? { code: 1, stdout: "", stderr: "Permission denied\n" } : { code: 0, stdout: "", stderr: "" },
    );
    const transport = createTransport(runner, { sshTarget: "login", remoteRoot: "/scratch/me" });

    await expect(transport.stage("/tmp/a.sbatch", "scripts")).rejects.toThrow("scp failed: Permission denied");
  });
});
