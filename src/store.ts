import fs from "node:fs/promises";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { describeError } from "./errors.js";
import { JobSpecSchema } from "./spec.js";

export const LedgerTaskSchema = Type.Object({
  arrayIndex: Type.Optional(Type.Integer({ minimum: 0 })),
  state: Type.Union([
    Type.Literal("queued"),
    Type.Literal("running"),
    Type.Literal("done"),
    Type.Literal("failed"),
  ]),
  exitCode: Type.Optional(Type.Integer()),
  outputs: Type.Object({ stdout: Type.String(), stderr: Type.String() }),
  startedAt: Type.Optional(Type.String()),
  finishedAt: Type.Optional(Type.String()),
  note: Type.Optional(Type.String()),
});

export const LedgerJobSchema = Type.Object({
  id: Type.String(),
  spec: JobSpecSchema,
  submittedAt: Type.String(),
  tasks: Type.Array(LedgerTaskSchema),
});

export const LocalLedgerSchema = Type.Object({
  nextId: Type.Integer({ minimum: 1 }),
  jobs: Type.Record(Type.String(), LedgerJobSchema),
});

export type LedgerTask = Static<typeof LedgerTaskSchema>;
export type LocalLedger = Static<typeof LocalLedgerSchema>;

export function emptyLedger(): LocalLedger {
  return { nextId: 1, jobs: {} };
}

export function ledgerPath(ledgerDir: string): string {
  return path.join(ledgerDir, "ledger.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** A missing ledger is empty; an unreadable or malformed one is an error. */
export async function loadLedger(ledgerDir: string): Promise<LocalLedger> {
  const file = ledgerPath(ledgerDir);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      return emptyLedger();
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Corrupt ledger ${file}: ${describeError(err)}`, { cause: err });
  }
  if (!Value.Check(LocalLedgerSchema, parsed)) {
    const first = Value.Errors(LocalLedgerSchema, parsed).First();
    throw new Error(
      `Corrupt ledger ${file}: ${first ? `${first.path || "/"} ${first.message}` : "schema mismatch"}`,
    );
  }
  return parsed;
}

/** Writes through a temp file so a crash mid-write leaves the old ledger intact. */
export async function saveLedger(ledgerDir: string, ledger: LocalLedger): Promise<void> {
  await fs.mkdir(ledgerDir, { recursive: true });
  const file = ledgerPath(ledgerDir);
  const temp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(temp, `${JSON.stringify(ledger, null, 2)}\n`, "utf8");
  await fs.rename(temp, file);
}
