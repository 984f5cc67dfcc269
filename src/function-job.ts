import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { FunctionJobError, SpecValidationError, describeError } from "./errors.js";
import { shellQuote } from "./shell.js";
import type { JobSpec } from "./spec.js";

/** Prefix of the stdout line that carries a function job's outcome. */
export const FUNCTION_RESULT_MARKER = "__CLUSTER_QUEUE_RESULT__";

// The call travels as one command-line argument; Linux caps those at 128 KiB.
export const MAX_FUNCTION_CALL_BYTES = 100_000;

export const FunctionCallSchema = Type.Object(
  {
    /** `./relative.mjs` or `/absolute.js` (resolved against the job's cwd), or a package name. */
    module: Type.String({ minLength: 1 }),
    exportName: Type.Optional(Type.String({ minLength: 1 })),
    args: Type.Optional(Type.Array(Type.Unknown())),
  },
  { additionalProperties: false },
);

export type FunctionCall = Static<typeof FunctionCallSchema>;

export type FunctionJobOptions = Omit<JobSpec, "command" | "arrayIndices"> & {
  /** Command that starts Node.js on the execution host. Default `node`. */
  nodeCommand?: string;
};

const FunctionOutcomeSchema = Type.Union([
  Type.Object({ ok: Type.Literal(true), value: Type.Unknown() }),
  Type.Object({ ok: Type.Literal(false), error: Type.String() }),
]);

// Evaluated by `node --input-type=module -e`; the call is the last argv entry.
// Kept on one line because script rendering drops blank lines.
const RUNNER = [
  'import path from "node:path";',
  'import { pathToFileURL } from "node:url";',
  "const call = JSON.parse(process.argv[process.argv.length - 1]);",
  'const name = call.exportName ?? "default";',
  "const specifier = /^[./]/.test(call.module) ? pathToFileURL(path.resolve(call.module)).href : call.module;",
  "let outcome;",
  "try {",
  "const fn = (await import(specifier))[name];",
  'if (typeof fn !== "function") throw new Error(name + " is not a function exported by " + call.module);',
  "outcome = { ok: true, value: (await fn(...(call.args ?? []))) ?? null };",
  "} catch (err) {",
  "outcome = { ok: false, error: err instanceof Error ? (err.stack ?? err.message) : String(err) };",
  "}",
  "let line;",
  "try { line = JSON.stringify(outcome); }",
  'catch (err) { outcome = { ok: false, error: "result is not JSON: " + err.message }; line = JSON.stringify(outcome); }',
  `process.stdout.write("\\n${FUNCTION_RESULT_MARKER} " + line + "\\n");`,
  "if (!outcome.ok) process.exitCode = 1;",
].join(" ");

/**
 * Wraps a call to an exported function as an ordinary job. The job prints
 * the function's JSON result on its last stdout line; read it back with
 * {@link parseFunctionResult}.
 */
export function buildFunctionJob(call: FunctionCall, options: FunctionJobOptions = {}): JobSpec {
  if (!Value.Check(FunctionCallSchema, call)) {
    const issues = [...Value.Errors(FunctionCallSchema, call)].map(
      (issue) => `${issue.path || "/"} ${issue.message}`,
    );
    throw new SpecValidationError(issues);
  }
  let payload: string;
  try {
    payload = JSON.stringify(call);
  } catch (err) {
    throw new SpecValidationError([`/args are not JSON-serializable: ${describeError(err)}`]);
  }
  if (Buffer.byteLength(payload, "utf8") > MAX_FUNCTION_CALL_BYTES) {
    throw new SpecValidationError([`/args exceed ${MAX_FUNCTION_CALL_BYTES} bytes as JSON`]);
  }

  const { nodeCommand = "node", ...spec } = options;
  return {
    ...spec,
    name: spec.name ?? call.exportName ?? "function",
    command: [nodeCommand, "--input-type=module", "-e", shellQuote(RUNNER), shellQuote(payload)].join(
      " ",
    ),
  };
}

/** The value a function job returned, read from its stdout. */
export function parseFunctionResult(jobId: string, stdout: string): unknown {
  const prefix = `${FUNCTION_RESULT_MARKER} `;
  const line = stdout
    .split(/\r?\n/)
    .reverse()
    .find((entry) => entry.startsWith(prefix));
  if (line === undefined) {
    throw new FunctionJobError(jobId, "no result was reported");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(line.slice(prefix.length));
  } catch (err) {
    throw new FunctionJobError(jobId, "result line is not valid JSON", { cause: err });
  }
  if (!Value.Check(FunctionOutcomeSchema, parsed)) {
    throw new FunctionJobError(jobId, "result line has an unexpected shape");
  }
  if (!parsed.ok) {
    throw new FunctionJobError(jobId, parsed.error);
  }
  return parsed.value;
}
