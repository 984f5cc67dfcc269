import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SpecValidationError } from "./errors.js";

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const ResourceRequestSchema = Type.Object(
  {
    partition: Type.Optional(Type.String({ minLength: 1 })),
    account: Type.Optional(Type.String({ minLength: 1 })),
    qos: Type.Optional(Type.String({ minLength: 1 })),
    time: Type.Optional(
      Type.String({ pattern: "^(\\d+-)?\\d{1,3}:\\d{2}:\\d{2}$", description: "[D-]HH:MM:SS" }),
    ),
    nodes: Type.Optional(Type.Integer({ minimum: 1 })),
    cpusPerTask: Type.Optional(Type.Integer({ minimum: 1 })),
    mem: Type.Optional(Type.String({ pattern: "^\\d+[KMGT]?$" })),
    gpus: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false },
);

export const JobSpecSchema = Type.Object(
  {
    name: Type.Optional(Type.String({ minLength: 1, maxLength: 80 })),
    command: Type.String({ minLength: 1, description: "Shell text run by bash" }),
    cwd: Type.Optional(Type.String({ minLength: 1 })),
    env: Type.Optional(Type.Record(Type.String(), Type.String())),
    modules: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    setupCommands: Type.Optional(Type.Array(Type.String())),
    resources: Type.Optional(ResourceRequestSchema),
    outputPath: Type.Optional(
      Type.String({ minLength: 1, description: "Template; %j = job id, %a = array index" }),
    ),
    errorPath: Type.Optional(Type.String({ minLength: 1 })),
    arrayIndices: Type.Optional(
      Type.Array(Type.Integer({ minimum: 0 }), { minItems: 1, uniqueItems: true }),
    ),
    submitArgs: Type.Optional(Type.Array(Type.String())),
  },
  { additionalProperties: false },
);

export type ResourceRequest = Static<typeof ResourceRequestSchema>;
export type JobSpec = Static<typeof JobSpecSchema>;

export function validateJobSpec(value: unknown): JobSpec {
  if (!Value.Check(JobSpecSchema, value)) {
    const issues = [...Value.Errors(JobSpecSchema, value)].map(
      (issue) => `${issue.path || "/"} ${issue.message}`,
    );
    throw new SpecValidationError(issues);
  }
  if (value.command.trim().length === 0) {
    throw new SpecValidationError(["/command must not be blank"]);
  }
  const badEnv = Object.keys(value.env ?? {}).filter((key) => !ENV_NAME.test(key));
  if (badEnv.length > 0) {
    throw new SpecValidationError(badEnv.map((key) => `/env invalid variable name: ${key}`));
  }
  return value;
}

export function isArraySpec(spec: JobSpec): boolean {
  return (spec.arrayIndices?.length ?? 0) > 0;
}

/** Seconds in a `[D-]HH:MM:SS` wall time. */
export function parseWallTime(time: string): number {
  const match = /^(?:(\d+)-)?(\d{1,3}):(\d{2}):(\d{2})$/.exec(time.trim());
  if (!match) {
    throw new Error(`Invalid wall time: ${time}`);
  }
  const [, days, hours, minutes, seconds] = match;
  return (
    Number(days ?? 0) * 86_400 + Number(hours) * 3_600 + Number(minutes) * 60 + Number(seconds)
  );
}

export function jobLabel(spec: JobSpec): string {
  const base = spec.name?.trim() || "job";
  return (
    base
      .replace(/[^A-Za-z0-9._-]+/g, "-")
      .replace(/^-+|-+$/g, "")
      .slice(0, 64) || "job"
  );
}

export function withDefaultOutputs(spec: JobSpec): JobSpec {
  const label = jobLabel(spec);
  const suffix = isArraySpec(spec) ? "%j_%a" : "%j";
  return {
    ...spec,
    outputPath: spec.outputPath ?? `${label}.${suffix}.out`,
    errorPath: spec.errorPath ?? `${label}.${suffix}.err`,
  };
}

export function expandOutputTemplate(
  template: string,
  jobId: string,
  arrayIndex?: number,
): string {
  return template.replace(/%([ja%])/g, (_match, token: string) => {
    if (token === "j") {
      return jobId;
    }
    if (token === "a") {
      return arrayIndex == null ? "" : String(arrayIndex);
    }
    return "%";
  });
}

export function resolveOutputPath(
  spec: JobSpec,
  template: string,
  jobId: string,
  arrayIndex?: number,
): string {
  const expanded = expandOutputTemplate(template, jobId, arrayIndex);
  if (path.posix.isAbsolute(expanded) || !spec.cwd) {
    return expanded;
  }
  return path.posix.join(spec.cwd, expanded);
}
