export type ClusterQueueErrorCode =
  | "DUPLICATE_JOB"
  | "UNKNOWN_JOB"
  | "SUBMISSION_FAILED"
  | "ADAPTER_QUERY_FAILED"
  | "NOT_FINISHED"
  | "OUTPUT_MISSING"
  | "INVALID_SPEC"
  | "FUNCTION_FAILED";

export class ClusterQueueError extends Error {
  readonly code: ClusterQueueErrorCode;

  constructor(code: ClusterQueueErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateJobError extends ClusterQueueError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("DUPLICATE_JOB", `Job ${jobId} is already tracked`);
    this.jobId = jobId;
  }
}

export class UnknownJobError extends ClusterQueueError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("UNKNOWN_JOB", `Job ${jobId} was never registered`);
    this.jobId = jobId;
  }
}

/** The backend refused a job; `diagnostic` is its raw output. */
export class SubmissionError extends ClusterQueueError {
  readonly backend: string;
  readonly diagnostic: string;

  constructor(backend: string, diagnostic: string, options?: { cause?: unknown }) {
    super("SUBMISSION_FAILED", `${backend} rejected the job: ${diagnostic || "<no output>"}`, options);
    this.backend = backend;
    this.diagnostic = diagnostic;
  }
}

export class AdapterQueryError extends ClusterQueueError {
  readonly backend: string;

  constructor(backend: string, detail: string, options?: { cause?: unknown }) {
    super("ADAPTER_QUERY_FAILED", `${backend} queue query failed: ${detail}`, options);
    this.backend = backend;
  }
}

export class NotFinishedError extends ClusterQueueError {
  readonly jobId: string;
  readonly state: string;

  constructor(jobId: string, state: string) {
    super("NOT_FINISHED", `Job ${jobId} is not finished (state: ${state})`);
    this.jobId = jobId;
    this.state = state;
  }
}

export class OutputMissingError extends ClusterQueueError {
  readonly jobId: string;
  readonly path: string;

  constructor(jobId: string, path: string, options?: { cause?: unknown }) {
    super("OUTPUT_MISSING", `Job ${jobId} finished but its output is unreadable: ${path}`, options);
    this.jobId = jobId;
    this.path = path;
  }
}

export class SpecValidationError extends ClusterQueueError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_SPEC", `Invalid job spec: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** A function job threw, or finished without reporting a result. */
export class FunctionJobError extends ClusterQueueError {
  readonly jobId: string;
  readonly detail: string;

  constructor(jobId: string, detail: string, options?: { cause?: unknown }) {
    super("FUNCTION_FAILED", `Function job ${jobId} failed: ${detail}`, options);
    this.jobId = jobId;
    this.detail = detail;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
