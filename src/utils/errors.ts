export type CairnErrorCode =
  | "TRANSIENT"
  | "TIMEOUT"
  | "TOOL_VALIDATION"
  | "PERSISTENCE"
  | "CONFIG";

export class CairnError extends Error {
  readonly code: CairnErrorCode;
  readonly retryable: boolean;

  constructor(
    code: CairnErrorCode,
    message: string,
    opts?: { retryable?: boolean; cause?: unknown },
  ) {
    super(message, { cause: opts?.cause });
    this.name = "CairnError";
    this.code = code;
    this.retryable = opts?.retryable ?? false;
  }
}

/** A failure of an external provider that may succeed on a later attempt. */
export class TransientError extends CairnError {
  constructor(message: string, cause?: unknown, code: CairnErrorCode = "TRANSIENT") {
    super(code, message, { retryable: true, cause });
    this.name = "TransientError";
  }
}

export class TimeoutError extends TransientError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, undefined, "TIMEOUT");
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface FieldIssue {
  readonly field: string;
  readonly message: string;
}

export class ToolValidationError extends CairnError {
  readonly tool: string;
  readonly issues: readonly FieldIssue[];

  constructor(tool: string, issues: readonly FieldIssue[]) {
    const detail = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    super("TOOL_VALIDATION", `Invalid arguments for ${tool}: ${detail}`);
    this.name = "ToolValidationError";
    this.tool = tool;
    this.issues = issues;
  }
}

/** A durable write (memory document, task ledger) could not be completed. */
export class PersistenceError extends CairnError {
  readonly target: string;

  constructor(target: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super("PERSISTENCE", `Failed to persist ${target}${reason}`, { cause });
    this.name = "PersistenceError";
    this.target = target;
  }
}

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504]);

export function isRetryable(err: unknown): boolean {
  if (err instanceof CairnError) return err.retryable;
  if (!(err instanceof Error)) return false;
  if (err.name === "AbortError") return false;
  if ("status" in err && typeof err.status === "number") {
    return RETRYABLE_STATUS.has(err.status);
  }
  // Connection-level failures from the SDK or fetch carry no status.
  return err.name === "APIConnectionError" || err.name === "APIConnectionTimeoutError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
