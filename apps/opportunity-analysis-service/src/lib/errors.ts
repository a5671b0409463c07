export const ERROR_CODES = {
  INVALID_RECORD: "INVALID_RECORD",
  TIMEOUT: "TIMEOUT",
  AUTH_FAILURE: "AUTH_FAILURE",
  TRANSIENT_ERROR: "TRANSIENT_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  REQUEST_REJECTED: "REQUEST_REJECTED",
  PARSE_ERROR: "PARSE_ERROR",
  BATCH_CANCELLED: "BATCH_CANCELLED",
  BATCH_TIMEOUT: "BATCH_TIMEOUT",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base for every error the analysis pipeline raises on purpose
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, retryable = false) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.retryable = retryable;
  }
}

export type InvalidRecordField = "id" | "opportunityName" | "description" | "onHoldReason";

/**
 * A record is missing a required field and cannot be turned into a prompt
 */
export class InvalidRecordError extends AppError {
  readonly field: InvalidRecordField;
  readonly recordId: string | null;

  constructor(field: InvalidRecordField, recordId: string | null) {
    super(ERROR_CODES.INVALID_RECORD, `Record ${recordId ?? "<no id>"} is missing required field: ${field}`);
    this.name = "InvalidRecordError";
    this.field = field;
    this.recordId = recordId;
  }
}

export type GatewayErrorKind = "Timeout" | "AuthFailure" | "TransientError" | "RateLimited" | "Rejected";

const GATEWAY_CODES: Record<GatewayErrorKind, ErrorCode> = {
  Timeout: ERROR_CODES.TIMEOUT,
  AuthFailure: ERROR_CODES.AUTH_FAILURE,
  TransientError: ERROR_CODES.TRANSIENT_ERROR,
  RateLimited: ERROR_CODES.RATE_LIMITED,
  Rejected: ERROR_CODES.REQUEST_REJECTED,
};

const RETRYABLE_KINDS: ReadonlySet<GatewayErrorKind> = new Set(["Timeout", "TransientError", "RateLimited"]);

/**
 * Transport-level failure talking to the model service
 */
export class GatewayError extends AppError {
  readonly kind: GatewayErrorKind;
  readonly status: number | null;
  /** Server-suggested wait before retrying (RateLimited only) */
  readonly retryAfterMs: number | null;

  constructor(
    kind: GatewayErrorKind,
    message: string,
    options: { status?: number | null; retryAfterMs?: number | null; cause?: unknown } = {}
  ) {
    super(GATEWAY_CODES[kind], message, RETRYABLE_KINDS.has(kind));
    this.name = "GatewayError";
    this.kind = kind;
    this.status = options.status ?? null;
    this.retryAfterMs = options.retryAfterMs ?? null;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  get isFatal(): boolean {
    return this.kind === "AuthFailure";
  }
}

export type ParseErrorField = "content" | "payload" | "type" | "confidence" | "reasoning";

/**
 * Model output could not be normalized into a classification
 */
export class ParseError extends AppError {
  readonly field: ParseErrorField;
  readonly raw: string;

  constructor(field: ParseErrorField, raw: string, detail?: string) {
    super(ERROR_CODES.PARSE_ERROR, `Unparseable model output (${field})${detail ? `: ${detail}` : ""}`);
    this.name = "ParseError";
    this.field = field;
    this.raw = raw;
  }
}

export class BatchCancelledError extends AppError {
  constructor(message = "Batch analysis was cancelled") {
    super(ERROR_CODES.BATCH_CANCELLED, message);
    this.name = "BatchCancelledError";
  }
}

export class BatchTimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(ERROR_CODES.BATCH_TIMEOUT, `Batch analysis timed out after ${timeoutMs}ms`);
    this.name = "BatchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
