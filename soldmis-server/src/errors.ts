// ── Report error taxonomy ──────────────────────────────────────────────────

export type ReportErrorCode =
  | "MissingParameter"
  | "InvalidParameter"
  | "SchemaMismatch"
  | "NotFound"
  | "Unauthorized"
  | "SchemaUnavailable"
  | "UpstreamQueryFailure";

/** An error that maps directly onto an HTTP status and a JSON `{ error, code }` body. */
export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly status: number;

  constructor(code: ReportErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
    this.status = status;
  }
}

export class MissingParameterError extends ReportError {
  constructor(message: string) {
    super("MissingParameter", 400, message);
  }
}

export class InvalidParameterError extends ReportError {
  constructor(message: string) {
    super("InvalidParameter", 400, message);
  }
}

/** A required column (configured or inferred) is absent from the live schema. */
export class SchemaMismatchError extends ReportError {
  constructor(message: string) {
    super("SchemaMismatch", 500, message);
  }
}

export class NotFoundError extends ReportError {
  constructor(message: string) {
    super("NotFound", 404, message);
  }
}

export class UnauthorizedError extends ReportError {
  constructor() {
    super("Unauthorized", 401, "Unauthorized");
  }
}

/** Catalog introspection failed or the table does not exist. */
export class SchemaUnavailableError extends ReportError {
  constructor(message: string, cause?: unknown) {
    super("SchemaUnavailable", 503, message, { cause });
  }
}

/** The warehouse rejected or failed a query. `status` is 503 while the circuit is open. */
export class UpstreamQueryError extends ReportError {
  constructor(message: string, cause?: unknown, status = 502) {
    super("UpstreamQueryFailure", status, message, { cause });
  }
}

export interface ErrorBody {
  error: string;
  code: ReportErrorCode | "InternalError";
}

/** Shape any thrown value into the JSON body and status the HTTP boundary returns. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ReportError) {
    return { status: err.status, body: { error: err.message, code: err.code } };
  }
  return { status: 500, body: { error: "Internal server error", code: "InternalError" } };
}
