/**
 * Error kinds shared across the indexer, gateway and orchestrator.
 *
 * Every error carries a stable `code` (surfaced in response envelopes and CLI
 * JSON output) and a `retryable` flag telling callers whether re-running the
 * whole request can help.
 */
export abstract class RepoCiteError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
}

export class IngestionError extends RepoCiteError {
  readonly code = "ingestion_failed";
  readonly retryable = false;

  constructor(
    public readonly rootPath: string,
    details: string,
  ) {
    super(`Cannot ingest ${rootPath}: ${details}`);
    this.name = "IngestionError";
  }
}

export const GATEWAY_FAILURE_REASONS = [
  "not_ingested",
  "bad_arguments",
  "not_found",
  "out_of_range",
  "binary_file",
  "unavailable",
  "fetch_failed",
] as const;
export type GatewayFailureReason = (typeof GATEWAY_FAILURE_REASONS)[number];

export class ToolGatewayError extends RepoCiteError {
  readonly code = "tool_gateway_failure";
  readonly retryable: boolean;

  constructor(
    public readonly reason: GatewayFailureReason,
    message: string,
  ) {
    super(message);
    this.name = "ToolGatewayError";
    this.retryable = reason === "fetch_failed";
  }
}

/** Raised by code-host adapters; the gateway turns it into a `fetch_failed` result. */
export class FetchError extends RepoCiteError {
  readonly code = "fetch_failed";
  readonly retryable = true;

  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class OracleTimeoutError extends RepoCiteError {
  readonly code = "oracle_timeout";
  readonly retryable = true;

  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
  }
}

export class OracleUnparseableError extends RepoCiteError {
  readonly code = "oracle_unparseable";
  readonly retryable = true;

  constructor(
    public readonly label: string,
    public readonly reply: string,
  ) {
    const preview = reply.length > 120 ? `${reply.slice(0, 120)}...` : reply;
    super(`${label} returned an unparseable reply: ${JSON.stringify(preview)}`);
    this.name = "OracleUnparseableError";
  }
}

export class OracleUnavailableError extends RepoCiteError {
  readonly code = "oracle_unavailable";
  readonly retryable = true;

  constructor(
    public readonly label: string,
    cause: unknown,
  ) {
    super(`${label} failed: ${errorMessage(cause)}`, { cause });
    this.name = "OracleUnavailableError";
  }
}

/** Classification ended without a usable intent; `cause` holds the oracle error. */
export class ClassificationError extends RepoCiteError {
  readonly code = "classification_failed";
  readonly retryable: boolean;

  constructor(cause: RepoCiteError) {
    super(`Could not classify the request: ${cause.message}`, { cause });
    this.name = "ClassificationError";
    this.retryable = cause.retryable;
  }
}

export class InvalidRequestError extends RepoCiteError {
  readonly code = "invalid_request";
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class ToolGatewayExhaustedError extends RepoCiteError {
  readonly code = "tool_gateway_exhausted";
  readonly retryable = true;

  constructor(public readonly failures: string[]) {
    super(`Every tool call failed: ${failures.join("; ")}`);
    this.name = "ToolGatewayExhaustedError";
  }
}

export class CitationStaleError extends RepoCiteError {
  readonly code = "citation_stale";
  readonly retryable = true;

  constructor(
    public readonly evidenceId: string,
    public readonly evidenceEpoch: number,
    public readonly currentEpoch: number,
  ) {
    super(`Evidence ${evidenceId} belongs to epoch ${evidenceEpoch}, but the repository is at epoch ${currentEpoch}`);
    this.name = "CitationStaleError";
  }
}

export class RequestCancelledError extends RepoCiteError {
  readonly code = "cancelled";
  readonly retryable = true;

  constructor(stage: string) {
    super(`Request cancelled during ${stage}`);
    this.name = "RequestCancelledError";
  }
}

export class SessionClosedError extends RepoCiteError {
  readonly code = "session_closed";
  readonly retryable = false;

  constructor(sessionId: string) {
    super(`Session ${sessionId} has been destroyed`);
    this.name = "SessionClosedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
