/**
 * Error taxonomy shared by both ends of the pipe.
 *
 * Every failure carries a stable `code` (used on the wire) and a `category`
 * that tells the writer/reader how to react:
 * - protocol: reconciled locally (resync), surfaced only when retries exhaust
 * - integrity: corruption or tampering, terminal for the session
 * - capacity: transient, back off and retry
 * - lifecycle: session gone or in the wrong state, terminal for the transfer
 * - access: missing or invalid credentials
 * - transport: channel failure, retried per policy then surfaced as TransferFailed
 */

export type ErrorCategory =
  | "protocol"
  | "integrity"
  | "capacity"
  | "lifecycle"
  | "access"
  | "transport";

export type ErrorCode =
  | "bad_request"
  | "sequence_mismatch"
  | "sequence_conflict"
  | "ack_out_of_range"
  | "chunk_out_of_range"
  | "auth_failed"
  | "codec_error"
  | "store_full"
  | "payload_too_large"
  | "session_not_found"
  | "session_sealed"
  | "session_not_drained"
  | "chunk_evicted"
  | "access_denied"
  | "transport_error"
  | "transfer_failed"
  | "internal";

/**
 * HTTP status for each error code
 */
export const ERROR_STATUS = {
  bad_request: 400,
  sequence_mismatch: 409,
  sequence_conflict: 422,
  ack_out_of_range: 409,
  chunk_out_of_range: 416,
  auth_failed: 400,
  codec_error: 400,
  store_full: 503,
  payload_too_large: 413,
  session_not_found: 404,
  session_sealed: 409,
  session_not_drained: 409,
  chunk_evicted: 410,
  access_denied: 401,
  transport_error: 502,
  transfer_failed: 502,
  internal: 500,
} as const satisfies Record<ErrorCode, number>;

export abstract class PipeError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields sent alongside `code` and `message` in an error body. */
  details(): Record<string, unknown> {
    return {};
  }
}

// Protocol

export class BadRequestError extends PipeError {
  readonly code = "bad_request";
  readonly category = "protocol";
}

export class SequenceMismatchError extends PipeError {
  readonly code = "sequence_mismatch";
  readonly category = "protocol";

  constructor(
    readonly expected: number,
    readonly received: number
  ) {
    super(`Sequence mismatch: expected ${expected}, received ${received}`);
  }

  override details() {
    return { expected: this.expected, received: this.received };
  }
}

export class SequenceConflictError extends PipeError {
  readonly code = "sequence_conflict";
  readonly category = "protocol";

  constructor(readonly seq: number) {
    super(`Chunk ${seq} already stored with different content`);
  }

  override details() {
    return { seq: this.seq };
  }
}

export class AckOutOfRangeError extends PipeError {
  readonly code = "ack_out_of_range";
  readonly category = "protocol";

  constructor(
    readonly seq: number,
    readonly nextWriteSeq: number
  ) {
    super(`Cannot ack chunk ${seq}: only ${nextWriteSeq} chunks written`);
  }

  override details() {
    return { seq: this.seq, nextWriteSeq: this.nextWriteSeq };
  }
}

export class ChunkOutOfRangeError extends PipeError {
  readonly code = "chunk_out_of_range";
  readonly category = "protocol";

  constructor(
    readonly seq: number,
    readonly lastSeq: number
  ) {
    super(`Chunk ${seq} is past the end of a sealed stream (last ${lastSeq})`);
  }

  override details() {
    return { seq: this.seq, lastSeq: this.lastSeq };
  }
}

// Integrity

export class AuthError extends PipeError {
  readonly code = "auth_failed";
  readonly category = "integrity";
}

export class CodecError extends PipeError {
  readonly code = "codec_error";
  readonly category = "integrity";
}

// Capacity

export class StoreFullError extends PipeError {
  readonly code = "store_full";
  readonly category = "capacity";
}

export class PayloadTooLargeError extends PipeError {
  readonly code = "payload_too_large";
  readonly category = "capacity";
}

// Lifecycle

export class SessionNotFoundError extends PipeError {
  readonly code = "session_not_found";
  readonly category = "lifecycle";

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found or expired`);
  }

  override details() {
    return { sessionId: this.sessionId };
  }
}

export class SessionSealedError extends PipeError {
  readonly code = "session_sealed";
  readonly category = "lifecycle";
}

export class SessionNotDrainedError extends PipeError {
  readonly code = "session_not_drained";
  readonly category = "lifecycle";
}

export class ChunkEvictedError extends PipeError {
  readonly code = "chunk_evicted";
  readonly category = "lifecycle";

  constructor(readonly seq: number) {
    super(`Chunk ${seq} was acked and evicted`);
  }

  override details() {
    return { seq: this.seq };
  }
}

// Access

export class AccessDeniedError extends PipeError {
  readonly code = "access_denied";
  readonly category = "access";
}

// Transport

export class TransportError extends PipeError {
  readonly code = "transport_error";
  readonly category = "transport";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class TransferFailedError extends PipeError {
  readonly code = "transfer_failed";
  readonly category = "transport";

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class InternalError extends PipeError {
  readonly code = "internal";
  readonly category = "transport";
}

/**
 * Rebuild a typed error from an error body received over the wire.
 */
export function errorFromWire(
  code: string,
  message: string,
  details: Record<string, unknown> = {}
): PipeError {
  const num = (key: string): number => {
    const value = details[key];
    return typeof value === "number" ? value : -1;
  };

  switch (code) {
    case "bad_request":
      return new BadRequestError(message);
    case "sequence_mismatch":
      return new SequenceMismatchError(num("expected"), num("received"));
    case "sequence_conflict":
      return new SequenceConflictError(num("seq"));
    case "ack_out_of_range":
      return new AckOutOfRangeError(num("seq"), num("nextWriteSeq"));
    case "chunk_out_of_range":
      return new ChunkOutOfRangeError(num("seq"), num("lastSeq"));
    case "auth_failed":
      return new AuthError(message);
    case "codec_error":
      return new CodecError(message);
    case "store_full":
      return new StoreFullError(message);
    case "payload_too_large":
      return new PayloadTooLargeError(message);
    case "session_not_found":
      return new SessionNotFoundError(
        typeof details.sessionId === "string" ? details.sessionId : "unknown"
      );
    case "session_sealed":
      return new SessionSealedError(message);
    case "session_not_drained":
      return new SessionNotDrainedError(message);
    case "chunk_evicted":
      return new ChunkEvictedError(num("seq"));
    case "access_denied":
      return new AccessDeniedError(message);
    case "transfer_failed":
      return new TransferFailedError(message, 0);
    case "internal":
      return new InternalError(message);
    default:
      return new TransportError(`${code}: ${message}`);
  }
}

export function isPipeError(err: unknown): err is PipeError {
  return err instanceof PipeError;
}
