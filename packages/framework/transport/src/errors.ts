// Transport errors

export type TransportErrorCode =
  | "ORIGIN_VALIDATION_FAILED"
  | "MISSING_PEER_ID"
  | "PEER_UNRESOLVABLE"
  | "SESSION_CONFLICT"
  | "RECEIVER_MISMATCH"
  | "ENVELOPE_DECODE_ERROR"
  | "UNKNOWN_SESSION"
  | "MESSAGE_PARSE_ERROR"
  | "ENDPOINT_ORIGIN_MISMATCH"
  | "UNSUPPORTED_SCHEME"
  | "SUBPROTOCOL_MISMATCH"
  | "HTTP_ERROR"
  | "STREAM_CLOSED"
  | "READ_TIMEOUT";

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: TransportErrorCode,
    /** HTTP status answered, for request-level failures */
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

/** Raised by `send` or `receive` on a closed channel */
export class ClosedResourceError extends Error {
  constructor(message = "Channel is closed") {
    super(message);
    this.name = "ClosedResourceError";
  }
}
