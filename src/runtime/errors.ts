/**
 * Runtime errors raised by generated codecs and RPC bindings
 */

/**
 * Malformed input bytes. Decoding never returns a partial message: the first
 * problem aborts the whole decode with this error.
 */
export class DecodeError extends Error {
  constructor(message: string, readonly offset?: number) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = 'DecodeError';
  }
}

/**
 * Status codes carried by RpcError, numbered like gRPC's
 */
export enum StatusCode {
  OK = 0,
  CANCELLED = 1,
  UNKNOWN = 2,
  INVALID_ARGUMENT = 3,
  DEADLINE_EXCEEDED = 4,
  NOT_FOUND = 5,
  ALREADY_EXISTS = 6,
  PERMISSION_DENIED = 7,
  RESOURCE_EXHAUSTED = 8,
  FAILED_PRECONDITION = 9,
  ABORTED = 10,
  OUT_OF_RANGE = 11,
  UNIMPLEMENTED = 12,
  INTERNAL = 13,
  UNAVAILABLE = 14,
  DATA_LOSS = 15,
  UNAUTHENTICATED = 16
}

export class RpcError extends Error {
  constructor(readonly code: StatusCode, message: string) {
    super(message);
    this.name = 'RpcError';
  }
}

/**
 * The call was cancelled by either side. Streams and handlers observe
 * cancellation as this error rather than as a silent stop.
 */
export class CancelledError extends RpcError {
  constructor(message = 'Call cancelled') {
    super(StatusCode.CANCELLED, message);
    this.name = 'CancelledError';
  }
}

/**
 * Normalize anything a handler threw into an RpcError
 */
export function toRpcError(error: unknown): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  if (error instanceof DecodeError) {
    return new RpcError(StatusCode.INTERNAL, `Failed to decode message: ${error.message}`);
  }
  return new RpcError(StatusCode.UNKNOWN, error instanceof Error ? error.message : String(error));
}
