/**
 * @fileoverview Defines standardized error codes and the custom error class used
 * across the accessor layer, the request entry points and the publisher daemon.
 * Every failure the layer raises is an `McpError` so callers can branch on
 * `code` instead of parsing messages.
 * @module src/types-global/errors
 */

/**
 * JSON-RPC 2.0 error codes, including standard and implementation-defined codes.
 * @see https://www.jsonrpc.org/specification#error_object
 */
export enum JsonRpcErrorCode {
  // Standard JSON-RPC 2.0 Errors
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  // Implementation-defined server-errors (-32000 to -32099)
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Conflict = -32002,
  RateLimited = -32003,
  Timeout = -32004,
  Forbidden = -32005,
  /** An ambient client accessor was reached with no credential in scope. */
  Unauthorized = -32006,
  ValidationError = -32007,
  ConfigurationError = -32008,
  InitializationFailed = -32009,
  DatabaseError = -32010,
  /** A worker-affine storage handle could not be opened. */
  ResourceOpenFailure = -32011,
  /** The publisher daemon found no stored credential for a tick. */
  NoCredentialAvailable = -32012,
  /** The scheduling work unit raised during a daemon tick. */
  WorkUnitFailure = -32013,
  UnknownError = -32099, // A generic fallback
}

/**
 * Custom error class carrying a {@link JsonRpcErrorCode}, a human-readable
 * message and optional structured data.
 */
export class McpError extends Error {
  public code: JsonRpcErrorCode;

  /**
   * Optional additional data about the error, conforming to the JSON-RPC 2.0 specification.
   */
  public readonly data?: Record<string, unknown>;

  constructor(
    code: JsonRpcErrorCode,
    message?: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);

    this.code = code;
    if (data) {
      this.data = data;
    }
    this.name = 'McpError';

    // Maintain a proper prototype chain.
    Object.setPrototypeOf(this, McpError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, McpError);
    }
  }
}

/**
 * Narrows `error` to an `McpError` carrying the given code.
 */
export function isMcpErrorWithCode(
  error: unknown,
  code: JsonRpcErrorCode,
): error is McpError {
  return error instanceof McpError && error.code === code;
}
