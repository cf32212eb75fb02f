/**
 * @fileoverview Option and mapping types for the ErrorHandler.
 * @module src/utils/internal/error-handler/types
 */
import type { JsonRpcErrorCode } from '@/types-global/errors.js';

/**
 * Context fields attached to a handled error. Usually a `RequestContext`.
 */
export type ErrorContext = Record<string, unknown>;

export interface ErrorHandlerOptions {
  /** Context merged into the logged record and into the resulting error's data. */
  context?: ErrorContext;
  /** Name of the operation that failed. */
  operation: string;
  /** Input that led to the failure; sanitized before logging. */
  input?: unknown;
  /** Throw the handled error instead of returning it. */
  rethrow?: boolean;
  /** Code used when the error is not already an `McpError`. */
  errorCode?: JsonRpcErrorCode;
  includeStack?: boolean;
  /** Log at `crit` instead of `error`. */
  critical?: boolean;
}

/**
 * A message/name pattern and the code it classifies to.
 */
export interface BaseErrorMapping {
  pattern: string | RegExp;
  errorCode: JsonRpcErrorCode;
}
