/**
 * @fileoverview Classification rules the ErrorHandler applies to errors that
 * are not already `McpError` instances.
 * @module src/utils/internal/error-handler/mappings
 */
import { JsonRpcErrorCode } from '@/types-global/errors.js';

import type { BaseErrorMapping } from './types.js';

/**
 * Standard error constructor names and their codes.
 */
export const ERROR_TYPE_MAPPINGS: Readonly<Record<string, JsonRpcErrorCode>> = {
  SyntaxError: JsonRpcErrorCode.ValidationError,
  TypeError: JsonRpcErrorCode.ValidationError,
  RangeError: JsonRpcErrorCode.ValidationError,
  ReferenceError: JsonRpcErrorCode.InternalError,
  AggregateError: JsonRpcErrorCode.InternalError,
};

/**
 * Message/name patterns, most specific first.
 */
export const COMMON_ERROR_PATTERNS: ReadonlyArray<Readonly<BaseErrorMapping>> =
  [
    {
      pattern:
        /unauthorized|unauthenticated|invalid.*token|expired.*token|revoked/i,
      errorCode: JsonRpcErrorCode.Unauthorized,
    },
    {
      pattern: /permission|forbidden|access.*denied/i,
      errorCode: JsonRpcErrorCode.Forbidden,
    },
    {
      pattern: /sqlite_busy|database is locked|readonly database/i,
      errorCode: JsonRpcErrorCode.DatabaseError,
    },
    {
      pattern: /not found|no such|doesn't exist/i,
      errorCode: JsonRpcErrorCode.NotFound,
    },
    {
      pattern: /rate limit|too many requests|throttled/i,
      errorCode: JsonRpcErrorCode.RateLimited,
    },
    {
      pattern: /timeout|timed out|abort(ed)?/i,
      errorCode: JsonRpcErrorCode.Timeout,
    },
    {
      pattern: /service unavailable|bad gateway|upstream error|econnrefused/i,
      errorCode: JsonRpcErrorCode.ServiceUnavailable,
    },
  ];
