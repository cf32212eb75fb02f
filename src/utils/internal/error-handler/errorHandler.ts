/**
 * @fileoverview ErrorHandler: classifies thrown values into `McpError`s, records
 * them on the active OpenTelemetry span and logs them with sanitized context.
 * @module src/utils/internal/error-handler/errorHandler
 */
import { SpanStatusCode, trace } from '@opentelemetry/api';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';
import { generateUUID } from '@/utils/security/idGenerator.js';
import { sanitizeInputForLogging } from '@/utils/security/sanitization.js';

import { createSafeRegex, getErrorMessage, getErrorName } from './helpers.js';
import { COMMON_ERROR_PATTERNS, ERROR_TYPE_MAPPINGS } from './mappings.js';
import type { ErrorHandlerOptions } from './types.js';

export class ErrorHandler {
  /**
   * Determines the `JsonRpcErrorCode` for an error: its own code for
   * `McpError`, then constructor-name mappings, then message patterns.
   * Defaults to `InternalError`.
   */
  public static determineErrorCode(error: unknown): JsonRpcErrorCode {
    if (error instanceof McpError) {
      return error.code;
    }

    const errorName = getErrorName(error);
    const errorMessage = getErrorMessage(error);

    const mappedFromType = ERROR_TYPE_MAPPINGS[errorName];
    if (mappedFromType !== undefined) {
      return mappedFromType;
    }

    for (const mapping of COMMON_ERROR_PATTERNS) {
      const regex = createSafeRegex(mapping.pattern);
      if (regex.test(errorMessage) || regex.test(errorName)) {
        return mapping.errorCode;
      }
    }
    return JsonRpcErrorCode.InternalError;
  }

  /**
   * Normalizes `error` into an `McpError`, logs it and either returns or
   * rethrows it. An incoming `McpError` keeps its code and message; anything
   * else is wrapped with `errorCode` (or the classified code) and kept as
   * `cause`.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): McpError {
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      if (error instanceof Error) {
        activeSpan.recordException(error);
      }
      activeSpan.setStatus({
        code: SpanStatusCode.ERROR,
        message: getErrorMessage(error),
      });
    }

    const {
      context = {},
      operation,
      input,
      rethrow = false,
      errorCode: explicitErrorCode,
      includeStack = true,
      critical = false,
    } = options;

    const originalErrorName = getErrorName(error);
    const originalErrorMessage = getErrorMessage(error);
    const cause = error instanceof Error ? error : undefined;

    const consolidatedData: Record<string, unknown> = {
      ...(error instanceof McpError ? error.data : undefined),
      ...context,
      originalErrorName,
      originalMessage: originalErrorMessage,
    };

    let finalError: McpError;
    if (error instanceof McpError) {
      finalError = new McpError(error.code, error.message, consolidatedData, {
        cause: error.cause ?? cause,
      });
    } else {
      const code = explicitErrorCode ?? ErrorHandler.determineErrorCode(error);
      finalError = new McpError(
        code,
        `Error in ${operation}: ${originalErrorMessage}`,
        consolidatedData,
        { cause },
      );
    }
    if (cause?.stack) {
      finalError.stack = cause.stack;
    }

    const logContext: RequestContext = {
      ...context,
      requestId:
        typeof context.requestId === 'string' && context.requestId
          ? context.requestId
          : generateUUID(),
      timestamp:
        typeof context.timestamp === 'string' && context.timestamp
          ? context.timestamp
          : new Date().toISOString(),
      operation,
      input: input !== undefined ? sanitizeInputForLogging(input) : undefined,
      critical,
      errorCode: finalError.code,
      originalErrorType: originalErrorName,
      errorData: sanitizeInputForLogging(finalError.data),
      ...(includeStack && finalError.stack ? { stack: finalError.stack } : {}),
    };

    const message = `Error in ${operation}: ${originalErrorMessage}`;
    if (critical) {
      logger.crit(message, logContext);
    } else {
      logger.error(message, logContext);
    }

    if (rethrow) {
      throw finalError;
    }
    return finalError;
  }

  /**
   * Formats an error into a JSON-RPC style `{ code, message, data }` object.
   */
  public static formatError(error: unknown): Record<string, unknown> {
    if (error instanceof McpError) {
      return {
        code: error.code,
        message: error.message,
        data: error.data ?? {},
      };
    }

    return {
      code: ErrorHandler.determineErrorCode(error),
      message: getErrorMessage(error),
      data: { errorType: getErrorName(error) },
    };
  }

  /**
   * Runs `fn` and rethrows any failure through {@link ErrorHandler.handleError}.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, 'rethrow'>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (caughtError) {
      throw ErrorHandler.handleError(caughtError, {
        ...options,
        rethrow: true,
      });
    }
  }
}
