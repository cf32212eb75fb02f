/**
 * @fileoverview Centralized error handler for the Hono HTTP surface. Errors are
 * normalized through the ErrorHandler and returned as JSON-RPC error bodies
 * with a matching HTTP status.
 * @module src/mcp-server/transports/http/httpErrorHandler
 */
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

import { JsonRpcErrorCode } from '@/types-global/errors.js';
import { ErrorHandler, logger, requestContextService } from '@/utils/index.js';

/**
 * HTTP status for a JSON-RPC error code.
 */
export function httpStatusForErrorCode(
  code: JsonRpcErrorCode,
): ContentfulStatusCode {
  switch (code) {
    case JsonRpcErrorCode.Unauthorized:
      return 401;
    case JsonRpcErrorCode.Forbidden:
      return 403;
    case JsonRpcErrorCode.NotFound:
      return 404;
    case JsonRpcErrorCode.ValidationError:
    case JsonRpcErrorCode.InvalidRequest:
    case JsonRpcErrorCode.InvalidParams:
      return 400;
    case JsonRpcErrorCode.Conflict:
      return 409;
    case JsonRpcErrorCode.RateLimited:
      return 429;
    case JsonRpcErrorCode.ServiceUnavailable:
      return 503;
    case JsonRpcErrorCode.Timeout:
      return 504;
    default:
      return 500;
  }
}

/**
 * Registered with `app.onError()`.
 */
export const httpErrorHandler = async (
  err: Error,
  c: Context,
): Promise<Response> => {
  const context = requestContextService.createRequestContext({
    operation: 'httpErrorHandler',
    additionalContext: {
      path: c.req.path,
      method: c.req.method,
    },
  });

  const handledError = ErrorHandler.handleError(err, {
    operation: 'httpTransport',
    context,
  });
  const status = httpStatusForErrorCode(handledError.code);

  let requestId: string | number | null = null;
  if (!c.req.raw.bodyUsed && c.req.header('content-type')?.includes('json')) {
    try {
      const body: unknown = await c.req.json();
      if (body && typeof body === 'object' && 'id' in body) {
        const { id } = body;
        requestId =
          typeof id === 'string' || typeof id === 'number' ? id : null;
      }
    } catch (parseError) {
      logger.debug('Could not parse request body to extract JSON-RPC ID.', {
        ...context,
        parseError:
          parseError instanceof Error ? parseError.message : String(parseError),
      });
    }
  }

  logger.info(`Sending error response with HTTP status ${status}.`, {
    ...context,
    status,
    errorCode: handledError.code,
    jsonRpcId: requestId,
  });
  return c.json(
    {
      jsonrpc: '2.0',
      error: {
        code: handledError.code,
        message: handledError.message,
      },
      id: requestId,
    },
    status,
  );
};
