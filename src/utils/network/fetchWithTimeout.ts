/**
 * @fileoverview `fetch` with a deadline. Failures surface as `McpError`s so
 * that upstream clients do not have to classify network errors themselves.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Standard `RequestInit` without `signal`, which is owned by the timeout.
 */
export type FetchWithTimeoutOptions = Omit<RequestInit, 'signal'>;

/**
 * Maps an upstream HTTP status to the code surfaced to callers. 401 from the
 * upstream API means the user's grant is no longer accepted.
 */
function codeForStatus(status: number): JsonRpcErrorCode {
  if (status === 401) return JsonRpcErrorCode.Unauthorized;
  if (status === 403) return JsonRpcErrorCode.Forbidden;
  if (status === 404) return JsonRpcErrorCode.NotFound;
  if (status === 429) return JsonRpcErrorCode.RateLimited;
  return JsonRpcErrorCode.ServiceUnavailable;
}

/**
 * Fetches `url`, aborting after `timeoutMs`.
 * @throws {McpError} `Timeout` when the deadline passes, a status-derived code
 *   for non-2xx responses, `ServiceUnavailable` for other network failures.
 */
export async function fetchWithTimeout(
  url: string | URL,
  timeoutMs: number,
  context: RequestContext,
  options?: FetchWithTimeoutOptions,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const urlString = url.toString();
  const operationDescription = `fetch ${options?.method ?? 'GET'} ${urlString}`;

  logger.debug(
    `Attempting ${operationDescription} with ${timeoutMs}ms timeout.`,
    context,
  );

  let response: Response;
  try {
    response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logger.error(`${operationDescription} timed out after ${timeoutMs}ms.`, {
        ...context,
        errorSource: 'FetchTimeout',
      });
      throw new McpError(
        JsonRpcErrorCode.Timeout,
        `${operationDescription} timed out.`,
        { url: urlString, timeoutMs },
        { cause: error },
      );
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(
      `Network error during ${operationDescription}: ${errorMessage}`,
      {
        ...context,
        originalErrorName: error instanceof Error ? error.name : 'UnknownError',
        errorSource: 'FetchNetworkError',
      },
    );
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Network error during ${operationDescription}: ${errorMessage}`,
      { url: urlString },
      { cause: error },
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    const errorBody = await response
      .text()
      .catch(() => 'Could not read response body');
    logger.error(
      `Fetch failed for ${urlString} with status ${response.status}.`,
      {
        ...context,
        statusCode: response.status,
        statusText: response.statusText,
        errorSource: 'FetchHttpError',
      },
    );
    throw new McpError(
      codeForStatus(response.status),
      `Fetch failed for ${urlString}. Status: ${response.status}`,
      {
        url: urlString,
        statusCode: response.status,
        statusText: response.statusText,
        responseBody: errorBody,
      },
    );
  }

  logger.debug(
    `Successfully fetched ${urlString}. Status: ${response.status}`,
    context,
  );
  return response;
}
