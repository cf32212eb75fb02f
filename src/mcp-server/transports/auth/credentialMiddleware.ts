/**
 * @fileoverview Hono middleware that scopes the caller's upstream credential to
 * the rest of the request. It extracts the Bearer token, asks the session
 * collaborator for the matching upstream grant and runs the downstream chain
 * inside `withCredential`, so `currentClient()` resolves to that user.
 * @module src/mcp-server/transports/auth/credentialMiddleware
 */
import type { MiddlewareHandler } from 'hono';

import { withCredential } from '@/ambient/credentialContext.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { ErrorHandler, logger, requestContextService } from '@/utils/index.js';

import type { UpstreamTokenResolver } from './lib/upstreamTokenResolver.js';

const BEARER_PREFIX = 'Bearer ';

export function createCredentialMiddleware(
  resolveUpstreamToken: UpstreamTokenResolver,
): MiddlewareHandler {
  return async function credentialMiddleware(c, next) {
    const context = requestContextService.createRequestContext({
      operation: 'credentialMiddleware',
      method: c.req.method,
      path: c.req.path,
    });

    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      logger.warning('Authorization header missing or invalid.', context);
      throw new McpError(
        JsonRpcErrorCode.Unauthorized,
        'Missing or invalid Authorization header. Bearer scheme required.',
      );
    }

    const token = authHeader.slice(BEARER_PREFIX.length).trim();
    if (!token) {
      logger.warning(
        'Bearer token is missing from Authorization header.',
        context,
      );
      throw new McpError(
        JsonRpcErrorCode.Unauthorized,
        'Authentication token is missing.',
      );
    }

    const grant = await ErrorHandler.tryCatch(
      () => resolveUpstreamToken(token),
      { operation: 'credentialMiddleware.resolveUpstreamToken', context },
    );
    if (!grant) {
      logger.warning('No upstream grant found for this session.', context);
      throw new McpError(
        JsonRpcErrorCode.Unauthorized,
        'No upstream authorization is on file for this session.',
      );
    }

    logger.debug('Upstream credential installed for request.', {
      ...context,
      ...(grant.subjectId !== undefined ? { subjectId: grant.subjectId } : {}),
    });
    await withCredential(grant.accessToken, grant.subjectId, next);
  };
}
