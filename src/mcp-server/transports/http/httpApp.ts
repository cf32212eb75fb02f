/**
 * @fileoverview Builds the Hono application that fronts credential-scoped
 * routes. Everything under `/api` runs with the caller's upstream credential
 * installed; `/healthz` stays public. Serving the app is left to the host.
 * @module src/mcp-server/transports/http/httpApp
 */
import { Hono } from 'hono';

import type { AmbientAccessors } from '@/ambient/accessorRegistry.js';
import { createCredentialMiddleware } from '@/mcp-server/transports/auth/credentialMiddleware.js';
import type { UpstreamTokenResolver } from '@/mcp-server/transports/auth/lib/upstreamTokenResolver.js';
import type { IUpstreamClient } from '@/services/upstream/core/IUpstreamClient.js';
import type { StorageHandle } from '@/storage/core/IStorageEngine.js';
import { requestContextService } from '@/utils/index.js';

import { httpErrorHandler } from './httpErrorHandler.js';

export interface HttpAppOptions {
  resolveUpstreamToken: UpstreamTokenResolver;
  /** Registry the request-path accessors were installed on. */
  accessors: AmbientAccessors<IUpstreamClient, StorageHandle>;
}

export function createHttpApp(options: HttpAppOptions): Hono {
  const app = new Hono();

  app.onError(httpErrorHandler);

  app.get('/healthz', (c) => c.json({ status: 'ok' }));

  app.use('/api/*', createCredentialMiddleware(options.resolveUpstreamToken));

  app.get('/api/me', async (c) => {
    const profile = await options.accessors.currentClient().getProfile(
      requestContextService.createRequestContext({ operation: 'GET /api/me' }),
    );
    return c.json(profile);
  });

  return app;
}
