/**
 * @fileoverview Session collaborator contract: maps the bearer token presented
 * on an inbound request to the upstream grant the OAuth proxy stored for it.
 * @module src/mcp-server/transports/auth/lib/upstreamTokenResolver
 */
import type { StoredCredential } from '@/storage/core/ICredentialStore.js';

/**
 * Returns the upstream grant behind `bearerToken`, or `undefined` when the
 * session is unknown or was never authorized upstream.
 */
export type UpstreamTokenResolver = (
  bearerToken: string,
) => Promise<StoredCredential | undefined> | StoredCredential | undefined;
