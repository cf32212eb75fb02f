/**
 * @fileoverview Barrel file for request credential scoping.
 * @module src/mcp-server/transports/auth
 */
export * from './credentialMiddleware.js';
export * from './lib/upstreamTokenResolver.js';
export * from './lib/withToolCredential.js';
