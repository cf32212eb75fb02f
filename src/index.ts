/**
 * @fileoverview Public entry point. Hosts import the accessor layer, the
 * request entry points and the runtime from here.
 * @module src/index
 */
import 'reflect-metadata';

export * from '@/ambient/index.js';
export { composeContainer, type HostCollaborators } from '@/container/index.js';
export * from '@/mcp-server/transports/auth/index.js';
export * from '@/mcp-server/transports/http/index.js';
export * from '@/runtime.js';
export * from '@/services/scheduling/index.js';
export * from '@/services/upstream/core/IUpstreamClient.js';
export * from '@/services/upstream/providers/httpUpstreamClient.js';
export type * from '@/storage/core/ICredentialStore.js';
export type * from '@/storage/core/IStorageEngine.js';
export { InMemoryCredentialStore } from '@/storage/providers/inMemory/inMemoryCredentialStore.js';
export { JsonRpcErrorCode, McpError, isMcpErrorWithCode } from '@/types-global/errors.js';
