/**
 * @fileoverview Dependency injection tokens. Every dependency is registered by
 * value or factory against one of these symbols.
 * @module src/container/tokens
 */

// Configuration and logging
export const AppConfig = Symbol('AppConfig');
export const Logger = Symbol('Logger');

// Host collaborators
export const StorageEngine = Symbol('IStorageEngine');
export const CredentialStore = Symbol('ICredentialStore');
export const UpstreamClientFactory = Symbol('UpstreamClientFactory');
export const SchedulingWorkUnitFactory = Symbol('SchedulingWorkUnitFactory');
export const UpstreamTokenResolver = Symbol('UpstreamTokenResolver');

// Request path
export const RequestCredentialContext = Symbol('RequestCredentialContext');
export const RequestResourceCache = Symbol('RequestResourceCache');
export const RequestAccessorRegistry = Symbol('RequestAccessorRegistry');
export const HttpApp = Symbol('HttpApp');

// Background publishing
export const PublisherDaemonAssembly = Symbol('PublisherDaemonAssembly');
