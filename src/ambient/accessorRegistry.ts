/**
 * @fileoverview Ambient accessor registry: the two process-wide slots through
 * which scheduling and publishing code obtains "the current upstream client"
 * and "the current storage handle".
 *
 * Each slot is installed exactly once at startup. Until then the defaults
 * fail loudly: `currentClient()` throws `Unauthorized` and `currentStorage()`
 * throws `ConfigurationError`. After installation the registry is read-only.
 *
 * The request path uses the process-wide {@link ambientAccessors}. The
 * publisher daemon builds its own registry so that its credential context
 * and storage cache never mix with request state.
 * @module src/ambient/accessorRegistry
 */
import type {
  IUpstreamClient,
  UpstreamClientFactory,
} from '@/services/upstream/core/IUpstreamClient.js';
import type {
  IStorageEngine,
  StorageHandle,
} from '@/storage/core/IStorageEngine.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, requestContextService } from '@/utils/index.js';

import type { Credential } from './credential.js';
import type { CredentialContext } from './credentialContext.js';
import type { ThreadAffineResourceCache } from './threadAffineResourceCache.js';

export type ClientAccessor<TClient> = () => TClient;
export type StorageAccessor<THandle> = (path?: string) => THandle;

/**
 * Read side of a registry, handed to work units.
 */
export interface AmbientAccessors<TClient, THandle> {
  currentClient(): TClient;
  currentStorage(path?: string): THandle;
}

type AccessorSlot = 'client' | 'storage';

export class AmbientAccessorRegistry<TClient, THandle>
  implements AmbientAccessors<TClient, THandle>
{
  private clientAccessor: ClientAccessor<TClient> | undefined;
  private storageAccessor: StorageAccessor<THandle> | undefined;

  constructor(public readonly name: string) {}

  private assertNotInstalled(slot: AccessorSlot): void {
    const installed =
      slot === 'client'
        ? this.clientAccessor !== undefined
        : this.storageAccessor !== undefined;
    if (installed) {
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        `The ${slot} accessor of registry '${this.name}' is already installed.`,
        { registry: this.name, slot },
      );
    }
  }

  private logInstalled(slot: AccessorSlot): void {
    logger.debug(
      `Installed ${slot} accessor on registry '${this.name}'.`,
      requestContextService.createRequestContext({
        operation: 'AmbientAccessorRegistry.install',
        registry: this.name,
        slot,
      }),
    );
  }

  /**
   * Installs the client accessor. Allowed once.
   * @throws {McpError} `ConfigurationError` on a second installation.
   */
  public installClientAccessor(accessor: ClientAccessor<TClient>): void {
    this.assertNotInstalled('client');
    this.clientAccessor = accessor;
    this.logInstalled('client');
  }

  /**
   * Installs the storage accessor. Allowed once.
   * @throws {McpError} `ConfigurationError` on a second installation.
   */
  public installStorageAccessor(accessor: StorageAccessor<THandle>): void {
    this.assertNotInstalled('storage');
    this.storageAccessor = accessor;
    this.logInstalled('storage');
  }

  public isInstalled(slot: AccessorSlot): boolean {
    return slot === 'client'
      ? this.clientAccessor !== undefined
      : this.storageAccessor !== undefined;
  }

  /**
   * The upstream client for the calling context.
   * @throws {McpError} `Unauthorized` when no client accessor is installed or
   *   the installed one finds no credential.
   */
  public currentClient(): TClient {
    if (!this.clientAccessor) {
      throw new McpError(
        JsonRpcErrorCode.Unauthorized,
        'No authenticated upstream client is available in this context.',
        { registry: this.name },
      );
    }
    return this.clientAccessor();
  }

  /**
   * The storage handle for the calling worker.
   * @throws {McpError} `ConfigurationError` when no storage accessor is installed.
   */
  public currentStorage(path?: string): THandle {
    if (!this.storageAccessor) {
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        `No storage accessor is installed on registry '${this.name}'.`,
        { registry: this.name },
      );
    }
    return this.storageAccessor(path);
  }
}

/**
 * Client accessor backed by a credential context. The client built for a
 * Credential instance is reused for as long as that instance is alive, so
 * repeated calls within one request share one client.
 */
export function createContextClientAccessor<TClient extends IUpstreamClient>(
  context: CredentialContext,
  factory: UpstreamClientFactory<TClient>,
): ClientAccessor<TClient> {
  const clients = new WeakMap<Credential, TClient>();
  return () => {
    const credential = context.get();
    if (!credential) {
      throw new McpError(
        JsonRpcErrorCode.Unauthorized,
        'No upstream credential is installed for the current request.',
        { credentialContext: context.name },
      );
    }
    let client = clients.get(credential);
    if (!client) {
      client = factory(credential);
      clients.set(credential, client);
    }
    return client;
  };
}

/**
 * Storage accessor backed by a worker-affine cache. Without an explicit path
 * the engine's default path is used.
 */
export function createCachedStorageAccessor<THandle extends StorageHandle>(
  cache: ThreadAffineResourceCache<THandle>,
  engine: Pick<IStorageEngine<THandle>, 'resolveStoragePath'>,
): StorageAccessor<THandle> {
  return (path?: string) => cache.get(path ?? engine.resolveStoragePath());
}

/**
 * The request-path registry.
 */
export const ambientAccessors = new AmbientAccessorRegistry<
  IUpstreamClient,
  StorageHandle
>('request');

export const installClientAccessor = (
  accessor: ClientAccessor<IUpstreamClient>,
): void => ambientAccessors.installClientAccessor(accessor);

export const installStorageAccessor = (
  accessor: StorageAccessor<StorageHandle>,
): void => ambientAccessors.installStorageAccessor(accessor);

export const currentClient = (): IUpstreamClient =>
  ambientAccessors.currentClient();

export const currentStorage = (path?: string): StorageHandle =>
  ambientAccessors.currentStorage(path);
