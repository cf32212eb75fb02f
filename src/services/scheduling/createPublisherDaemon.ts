/**
 * @fileoverview Wires a {@link PublisherDaemon} to its own credential context,
 * worker-affine handle cache and accessor registry, so that nothing the daemon
 * resolves can be observed by request code and vice versa.
 * @module src/services/scheduling/createPublisherDaemon
 */
import {
  AmbientAccessorRegistry,
  createCachedStorageAccessor,
  createContextClientAccessor,
} from '@/ambient/accessorRegistry.js';
import { CredentialContext } from '@/ambient/credentialContext.js';
import { ThreadAffineResourceCache } from '@/ambient/threadAffineResourceCache.js';
import type {
  IUpstreamClient,
  UpstreamClientFactory,
} from '@/services/upstream/core/IUpstreamClient.js';
import type { ICredentialStore } from '@/storage/core/ICredentialStore.js';
import type {
  IStorageEngine,
  StorageHandle,
} from '@/storage/core/IStorageEngine.js';

import type { SchedulingWorkUnitFactory } from './core/ISchedulingWorkUnit.js';
import { PublisherDaemon } from './publisherDaemon.js';

export interface PublisherDaemonDependencies<
  TClient extends IUpstreamClient,
  THandle extends StorageHandle,
> {
  pollIntervalSeconds: number;
  workerId: string;
  upstreamTokenKey: string;
  credentialStore: ICredentialStore;
  storageEngine: IStorageEngine<THandle>;
  clientFactory: UpstreamClientFactory<TClient>;
  workUnitFactory: SchedulingWorkUnitFactory<TClient, THandle>;
}

export interface PublisherDaemonAssembly<TClient, THandle extends StorageHandle> {
  daemon: PublisherDaemon;
  accessors: AmbientAccessorRegistry<TClient, THandle>;
  cache: ThreadAffineResourceCache<THandle>;
}

export function createPublisherDaemon<
  TClient extends IUpstreamClient,
  THandle extends StorageHandle,
>(
  deps: PublisherDaemonDependencies<TClient, THandle>,
): PublisherDaemonAssembly<TClient, THandle> {
  const credentials = new CredentialContext(deps.workerId);
  const cache = new ThreadAffineResourceCache<THandle>(
    (path) => deps.storageEngine.openStorage(path),
    { name: deps.workerId },
  );
  const accessors = new AmbientAccessorRegistry<TClient, THandle>(
    deps.workerId,
  );
  accessors.installClientAccessor(
    createContextClientAccessor(credentials, deps.clientFactory),
  );
  accessors.installStorageAccessor(
    createCachedStorageAccessor(cache, deps.storageEngine),
  );

  const daemon = new PublisherDaemon({
    pollIntervalSeconds: deps.pollIntervalSeconds,
    workerId: deps.workerId,
    upstreamTokenKey: deps.upstreamTokenKey,
    credentialStore: deps.credentialStore,
    credentials,
    workUnit: deps.workUnitFactory(accessors),
    storageEngine: deps.storageEngine,
    resources: cache,
  });

  return { daemon, accessors, cache };
}
