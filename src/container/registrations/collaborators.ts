/**
 * @fileoverview Registers the host's collaborators: the storage engine, the
 * token store, the session resolver and the scheduling work unit. The upstream
 * client factory defaults to the HTTP client built from configuration.
 * @module src/container/registrations/collaborators
 */
import type { DependencyContainer } from 'tsyringe';

import {
  CredentialStore,
  SchedulingWorkUnitFactory,
  StorageEngine,
  UpstreamClientFactory,
  UpstreamTokenResolver,
} from '@/container/tokens.js';
import type { UpstreamTokenResolver as UpstreamTokenResolverFn } from '@/mcp-server/transports/auth/lib/upstreamTokenResolver.js';
import type { SchedulingWorkUnitFactory as SchedulingWorkUnitFactoryFn } from '@/services/scheduling/core/ISchedulingWorkUnit.js';
import type { UpstreamClientFactory as UpstreamClientFactoryFn } from '@/services/upstream/core/IUpstreamClient.js';
import type { ICredentialStore } from '@/storage/core/ICredentialStore.js';
import type { IStorageEngine } from '@/storage/core/IStorageEngine.js';

export interface HostCollaborators {
  storageEngine: IStorageEngine;
  credentialStore: ICredentialStore;
  workUnitFactory: SchedulingWorkUnitFactoryFn;
  resolveUpstreamToken: UpstreamTokenResolverFn;
  /** Overrides the HTTP upstream client. */
  clientFactory?: UpstreamClientFactoryFn;
  /** Environment to parse configuration from; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export const registerCollaborators = (
  target: DependencyContainer,
  collaborators: HostCollaborators,
): void => {
  target.register<IStorageEngine>(StorageEngine, {
    useValue: collaborators.storageEngine,
  });
  target.register<ICredentialStore>(CredentialStore, {
    useValue: collaborators.credentialStore,
  });
  target.register<SchedulingWorkUnitFactoryFn>(SchedulingWorkUnitFactory, {
    useValue: collaborators.workUnitFactory,
  });
  target.register<UpstreamTokenResolverFn>(UpstreamTokenResolver, {
    useValue: collaborators.resolveUpstreamToken,
  });
  if (collaborators.clientFactory) {
    target.register<UpstreamClientFactoryFn>(UpstreamClientFactory, {
      useValue: collaborators.clientFactory,
    });
  }
};
