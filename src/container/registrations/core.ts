/**
 * @fileoverview Registers core services: configuration, logging, the request
 * credential context and handle cache, the request accessor registry, the
 * HTTP app and the publisher daemon with its private wiring.
 * @module src/container/registrations/core
 */
import {
  type DependencyContainer,
  instanceCachingFactory,
} from 'tsyringe';

import {
  type AmbientAccessorRegistry,
  ambientAccessors,
} from '@/ambient/accessorRegistry.js';
import {
  type CredentialContext,
  requestCredentials,
} from '@/ambient/credentialContext.js';
import { ThreadAffineResourceCache } from '@/ambient/threadAffineResourceCache.js';
import { type AppConfig as AppConfigType, parseConfig } from '@/config/index.js';
import {
  AppConfig,
  CredentialStore,
  HttpApp,
  Logger,
  PublisherDaemonAssembly,
  RequestAccessorRegistry,
  RequestCredentialContext,
  RequestResourceCache,
  SchedulingWorkUnitFactory,
  StorageEngine,
  UpstreamClientFactory,
  UpstreamTokenResolver,
} from '@/container/tokens.js';
import type { UpstreamTokenResolver as UpstreamTokenResolverFn } from '@/mcp-server/transports/auth/lib/upstreamTokenResolver.js';
import { createHttpApp } from '@/mcp-server/transports/http/httpApp.js';
import type { SchedulingWorkUnitFactory as SchedulingWorkUnitFactoryFn } from '@/services/scheduling/core/ISchedulingWorkUnit.js';
import {
  type PublisherDaemonAssembly as PublisherDaemonAssemblyType,
  createPublisherDaemon,
} from '@/services/scheduling/createPublisherDaemon.js';
import type {
  IUpstreamClient,
  UpstreamClientFactory as UpstreamClientFactoryFn,
} from '@/services/upstream/core/IUpstreamClient.js';
import { createHttpUpstreamClientFactory } from '@/services/upstream/providers/httpUpstreamClient.js';
import type { ICredentialStore } from '@/storage/core/ICredentialStore.js';
import type {
  IStorageEngine,
  StorageHandle,
} from '@/storage/core/IStorageEngine.js';
import { logger } from '@/utils/index.js';

export const registerCoreServices = (
  target: DependencyContainer,
  env: NodeJS.ProcessEnv = process.env,
): void => {
  // Configuration (parsed and registered as a static value)
  target.register<AppConfigType>(AppConfig, { useValue: parseConfig(env) });

  // Logger (as a static value)
  target.register(Logger, { useValue: logger });

  if (!target.isRegistered(UpstreamClientFactory)) {
    target.register<UpstreamClientFactoryFn>(UpstreamClientFactory, {
      useFactory: instanceCachingFactory((c) => {
        const cfg = c.resolve<AppConfigType>(AppConfig);
        return createHttpUpstreamClientFactory({
          apiBaseUrl: cfg.upstream.apiBaseUrl,
          requestTimeoutMs: cfg.upstream.requestTimeoutMs,
        });
      }),
    });
  }

  // --- Request path ---
  target.register<CredentialContext>(RequestCredentialContext, {
    useValue: requestCredentials,
  });

  target.register<ThreadAffineResourceCache<StorageHandle>>(
    RequestResourceCache,
    {
      useFactory: instanceCachingFactory((c) => {
        const engine = c.resolve<IStorageEngine>(StorageEngine);
        return new ThreadAffineResourceCache<StorageHandle>(
          (path) => engine.openStorage(path),
          { name: 'request' },
        );
      }),
    },
  );

  // The process-wide registry unless a scoped one was registered up front.
  if (!target.isRegistered(RequestAccessorRegistry)) {
    target.register<AmbientAccessorRegistry<IUpstreamClient, StorageHandle>>(
      RequestAccessorRegistry,
      { useValue: ambientAccessors },
    );
  }

  target.register(HttpApp, {
    useFactory: instanceCachingFactory((c) =>
      createHttpApp({
        resolveUpstreamToken: c.resolve<UpstreamTokenResolverFn>(
          UpstreamTokenResolver,
        ),
        accessors: c.resolve<
          AmbientAccessorRegistry<IUpstreamClient, StorageHandle>
        >(RequestAccessorRegistry),
      }),
    ),
  });

  // --- Background publishing ---
  target.register<PublisherDaemonAssemblyType<IUpstreamClient, StorageHandle>>(
    PublisherDaemonAssembly,
    {
      useFactory: instanceCachingFactory((c) => {
        const cfg = c.resolve<AppConfigType>(AppConfig);
        return createPublisherDaemon<IUpstreamClient, StorageHandle>({
          pollIntervalSeconds: cfg.daemon.pollIntervalSeconds,
          workerId: cfg.daemon.workerId,
          upstreamTokenKey: cfg.upstream.tokenKey,
          credentialStore: c.resolve<ICredentialStore>(CredentialStore),
          storageEngine: c.resolve<IStorageEngine>(StorageEngine),
          clientFactory: c.resolve<UpstreamClientFactoryFn>(
            UpstreamClientFactory,
          ),
          workUnitFactory: c.resolve<SchedulingWorkUnitFactoryFn>(
            SchedulingWorkUnitFactory,
          ),
        });
      }),
    },
  );

  logger.info('Core services registered with the DI container.');
};
