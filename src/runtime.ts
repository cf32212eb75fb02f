/**
 * @fileoverview Start-up and shutdown of the accessor layer inside a host
 * process. `startRuntime` installs the request-path accessors and starts the
 * publisher daemon; `stopRuntime` stops the daemon and closes cached handles.
 * @module src/runtime
 */
import type { Hono } from 'hono';
import type { DependencyContainer } from 'tsyringe';

import {
  type AmbientAccessorRegistry,
  createCachedStorageAccessor,
  createContextClientAccessor,
} from '@/ambient/accessorRegistry.js';
import type { CredentialContext } from '@/ambient/credentialContext.js';
import type { ThreadAffineResourceCache } from '@/ambient/threadAffineResourceCache.js';
import type { AppConfig as AppConfigType } from '@/config/index.js';
import container, {
  AppConfig,
  HttpApp,
  Logger,
  PublisherDaemonAssembly,
  RequestAccessorRegistry,
  RequestCredentialContext,
  RequestResourceCache,
  StorageEngine,
  UpstreamClientFactory,
  composeContainer,
  type HostCollaborators,
} from '@/container/index.js';
import type { PublisherDaemonAssembly as PublisherDaemonAssemblyType } from '@/services/scheduling/createPublisherDaemon.js';
import type { PublisherDaemon } from '@/services/scheduling/publisherDaemon.js';
import type {
  IUpstreamClient,
  UpstreamClientFactory as UpstreamClientFactoryFn,
} from '@/services/upstream/core/IUpstreamClient.js';
import type {
  IStorageEngine,
  StorageHandle,
} from '@/storage/core/IStorageEngine.js';
import { type Logger as LoggerType, requestContextService } from '@/utils/index.js';

export interface Runtime {
  config: AppConfigType;
  container: DependencyContainer;
  app: Hono;
  /** Present when the publisher daemon is enabled. */
  daemon: PublisherDaemon | undefined;
}

/**
 * Composes the container, installs the request-path accessors and, when
 * enabled, starts the publisher daemon.
 * @throws {McpError} `ConfigurationError` for invalid configuration or a second
 *   installation on the same registry; `InitializationFailed` when the daemon's
 *   storage check fails.
 */
export function startRuntime(
  collaborators: HostCollaborators,
  target: DependencyContainer = container,
): Runtime {
  composeContainer(collaborators, target);

  const config = target.resolve<AppConfigType>(AppConfig);
  const logger = target.resolve<LoggerType>(Logger);
  if (!logger.isInitialized()) {
    logger.initialize(config.logLevel, config);
  }
  const context = requestContextService.createRequestContext({
    operation: 'startRuntime',
  });

  const registry = target.resolve<
    AmbientAccessorRegistry<IUpstreamClient, StorageHandle>
  >(RequestAccessorRegistry);
  registry.installClientAccessor(
    createContextClientAccessor(
      target.resolve<CredentialContext>(RequestCredentialContext),
      target.resolve<UpstreamClientFactoryFn>(UpstreamClientFactory),
    ),
  );
  registry.installStorageAccessor(
    createCachedStorageAccessor(
      target.resolve<ThreadAffineResourceCache<StorageHandle>>(
        RequestResourceCache,
      ),
      target.resolve<IStorageEngine>(StorageEngine),
    ),
  );

  let daemon: PublisherDaemon | undefined;
  if (config.daemon.enabled) {
    daemon = target.resolve<
      PublisherDaemonAssemblyType<IUpstreamClient, StorageHandle>
    >(PublisherDaemonAssembly).daemon;
    daemon.start();
  } else {
    logger.info('Publisher daemon disabled by configuration.', context);
  }

  logger.info(`${config.pkg.name} v${config.pkg.version} runtime started.`, {
    ...context,
    environment: config.environment,
  });

  return {
    config,
    container: target,
    app: target.resolve<Hono>(HttpApp),
    daemon,
  };
}

/**
 * Stops the daemon (which closes its own handles) and closes every request
 * handle.
 */
export async function stopRuntime(runtime: Runtime): Promise<void> {
  const logger = runtime.container.resolve<LoggerType>(Logger);
  const context = requestContextService.createRequestContext({
    operation: 'stopRuntime',
  });
  if (runtime.daemon) {
    await runtime.daemon.stop();
  }
  runtime.container
    .resolve<ThreadAffineResourceCache<StorageHandle>>(RequestResourceCache)
    .closeAll();
  logger.info('Runtime stopped.', context);
}
