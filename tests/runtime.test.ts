/**
 * @fileoverview Tests for runtime start-up and shutdown through the container.
 * @module tests/runtime.test
 */
import { tmpdir } from 'os';
import { join } from 'path';
import { container } from 'tsyringe';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { AmbientAccessorRegistry } from '../src/ambient/accessorRegistry.js';
import { Credential } from '../src/ambient/credential.js';
import { requestCredentials } from '../src/ambient/credentialContext.js';
import { runInWorkerLane } from '../src/ambient/workerLane.js';
import {
  Logger,
  RequestAccessorRegistry,
  type HostCollaborators,
} from '../src/container/index.js';
import { startRuntime, stopRuntime } from '../src/runtime.js';
import type { IUpstreamClient } from '../src/services/upstream/core/IUpstreamClient.js';
import type { StorageHandle } from '../src/storage/core/IStorageEngine.js';
import { InMemoryCredentialStore } from '../src/storage/providers/inMemory/inMemoryCredentialStore.js';
import { JsonRpcErrorCode } from '../src/types-global/errors.js';
import { logger } from '../src/utils/internal/logger.js';

const STORAGE_PATH = join(tmpdir(), 'runtime-test.db');

interface TestHandle extends StorageHandle {
  path: string;
  close: ReturnType<typeof vi.fn>;
}

const setup = (
  env: NodeJS.ProcessEnv,
  resolveUpstreamToken: HostCollaborators['resolveUpstreamToken'] = () =>
    undefined,
) => {
  const store = new InMemoryCredentialStore();
  const openStorage = vi.fn(
    (path: string): TestHandle => ({ path, close: vi.fn() }),
  );
  const runOneSchedulingCycle = vi.fn();
  const collaborators: HostCollaborators = {
    env: { NODE_ENV: 'test', ...env },
    credentialStore: store,
    storageEngine: { resolveStoragePath: () => STORAGE_PATH, openStorage },
    workUnitFactory: () => ({ runOneSchedulingCycle }),
    resolveUpstreamToken,
    clientFactory: (credential: Credential): IUpstreamClient => ({
      credential,
      getJson: vi.fn(),
      postJson: vi.fn(),
      getProfile: vi.fn(async () => ({
        sub: credential.subjectId ?? 'anonymous',
        name: credential.accessToken,
      })),
    }),
  };
  const registry = new AmbientAccessorRegistry<IUpstreamClient, StorageHandle>(
    'runtime-test',
  );
  const child = container.createChildContainer();
  child.register(RequestAccessorRegistry, { useValue: registry });
  return { store, openStorage, runOneSchedulingCycle, collaborators, registry, child };
};

describe('startRuntime', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('installs the request-path accessors', async () => {
    const { collaborators, registry, child, openStorage } = setup({
      PUBLISHER_DAEMON_ENABLED: 'false',
    });

    const runtime = startRuntime(collaborators, child);

    expect(runtime.daemon).toBeUndefined();
    expect(runtime.config.daemon.enabled).toBe(false);
    expect(child.resolve(Logger)).toBe(logger);
    expect(logger.isInitialized()).toBe(true);

    const credential = Credential.create({ accessToken: 'test-secret' });
    const client = requestCredentials.run(credential, () =>
      registry.currentClient(),
    );
    expect(client.credential).toBe(credential);

    const handle = runInWorkerLane('request-worker', () =>
      registry.currentStorage(),
    );
    expect(openStorage).toHaveBeenCalledWith(STORAGE_PATH);

    await stopRuntime(runtime);
    expect(openStorage.mock.results[0]?.value).toBe(handle);
    expect(handle).toMatchObject({ path: STORAGE_PATH });
    const opened = openStorage.mock.results[0]?.value;
    expect(opened?.close).toHaveBeenCalledTimes(1);
  });

  it('starts the publisher daemon when enabled', async () => {
    const { collaborators, child, store, runOneSchedulingCycle } = setup({
      PUBLISHER_DAEMON_ENABLED: 'true',
      UPSTREAM_TOKEN_KEY: 'test_token_key',
    });
    store.save('test_token_key', 'user-1', 'test-secret');

    const runtime = startRuntime(collaborators, child);

    await expect(runtime.daemon?.tick()).resolves.toBe('success');
    expect(runOneSchedulingCycle).toHaveBeenCalledTimes(1);
    expect(runtime.daemon?.isRunning).toBe(true);

    await stopRuntime(runtime);
    expect(runtime.daemon?.state).toBe('idle');
  });

  it('serves the HTTP app from the container', async () => {
    const { collaborators, child } = setup({ PUBLISHER_DAEMON_ENABLED: 'no' });

    const runtime = startRuntime(collaborators, child);
    const res = await runtime.app.request('/healthz');

    expect(res.status).toBe(200);
    await stopRuntime(runtime);
  });

  it('serves /api/me through the registry the runtime installed on', async () => {
    const { collaborators, child } = setup(
      { PUBLISHER_DAEMON_ENABLED: 'false' },
      (bearerToken) =>
        bearerToken === 'test-session'
          ? { accessToken: 'test-upstream-secret', subjectId: 'user-7' }
          : undefined,
    );

    const runtime = startRuntime(collaborators, child);
    const res = await runtime.app.request('/api/me', {
      headers: { Authorization: 'Bearer test-session' },
    });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      sub: 'user-7',
      name: 'test-upstream-secret',
    });
    await stopRuntime(runtime);
  });

  it('rejects invalid configuration', () => {
    const { collaborators, child } = setup({ POLL_INTERVAL_SECONDS: '-5' });

    let caught: unknown;
    try {
      startRuntime(collaborators, child);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: JsonRpcErrorCode.ConfigurationError,
    });
  });

  it('refuses to install the request accessors twice', async () => {
    const { collaborators, child } = setup({ PUBLISHER_DAEMON_ENABLED: '0' });
    const runtime = startRuntime(collaborators, child);

    let caught: unknown;
    try {
      startRuntime(collaborators, child);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: JsonRpcErrorCode.ConfigurationError,
      message:
        "The client accessor of registry 'runtime-test' is already installed.",
    });
    await stopRuntime(runtime);
  });
});
