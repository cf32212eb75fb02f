/**
 * @fileoverview Tests for the ambient accessor registry and its accessor
 * factories.
 * @module tests/ambient/accessorRegistry.test
 */
import { describe, expect, it, vi } from 'vitest';

import {
  AmbientAccessorRegistry,
  createCachedStorageAccessor,
  createContextClientAccessor,
} from '../../src/ambient/accessorRegistry.js';
import { Credential } from '../../src/ambient/credential.js';
import { CredentialContext } from '../../src/ambient/credentialContext.js';
import { ThreadAffineResourceCache } from '../../src/ambient/threadAffineResourceCache.js';
import { runInWorkerLane } from '../../src/ambient/workerLane.js';
import type { IUpstreamClient } from '../../src/services/upstream/core/IUpstreamClient.js';
import type { StorageHandle } from '../../src/storage/core/IStorageEngine.js';
import { JsonRpcErrorCode } from '../../src/types-global/errors.js';

const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

const fakeClient = (credential: Credential): IUpstreamClient => ({
  credential,
  getJson: vi.fn(),
  postJson: vi.fn(),
  getProfile: vi.fn(),
});

interface PathHandle extends StorageHandle {
  path: string;
}

describe('AmbientAccessorRegistry', () => {
  it('fails with Unauthorized before a client accessor is installed', () => {
    const registry = new AmbientAccessorRegistry<string, StorageHandle>('r1');

    expect(thrownBy(() => registry.currentClient())).toMatchObject({
      code: JsonRpcErrorCode.Unauthorized,
    });
  });

  it('fails with ConfigurationError before a storage accessor is installed', () => {
    const registry = new AmbientAccessorRegistry<string, StorageHandle>('r1');

    expect(thrownBy(() => registry.currentStorage())).toMatchObject({
      code: JsonRpcErrorCode.ConfigurationError,
      message: "No storage accessor is installed on registry 'r1'.",
    });
  });

  it('delegates to the installed accessors', () => {
    const handle: PathHandle = { path: '/data/a.db', close: vi.fn() };
    const storage = vi.fn((_path?: string) => handle);
    const registry = new AmbientAccessorRegistry<string, PathHandle>('r2');

    registry.installClientAccessor(() => 'client');
    registry.installStorageAccessor(storage);

    expect(registry.currentClient()).toBe('client');
    expect(registry.currentStorage('/data/a.db')).toBe(handle);
    expect(storage).toHaveBeenCalledWith('/data/a.db');
    expect(registry.isInstalled('client')).toBe(true);
    expect(registry.isInstalled('storage')).toBe(true);
  });

  it('allows each slot to be installed only once', () => {
    const registry = new AmbientAccessorRegistry<string, StorageHandle>('r3');
    registry.installClientAccessor(() => 'first');

    expect(
      thrownBy(() => registry.installClientAccessor(() => 'second')),
    ).toMatchObject({
      code: JsonRpcErrorCode.ConfigurationError,
      message: "The client accessor of registry 'r3' is already installed.",
    });
    expect(registry.currentClient()).toBe('first');
    expect(registry.isInstalled('storage')).toBe(false);
  });
});

describe('createContextClientAccessor', () => {
  it('throws Unauthorized when the context holds no credential', () => {
    const context = new CredentialContext('empty');
    const accessor = createContextClientAccessor(context, fakeClient);

    expect(thrownBy(accessor)).toMatchObject({
      code: JsonRpcErrorCode.Unauthorized,
      data: { credentialContext: 'empty' },
    });
  });

  it('builds one client per credential and reuses it within a request', () => {
    const context = new CredentialContext('requests');
    const factory = vi.fn(fakeClient);
    const accessor = createContextClientAccessor(context, factory);
    const alice = Credential.create({ accessToken: 'test-token-alice' });
    const bob = Credential.create({ accessToken: 'test-token-bob' });

    const [a1, a2] = context.run(alice, () => [accessor(), accessor()]);
    const b1 = context.run(bob, () => accessor());

    expect(a1).toBe(a2);
    expect(a1?.credential).toBe(alice);
    expect(b1.credential).toBe(bob);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('reads whichever credential is current at call time', async () => {
    const context = new CredentialContext('concurrent');
    const accessor = createContextClientAccessor(context, fakeClient);
    const alice = Credential.create({ accessToken: 'test-token-alice' });
    const bob = Credential.create({ accessToken: 'test-token-bob' });

    const tokens = await Promise.all(
      [alice, bob].map((credential) =>
        context.run(credential, async () => {
          await Promise.resolve();
          return accessor().credential.accessToken;
        }),
      ),
    );

    expect(tokens).toEqual(['test-token-alice', 'test-token-bob']);
  });
});

describe('createCachedStorageAccessor', () => {
  it("uses the engine's default path when none is given", () => {
    const cache = new ThreadAffineResourceCache<PathHandle>(
      (path) => ({ path, close: vi.fn() }),
      { name: 'accessor' },
    );
    const engine = { resolveStoragePath: vi.fn(() => '/data/default.db') };
    const accessor = createCachedStorageAccessor(cache, engine);

    const [byDefault, explicit] = runInWorkerLane('w1', () => [
      accessor(),
      accessor('/data/other.db'),
    ]);

    expect(byDefault?.path).toBe('/data/default.db');
    expect(explicit?.path).toBe('/data/other.db');
    expect(engine.resolveStoragePath).toHaveBeenCalledTimes(1);
    expect(cache.peek('w1')?.path).toBe('/data/other.db');
  });
});
