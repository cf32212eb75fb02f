/**
 * @fileoverview One open storage handle per worker, keyed by path.
 *
 * The cache is an explicit map from worker identity to `{ path, handle }`.
 * A worker only ever receives the handle it opened; a handle is closed and
 * replaced only when the same worker asks for a different path. Concurrent
 * access to the underlying storage file from several handles is the storage
 * engine's concern.
 * @module src/ambient/threadAffineResourceCache
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import type { StorageHandle } from '@/storage/core/IStorageEngine.js';
import { logger, requestContextService } from '@/utils/index.js';

import { currentWorkerId } from './workerLane.js';

interface CacheEntry<THandle> {
  path: string;
  handle: THandle;
}

export interface ThreadAffineResourceCacheOptions {
  /** Label used in logs, e.g. `request` or `publisher-daemon`. */
  name: string;
  /** Resolves the calling worker's identity. Defaults to {@link currentWorkerId}. */
  workerIdentity?: () => string;
}

export class ThreadAffineResourceCache<THandle extends StorageHandle> {
  private readonly entries = new Map<string, CacheEntry<THandle>>();
  private readonly name: string;
  private readonly workerIdentity: () => string;

  constructor(
    private readonly open: (path: string) => THandle,
    options: ThreadAffineResourceCacheOptions,
  ) {
    this.name = options.name;
    this.workerIdentity = options.workerIdentity ?? currentWorkerId;
  }

  /**
   * Returns the calling worker's handle for `path`, opening it on first use
   * and re-opening it (after closing the old one) when the path changed.
   * @throws {McpError} `ResourceOpenFailure` if opening fails; the worker's
   *   entry is left empty.
   */
  public get(path: string): THandle {
    const workerId = this.workerIdentity();
    const cached = this.entries.get(workerId);
    if (cached && cached.path === path) {
      return cached.handle;
    }

    const context = requestContextService.createRequestContext({
      operation: 'ThreadAffineResourceCache.get',
      cache: this.name,
      workerId,
      path,
    });

    if (cached) {
      this.entries.delete(workerId);
      logger.debug(
        `Storage path changed for worker '${workerId}'; closing handle for ${cached.path}.`,
        { ...context, previousPath: cached.path },
      );
      cached.handle.close();
    }

    let handle: THandle;
    try {
      handle = this.open(path);
    } catch (error) {
      throw new McpError(
        JsonRpcErrorCode.ResourceOpenFailure,
        `Failed to open storage handle for ${path}.`,
        { cache: this.name, workerId, path },
        { cause: error },
      );
    }

    this.entries.set(workerId, { path, handle });
    logger.debug(`Opened storage handle for worker '${workerId}'.`, context);
    return handle;
  }

  /**
   * The entry cached for a worker (the calling one by default), without
   * opening anything.
   */
  public peek(workerId: string = this.workerIdentity()):
    | Readonly<CacheEntry<THandle>>
    | undefined {
    return this.entries.get(workerId);
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * Closes every cached handle. Used at process shutdown only. Every handle is
   * attempted; the first close failure is rethrown afterwards.
   */
  public closeAll(): void {
    const entries = [...this.entries.values()];
    this.entries.clear();

    let firstFailure: unknown;
    for (const { handle } of entries) {
      try {
        handle.close();
      } catch (error) {
        firstFailure ??= error;
      }
    }
    if (firstFailure !== undefined) {
      throw firstFailure;
    }
  }
}
