/**
 * @fileoverview Types shared by the publisher daemon and its callers.
 * @module src/services/scheduling/types
 */
import type { CredentialContext } from '@/ambient/credentialContext.js';
import type { ICredentialStore } from '@/storage/core/ICredentialStore.js';
import type { IStorageEngine } from '@/storage/core/IStorageEngine.js';

import type { ISchedulingWorkUnit } from './core/ISchedulingWorkUnit.js';

/**
 * `idle` before `start()` and after `stop()`; `awaiting_tick` while the timer
 * is pending; `running_unit` while a tick executes.
 */
export type DaemonState = 'idle' | 'awaiting_tick' | 'running_unit';

/**
 * `skipped` means no stored credential existed; `failed` means the cycle
 * threw.
 */
export type TickOutcome = 'success' | 'skipped' | 'failed';

export interface DaemonStats {
  ticks: number;
  successes: number;
  skips: number;
  failures: number;
  lastOutcome?: TickOutcome;
  lastTickAt?: string;
}

export interface PublisherDaemonOptions {
  /** Seconds between the end of one tick and the start of the next. */
  pollIntervalSeconds: number;
  /** Worker lane the work unit runs in; keys the daemon's storage handle. */
  workerId: string;
  /** Key under which the token store keeps upstream grants. */
  upstreamTokenKey: string;
  credentialStore: ICredentialStore;
  /** The daemon's own credential context, never the request one. */
  credentials: CredentialContext;
  workUnit: ISchedulingWorkUnit;
  /** Used by the start-up check that the storage directory is writable. */
  storageEngine: Pick<IStorageEngine, 'resolveStoragePath'>;
  /** Resources released by `stop()`, typically the daemon's handle cache. */
  resources?: { closeAll(): void };
}
