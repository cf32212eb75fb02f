/**
 * @fileoverview Contract of the external "publish due items" logic the
 * publisher daemon drives. The work unit resolves its client and storage
 * handle through the accessor registry it was built against.
 * @module src/services/scheduling/core/ISchedulingWorkUnit
 */
import type { AmbientAccessors } from '@/ambient/accessorRegistry.js';
import type { IUpstreamClient } from '@/services/upstream/core/IUpstreamClient.js';
import type { StorageHandle } from '@/storage/core/IStorageEngine.js';

export interface ISchedulingWorkUnit {
  /** Performs one scheduling cycle; throws on internal failure. */
  runOneSchedulingCycle(): Promise<void> | void;
}

/**
 * Builds the daemon's work unit against the daemon's own accessors.
 */
export type SchedulingWorkUnitFactory<
  TClient extends IUpstreamClient = IUpstreamClient,
  THandle extends StorageHandle = StorageHandle,
> = (accessors: AmbientAccessors<TClient, THandle>) => ISchedulingWorkUnit;
