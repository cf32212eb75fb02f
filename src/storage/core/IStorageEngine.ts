/**
 * @fileoverview Contract of the external storage engine that holds scheduled
 * items. The engine owns the schema and serializes concurrent writers from
 * different handles; this package only decides which handle a worker uses.
 * @module src/storage/core/IStorageEngine
 */

/**
 * An open connection to the storage engine.
 */
export interface StorageHandle {
  close(): void;
}

export interface IStorageEngine<THandle extends StorageHandle = StorageHandle> {
  /** Path used when a caller does not name one explicitly. */
  resolveStoragePath(): string;

  /** Opens a new handle on `path`. Must not return a shared instance. */
  openStorage(path: string): THandle;
}
