/**
 * @fileoverview An in-memory credential store.
 * Ideal for development and tests; grants are lost on restart.
 * @module src/storage/providers/inMemory/inMemoryCredentialStore
 */
import type {
  ICredentialStore,
  StoredCredential,
} from '@/storage/core/ICredentialStore.js';
import { logger, requestContextService } from '@/utils/index.js';

export class InMemoryCredentialStore implements ICredentialStore {
  /** tokenKey -> subjectId -> credential, in insertion order. */
  private readonly store = new Map<string, Map<string, StoredCredential>>();

  private getKeyStore(tokenKey: string): Map<string, StoredCredential> {
    let keyStore = this.store.get(tokenKey);
    if (!keyStore) {
      keyStore = new Map<string, StoredCredential>();
      this.store.set(tokenKey, keyStore);
    }
    return keyStore;
  }

  /**
   * Saves (or replaces) the grant of one subject under `tokenKey`.
   */
  save(tokenKey: string, subjectId: string, accessToken: string): void {
    logger.debug(
      `[InMemoryCredentialStore] Saving credential under ${tokenKey} for subject: ${subjectId}`,
      requestContextService.createRequestContext({
        operation: 'InMemoryCredentialStore.save',
        subjectId,
      }),
    );
    this.getKeyStore(tokenKey).set(subjectId, { accessToken, subjectId });
  }

  revoke(tokenKey: string, subjectId: string): boolean {
    return this.getKeyStore(tokenKey).delete(subjectId);
  }

  /**
   * Returns the earliest saved grant still present under `tokenKey`.
   */
  findAnyStoredCredential(tokenKey: string): StoredCredential | undefined {
    for (const credential of this.getKeyStore(tokenKey).values()) {
      return { ...credential };
    }
    return undefined;
  }
}
