/**
 * @fileoverview Contract of the external token store that the OAuth proxy
 * writes upstream grants into. The publisher daemon reads from it because no
 * inbound request exists to scope a credential.
 * @module src/storage/core/ICredentialStore
 */

export interface StoredCredential {
  accessToken: string;
  subjectId?: string;
}

export interface ICredentialStore {
  /**
   * Returns any one stored upstream credential saved under `tokenKey`, or
   * `undefined` when no user has authorized yet. Which one is returned when
   * several exist is up to the store.
   */
  findAnyStoredCredential(
    tokenKey: string,
  ): Promise<StoredCredential | undefined> | StoredCredential | undefined;
}
