/**
 * @fileoverview Contract of a credential-scoped client for the upstream
 * publishing API. One client acts for exactly one Credential.
 * @module src/services/upstream/core/IUpstreamClient
 */
import type { Credential } from '@/ambient/credential.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

export interface UpstreamProfile {
  /** The upstream subject identifier of the authorized user. */
  sub: string;
  name?: string;
  email?: string;
}

export interface IUpstreamClient {
  /** The credential this client sends with every request. */
  readonly credential: Credential;

  /** GETs `path` (relative to the API base URL) and returns the parsed JSON. */
  getJson(path: string, context?: RequestContext): Promise<unknown>;

  /** POSTs `body` as JSON to `path` and returns the parsed JSON, if any. */
  postJson(
    path: string,
    body: unknown,
    context?: RequestContext,
  ): Promise<unknown>;

  /** Profile of the user the credential belongs to. */
  getProfile(context?: RequestContext): Promise<UpstreamProfile>;
}

/**
 * Builds a client for one credential. Called at most once per Credential
 * instance by the context-backed client accessor.
 */
export type UpstreamClientFactory<
  TClient extends IUpstreamClient = IUpstreamClient,
> = (credential: Credential) => TClient;
