/**
 * @fileoverview HTTP implementation of {@link IUpstreamClient}. Sends the
 * credential as a bearer token and parses JSON responses.
 * @module src/services/upstream/providers/httpUpstreamClient
 */
import { z } from 'zod';

import type { Credential } from '@/ambient/credential.js';
import type {
  IUpstreamClient,
  UpstreamClientFactory,
  UpstreamProfile,
} from '@/services/upstream/core/IUpstreamClient.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  fetchWithTimeout,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';

export interface HttpUpstreamClientOptions {
  apiBaseUrl: string;
  requestTimeoutMs: number;
}

const UpstreamProfileSchema = z
  .object({
    sub: z.string().min(1),
    name: z.string().optional(),
    email: z.string().optional(),
  })
  .passthrough();

export class HttpUpstreamClient implements IUpstreamClient {
  constructor(
    public readonly credential: Credential,
    private readonly options: HttpUpstreamClientOptions,
  ) {}

  private resolve(path: string): URL {
    return new URL(path, this.options.apiBaseUrl);
  }

  private headers(withBody: boolean): Record<string, string> {
    return {
      Authorization: `Bearer ${this.credential.accessToken}`,
      Accept: 'application/json',
      ...(withBody ? { 'Content-Type': 'application/json' } : {}),
    };
  }

  private createContext(
    operation: string,
    parent?: RequestContext,
  ): RequestContext {
    return requestContextService.createRequestContext({
      parentContext: parent,
      operation,
      ...(this.credential.subjectId !== undefined
        ? { subjectId: this.credential.subjectId }
        : {}),
    });
  }

  private static async parseBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.trim() === '') {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        'Upstream API returned a response that is not valid JSON.',
        { url: response.url, status: response.status },
        { cause: error },
      );
    }
  }

  public async getJson(
    path: string,
    context?: RequestContext,
  ): Promise<unknown> {
    const response = await fetchWithTimeout(
      this.resolve(path),
      this.options.requestTimeoutMs,
      this.createContext('HttpUpstreamClient.getJson', context),
      { method: 'GET', headers: this.headers(false) },
    );
    return HttpUpstreamClient.parseBody(response);
  }

  public async postJson(
    path: string,
    body: unknown,
    context?: RequestContext,
  ): Promise<unknown> {
    const response = await fetchWithTimeout(
      this.resolve(path),
      this.options.requestTimeoutMs,
      this.createContext('HttpUpstreamClient.postJson', context),
      {
        method: 'POST',
        headers: this.headers(true),
        body: JSON.stringify(body),
      },
    );
    return HttpUpstreamClient.parseBody(response);
  }

  public async getProfile(context?: RequestContext): Promise<UpstreamProfile> {
    const payload = await this.getJson('/v2/userinfo', context);
    const parsed = UpstreamProfileSchema.safeParse(payload);
    if (!parsed.success) {
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        'Upstream profile response has an unexpected shape.',
        { issues: parsed.error.flatten().fieldErrors },
      );
    }
    const { sub, name, email } = parsed.data;
    return {
      sub,
      ...(name !== undefined ? { name } : {}),
      ...(email !== undefined ? { email } : {}),
    };
  }
}

/**
 * Default client factory: one {@link HttpUpstreamClient} per credential.
 */
export function createHttpUpstreamClientFactory(
  options: HttpUpstreamClientOptions,
): UpstreamClientFactory<HttpUpstreamClient> {
  return (credential) => new HttpUpstreamClient(credential, options);
}
