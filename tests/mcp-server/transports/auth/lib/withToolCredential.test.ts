/**
 * @fileoverview Tests for the MCP tool credential wrapper.
 * @module tests/mcp-server/transports/auth/lib/withToolCredential.test
 */
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { describe, expect, it } from 'vitest';

import { requestCredentials } from '../../../../../src/ambient/credentialContext.js';
import {
  credentialFromAuthInfo,
  withToolCredential,
} from '../../../../../src/mcp-server/transports/auth/lib/withToolCredential.js';
import { JsonRpcErrorCode } from '../../../../../src/types-global/errors.js';

const TOKEN_KEY = 'test_access_token';

const authInfo = (extra?: Record<string, unknown>): AuthInfo => ({
  token: 'test-session-token',
  clientId: 'test-client',
  scopes: [],
  ...(extra ? { extra } : {}),
});

describe('credentialFromAuthInfo', () => {
  it('reads the upstream token and subject from AuthInfo.extra', () => {
    const credential = credentialFromAuthInfo(
      authInfo({ [TOKEN_KEY]: 'test-upstream-secret', sub: 'user-1' }),
      TOKEN_KEY,
    );

    expect(credential.accessToken).toBe('test-upstream-secret');
    expect(credential.subjectId).toBe('user-1');
  });

  it('prefers subjectId over sub', () => {
    const credential = credentialFromAuthInfo(
      authInfo({
        [TOKEN_KEY]: 'test-upstream-secret',
        subjectId: 'preferred',
        sub: 'fallback',
      }),
      TOKEN_KEY,
    );

    expect(credential.subjectId).toBe('preferred');
  });

  it.each([
    ['no auth info', undefined],
    ['no extra', authInfo()],
    ['a non-string token', authInfo({ [TOKEN_KEY]: 42 })],
    ['a blank token', authInfo({ [TOKEN_KEY]: ' ' })],
  ])('throws Unauthorized for %s', (_label, info) => {
    let caught: unknown;
    try {
      credentialFromAuthInfo(info, TOKEN_KEY);
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      code: JsonRpcErrorCode.Unauthorized,
      data: { tokenKey: TOKEN_KEY },
    });
  });
});

describe('withToolCredential', () => {
  it('runs the handler with the credential installed', async () => {
    const handler = withToolCredential(
      TOKEN_KEY,
      async (args: { n: number }) => {
        await Promise.resolve();
        return `${args.n}:${requestCredentials.get()?.accessToken ?? 'none'}`;
      },
    );

    await expect(
      handler(
        { n: 1 },
        { authInfo: authInfo({ [TOKEN_KEY]: 'test-upstream-secret' }) },
      ),
    ).resolves.toBe('1:test-upstream-secret');
    expect(requestCredentials.get()).toBeUndefined();
  });

  it('rejects before calling the handler when no token is attached', async () => {
    let called = false;
    const handler = withToolCredential(TOKEN_KEY, () => {
      called = true;
    });

    await expect(handler({}, {})).rejects.toMatchObject({
      code: JsonRpcErrorCode.Unauthorized,
    });
    expect(called).toBe(false);
  });
});
