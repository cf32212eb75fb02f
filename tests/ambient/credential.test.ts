/**
 * @fileoverview Tests for the Credential value object.
 * @module tests/ambient/credential.test
 */
import { inspect } from 'util';
import { describe, expect, it } from 'vitest';

import { Credential } from '../../src/ambient/credential.js';
import { JsonRpcErrorCode, McpError } from '../../src/types-global/errors.js';

describe('Credential', () => {
  it('keeps the token and subject it was created with', () => {
    const credential = Credential.create({
      accessToken: 'test-secret-token',
      subjectId: 'user-1',
    });

    expect(credential.accessToken).toBe('test-secret-token');
    expect(credential.subjectId).toBe('user-1');
    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('treats a blank subject as absent', () => {
    const credential = Credential.create({
      accessToken: 'test-secret-token',
      subjectId: '  ',
    });
    expect(credential.subjectId).toBeUndefined();
  });

  it('rejects a blank access token with a ValidationError', () => {
    let caught: unknown;
    try {
      Credential.create({ accessToken: '   ' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(McpError);
    expect(caught).toMatchObject({ code: JsonRpcErrorCode.ValidationError });
  });

  it('compares by value', () => {
    const a = Credential.create({ accessToken: 'test-secret', subjectId: 'u' });
    const b = Credential.create({ accessToken: 'test-secret', subjectId: 'u' });
    const c = Credential.create({ accessToken: 'test-secret' });

    expect(a).not.toBe(b);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
    expect(a.equals(undefined)).toBe(false);
  });

  it('never renders the full token', () => {
    const credential = Credential.create({
      accessToken: 'test-secret-token',
      subjectId: 'user-1',
    });

    expect(credential.toString()).toBe('Credential(user-1, test…(17 chars))');
    expect(inspect(credential)).toBe('Credential(user-1, test…(17 chars))');
    expect(JSON.stringify(credential)).toBe(
      '{"accessToken":"test…(17 chars)","subjectId":"user-1"}',
    );
  });

  it('fully redacts short tokens', () => {
    const credential = Credential.create({ accessToken: 'short' });
    expect(credential.toString()).toBe('Credential(anonymous, [REDACTED])');
    expect(JSON.stringify(credential)).toBe('{"accessToken":"[REDACTED]"}');
  });
});
