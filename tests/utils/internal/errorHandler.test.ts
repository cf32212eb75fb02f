/**
 * @fileoverview Tests for the ErrorHandler utility.
 * @module tests/utils/internal/errorHandler.test
 */
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from 'vitest';

import { JsonRpcErrorCode, McpError } from '../../../src/types-global/errors.js';
import { ErrorHandler } from '../../../src/utils/internal/error-handler/errorHandler.js';
import { logger } from '../../../src/utils/internal/logger.js';

describe('ErrorHandler', () => {
  let errorSpy: MockInstance;
  let critSpy: MockInstance;

  beforeEach(() => {
    errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => {});
    critSpy = vi.spyOn(logger, 'crit').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('determineErrorCode', () => {
    it('returns the code of an McpError', () => {
      const error = new McpError(JsonRpcErrorCode.NotFound, 'Not found');
      expect(ErrorHandler.determineErrorCode(error)).toBe(
        JsonRpcErrorCode.NotFound,
      );
    });

    it('maps a TypeError to ValidationError', () => {
      expect(ErrorHandler.determineErrorCode(new TypeError('bad'))).toBe(
        JsonRpcErrorCode.ValidationError,
      );
    });

    it.each([
      ['invalid access token', JsonRpcErrorCode.Unauthorized],
      ['SQLITE_BUSY: database is locked', JsonRpcErrorCode.DatabaseError],
      ['Item not found', JsonRpcErrorCode.NotFound],
      ['request timed out', JsonRpcErrorCode.Timeout],
      ['Too many requests', JsonRpcErrorCode.RateLimited],
      ['Something strange happened', JsonRpcErrorCode.InternalError],
    ])('classifies "%s"', (message, code) => {
      expect(ErrorHandler.determineErrorCode(new Error(message))).toBe(code);
    });

    it('handles non-Error values', () => {
      expect(ErrorHandler.determineErrorCode('plain failure')).toBe(
        JsonRpcErrorCode.InternalError,
      );
    });
  });

  describe('handleError', () => {
    it('wraps an unknown error, keeping it as cause', () => {
      const original = new Error('disk full');

      const handled = ErrorHandler.handleError(original, {
        operation: 'saveDraft',
        errorCode: JsonRpcErrorCode.DatabaseError,
        context: { requestId: 'req-1', timestamp: '2026-01-01T00:00:00.000Z' },
      });

      expect(handled).toBeInstanceOf(McpError);
      expect(handled.code).toBe(JsonRpcErrorCode.DatabaseError);
      expect(handled.message).toBe('Error in saveDraft: disk full');
      expect(handled.cause).toBe(original);
      expect(errorSpy).toHaveBeenCalledWith(
        'Error in saveDraft: disk full',
        expect.objectContaining({
          requestId: 'req-1',
          operation: 'saveDraft',
          errorCode: JsonRpcErrorCode.DatabaseError,
          originalErrorType: 'Error',
        }),
      );
    });

    it('keeps the code and message of an McpError', () => {
      const original = new McpError(
        JsonRpcErrorCode.Unauthorized,
        'No session.',
        { attempt: 1 },
      );

      const handled = ErrorHandler.handleError(original, {
        operation: 'whoami',
        context: { requestId: 'req-2' },
      });

      expect(handled.code).toBe(JsonRpcErrorCode.Unauthorized);
      expect(handled.message).toBe('No session.');
      expect(handled.data).toMatchObject({ attempt: 1, requestId: 'req-2' });
    });

    it('redacts secrets in the logged input', () => {
      ErrorHandler.handleError(new Error('boom'), {
        operation: 'connect',
        input: { accessToken: 'test-secret', page: 2 },
      });

      expect(errorSpy).toHaveBeenCalledWith(
        'Error in connect: boom',
        expect.objectContaining({
          input: { accessToken: '[REDACTED]', page: 2 },
        }),
      );
    });

    it('logs critical errors at crit', () => {
      ErrorHandler.handleError(new Error('boom'), {
        operation: 'boot',
        critical: true,
      });

      expect(critSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('throws when rethrow is set', () => {
      expect(() =>
        ErrorHandler.handleError(new Error('boom'), {
          operation: 'op',
          rethrow: true,
        }),
      ).toThrow('Error in op: boom');
    });
  });

  describe('formatError', () => {
    it('formats an McpError', () => {
      const error = new McpError(JsonRpcErrorCode.Forbidden, 'nope', {
        scope: 'write',
      });
      expect(ErrorHandler.formatError(error)).toEqual({
        code: JsonRpcErrorCode.Forbidden,
        message: 'nope',
        data: { scope: 'write' },
      });
    });

    it('formats a plain Error', () => {
      expect(ErrorHandler.formatError(new RangeError('out of range'))).toEqual({
        code: JsonRpcErrorCode.ValidationError,
        message: 'out of range',
        data: { errorType: 'RangeError' },
      });
    });
  });

  describe('tryCatch', () => {
    it('returns the value of a successful function', async () => {
      await expect(
        ErrorHandler.tryCatch(() => 42, { operation: 'answer' }),
      ).resolves.toBe(42);
    });

    it('rethrows failures as McpError', async () => {
      await expect(
        ErrorHandler.tryCatch(
          async () => {
            throw new Error('record not found');
          },
          { operation: 'load' },
        ),
      ).rejects.toMatchObject({
        code: JsonRpcErrorCode.NotFound,
        message: 'Error in load: record not found',
      });
    });
  });
});
