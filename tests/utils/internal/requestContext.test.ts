/**
 * @fileoverview Unit tests for the requestContextService utilities.
 * @module tests/utils/internal/requestContext.test
 */
import { trace } from '@opentelemetry/api';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { requestContextService } from '../../../src/utils/internal/requestContext.js';

describe('requestContextService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a context with a generated id and a timestamp', () => {
    const context = requestContextService.createRequestContext({
      operation: 'testOp',
    });

    expect(context.requestId).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
    expect(new Date(context.timestamp).toISOString()).toBe(context.timestamp);
    expect(context.operation).toBe('testOp');
    expect(context.traceId).toBeUndefined();
  });

  it('inherits the request id of a parent context', () => {
    const parent = requestContextService.createRequestContext({
      operation: 'parent',
    });

    const child = requestContextService.createRequestContext({
      parentContext: parent,
      operation: 'child',
      additionalContext: { workerId: 'w1' },
    });

    expect(child.requestId).toBe(parent.requestId);
    expect(child.operation).toBe('child');
    expect(child.workerId).toBe('w1');
  });

  it('copies plain fields into the context', () => {
    const context = requestContextService.createRequestContext({
      cache: 'request',
      path: '/data/a.db',
    });

    expect(context).toMatchObject({ cache: 'request', path: '/data/a.db' });
  });

  it('adds trace and span ids from the active span', () => {
    vi.spyOn(trace, 'getActiveSpan').mockReturnValue(
      trace.wrapSpanContext({
        traceId: 'trace-1',
        spanId: 'span-1',
        traceFlags: 1,
      }),
    );

    const context = requestContextService.createRequestContext({
      operation: 'traced',
    });

    expect(context.traceId).toBe('trace-1');
    expect(context.spanId).toBe('span-1');
  });
});
