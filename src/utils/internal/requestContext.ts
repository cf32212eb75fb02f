/**
 * @fileoverview Utilities for creating request contexts: the structured
 * objects every log line and error carries. A context holds a request id, a
 * timestamp, the operation name and, when an OpenTelemetry span is active, its
 * trace and span ids.
 *
 * Note that this is the *logging* context. The credential a request acts with
 * lives in `CredentialContext` and is never copied in here; callers that want
 * to correlate by user add the non-secret `subjectId` explicitly.
 * @module src/utils/internal/requestContext
 */
import { trace } from '@opentelemetry/api';

import { generateRequestContextId } from '@/utils/security/idGenerator.js';

/**
 * Core structure for context information associated with a request or operation.
 */
export interface RequestContext {
  /** Unique ID used for log correlation. */
  requestId: string;

  /** ISO 8601 creation timestamp. */
  timestamp: string;

  /** Subject (user) the request acts for, when known. Never a token. */
  subjectId?: string;

  /**
   * Arbitrary additional fields. Consumers must type-check when reading them.
   */
  [key: string]: unknown;
}

/**
 * Parameters for creating a new request context.
 */
export interface CreateRequestContextParams {
  /**
   * Parent context to inherit from; its `requestId` is kept so that child
   * operations correlate with the request that started them.
   */
  parentContext?: Record<string, unknown> | RequestContext;

  /** Fields merged last, overriding inherited ones. */
  additionalContext?: Record<string, unknown>;

  /** Name of the operation creating this context. */
  operation?: string;
}

const requestContextServiceInstance = {
  /**
   * Creates a new {@link RequestContext}. Accepts either
   * `CreateRequestContextParams` or a plain object whose fields are copied
   * into the context.
   */
  createRequestContext(
    params: CreateRequestContextParams & Record<string, unknown> = {},
  ): RequestContext {
    const { parentContext, additionalContext, operation, ...rest } = params;

    const inheritedContext: Record<string, unknown> =
      parentContext && typeof parentContext === 'object'
        ? { ...parentContext }
        : {};

    const requestId =
      typeof inheritedContext.requestId === 'string' &&
      inheritedContext.requestId
        ? inheritedContext.requestId
        : generateRequestContextId();

    const context: RequestContext = {
      ...inheritedContext,
      ...rest,
      requestId,
      timestamp: new Date().toISOString(),
      ...(additionalContext && typeof additionalContext === 'object'
        ? additionalContext
        : {}),
      ...(operation && typeof operation === 'string' ? { operation } : {}),
    };

    const activeSpan = trace.getActiveSpan();
    if (activeSpan && typeof activeSpan.spanContext === 'function') {
      const spanContext = activeSpan.spanContext();
      context.traceId = spanContext.traceId;
      context.spanId = spanContext.spanId;
    }

    return context;
  },
};

/**
 * Primary export for request context functionality.
 */
export const requestContextService = requestContextServiceInstance;
