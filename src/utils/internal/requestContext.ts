/**
 * @fileoverview Utilities for creating request contexts. A request context
 * carries a unique id, a timestamp and whatever else an operation wants to
 * attach to its log lines; when an OpenTelemetry span is active its trace and
 * span ids are added too.
 * @module src/utils/internal/requestContext
 */
import { trace } from '@opentelemetry/api';

import { generateRequestContextId } from '../security/idGenerator.js';

/**
 * Core structure attached to every log line of an operation.
 */
export interface RequestContext {
  /** Unique id used to correlate the log lines of one operation. */
  requestId: string;
  /** ISO 8601 creation time. */
  timestamp: string;
  /** Consumers must type-check extended properties before use. */
  [key: string]: unknown;
}

export interface CreateRequestContextParams {
  /**
   * Context to inherit from. Its `requestId` is kept, so child operations
   * share the id of their parent.
   */
  parentContext?: Record<string, unknown> | RequestContext;
  /** Merged last, overriding inherited properties. */
  additionalContext?: Record<string, unknown>;
  operation?: string;
}

const requestContextServiceInstance = {
  /**
   * Creates a new {@link RequestContext}. Accepts either
   * {@link CreateRequestContextParams} or a plain object whose properties are
   * copied into the context.
   */
  createRequestContext(
    params: CreateRequestContextParams | Record<string, unknown> = {},
  ): RequestContext {
    const { parentContext, additionalContext, operation, ...rest } = params;

    const inheritedContext: Record<string, unknown> =
      parentContext !== null && typeof parentContext === 'object'
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
      ...(additionalContext !== null && typeof additionalContext === 'object'
        ? additionalContext
        : {}),
      ...(typeof operation === 'string' && operation ? { operation } : {}),
    };

    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      const spanContext = activeSpan.spanContext();
      context.traceId = spanContext.traceId;
      context.spanId = spanContext.spanId;
    }

    return context;
  },
};

export const requestContextService = requestContextServiceInstance;
