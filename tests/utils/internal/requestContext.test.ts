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

  it('creates a context with an id, a timestamp and an operation', () => {
    const context = requestContextService.createRequestContext({
      operation: 'cloneRepository',
    });

    expect(context.requestId).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
    expect(Number.isNaN(Date.parse(context.timestamp))).toBe(false);
    expect(context.operation).toBe('cloneRepository');
    expect(context).not.toHaveProperty('traceId');
  });

  it('inherits the request id and fields of its parent', () => {
    const parent = requestContextService.createRequestContext({
      operation: 'run',
      project: 'demo',
    });

    const child = requestContextService.createRequestContext({
      parentContext: parent,
      operation: 'clone',
      additionalContext: { branch: 'main' },
    });

    expect(child).toMatchObject({
      requestId: parent.requestId,
      project: 'demo',
      branch: 'main',
      operation: 'clone',
    });
  });

  it('adds trace ids when a span is active', () => {
    const span = trace.wrapSpanContext({
      traceId: '0af7651916cd43dd8448eb211c80319c',
      spanId: 'b7ad6b7169203331',
      traceFlags: 1,
    });
    vi.spyOn(trace, 'getActiveSpan').mockReturnValue(span);

    const context = requestContextService.createRequestContext();

    expect(context.traceId).toBe('0af7651916cd43dd8448eb211c80319c');
    expect(context.spanId).toBe('b7ad6b7169203331');
  });
});
