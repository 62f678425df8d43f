/**
 * @fileoverview Unit tests for the fetchWithTimeout utility.
 * @module tests/utils/network/fetchWithTimeout.test
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

import { HttpRequestError } from '../../../src/types-global/errors.js';
import { logger } from '../../../src/utils/internal/logger.js';
import { fetchWithTimeout } from '../../../src/utils/network/fetchWithTimeout.js';

describe('fetchWithTimeout', () => {
  const context = {
    requestId: 'ctx-1',
    timestamp: new Date().toISOString(),
  };
  let debugSpy: MockInstance;
  let warningSpy: MockInstance;

  beforeEach(() => {
    debugSpy = vi.spyOn(logger, 'debug').mockImplementation(() => {});
    warningSpy = vi.spyOn(logger, 'warning').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('resolves with the response when fetch succeeds', async () => {
    const response = new Response('ok', { status: 200 });
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(response);

    const result = await fetchWithTimeout('https://example.com', 1000, context);

    expect(result).toBe(response);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com',
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
    expect(debugSpy).toHaveBeenCalledWith(
      'Successfully fetched https://example.com. Status: 200',
      context,
    );
  });

  it('throws an HttpRequestError when the status is not accepted', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('nope', { status: 503, statusText: 'Service Unavailable' }),
    );

    await expect(
      fetchWithTimeout('https://example.com', 1000, context),
    ).rejects.toMatchObject({
      reason: 'status',
      statusCode: 503,
      message: 'Fetch failed for https://example.com. Status: 503',
    });
    expect(warningSpy).toHaveBeenCalledWith(
      'Fetch failed for https://example.com with status 503.',
      expect.objectContaining({ errorSource: 'FetchHttpError', statusCode: 503 }),
    );
  });

  it('uses the status predicate when one is given', async () => {
    const response = new Response(null, { status: 302 });
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(response);

    await expect(
      fetchWithTimeout('https://example.com', 1000, context, {
        redirect: 'manual',
        acceptStatus: (status) => status < 400,
      }),
    ).resolves.toBe(response);
  });

  it('wraps network failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    const error = await fetchWithTimeout('https://example.com', 1000, context).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(HttpRequestError);
    expect(error).toMatchObject({
      reason: 'network',
      message: 'Network error during fetch GET https://example.com: fetch failed',
      data: { originalErrorName: 'TypeError', errorSource: 'FetchNetworkError' },
    });
  });

  it('aborts requests that take too long', async () => {
    vi.useFakeTimers();
    vi.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(new DOMException('This operation was aborted', 'AbortError'));
          });
        }),
    );

    const pending = fetchWithTimeout('https://example.com', 500, context);
    const assertion = expect(pending).rejects.toMatchObject({ reason: 'timeout' });
    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    expect(warningSpy).toHaveBeenCalledWith(
      'fetch GET https://example.com timed out after 500ms.',
      expect.objectContaining({ errorSource: 'FetchTimeout' }),
    );
  });
});
