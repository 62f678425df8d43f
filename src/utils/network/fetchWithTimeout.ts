/**
 * @fileoverview Provides a utility function to make fetch requests with a specified timeout.
 * @module src/utils/network/fetchWithTimeout
 */
import { HttpRequestError } from '../../types-global/errors.js';
import { logger } from '../internal/logger.js';
import type { RequestContext } from '../internal/requestContext.js';

/**
 * Options for {@link fetchWithTimeout}. `signal` is handled internally.
 */
export type FetchWithTimeoutOptions = Omit<RequestInit, 'signal'> & {
  /**
   * Decides whether a response counts as a success. Defaults to
   * `response.ok` (200-299).
   */
  acceptStatus?: (status: number) => boolean;
};

/**
 * Fetches a resource with a specified timeout.
 *
 * @param url - The URL to fetch.
 * @param timeoutMs - The timeout duration in milliseconds.
 * @param context - The request context for logging.
 * @param options - Optional fetch options, excluding 'signal'.
 * @returns The response, when its status is accepted.
 * @throws {HttpRequestError} If the request times out, fails at the network
 * level, or answers with a status that is not accepted.
 */
export async function fetchWithTimeout(
  url: string | URL,
  timeoutMs: number,
  context: RequestContext,
  options: FetchWithTimeoutOptions = {},
): Promise<Response> {
  const { acceptStatus, ...init } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const urlString = url.toString();
  const operationDescription = `fetch ${init.method ?? 'GET'} ${urlString}`;

  logger.debug(
    `Attempting ${operationDescription} with ${timeoutMs}ms timeout.`,
    context,
  );

  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logger.warning(`${operationDescription} timed out after ${timeoutMs}ms.`, {
        ...context,
        errorSource: 'FetchTimeout',
      });
      throw new HttpRequestError(
        'timeout',
        `${operationDescription} timed out.`,
        { data: { errorSource: 'FetchTimeout' }, cause: error },
      );
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warning(
      `Network error during ${operationDescription}: ${errorMessage}`,
      {
        ...context,
        originalErrorName: error instanceof Error ? error.name : 'UnknownError',
        errorSource: 'FetchNetworkError',
      },
    );
    throw new HttpRequestError(
      'network',
      `Network error during ${operationDescription}: ${errorMessage}`,
      {
        data: {
          originalErrorName:
            error instanceof Error ? error.name : 'UnknownError',
          errorSource: 'FetchNetworkError',
        },
        cause: error,
      },
    );
  } finally {
    clearTimeout(timeoutId);
  }

  const accepted = acceptStatus ? acceptStatus(response.status) : response.ok;
  if (!accepted) {
    logger.warning(
      `Fetch failed for ${urlString} with status ${response.status}.`,
      {
        ...context,
        statusCode: response.status,
        statusText: response.statusText,
        errorSource: 'FetchHttpError',
      },
    );
    // Release the connection; the body is not needed.
    await response.body?.cancel().catch(() => undefined);
    throw new HttpRequestError(
      'status',
      `Fetch failed for ${urlString}. Status: ${response.status}`,
      {
        statusCode: response.status,
        data: { statusText: response.statusText, errorSource: 'FetchHttpError' },
      },
    );
  }

  logger.debug(
    `Successfully fetched ${urlString}. Status: ${response.status}`,
    context,
  );
  return response;
}
