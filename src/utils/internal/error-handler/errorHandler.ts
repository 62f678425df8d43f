/**
 * @fileoverview Top-level failure handling. Translates whatever aborted the
 * run into the process exit code the session orchestrator acts on, and makes
 * sure the full diagnostic trace reaches the error stream.
 * @module src/utils/internal/error-handler/errorHandler
 */
import { CloneExitCode, GitCloneError } from '../../../types-global/errors.js';
import { sanitization } from '../../security/sanitization.js';
import { logger } from '../logger.js';
import {
  requestContextService,
  type RequestContext,
} from '../requestContext.js';
import { formatErrorTrace, getErrorMessage, getErrorName } from './helpers.js';

export interface FatalErrorOptions {
  context?: RequestContext;
  /** Where the trace is written. Defaults to `process.stderr`. */
  stream?: Pick<NodeJS.WritableStream, 'write'>;
}

export class ErrorHandler {
  /**
   * Exit code for a failure: the taxonomy code of a {@link GitCloneError},
   * {@link CloneExitCode.Generic} for anything else.
   */
  public static determineExitCode(error: unknown): number {
    if (error instanceof GitCloneError) {
      return error.exitCode;
    }
    return CloneExitCode.Generic;
  }

  /**
   * Writes the trace to the error stream, logs the failure and returns the
   * exit code. Taxonomy errors are something the user can act on; everything
   * else is reported as a generic failure.
   */
  public static handleFatalError(
    error: unknown,
    options: FatalErrorOptions = {},
  ): number {
    const exitCode = ErrorHandler.determineExitCode(error);
    const stream = options.stream ?? process.stderr;
    stream.write(`${sanitization.redactUrlCredentials(formatErrorTrace(error))}\n`);

    const logContext = requestContextService.createRequestContext({
      operation: 'handleFatalError',
      parentContext: options.context,
      additionalContext: {
        exitCode,
        errorName: getErrorName(error),
        ...(error instanceof GitCloneError && error.data
          ? { errorData: sanitization.sanitizeForLogging(error.data) }
          : {}),
      },
    });
    const message =
      error instanceof GitCloneError
        ? `Repository initialization failed: ${error.message}`
        : `Repository initialization failed unexpectedly: ${getErrorMessage(error)}`;

    if (error instanceof Error) {
      logger.error(message, error, logContext);
    } else {
      logger.error(message, logContext);
    }

    return exitCode;
  }
}
