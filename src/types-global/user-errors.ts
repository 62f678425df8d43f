/**
 * @fileoverview User-facing error taxonomy for the session HTTP API.
 * Each error carries an application code and the HTTP status it maps to.
 *
 * User input errors use the codes 1000 to 1999. There is no bug behind them:
 * the user can address the problem (a wrong parameter, a private repository
 * accessed without permissions, and so on).
 * @module src/types-global/user-errors
 */
import { z } from 'zod';

/**
 * Schema of the JSON body returned for an API error.
 */
export const ApiErrorResponseSchema = z
  .object({
    error: z.object({
      code: z.number().int().min(1000),
      message: z.string().min(1, 'Error message cannot be empty.'),
      detail: z.string().optional(),
    }),
  })
  .describe('Body of an error response returned by the session API.');

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;

export interface ApiErrorOptions {
  message?: string;
  code?: number;
  statusCode?: number;
  detail?: string;
}

/**
 * Base class of all errors rendered by the API layer.
 */
export class GenericApiError extends Error {
  public readonly code: number;
  public readonly statusCode: number;
  public readonly detail?: string;

  constructor(
    defaults: { message: string; code: number; statusCode: number },
    options: ApiErrorOptions = {},
  ) {
    super(options.message ?? defaults.message);
    this.code = options.code ?? defaults.code;
    this.statusCode = options.statusCode ?? defaults.statusCode;
    if (options.detail !== undefined) {
      this.detail = options.detail;
    }
    this.name = 'GenericApiError';
    Object.setPrototypeOf(this, GenericApiError.prototype);
  }

  public toResponse(): ApiErrorResponse {
    return ApiErrorResponseSchema.parse({
      error: {
        code: this.code,
        message: this.message,
        ...(this.detail !== undefined ? { detail: this.detail } : {}),
      },
    });
  }
}

const USER_INPUT_CODE = 1000;

export class UserInputError extends GenericApiError {
  constructor(options: ApiErrorOptions = {}) {
    super(
      { message: 'Invalid user input.', code: USER_INPUT_CODE, statusCode: 422 },
      options,
    );
    this.name = 'UserInputError';
    Object.setPrototypeOf(this, UserInputError.prototype);
  }
}

/**
 * A resource that is expected to exist does not, or it is private and the
 * upstream API answered with a plain 404.
 */
export class MissingResourceError extends UserInputError {
  constructor(message: string, options: Omit<ApiErrorOptions, 'message'> = {}) {
    super({
      code: USER_INPUT_CODE + 404,
      statusCode: 404,
      ...options,
      message,
    });
    this.name = 'MissingResourceError';
    Object.setPrototypeOf(this, MissingResourceError.prototype);
  }
}

/** The resource (possibly) exists but requires the user to log in. */
export class AuthenticationError extends UserInputError {
  constructor(options: ApiErrorOptions = {}) {
    super({
      message:
        'Accessing the requested resource requires authentication, please log in.',
      code: USER_INPUT_CODE + 401,
      statusCode: 401,
      ...options,
    });
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/** Bucket names double as mount points, so they must be unique per session. */
export class DuplicateS3BucketNamesError extends UserInputError {
  constructor(options: ApiErrorOptions = {}) {
    super({
      message: 'The names of all mounted S3 buckets should be unique.',
      code: USER_INPUT_CODE + 1,
      ...options,
    });
    this.name = 'DuplicateS3BucketNamesError';
    Object.setPrototypeOf(this, DuplicateS3BucketNamesError.prototype);
  }
}

/**
 * The image name cannot be parsed. A valid name that cannot be found raises
 * {@link MissingResourceError} instead.
 */
export class ImageParseError extends UserInputError {
  constructor(options: ApiErrorOptions = {}) {
    super({
      message: 'The provided image name cannot be parsed.',
      code: USER_INPUT_CODE + 2,
      ...options,
    });
    this.name = 'ImageParseError';
    Object.setPrototypeOf(this, ImageParseError.prototype);
  }
}
