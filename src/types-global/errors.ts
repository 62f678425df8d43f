/**
 * @fileoverview Defines the exit-code taxonomy of the repository initializer, the
 * error classes that carry those codes, and the structured errors raised by the
 * git command runner and the HTTP helpers.
 *
 * Only {@link GitCloneError} and its subclasses are part of the user-visible
 * contract: the process exits with their `exitCode`. Every other failure exits
 * with {@link CloneExitCode.Generic}.
 * @module src/types-global/errors
 */

/**
 * Process exit codes reported to the session orchestrator.
 */
export enum CloneExitCode {
  /** Something failed and the end user cannot act on the details. */
  Generic = 200,
  GitServerUnavailable = 201,
  UnexpectedAutosaveFormat = 202,
  NoDiskSpace = 203,
  BranchDoesNotExist = 204,
  GitSubmodule = 205,
}

/**
 * Options accepted by every {@link GitCloneError}.
 */
export interface GitCloneErrorOptions {
  /** Overrides the exit code the error class would report. */
  exitCode?: CloneExitCode;
  /** Structured details for the diagnostic trace. */
  data?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class of the taxonomy. Raising one aborts the run and the process exits
 * with `exitCode`.
 */
export class GitCloneError extends Error {
  public readonly exitCode: CloneExitCode;
  public readonly data?: Record<string, unknown>;

  constructor(
    message = 'Repository initialization failed.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { cause: options.cause });

    this.exitCode = options.exitCode ?? CloneExitCode.Generic;
    if (options.data) {
      this.data = options.data;
    }
    this.name = 'GitCloneError';

    Object.setPrototypeOf(this, GitCloneError.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GitCloneError);
    }
  }
}

export class GitServerUnavailableError extends GitCloneError {
  constructor(
    message = 'The git server did not become available in time.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { exitCode: CloneExitCode.GitServerUnavailable, ...options });
    this.name = 'GitServerUnavailableError';
    Object.setPrototypeOf(this, GitServerUnavailableError.prototype);
  }
}

/** Reserved for autosave branch parsing; never raised by the cloner itself. */
export class UnexpectedAutosaveFormatError extends GitCloneError {
  constructor(
    message = 'An autosave branch does not have the expected format.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, {
      exitCode: CloneExitCode.UnexpectedAutosaveFormat,
      ...options,
    });
    this.name = 'UnexpectedAutosaveFormatError';
    Object.setPrototypeOf(this, UnexpectedAutosaveFormatError.prototype);
  }
}

export class NoDiskSpaceError extends GitCloneError {
  constructor(
    message = 'There is not enough disk space left in the session to clone the repository.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { exitCode: CloneExitCode.NoDiskSpace, ...options });
    this.name = 'NoDiskSpaceError';
    Object.setPrototypeOf(this, NoDiskSpaceError.prototype);
  }
}

export class BranchDoesNotExistError extends GitCloneError {
  constructor(
    message = 'The requested branch does not exist in the repository.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { exitCode: CloneExitCode.BranchDoesNotExist, ...options });
    this.name = 'BranchDoesNotExistError';
    Object.setPrototypeOf(this, BranchDoesNotExistError.prototype);
  }
}

/**
 * Reserved. Submodule failures are logged and swallowed by the cloner.
 */
export class GitSubmoduleError extends GitCloneError {
  constructor(
    message = 'The submodules of the repository could not be initialized.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { exitCode: CloneExitCode.GitSubmodule, ...options });
    this.name = 'GitSubmoduleError';
    Object.setPrototypeOf(this, GitSubmoduleError.prototype);
  }
}

/**
 * A cloud storage mount point is already occupied by a file or directory.
 * There is no dedicated exit code for this case.
 */
export class CloudStorageOverwritesExistingFilesError extends GitCloneError {
  constructor(
    message = 'A cloud storage mount point would overwrite existing files.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { exitCode: CloneExitCode.Generic, ...options });
    this.name = 'CloudStorageOverwritesExistingFilesError';
    Object.setPrototypeOf(
      this,
      CloudStorageOverwritesExistingFilesError.prototype,
    );
  }
}

export class ConfigurationError extends GitCloneError {
  constructor(
    message = 'Invalid application configuration.',
    options: GitCloneErrorOptions = {},
  ) {
    super(message, { exitCode: CloneExitCode.Generic, ...options });
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export interface GitCommandErrorDetails {
  /** Arguments passed to `git`, without the binary itself. */
  args: readonly string[];
  /** `null` when the process never started or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  cause?: unknown;
}

/**
 * Raised by the command runner when a git invocation does not succeed.
 * Not part of the taxonomy: unclassified, it exits with the generic code.
 */
export class GitCommandError extends Error {
  public readonly args: readonly string[];
  public readonly exitCode: number | null;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(message: string, details: GitCommandErrorDetails) {
    super(message, { cause: details.cause });
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
    this.name = 'GitCommandError';
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Raised by {@link fetchWithTimeout} when a request fails, times out, or
 * answers with a status the caller did not accept.
 */
export class HttpRequestError extends Error {
  public readonly reason: 'status' | 'timeout' | 'network';
  public readonly statusCode?: number;
  public readonly data?: Record<string, unknown>;

  constructor(
    reason: 'status' | 'timeout' | 'network',
    message: string,
    options: {
      statusCode?: number;
      data?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.reason = reason;
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
    if (options.data) {
      this.data = options.data;
    }
    this.name = 'HttpRequestError';
    Object.setPrototypeOf(this, HttpRequestError.prototype);
  }
}
