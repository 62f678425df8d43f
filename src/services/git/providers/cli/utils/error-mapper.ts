/**
 * @fileoverview Git CLI error mapping utilities
 * @module services/git/providers/cli/utils/error-mapper
 */

import { GitCommandError } from '@/types-global/errors.js';

import { describeGitCommand } from './command-builder.js';
import { GitTimeoutError, type GitProcessResult } from './runtime-adapter.js';

const NO_SPACE_LEFT_PATTERN = /no space left on device/i;

/**
 * True when stderr reports that the device is full.
 */
export function isNoSpaceLeftError(stderr: string): boolean {
  return NO_SPACE_LEFT_PATTERN.test(stderr);
}

/**
 * Extract the first meaningful line of git's stderr, without the
 * `fatal:`/`error:` prefix.
 */
export function extractGitErrorMessage(stderr: string): string {
  const message = stderr
    .replace(/^fatal:\s*/gim, '')
    .replace(/^error:\s*/gim, '')
    .replace(/^warning:\s*/gim, '')
    .trim();

  const firstLine = message.split('\n').find((line) => line.trim());
  return firstLine?.trim() ?? message;
}

/**
 * Build the error for a git process that exited unsuccessfully.
 */
export function createGitCommandError(
  args: readonly string[],
  result: GitProcessResult,
): GitCommandError {
  const status =
    result.exitCode !== null
      ? `exit code ${result.exitCode}`
      : `signal ${result.signal ?? 'unknown'}`;
  const detail = extractGitErrorMessage(result.stderr);

  return new GitCommandError(
    `${describeGitCommand(args)} failed with ${status}${detail ? `: ${detail}` : ''}`,
    {
      args,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    },
  );
}

/**
 * Map any failure raised while running git to a {@link GitCommandError}.
 *
 * @param error - The original error from spawning or running git
 * @param args - The git arguments that were executed
 */
export function mapGitError(
  error: unknown,
  args: readonly string[],
): GitCommandError {
  if (error instanceof GitCommandError) {
    return error;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);

  if (error instanceof GitTimeoutError) {
    return new GitCommandError(errorMessage, {
      args,
      exitCode: null,
      stdout: '',
      stderr: '',
      cause: error,
    });
  }

  if (isGitNotFoundError(error)) {
    return new GitCommandError(
      'Git command not found. Please ensure Git is installed and in your PATH.',
      {
        args,
        exitCode: 127,
        stdout: '',
        stderr: errorMessage,
        cause: error,
      },
    );
  }

  return new GitCommandError(
    `${describeGitCommand(args)} failed: ${errorMessage}`,
    {
      args,
      exitCode: null,
      stdout: '',
      stderr: errorMessage,
      cause: error,
    },
  );
}

/**
 * Check if an error indicates a missing git installation (`spawn git ENOENT`).
 */
export function isGitNotFoundError(error: unknown): boolean {
  if (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT' &&
    'path' in error &&
    error.path === 'git'
  ) {
    return true;
  }
  const message = (
    error instanceof Error ? error.message : String(error)
  ).toLowerCase();
  return message.includes('git') && message.includes('command not found');
}
