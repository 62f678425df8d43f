/**
 * @fileoverview Git CLI command executor
 * @module services/git/providers/cli/utils/git-executor
 *
 * Validates arguments, prepares the environment, spawns git and turns every
 * unsuccessful outcome into a `GitCommandError`. No timeout is applied unless
 * the caller asks for one: clones and LFS pulls of large repositories can run
 * for a long time.
 */

import { buildGitEnv, validateGitArgs } from './command-builder.js';
import { createGitCommandError, mapGitError } from './error-mapper.js';
import { spawnGitCommand } from './runtime-adapter.js';

export interface ExecuteGitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

/**
 * Executes a git command.
 *
 * @param args - Git command arguments (e.g., ['checkout', 'main'])
 * @param cwd - The working directory to execute the command in
 * @returns The stdout and stderr of the command
 * @throws {GitCommandError} If the command fails to start, times out, or
 * exits with a non-zero status
 *
 * @example
 * ```typescript
 * const { stdout } = await executeGitCommand(
 *   ['rev-parse', '--is-inside-work-tree'],
 *   '/work/demo',
 * );
 * ```
 */
export async function executeGitCommand(
  args: readonly string[],
  cwd: string,
  options: ExecuteGitOptions = {},
): Promise<{ stdout: string; stderr: string }> {
  let result;
  try {
    validateGitArgs(args);
    result = await spawnGitCommand(args, cwd, {
      env: buildGitEnv(process.env, options.env),
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
    });
  } catch (error) {
    throw mapGitError(error, args);
  }

  if (result.exitCode !== 0) {
    throw createGitCommandError(args, result);
  }

  return { stdout: result.stdout, stderr: result.stderr };
}
