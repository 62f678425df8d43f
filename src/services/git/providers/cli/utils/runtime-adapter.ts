/**
 * @fileoverview Process spawning for git commands
 * @module services/git/providers/cli/utils/runtime-adapter
 *
 * Spawns `git` with piped output and reports how the process ended. A
 * non-zero exit is not an error at this level: the executor decides what it
 * means. Spawn failures (git missing, bad cwd), timeouts and cancellation
 * reject.
 */

import { spawn } from 'node:child_process';

/**
 * Outcome of a git process that ran to completion.
 */
export interface GitProcessResult {
  stdout: string;
  stderr: string;
  /** `null` when the process was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface SpawnGitOptions {
  env: Record<string, string>;
  /** Kill the process after this many milliseconds. No limit when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Raised when a git process exceeds its time limit.
 */
export class GitTimeoutError extends Error {
  constructor(
    public readonly args: readonly string[],
    public readonly timeoutMs: number,
  ) {
    super(`Git command timed out after ${timeoutMs / 1000}s: git ${args.join(' ')}`);
    this.name = 'GitTimeoutError';
  }
}

/**
 * Spawns a git command and collects its output.
 *
 * @param args - Git command arguments (e.g., ['rev-parse', '--is-inside-work-tree'])
 * @param cwd - Working directory for command execution
 * @returns Promise resolving once the process has closed
 * @throws Error if the process cannot be spawned, times out, or is cancelled
 *
 * @example
 * ```typescript
 * const result = await spawnGitCommand(['fetch', 'origin'], '/work/demo', {
 *   env: buildGitEnv(),
 * });
 * if (result.exitCode !== 0) console.error(result.stderr);
 * ```
 */
export function spawnGitCommand(
  args: readonly string[],
  cwd: string,
  options: SpawnGitOptions,
): Promise<GitProcessResult> {
  const { env, timeoutMs, signal } = options;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(
        new Error(`Git command cancelled before execution: git ${args.join(' ')}`),
      );
      return;
    }

    const proc = spawn('git', [...args], {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    proc.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    const abortHandler = () => {
      proc.kill('SIGTERM');
      finish(() => reject(new Error(`Git command cancelled: git ${args.join(' ')}`)));
    };
    signal?.addEventListener('abort', abortHandler, { once: true });

    const timeoutHandle =
      timeoutMs !== undefined
        ? setTimeout(() => {
            proc.kill('SIGTERM');
            finish(() => reject(new GitTimeoutError(args, timeoutMs)));
          }, timeoutMs)
        : undefined;

    function finish(settle: () => void): void {
      if (settled) return;
      settled = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      signal?.removeEventListener('abort', abortHandler);
      settle();
    }

    proc.on('error', (error) => {
      finish(() => reject(error));
    });

    proc.on('close', (exitCode, exitSignal) => {
      finish(() =>
        resolve({
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          exitCode,
          signal: exitSignal,
        }),
      );
    });
  });
}
