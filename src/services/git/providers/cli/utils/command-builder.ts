/**
 * @fileoverview Environment and argument preparation for git invocations
 * @module services/git/providers/cli/utils/command-builder
 */

/**
 * Build environment variables for a git command.
 *
 * Keeps the process environment, disables credential prompts and pins the
 * locale; stderr is matched against English messages such as
 * "No space left on device".
 *
 * @param baseEnv - Environment to start from, usually `process.env`
 * @param additionalEnv - Overrides applied last
 */
export function buildGitEnv(
  baseEnv: NodeJS.ProcessEnv = process.env,
  additionalEnv?: Record<string, string>,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  Object.assign(env, {
    GIT_TERMINAL_PROMPT: '0',
    LANG: 'C.UTF-8',
    LC_ALL: 'C.UTF-8',
  });

  if (additionalEnv) {
    Object.assign(env, additionalEnv);
  }

  return env;
}

/**
 * Validate git command arguments.
 *
 * Arguments go to `spawn` as an array, never through a shell. Null bytes
 * are rejected.
 *
 * @throws Error if an argument contains a null byte
 */
export function validateGitArgs(args: readonly string[]): void {
  for (const arg of args) {
    if (arg.includes('\0')) {
      throw new Error(`Null byte detected in git argument: ${arg}`);
    }
  }
}

/**
 * Human-readable form of a git invocation for logs and error messages.
 */
export function describeGitCommand(args: readonly string[]): string {
  return ['git', ...args].join(' ');
}
