/**
 * @fileoverview Command runner contract consumed by the repository cloner
 * @module services/git/core/ICommandRunner
 *
 * A command runner is bound to one working directory and exposes exactly the
 * git subcommands the cloner needs. Every method resolves with the captured
 * stdout or rejects with a `GitCommandError` carrying the exit code and stderr.
 */

export interface ICommandRunner {
  /** Working directory every command runs in. */
  readonly cwd: string;

  init(...args: string[]): Promise<string>;
  /** `config(key, value)` sets a value, `config('--unset', key)` removes it. */
  config(...args: string[]): Promise<string>;
  remote(...args: string[]): Promise<string>;
  fetch(...args: string[]): Promise<string>;
  checkout(...args: string[]): Promise<string>;
  reset(...args: string[]): Promise<string>;
  revParse(...args: string[]): Promise<string>;
  submodule(...args: string[]): Promise<string>;
  /** Runs a `git lfs` subcommand, e.g. `lfs('install', '--local')`. */
  lfs(...args: string[]): Promise<string>;
}

/**
 * Creates the runner bound to a repository's directory.
 */
export type CommandRunnerFactory = (cwd: string) => ICommandRunner;
