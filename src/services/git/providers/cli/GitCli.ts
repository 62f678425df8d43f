/**
 * @fileoverview Command runner backed by the native git binary
 * @module services/git/providers/cli/GitCli
 *
 * Each method maps to one git subcommand and runs it in the runner's working
 * directory. Requires `git` (and `git-lfs` for the `lfs` subcommands) on the
 * PATH.
 */

import type {
  CommandRunnerFactory,
  ICommandRunner,
} from '../../core/ICommandRunner.js';
import { executeGitCommand, type ExecuteGitOptions } from './utils/index.js';

export interface GitCliOptions {
  /** Per-command time limit. Commands run unbounded when omitted. */
  timeoutMs?: number;
  env?: Record<string, string>;
}

export class GitCli implements ICommandRunner {
  constructor(
    public readonly cwd: string,
    private readonly options: GitCliOptions = {},
  ) {}

  init(...args: string[]): Promise<string> {
    return this.run('init', args);
  }

  config(...args: string[]): Promise<string> {
    return this.run('config', args);
  }

  remote(...args: string[]): Promise<string> {
    return this.run('remote', args);
  }

  fetch(...args: string[]): Promise<string> {
    return this.run('fetch', args);
  }

  checkout(...args: string[]): Promise<string> {
    return this.run('checkout', args);
  }

  reset(...args: string[]): Promise<string> {
    return this.run('reset', args);
  }

  revParse(...args: string[]): Promise<string> {
    return this.run('rev-parse', args);
  }

  submodule(...args: string[]): Promise<string> {
    return this.run('submodule', args);
  }

  lfs(...args: string[]): Promise<string> {
    return this.run('lfs', args);
  }

  private async run(subcommand: string, args: string[]): Promise<string> {
    const executeOptions: ExecuteGitOptions = {};
    if (this.options.timeoutMs !== undefined) {
      executeOptions.timeoutMs = this.options.timeoutMs;
    }
    if (this.options.env) {
      executeOptions.env = this.options.env;
    }
    const { stdout } = await executeGitCommand(
      [subcommand, ...args],
      this.cwd,
      executeOptions,
    );
    return stdout;
  }
}

/**
 * Factory producing {@link GitCli} runners that share the same options.
 */
export const createGitCliFactory =
  (options: GitCliOptions = {}): CommandRunnerFactory =>
  (cwd) =>
    new GitCli(cwd, options);
