/**
 * @fileoverview In-memory command runner that records every git invocation
 * and answers from scripted outputs and failures.
 * @module tests/mocks/fakeCommandRunner
 */
import { GitCommandError } from '../../src/types-global/errors.js';
import type {
  CommandRunnerFactory,
  ICommandRunner,
} from '../../src/services/git/core/ICommandRunner.js';

/** A scripted reaction to a command, matched by its joined argv prefix. */
type Script =
  | { kind: 'output'; stdout: string }
  | { kind: 'failure'; error: Error }
  | { kind: 'callback'; run: (argv: string[]) => string | Promise<string> };

export interface GitFailureSpec {
  stderr?: string;
  exitCode?: number | null;
}

export const gitFailure = (
  argv: string[],
  { stderr = '', exitCode = 1 }: GitFailureSpec = {},
): GitCommandError =>
  new GitCommandError(`git ${argv.join(' ')} failed`, {
    args: argv,
    exitCode,
    stdout: '',
    stderr,
  });

export class FakeCommandRunner implements ICommandRunner {
  /** Every invocation as git argv, e.g. `['config', 'push.default', 'simple']`. */
  public readonly calls: string[][] = [];
  private readonly scripts = new Map<string, Script>();

  constructor(public readonly cwd: string) {}

  /** Answer the command whose argv starts with `prefix` with `stdout`. */
  respond(prefix: string, stdout: string): this {
    this.scripts.set(prefix, { kind: 'output', stdout });
    return this;
  }

  /** Fail the command whose argv starts with `prefix`. */
  fail(prefix: string, spec: GitFailureSpec | Error = {}): this {
    const error =
      spec instanceof Error ? spec : gitFailure(prefix.split(' '), spec);
    this.scripts.set(prefix, { kind: 'failure', error });
    return this;
  }

  onCommand(
    prefix: string,
    run: (argv: string[]) => string | Promise<string>,
  ): this {
    this.scripts.set(prefix, { kind: 'callback', run });
    return this;
  }

  /** Invocations rendered as `git ...` strings. */
  get commands(): string[] {
    return this.calls.map((argv) => ['git', ...argv].join(' '));
  }

  init(...args: string[]) {
    return this.invoke(['init', ...args]);
  }
  config(...args: string[]) {
    return this.invoke(['config', ...args]);
  }
  remote(...args: string[]) {
    return this.invoke(['remote', ...args]);
  }
  fetch(...args: string[]) {
    return this.invoke(['fetch', ...args]);
  }
  checkout(...args: string[]) {
    return this.invoke(['checkout', ...args]);
  }
  reset(...args: string[]) {
    return this.invoke(['reset', ...args]);
  }
  revParse(...args: string[]) {
    return this.invoke(['rev-parse', ...args]);
  }
  submodule(...args: string[]) {
    return this.invoke(['submodule', ...args]);
  }
  lfs(...args: string[]) {
    return this.invoke(['lfs', ...args]);
  }

  private async invoke(argv: string[]): Promise<string> {
    this.calls.push(argv);
    const joined = argv.join(' ');
    let match: Script | undefined;
    let matchLength = -1;
    for (const [prefix, script] of this.scripts) {
      if (
        (joined === prefix || joined.startsWith(`${prefix} `)) &&
        prefix.length > matchLength
      ) {
        match = script;
        matchLength = prefix.length;
      }
    }

    if (!match) return '';
    switch (match.kind) {
      case 'output':
        return match.stdout;
      case 'failure':
        throw match.error;
      case 'callback':
        return match.run(argv);
    }
  }
}

/**
 * Factory handing out one {@link FakeCommandRunner} per directory, kept in
 * `runners` so tests can inspect them.
 */
export const createFakeRunnerFactory = (
  configure?: (runner: FakeCommandRunner) => void,
): { factory: CommandRunnerFactory; runners: Map<string, FakeCommandRunner> } => {
  const runners = new Map<string, FakeCommandRunner>();
  const factory: CommandRunnerFactory = (cwd) => {
    const runner = new FakeCommandRunner(cwd);
    configure?.(runner);
    runners.set(cwd, runner);
    return runner;
  };
  return { factory, runners };
};
