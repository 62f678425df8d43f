/**
 * @fileoverview Collaborators the repository cloner receives from outside,
 * and their production defaults.
 * @module src/services/clone/types
 */
import { statfs } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';

import type { CommandRunnerFactory } from '../git/core/ICommandRunner.js';
import { createGitCliFactory } from '../git/providers/cli/GitCli.js';

export interface GitClonerDependencies {
  /** Creates the git runner bound to a repository directory. */
  createCommandRunner: CommandRunnerFactory;
  /** Bytes available to unprivileged users on the filesystem holding `path`. */
  freeSpaceBytes(path: string): Promise<number>;
  sleep(ms: number): Promise<void>;
  /** Milliseconds since the epoch. */
  now(): number;
}

export const getFreeSpaceBytes = async (path: string): Promise<number> => {
  const stats = await statfs(path);
  return stats.bavail * stats.bsize;
};

export const createDefaultClonerDependencies = (): GitClonerDependencies => ({
  createCommandRunner: createGitCliFactory(),
  freeSpaceBytes: getFreeSpaceBytes,
  sleep: async (ms) => {
    await sleep(ms);
  },
  now: () => Date.now(),
});
