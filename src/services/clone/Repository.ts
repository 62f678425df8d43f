/**
 * @fileoverview Descriptor of one repository to materialize in the workspace.
 * @module src/services/clone/Repository
 */
import { existsSync, mkdirSync } from 'node:fs';
import path from 'node:path';

import {
  RepositoryRecordSchema,
  type RepositoryRecord,
} from '../../config/cloner-config.js';
import { ConfigurationError, GitCommandError } from '../../types-global/errors.js';
import type {
  CommandRunnerFactory,
  ICommandRunner,
} from '../git/core/ICommandRunner.js';

export class Repository {
  private gitCli: ICommandRunner | undefined;

  private constructor(
    public readonly namespace: string,
    public readonly project: string,
    public readonly branch: string,
    public readonly commitSha: string,
    public readonly url: string,
    /** `<workspace>/<project>` */
    public readonly absolutePath: string,
    private readonly createCommandRunner: CommandRunnerFactory,
  ) {}

  /**
   * Builds a descriptor from a raw `GIT_CLONE_REPOSITORIES` entry.
   *
   * @throws {ConfigurationError} When the record is malformed.
   */
  static fromRecord(
    record: unknown,
    workspaceMountPath: string,
    createCommandRunner: CommandRunnerFactory,
  ): Repository {
    const parsed = RepositoryRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid repository record.', {
        data: { validationErrors: parsed.error.flatten().fieldErrors },
      });
    }
    const data: RepositoryRecord = parsed.data;
    return new Repository(
      data.namespace,
      data.project,
      data.branch,
      data.commit_sha,
      data.url,
      path.join(workspaceMountPath, data.project),
      createCommandRunner,
    );
  }

  /**
   * The runner bound to {@link absolutePath}. Created on first use, together
   * with the directory when it is missing, and reused afterwards.
   */
  getGitCli(): ICommandRunner {
    if (this.gitCli === undefined) {
      if (!existsSync(this.absolutePath)) {
        mkdirSync(this.absolutePath, { recursive: true });
      }
      this.gitCli = this.createCommandRunner(this.absolutePath);
    }
    return this.gitCli;
  }

  /**
   * Whether {@link absolutePath} is already inside a git work tree. A failing
   * git command means it is not.
   */
  async exists(): Promise<boolean> {
    try {
      const output = await this.getGitCli().revParse('--is-inside-work-tree');
      return output.trim().toLowerCase() === 'true';
    } catch (error) {
      if (error instanceof GitCommandError) {
        return false;
      }
      throw error;
    }
  }
}
