/**
 * @fileoverview Materializes the session's repositories in the workspace.
 *
 * For every configured repository the cloner initializes an empty repository,
 * sets the user's identity, fetches the requested branch (with temporary
 * credentials unless the user is anonymous), handles LFS content and
 * submodules, keeps cloud storage mounts out of version control and points
 * git at the session's proxy. Repositories that already exist are left alone,
 * so a resumed session keeps its work.
 * @module src/services/clone/GitCloner
 */
import { inject, injectable } from 'tsyringe';

import type { ClonerConfig as ClonerConfigType } from '../../config/cloner-config.js';
import {
  ClonerConfig,
  ClonerDependencies,
  Logger,
} from '../../container/tokens.js';
import {
  BranchDoesNotExistError,
  ConfigurationError,
  GitCommandError,
  GitServerUnavailableError,
  HttpRequestError,
  NoDiskSpaceError,
} from '../../types-global/errors.js';
import type { logger as LoggerType } from '../../utils/internal/logger.js';
import {
  requestContextService,
  type RequestContext,
} from '../../utils/internal/requestContext.js';
import { fetchWithTimeout } from '../../utils/network/fetchWithTimeout.js';
import { isNoSpaceLeftError } from '../git/providers/cli/utils/error-mapper.js';
import { withTemporaryCredentials } from './credentials.js';
import { getLfsTotalSizeBytes } from './lfs.js';
import { Repository } from './Repository.js';
import {
  assertStorageMountsAreFree,
  excludeStoragesFromGit,
} from './storage-exclusion.js';
import type { GitClonerDependencies } from './types.js';

export const REMOTE_NAME = 'origin';
/** Upper bound of one reachability request. */
export const PROBE_REQUEST_TIMEOUT_MS = 10_000;

const isReachableStatus = (status: number) => status >= 200 && status < 400;

@injectable()
export class GitCloner {
  public readonly repositories: readonly Repository[];

  constructor(
    @inject(ClonerConfig) private readonly config: ClonerConfigType,
    @inject(Logger) private readonly logger: typeof LoggerType,
    @inject(ClonerDependencies) private readonly deps: GitClonerDependencies,
  ) {
    this.repositories = config.repositories.map((record) =>
      Repository.fromRecord(
        record,
        config.workspaceMountPath,
        deps.createCommandRunner,
      ),
    );
  }

  /**
   * Constructs a cloner and waits until the git server answers.
   *
   * @throws {GitServerUnavailableError} When the server stays unreachable past
   * the configured timeout.
   */
  static async create(
    config: ClonerConfigType,
    logger: typeof LoggerType,
    deps: GitClonerDependencies,
  ): Promise<GitCloner> {
    const cloner = new GitCloner(config, logger, deps);
    await cloner.waitForServer();
    return cloner;
  }

  /**
   * Polls `repositoryUrl` until it answers with a 2xx or 3xx status. Does
   * nothing when there is no repository to clone.
   */
  async waitForServer(parentContext?: RequestContext): Promise<void> {
    if (this.repositories.length === 0) {
      return;
    }

    const context = requestContextService.createRequestContext({
      operation: 'GitCloner.waitForServer',
      parentContext,
      additionalContext: { repositoryUrl: this.config.repositoryUrl },
    });
    const { remoteTimeoutMs, probeIntervalMs } = this.config;
    const start = this.deps.now();
    let attempts = 0;

    for (;;) {
      attempts += 1;
      if (await this.isServerReachable(context)) {
        this.logger.info(
          `Git server is reachable after ${attempts} attempt(s).`,
          context,
        );
        return;
      }

      const elapsedMs = this.deps.now() - start;
      if (remoteTimeoutMs !== undefined && elapsedMs > remoteTimeoutMs) {
        throw new GitServerUnavailableError(
          `The git server at ${this.config.repositoryUrl} did not become available within ${remoteTimeoutMs}ms.`,
          { data: { attempts, elapsedMs } },
        );
      }

      this.logger.info(
        `Waiting for the git server at ${this.config.repositoryUrl} to become available.`,
        { ...context, attempts, elapsedMs },
      );
      await this.deps.sleep(probeIntervalMs);
    }
  }

  private async isServerReachable(context: RequestContext): Promise<boolean> {
    try {
      await fetchWithTimeout(
        this.config.repositoryUrl,
        PROBE_REQUEST_TIMEOUT_MS,
        context,
        { redirect: 'manual', acceptStatus: isReachableStatus },
      );
      return true;
    } catch (error) {
      if (error instanceof HttpRequestError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Initializes every repository in order. The first failure aborts the run.
   */
  async run(
    storageMounts: readonly string[] = this.config.storageMounts,
    parentContext?: RequestContext,
  ): Promise<void> {
    const context = requestContextService.createRequestContext({
      operation: 'GitCloner.run',
      parentContext,
      additionalContext: { repositoryCount: this.repositories.length },
    });
    this.logger.info('Initializing repositories.', context);

    for (const repository of this.repositories) {
      await this.runHelper(repository, storageMounts, context);
    }

    this.logger.info('All repositories initialized.', context);
  }

  private async runHelper(
    repository: Repository,
    storageMounts: readonly string[],
    parentContext: RequestContext,
  ): Promise<void> {
    const context = requestContextService.createRequestContext({
      operation: 'GitCloner.runHelper',
      parentContext,
      additionalContext: {
        project: `${repository.namespace}/${repository.project}`,
        repositoryPath: repository.absolutePath,
      },
    });

    if (await repository.exists()) {
      this.logger.info(
        `Repository ${repository.project} already exists, skipping.`,
        context,
      );
      return;
    }

    this.logger.info(`Initializing repository ${repository.project}.`, context);
    await this.initializeRepository(repository);

    const { user } = this.config;
    if (user.isAnonymous) {
      await this.clone(repository, context);
      await repository.getGitCli().reset('--hard', repository.commitSha);
    } else if (user.oauthToken) {
      await withTemporaryCredentials(
        {
          cli: repository.getGitCli(),
          repositoryUrl: repository.url,
          token: user.oauthToken,
          credentialsPath: this.config.credentialsPath,
          logger: this.logger,
          context,
        },
        () => this.clone(repository, context),
      );
    } else {
      throw new ConfigurationError(
        'An OAuth token is required for non-anonymous users.',
      );
    }

    assertStorageMountsAreFree(storageMounts);
    if (storageMounts.length > 0) {
      const entries = await excludeStoragesFromGit(
        repository.absolutePath,
        storageMounts,
      );
      this.logger.debug('Excluded storage mounts from git.', {
        ...context,
        excluded: entries,
      });
    }

    await this.setupProxy(repository);
    this.logger.notice(`Repository ${repository.project} is ready.`, context);
  }

  private async initializeRepository(repository: Repository): Promise<void> {
    const cli = repository.getGitCli();
    const { email, fullName } = this.config.user;
    await cli.init();
    if (email) {
      await cli.config('user.email', email);
    }
    if (fullName) {
      await cli.config('user.name', fullName);
    }
    await cli.config('push.default', 'simple');
  }

  private async clone(
    repository: Repository,
    context: RequestContext,
  ): Promise<void> {
    const cli = repository.getGitCli();

    if (this.config.lfsAutoFetch) {
      await cli.lfs('install', '--local');
    } else {
      await cli.lfs('install', '--skip-smudge', '--local');
    }

    await cli.remote('add', REMOTE_NAME, repository.url);
    await cli.fetch(REMOTE_NAME);

    try {
      await cli.checkout(repository.branch);
    } catch (error) {
      if (
        error instanceof GitCommandError &&
        (error.exitCode !== 0 || error.stderr !== '')
      ) {
        if (isNoSpaceLeftError(error.stderr)) {
          throw new NoDiskSpaceError(undefined, {
            cause: error,
            data: { branch: repository.branch },
          });
        }
        throw new BranchDoesNotExistError(
          `Branch ${repository.branch} does not exist in ${repository.namespace}/${repository.project}.`,
          { cause: error, data: { branch: repository.branch } },
        );
      }
      throw error;
    }

    if (this.config.lfsAutoFetch) {
      await this.pullLfsObjects(repository, context);
    }

    try {
      await cli.submodule('init');
      await cli.submodule('update');
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }
      this.logger.error('Failed to initialize submodules.', error, context);
    }
  }

  private async pullLfsObjects(
    repository: Repository,
    context: RequestContext,
  ): Promise<void> {
    const cli = repository.getGitCli();
    const requiredBytes = await getLfsTotalSizeBytes(cli, this.logger, context);
    const availableBytes = await this.deps.freeSpaceBytes(
      repository.absolutePath,
    );

    if (availableBytes < requiredBytes) {
      throw new NoDiskSpaceError(
        `Not enough disk space for the LFS files of ${repository.project}: ${requiredBytes} bytes required, ${availableBytes} available.`,
        { data: { requiredBytes, availableBytes } },
      );
    }

    await cli.lfs('install', '--local');
    await cli.lfs('pull');
  }

  private async setupProxy(repository: Repository): Promise<void> {
    const cli = repository.getGitCli();
    await cli.config('http.proxy', this.config.proxyUrl);
    await cli.config('http.sslVerify', 'false');
  }
}
