/**
 * @fileoverview Scoped git credentials for authenticated clones. The OAuth
 * token lives in a `git credential-store` file only while the wrapped
 * operation runs; the file and the related git config are removed afterwards,
 * whatever the outcome.
 * @module src/services/clone/credentials
 */
import { rm, writeFile } from 'node:fs/promises';

import { GitCommandError } from '../../types-global/errors.js';
import type { logger as LoggerType } from '../../utils/internal/logger.js';
import {
  requestContextService,
  type RequestContext,
} from '../../utils/internal/requestContext.js';
import type { ICommandRunner } from '../git/core/ICommandRunner.js';

const CREDENTIAL_HELPER_KEY = 'credential.helper';

export interface TemporaryCredentialsOptions {
  cli: ICommandRunner;
  repositoryUrl: string;
  token: string;
  credentialsPath: string;
  logger: typeof LoggerType;
  context?: RequestContext;
}

/**
 * The git config key enabling basic auth for the repository's LFS endpoint.
 *
 * @example
 * lfsAccessConfigKey('https://git.example.org/ns/demo.git')
 * // 'lfs.https://git.example.org/ns/demo.git/info/lfs.access'
 */
export const lfsAccessConfigKey = (repositoryUrl: string): string =>
  `lfs.${repositoryUrl.replace(/\/+$/, '')}/info/lfs.access`;

/**
 * One line in `git credential-store` format.
 */
export const formatCredentialLine = (
  repositoryUrl: string,
  token: string,
): string => {
  const { host } = new URL(repositoryUrl);
  return `https://oauth2:${encodeURIComponent(token)}@${host}`;
};

/**
 * Runs `operation` with credentials configured for `repositoryUrl`.
 * An error from `operation` is rethrown after cleanup, even if cleanup fails.
 */
export async function withTemporaryCredentials<T>(
  options: TemporaryCredentialsOptions,
  operation: () => Promise<T>,
): Promise<T> {
  const { cli, repositoryUrl, token, credentialsPath, logger } = options;
  const context = requestContextService.createRequestContext({
    operation: 'withTemporaryCredentials',
    parentContext: options.context,
    additionalContext: { repositoryPath: cli.cwd, credentialsPath },
  });

  const cleanup = () =>
    removeCredentials(cli, repositoryUrl, credentialsPath, logger, context);

  let result: T;
  try {
    await writeFile(
      credentialsPath,
      `${formatCredentialLine(repositoryUrl, token)}\n`,
      { mode: 0o600 },
    );
    await cli.config(lfsAccessConfigKey(repositoryUrl), 'basic');
    await cli.config(CREDENTIAL_HELPER_KEY, `store --file=${credentialsPath}`);
    logger.debug('Temporary git credentials configured.', context);

    result = await operation();
  } catch (error) {
    try {
      await cleanup();
    } catch (cleanupError) {
      logger.error(
        'Failed to remove temporary git credentials.',
        cleanupError instanceof Error
          ? cleanupError
          : new Error(String(cleanupError)),
        context,
      );
    }
    throw error;
  }

  await cleanup();
  return result;
}

async function removeCredentials(
  cli: ICommandRunner,
  repositoryUrl: string,
  credentialsPath: string,
  logger: typeof LoggerType,
  context: RequestContext,
): Promise<void> {
  await rm(credentialsPath, { force: true });

  for (const key of [CREDENTIAL_HELPER_KEY, lfsAccessConfigKey(repositoryUrl)]) {
    try {
      await cli.config('--unset', key);
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }
      logger.warning(`Failed to unset git config ${key}: ${error.message}`, {
        ...context,
        configKey: key,
        gitExitCode: error.exitCode,
      });
    }
  }
  logger.debug('Temporary git credentials removed.', context);
}
