#!/usr/bin/env node
/**
 * @fileoverview Entry point of the session repository initializer. Composes
 * the container, validates the configuration, clones the configured
 * repositories and exits with the code the session orchestrator acts on:
 * 0 on success, a taxonomy code (200-205) on failure.
 * @module src/index
 */
import 'reflect-metadata';

import type { ClonerConfig as ClonerConfigType } from '@/config/cloner-config.js';
import type { AppConfig as AppConfigType } from '@/config/index.js';
import container, {
  AppConfig,
  ClonerConfig,
  composeContainer,
  GitClonerToken,
} from '@/container/index.js';
import type { GitCloner } from '@/services/clone/GitCloner.js';
import {
  ErrorHandler,
  logger,
  requestContextService,
  sanitization,
} from '@/utils/index.js';

const main = async (): Promise<number> => {
  composeContainer();

  let appConfig: AppConfigType;
  let clonerConfig: ClonerConfigType;
  try {
    appConfig = container.resolve<AppConfigType>(AppConfig);
    clonerConfig = container.resolve<ClonerConfigType>(ClonerConfig);
  } catch (error) {
    return ErrorHandler.handleFatalError(error);
  }

  logger.initialize(appConfig.logLevel);
  const context = requestContextService.createRequestContext({
    operation: 'RepositoryInitialization',
    applicationName: appConfig.pkg.name,
    applicationVersion: appConfig.pkg.version,
  });
  logger.debug('Configuration loaded.', {
    ...context,
    config: sanitization.sanitizeForLogging(clonerConfig),
  });

  try {
    const cloner = container.resolve<GitCloner>(GitClonerToken);
    await cloner.waitForServer(context);
    await cloner.run(clonerConfig.storageMounts, context);
    logger.info('Repository initialization completed.', context);
    return 0;
  } catch (error) {
    return ErrorHandler.handleFatalError(error, { context });
  }
};

const exitCode = await main();
await logger.close();
process.exit(exitCode);
