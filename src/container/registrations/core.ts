/**
 * @fileoverview Registers core application services with the DI container:
 * configuration, logging and the repository cloner with its collaborators.
 * @module src/container/registrations/core
 */
import { container, instanceCachingFactory, Lifecycle } from 'tsyringe';

import { parseClonerConfig } from '@/config/cloner-config.js';
import { parseConfig } from '@/config/index.js';
import {
  AppConfig,
  ClonerConfig,
  ClonerDependencies,
  GitClonerToken,
  Logger,
} from '@/container/tokens.js';
import { GitCloner } from '@/services/clone/GitCloner.js';
import { createDefaultClonerDependencies } from '@/services/clone/types.js';
import { logger } from '@/utils/index.js';

/**
 * Registers core application services and values with the tsyringe container.
 * Configuration is parsed lazily, on first resolution, so a malformed
 * environment surfaces as a `ConfigurationError` where the entry point
 * resolves it.
 */
export const registerCoreServices = (env: NodeJS.ProcessEnv = process.env) => {
  container.register(AppConfig, {
    useFactory: instanceCachingFactory(() => parseConfig(env)),
  });
  container.register(ClonerConfig, {
    useFactory: instanceCachingFactory(() => parseClonerConfig(env)),
  });

  // Logger (as a static value)
  container.register(Logger, { useValue: logger });

  container.register(ClonerDependencies, {
    useFactory: instanceCachingFactory(() => createDefaultClonerDependencies()),
  });

  container.register(
    GitClonerToken,
    { useClass: GitCloner },
    { lifecycle: Lifecycle.Singleton },
  );
};

