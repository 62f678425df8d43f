/**
 * @fileoverview Loads, validates, and exports the ambient application
 * configuration (package identity, log level, environment, log directory).
 * Values come from environment variables, optionally seeded from a `.env`
 * file, and are validated with Zod. The repository-cloning settings live in
 * `cloner-config.ts` and are parsed on demand, since they are only required
 * when the cloner actually runs.
 *
 * @module src/config/index
 */
import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';

import dotenv from 'dotenv';
import { z } from 'zod';

import { ConfigurationError } from '../types-global/errors.js';

dotenv.config();

const PackageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

const readPackageManifest = (): z.infer<typeof PackageManifestSchema> => {
  try {
    const raw = readFileSync(
      new URL('../../package.json', import.meta.url),
      'utf-8',
    );
    const parsed = PackageManifestSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
};

// --- Helper Functions ---
export const emptyStringAsUndefined = (val: unknown) => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined;
  }
  return val;
};

/**
 * Expands a leading tilde to the user's home directory.
 *
 * @example
 * expandTildePath('~/logs') // '/home/jovyan/logs'
 * expandTildePath('') // undefined
 */
export const expandTildePath = (path: unknown): string | undefined => {
  if (typeof path !== 'string' || path.trim() === '') {
    return undefined;
  }

  const trimmed = path.trim();
  if (trimmed.startsWith('~/')) {
    return `${homedir()}${trimmed.slice(1)}`;
  }
  if (trimmed === '~') {
    return homedir();
  }
  return trimmed;
};

// --- Schema Definition ---
const ConfigSchema = z.object({
  pkg: z.object({
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
  }),
  logLevel: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            warn: 'warning',
            err: 'error',
            information: 'info',
            fatal: 'emerg',
            critical: 'crit',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum([
        'debug',
        'info',
        'notice',
        'warning',
        'error',
        'crit',
        'alert',
        'emerg',
      ]),
    )
    .default('info'),
  logsPath: z.preprocess(expandTildePath, z.string().optional()),
  environment: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            dev: 'development',
            prod: 'production',
            test: 'testing',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum(['development', 'production', 'testing']),
    )
    .default('production'),
});

// --- Parsing Logic ---
const parseConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const manifest = readPackageManifest();

  const rawConfig = {
    pkg: {
      name: env.PACKAGE_NAME ?? manifest.name ?? 'session-repo-init',
      version: env.PACKAGE_VERSION ?? manifest.version ?? '0.0.0',
      description: env.PACKAGE_DESCRIPTION ?? manifest.description,
    },
    logLevel: env.LOG_LEVEL,
    logsPath: env.LOGS_DIR,
    environment: env.NODE_ENV,
  };

  const parsedConfig = ConfigSchema.safeParse(rawConfig);

  if (!parsedConfig.success) {
    if (process.stdout.isTTY) {
      console.error(
        'Invalid configuration found. Please check your environment variables.',
        parsedConfig.error.flatten().fieldErrors,
      );
    }
    throw new ConfigurationError('Invalid application configuration.', {
      data: { validationErrors: parsedConfig.error.flatten().fieldErrors },
    });
  }

  return parsedConfig.data;
};

// Read at import time by the logger. Invalid values fall back to defaults
// here; the entry point validates strictly when it resolves AppConfig.
const config = (() => {
  try {
    return parseConfig();
  } catch {
    return ConfigSchema.parse({
      pkg: { name: 'session-repo-init', version: '0.0.0' },
    });
  }
})();

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = AppConfig['logLevel'];

export { config, ConfigSchema, parseConfig };
