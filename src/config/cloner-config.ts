/**
 * @fileoverview Schema and parser for the repository-cloning settings.
 * The session launcher passes these to the init container through
 * `GIT_CLONE_*` environment variables; nested user fields use a double
 * underscore (`GIT_CLONE_USER__EMAIL`).
 * @module src/config/cloner-config
 */
import { isAbsolute } from 'node:path';

import { z } from 'zod';

import { ConfigurationError } from '../types-global/errors.js';
import { emptyStringAsUndefined, expandTildePath } from './index.js';

export const DEFAULT_CREDENTIALS_PATH = '/tmp/git-credentials';
export const DEFAULT_PROXY_URL = 'http://localhost:8080';
export const DEFAULT_PROBE_INTERVAL_MS = 5_000;

const booleanFromEnv = (val: unknown) => {
  const str = emptyStringAsUndefined(val);
  if (typeof str === 'string') {
    return ['1', 'true', 'yes', 'on'].includes(str.trim().toLowerCase());
  }
  return str;
};

const jsonFromEnv = (val: unknown) => {
  const str = emptyStringAsUndefined(val);
  if (typeof str !== 'string') {
    return str;
  }
  try {
    const parsed: unknown = JSON.parse(str);
    return parsed;
  } catch {
    // Left as a string so the schema reports a readable type error.
    return str;
  }
};

/**
 * One entry of `GIT_CLONE_REPOSITORIES`.
 */
export const RepositoryRecordSchema = z.object({
  namespace: z.string(),
  project: z
    .string()
    .min(1)
    .refine(
      (project) =>
        !project.includes('/') &&
        !project.includes('\\') &&
        project !== '.' &&
        project !== '..',
      { message: 'project must be a single path segment' },
    ),
  branch: z.string().min(1),
  commit_sha: z.string().min(1),
  url: z.string().url(),
});

export type RepositoryRecord = z.infer<typeof RepositoryRecordSchema>;

export const GitUserSchema = z
  .object({
    email: z.preprocess(emptyStringAsUndefined, z.string().optional()),
    fullName: z.preprocess(emptyStringAsUndefined, z.string().optional()),
    oauthToken: z.preprocess(emptyStringAsUndefined, z.string().optional()),
    isAnonymous: z.preprocess(booleanFromEnv, z.boolean().default(false)),
  })
  .superRefine((user, ctx) => {
    if (!user.isAnonymous && !user.oauthToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['oauthToken'],
        message: 'An OAuth token is required for non-anonymous users.',
      });
    }
  });

export type GitUser = z.infer<typeof GitUserSchema>;

export const ClonerConfigSchema = z.object({
  repositories: z.preprocess(
    jsonFromEnv,
    z.array(RepositoryRecordSchema).default([]),
  ),
  workspaceMountPath: z.preprocess(
    expandTildePath,
    z.string().refine((path) => isAbsolute(path), {
      message: 'GIT_CLONE_WORKSPACE_MOUNT_PATH must be an absolute path',
    }),
  ),
  user: GitUserSchema,
  repositoryUrl: z.string().url(),
  lfsAutoFetch: z.preprocess(booleanFromEnv, z.boolean().default(false)),
  storageMounts: z.preprocess(
    jsonFromEnv,
    z.array(z.string().min(1)).default([]),
  ),
  remoteTimeoutMs: z.number().int().positive().optional(),
  credentialsPath: z.preprocess(
    emptyStringAsUndefined,
    z.string().default(DEFAULT_CREDENTIALS_PATH),
  ),
  proxyUrl: z.preprocess(
    emptyStringAsUndefined,
    z.string().url().default(DEFAULT_PROXY_URL),
  ),
  probeIntervalMs: z.number().int().positive().default(DEFAULT_PROBE_INTERVAL_MS),
});

export type ClonerConfig = z.infer<typeof ClonerConfigSchema>;
export type ClonerConfigInput = z.input<typeof ClonerConfigSchema>;

// Unparseable values are passed through for the schema to reject.
const minutesToMs = (val: string | undefined): number | string | undefined => {
  const str = emptyStringAsUndefined(val);
  if (typeof str !== 'string') {
    return undefined;
  }
  const minutes = Number(str);
  return Number.isFinite(minutes) ? Math.round(minutes * 60_000) : str;
};

/**
 * Builds the cloner configuration from environment variables.
 *
 * @throws {ConfigurationError} When a variable is missing or malformed.
 */
export const parseClonerConfig = (
  env: NodeJS.ProcessEnv = process.env,
): ClonerConfig => {
  const rawConfig = {
    repositories: env.GIT_CLONE_REPOSITORIES,
    workspaceMountPath: env.GIT_CLONE_WORKSPACE_MOUNT_PATH,
    user: {
      email: env.GIT_CLONE_USER__EMAIL,
      fullName: env.GIT_CLONE_USER__FULL_NAME,
      oauthToken: env.GIT_CLONE_USER__OAUTH_TOKEN,
      isAnonymous: env.GIT_CLONE_USER__IS_ANONYMOUS,
    },
    repositoryUrl: env.GIT_CLONE_REPOSITORY_URL,
    lfsAutoFetch: env.GIT_CLONE_LFS_AUTO_FETCH,
    storageMounts: env.GIT_CLONE_STORAGE_MOUNTS,
    remoteTimeoutMs: minutesToMs(env.GIT_CLONE_REMOTE_TIMEOUT_MINUTES),
    credentialsPath: env.GIT_CLONE_CREDENTIALS_PATH,
    proxyUrl: env.GIT_CLONE_PROXY_URL,
  };

  const parsed = ClonerConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid repository cloning configuration.', {
      data: { validationErrors: parsed.error.flatten().fieldErrors },
    });
  }
  return parsed.data;
};
