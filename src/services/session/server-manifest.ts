/**
 * @fileoverview Read-only view over the manifest of a deployed user session.
 * Extracts what the session API shows about a running server: its image,
 * resource requests, hibernation state and URL.
 * @module src/services/session/server-manifest
 */
import { z } from 'zod';

const LFS_INIT_CONTAINER_PATCH_PATH =
  '/statefulset/spec/template/spec/initContainers/-';
const LFS_AUTO_FETCH_ENV = 'GIT_CLONE_LFS_AUTO_FETCH';

const QuantitySchema = z.union([z.string(), z.number()]);

const EnvVarSchema = z
  .object({ name: z.string().optional(), value: z.string().optional() })
  .passthrough();

const PatchOperationSchema = z
  .object({
    path: z.string().optional(),
    value: z
      .object({ env: z.array(EnvVarSchema).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const UserServerManifestSchema = z
  .object({
    metadata: z
      .object({
        name: z.string(),
        annotations: z.record(z.string()).default({}),
        labels: z.record(z.string()).default({}),
      })
      .passthrough(),
    spec: z
      .object({
        jupyterServer: z
          .object({
            image: z.string(),
            defaultUrl: z.string(),
            resources: z
              .object({ requests: z.record(QuantitySchema).default({}) })
              .passthrough()
              .default({}),
          })
          .passthrough(),
        storage: z
          .object({ size: QuantitySchema.nullable().optional() })
          .passthrough()
          .default({}),
        patches: z
          .array(
            z
              .object({ patch: z.array(PatchOperationSchema).optional() })
              .passthrough(),
          )
          .default([]),
        routing: z.object({ host: z.string(), path: z.string() }).passthrough(),
        auth: z
          .object({ token: z.string().nullable().optional() })
          .passthrough()
          .default({}),
      })
      .passthrough(),
  })
  .passthrough();

export type UserServerManifestData = z.infer<typeof UserServerManifestSchema>;

/**
 * Contents of the `hibernation` annotation.
 */
export const HibernationSchema = z
  .object({
    dirty: z.boolean().optional(),
    commit: z.string().nullable().optional(),
    branch: z.string().nullable().optional(),
  })
  .passthrough();

export type Hibernation = z.infer<typeof HibernationSchema>;

export type Quantity = z.infer<typeof QuantitySchema>;

export interface ServerOptions {
  defaultUrl: string;
  disk_request: Quantity | null;
  mem_request?: Quantity;
  gpu_request?: Quantity;
  cpu_request?: Quantity;
  'ephemeral-storage'?: Quantity | null;
  lfs_auto_fetch?: boolean;
}

type RequestedResource = 'mem_request' | 'gpu_request' | 'cpu_request';

const RESOURCE_REQUEST_KEYS: ReadonlyArray<[string, RequestedResource]> = [
  ['memory', 'mem_request'],
  ['nvidia.com/gpu', 'gpu_request'],
  ['cpu', 'cpu_request'],
];

export interface UserServerManifestOptions {
  /** Image sessions run when the user does not pick one. */
  defaultImage: string;
  /** Whether sessions use persistent volumes for their disk. */
  pvsEnabled: boolean;
}

/**
 * Converts a disk size to a number when it is a plain number in string form;
 * sizes with units stay strings.
 *
 * @example
 * toNumericQuantity('1024') // 1024
 * toNumericQuantity('1G') // '1G'
 */
export const toNumericQuantity = (
  value: Quantity | null | undefined,
): Quantity | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number') {
    return value;
  }
  const trimmed = value.trim();
  const numeric = Number(trimmed);
  return trimmed !== '' && !Number.isNaN(numeric) ? numeric : value;
};

export class UserServerManifest {
  public readonly manifest: UserServerManifestData;

  /**
   * @throws {z.ZodError} When the manifest lacks a required field.
   */
  constructor(
    manifest: unknown,
    private readonly options: UserServerManifestOptions,
  ) {
    this.manifest = UserServerManifestSchema.parse(manifest);
  }

  get name(): string {
    return this.manifest.metadata.name;
  }

  get serverName(): string {
    return this.manifest.metadata.name;
  }

  get image(): string {
    return this.manifest.spec.jupyterServer.image;
  }

  get usingDefaultImage(): boolean {
    return this.image === this.options.defaultImage;
  }

  get annotations(): Record<string, string> {
    return this.manifest.metadata.annotations;
  }

  get labels(): Record<string, string> {
    return this.manifest.metadata.labels;
  }

  get serverOptions(): ServerOptions {
    const { spec } = this.manifest;
    const serverOptions: ServerOptions = {
      defaultUrl: spec.jupyterServer.defaultUrl,
      disk_request: toNumericQuantity(spec.storage.size),
    };

    const requests = spec.jupyterServer.resources.requests;
    for (const [resourceName, optionName] of RESOURCE_REQUEST_KEYS) {
      const requested = requests[resourceName];
      if (requested !== undefined) {
        serverOptions[optionName] = requested;
      }
    }

    const ephemeralStorage = requests['ephemeral-storage'];
    if (ephemeralStorage !== undefined) {
      // Without persistent volumes the session disk is ephemeral storage.
      serverOptions['ephemeral-storage'] = this.options.pvsEnabled
        ? ephemeralStorage
        : serverOptions.disk_request;
    }

    for (const patches of spec.patches) {
      for (const patch of patches.patch ?? []) {
        if (patch.path !== LFS_INIT_CONTAINER_PATCH_PATH) continue;
        for (const env of patch.value?.env ?? []) {
          if (env.name === LFS_AUTO_FETCH_ENV) {
            serverOptions.lfs_auto_fetch = env.value === '1';
          }
        }
      }
    }

    return serverOptions;
  }

  /**
   * The parsed `hibernation` annotation, or `null` when the session was never
   * hibernated.
   *
   * @throws {SyntaxError} When the annotation is not valid JSON.
   */
  get hibernation(): Hibernation | null {
    const raw = this.annotations.hibernation;
    if (!raw) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    return HibernationSchema.parse(parsed);
  }

  get dirty(): boolean {
    return this.hibernation?.dirty ?? false;
  }

  get hibernationCommit(): string | null {
    return this.hibernation?.commit ?? null;
  }

  get hibernationBranch(): string | null {
    return this.hibernation?.branch ?? null;
  }

  get url(): string {
    const { host, path } = this.manifest.spec.routing;
    const token = this.manifest.spec.auth.token;
    const url = `https://${host}${path.replace(/\/+$/, '')}`;
    return token ? `${url}?token=${token}` : url;
  }
}
