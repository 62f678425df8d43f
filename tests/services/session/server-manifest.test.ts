/**
 * @fileoverview Tests for the session manifest reader.
 * @module tests/services/session/server-manifest.test
 */
import { describe, expect, it } from 'vitest';

import {
  toNumericQuantity,
  UserServerManifest,
} from '../../../src/services/session/server-manifest.js';

const DEFAULT_IMAGE = 'registry.example.test/sessions/default:1.0';

const makeManifest = (
  overrides: {
    annotations?: Record<string, string>;
    requests?: Record<string, string | number>;
    storageSize?: string | number;
    patches?: unknown[];
    token?: string;
    path?: string;
  } = {},
) => ({
  metadata: {
    name: 'demo-session',
    annotations: overrides.annotations ?? { 'example.test/project': 'demo' },
    labels: { app: 'session' },
  },
  spec: {
    jupyterServer: {
      image: DEFAULT_IMAGE,
      defaultUrl: '/lab',
      resources: {
        requests: overrides.requests ?? { cpu: '500m', memory: '1G' },
      },
    },
    storage: { size: overrides.storageSize ?? '10G' },
    patches: overrides.patches ?? [],
    routing: { host: 'sessions.example.test', path: overrides.path ?? '/sessions/demo-session/' },
    auth: { token: overrides.token ?? '' },
  },
});

const lfsPatch = (value: string) => ({
  type: 'application/json-patch+json',
  patch: [
    {
      op: 'add',
      path: '/statefulset/spec/template/spec/initContainers/-',
      value: {
        name: 'git-clone',
        env: [
          { name: 'GIT_CLONE_REPOSITORY_URL', value: 'https://git.example.test' },
          { name: 'GIT_CLONE_LFS_AUTO_FETCH', value },
        ],
      },
    },
  ],
});

describe('UserServerManifest', () => {
  const options = { defaultImage: DEFAULT_IMAGE, pvsEnabled: true };

  it('exposes metadata', () => {
    const manifest = new UserServerManifest(makeManifest(), options);

    expect(manifest.name).toBe('demo-session');
    expect(manifest.serverName).toBe('demo-session');
    expect(manifest.image).toBe(DEFAULT_IMAGE);
    expect(manifest.usingDefaultImage).toBe(true);
    expect(manifest.labels).toEqual({ app: 'session' });
    expect(manifest.annotations).toEqual({ 'example.test/project': 'demo' });
  });

  it('detects a custom image', () => {
    const manifest = new UserServerManifest(makeManifest(), {
      ...options,
      defaultImage: 'registry.example.test/other:2.0',
    });

    expect(manifest.usingDefaultImage).toBe(false);
  });

  it('collects server options', () => {
    const manifest = new UserServerManifest(
      makeManifest({
        requests: {
          cpu: '500m',
          memory: '1G',
          'nvidia.com/gpu': 1,
          'ephemeral-storage': '5G',
        },
        patches: [lfsPatch('1')],
      }),
      options,
    );

    expect(manifest.serverOptions).toEqual({
      defaultUrl: '/lab',
      disk_request: '10G',
      cpu_request: '500m',
      mem_request: '1G',
      gpu_request: 1,
      'ephemeral-storage': '5G',
      lfs_auto_fetch: true,
    });
  });

  it('uses the disk request as ephemeral storage without persistent volumes', () => {
    const manifest = new UserServerManifest(
      makeManifest({
        requests: { 'ephemeral-storage': '5G' },
        storageSize: '1073741824',
        patches: [lfsPatch('0')],
      }),
      { ...options, pvsEnabled: false },
    );

    expect(manifest.serverOptions).toEqual({
      defaultUrl: '/lab',
      disk_request: 1_073_741_824,
      'ephemeral-storage': 1_073_741_824,
      lfs_auto_fetch: false,
    });
  });

  it('reads the hibernation annotation', () => {
    const manifest = new UserServerManifest(
      makeManifest({
        annotations: {
          hibernation: JSON.stringify({
            dirty: true,
            commit: 'abc123',
            branch: 'main',
            date: '2024-01-01T00:00:00Z',
          }),
        },
      }),
      options,
    );

    expect(manifest.hibernation).toMatchObject({ dirty: true, commit: 'abc123' });
    expect(manifest.dirty).toBe(true);
    expect(manifest.hibernationCommit).toBe('abc123');
    expect(manifest.hibernationBranch).toBe('main');
  });

  it('treats a session that never hibernated as clean', () => {
    const manifest = new UserServerManifest(makeManifest(), options);

    expect(manifest.hibernation).toBeNull();
    expect(manifest.dirty).toBe(false);
    expect(manifest.hibernationCommit).toBeNull();
    expect(manifest.hibernationBranch).toBeNull();
  });

  it('builds the session URL', () => {
    expect(new UserServerManifest(makeManifest(), options).url).toBe(
      'https://sessions.example.test/sessions/demo-session',
    );
    expect(
      new UserServerManifest(makeManifest({ token: 'test-token' }), options).url,
    ).toBe('https://sessions.example.test/sessions/demo-session?token=test-token');
  });

  it('rejects a manifest without routing', () => {
    const { spec, ...rest } = makeManifest();
    const { routing: _routing, ...specWithoutRouting } = spec;

    expect(
      () => new UserServerManifest({ ...rest, spec: specWithoutRouting }, options),
    ).toThrow();
  });
});

describe('toNumericQuantity', () => {
  it.each([
    ['1024', 1024],
    ['1.5', 1.5],
    ['10G', '10G'],
    [' ', ' '],
    [2048, 2048],
    [null, null],
    [undefined, null],
  ])('converts %j to %j', (input, expected) => {
    expect(toNumericQuantity(input)).toBe(expected);
  });
});
