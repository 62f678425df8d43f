/**
 * @fileoverview Tests for the repository descriptor.
 * @module tests/services/clone/Repository.test
 */
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { Repository } from '../../../src/services/clone/Repository.js';
import { ConfigurationError } from '../../../src/types-global/errors.js';
import { makeRepositoryRecord } from '../../mocks/clonerConfig.js';
import {
  createFakeRunnerFactory,
  FakeCommandRunner,
} from '../../mocks/fakeCommandRunner.js';

describe('Repository', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'repository-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('derives its fields from a record', () => {
    const { factory } = createFakeRunnerFactory();
    const repository = Repository.fromRecord(
      makeRepositoryRecord(),
      workspace,
      factory,
    );

    expect(repository).toMatchObject({
      namespace: 'ns',
      project: 'demo',
      branch: 'main',
      commitSha: 'abc123',
      url: 'https://git.example.test/ns/demo.git',
      absolutePath: path.join(workspace, 'demo'),
    });
  });

  it('rejects a project that is not a single path segment', () => {
    const { factory } = createFakeRunnerFactory();

    expect(() =>
      Repository.fromRecord(
        makeRepositoryRecord({ project: '../escape' }),
        workspace,
        factory,
      ),
    ).toThrow(ConfigurationError);
  });

  it('creates the directory and the runner once, on first use', () => {
    const factory = vi.fn((cwd: string) => new FakeCommandRunner(cwd));
    const repository = Repository.fromRecord(
      makeRepositoryRecord(),
      workspace,
      factory,
    );

    expect(existsSync(repository.absolutePath)).toBe(false);
    const first = repository.getGitCli();
    const second = repository.getGitCli();

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith(repository.absolutePath);
    expect(existsSync(repository.absolutePath)).toBe(true);
  });

  it.each([
    ['true\n', true],
    ['TRUE', true],
    ['false\n', false],
    ['', false],
  ])('exists() reads %j as %s', async (output, expected) => {
    const { factory } = createFakeRunnerFactory((runner) => {
      runner.respond('rev-parse --is-inside-work-tree', output);
    });
    const repository = Repository.fromRecord(
      makeRepositoryRecord(),
      workspace,
      factory,
    );

    await expect(repository.exists()).resolves.toBe(expected);
  });

  it('exists() is false when git fails', async () => {
    const { factory } = createFakeRunnerFactory((runner) => {
      runner.fail('rev-parse', {
        stderr: 'fatal: not a git repository',
        exitCode: 128,
      });
    });
    const repository = Repository.fromRecord(
      makeRepositoryRecord(),
      workspace,
      factory,
    );

    await expect(repository.exists()).resolves.toBe(false);
  });

  it('exists() propagates errors that are not git failures', async () => {
    const { factory } = createFakeRunnerFactory((runner) => {
      runner.fail('rev-parse', new RangeError('unexpected'));
    });
    const repository = Repository.fromRecord(
      makeRepositoryRecord(),
      workspace,
      factory,
    );

    await expect(repository.exists()).rejects.toThrow(RangeError);
  });
});
