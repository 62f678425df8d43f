/**
 * @fileoverview Keeps cloud storage mount points out of version control.
 * @module src/services/clone/storage-exclusion
 */
import { existsSync } from 'node:fs';
import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import { CloudStorageOverwritesExistingFilesError } from '../../types-global/errors.js';

/**
 * @throws {CloudStorageOverwritesExistingFilesError} When a mount point is
 * already occupied; mounting there would hide the existing files.
 */
export function assertStorageMountsAreFree(mounts: readonly string[]): void {
  const occupied = mounts.filter((mount) => existsSync(mount));
  if (occupied.length > 0) {
    throw new CloudStorageOverwritesExistingFilesError(
      `Cloud storage mount points already exist: ${occupied.join(', ')}`,
      { data: { mountPaths: occupied } },
    );
  }
}

/**
 * Repository-relative POSIX path of `mount`, or `undefined` unless the mount
 * lies strictly inside `repositoryPath`.
 */
export function relativeMountPath(
  repositoryPath: string,
  mount: string,
): string | undefined {
  const relative = path.relative(
    path.resolve(repositoryPath),
    path.resolve(mount),
  );
  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return undefined;
  }
  return relative.split(path.sep).join(path.posix.sep);
}

/**
 * Appends the mounts inside the repository to `.git/info/exclude`.
 *
 * @returns The entries written.
 */
export async function excludeStoragesFromGit(
  repositoryPath: string,
  mounts: readonly string[],
): Promise<string[]> {
  const entries = mounts.flatMap((mount) => {
    const relative = relativeMountPath(repositoryPath, mount);
    return relative === undefined ? [] : [relative];
  });

  const infoDir = path.join(repositoryPath, '.git', 'info');
  await mkdir(infoDir, { recursive: true });
  await appendFile(
    path.join(infoDir, 'exclude'),
    `\n${entries.map((entry) => `${entry}\n`).join('')}`,
  );
  return entries;
}
