/**
 * @fileoverview Git LFS helpers.
 * @module src/services/clone/lfs
 */
import { z } from 'zod';

import type { logger as LoggerType } from '../../utils/internal/logger.js';
import type { RequestContext } from '../../utils/internal/requestContext.js';
import type { ICommandRunner } from '../git/core/ICommandRunner.js';

const LfsFilesSchema = z.object({
  files: z
    .array(z
        .object({ size: z.number().nonnegative().optional().default(0) })
        .passthrough())
    .nullable()
    .default([]),
});

/**
 * Total size in bytes of the LFS objects referenced by the checked-out tree,
 * from `git lfs ls-files --json`. Anything unreadable counts as 0.
 */
export async function getLfsTotalSizeBytes(
  cli: ICommandRunner,
  logger: typeof LoggerType,
  context: RequestContext,
): Promise<number> {
  let raw: unknown;
  try {
    raw = JSON.parse(await cli.lfs('ls-files', '--json'));
  } catch (error) {
    logger.debug(
      `Could not list LFS files, assuming none: ${error instanceof Error ? error.message : String(error)}`,
      context,
    );
    return 0;
  }

  const parsed = LfsFilesSchema.safeParse(raw);
  if (!parsed.success) {
    logger.debug('Unexpected LFS file listing, assuming no LFS files.', context);
    return 0;
  }
  return (parsed.data.files ?? []).reduce((total, file) => total + file.size, 0);
}
