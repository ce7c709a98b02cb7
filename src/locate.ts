/**
 * Repository discovery from a working directory.
 */

import * as nodeFs from 'node:fs';
import * as path from 'node:path';
import { NotARepositoryError, errorCode, type FsModule } from './types.js';
import { DEFAULT_METADATA_DIR } from './config.js';

/**
 * Find the nearest directory at or above `start` that contains the
 * metadata directory.
 *
 * @param start - Directory to start from.
 * @param opts.metadataDir - Metadata directory name (default `.snapvc`).
 * @param opts.fs - Filesystem module (default: Node.js `node:fs`).
 * @returns Absolute repository root.
 * @throws {NotARepositoryError} If no ancestor holds a repository.
 */
export async function findRepositoryRoot(
  start: string,
  opts: { metadataDir?: string; fs?: FsModule } = {},
): Promise<string> {
  const fsModule = opts.fs ?? nodeFs;
  const metadataDir = opts.metadataDir ?? DEFAULT_METADATA_DIR;
  const origin = path.resolve(start);

  let dir = origin;
  for (;;) {
    try {
      const st = await fsModule.promises.stat(path.join(dir, metadataDir));
      if (st.isDirectory()) return dir;
    } catch (err) {
      const code = errorCode(err);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw err;
    }
    const parent = path.dirname(dir);
    if (parent === dir) throw new NotARepositoryError(origin, `no ${metadataDir} directory here or in any parent`);
    dir = parent;
  }
}
