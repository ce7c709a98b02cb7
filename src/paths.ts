/**
 * Path conversion between the working tree, repo paths, and snapshot trees.
 *
 * The state files hold absolute paths; snapshots are keyed by repo paths,
 * which are root-relative and always use forward slashes.
 */

import * as path from 'node:path';
import { InvalidPathError } from './types.js';

/**
 * Resolve a user-supplied path (absolute, or relative to `root`) to an
 * absolute working-tree path.
 *
 * @throws {InvalidPathError} If the path escapes `root`, is `root` itself,
 *   or points into the metadata directory.
 */
export function resolveWorkPath(root: string, metadataDir: string, input: string): string {
  const abs = path.resolve(root, input);
  const rel = path.relative(root, abs);
  if (!rel) throw new InvalidPathError(input, 'is the repository root');
  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new InvalidPathError(input, `outside repository ${root}`);
  }
  if (rel.split(path.sep)[0] === metadataDir) {
    throw new InvalidPathError(input, 'inside the metadata directory');
  }
  return abs;
}

/** Convert an absolute working-tree path to a repo path. */
export function toRepoPath(root: string, absPath: string): string {
  return path.relative(root, absPath).split(path.sep).join('/');
}

/** Convert a repo path back to an absolute path beneath `base`. */
export function fromRepoPath(base: string, repoPath: string): string {
  return path.join(base, ...repoPath.split('/'));
}

/**
 * Every ancestor directory of `absPath` strictly below `root`,
 * deepest first.
 */
export function ancestorsWithin(root: string, absPath: string): string[] {
  const result: string[] = [];
  let dir = path.dirname(absPath);
  while (dir !== root && dir.startsWith(root + path.sep)) {
    result.push(dir);
    dir = path.dirname(dir);
  }
  return result;
}
