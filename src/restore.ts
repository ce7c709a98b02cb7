/**
 * Restore engine: rewrites the working tree to match a commit's snapshot.
 *
 * Shared by checkout and reset. The snapshot is listed before anything is
 * deleted, so a missing snapshot leaves the working tree untouched.
 */

import { ancestorsWithin, fromRepoPath } from './paths.js';
import type { StateStore } from './store.js';
import type { Logger } from './logger.js';

/**
 * Replace the tracked files in the working tree with the snapshot of `hash`.
 *
 * 1. Delete every tracked file. Paths that are absent, or are now
 *    directories, are skipped.
 * 2. Prune directories left empty by step 1, deepest first. Directories
 *    still holding anything else are kept.
 * 3. Copy the full snapshot into the working tree.
 *
 * @param tracked - Absolute paths of the currently tracked files.
 * @returns Repo paths written to the working tree, sorted.
 * @throws {MissingSnapshotError} If the snapshot is missing or unreadable.
 */
export async function restoreSnapshot(
  store: StateStore,
  tracked: readonly string[],
  hash: string,
  logger: Logger,
): Promise<string[]> {
  const files = await store.listSnapshot(hash);

  let removed = 0;
  for (const file of tracked) {
    if (await store.removeFile(file)) removed++;
  }

  const dirs = new Set<string>();
  for (const file of tracked) {
    for (const dir of ancestorsWithin(store.root, file)) dirs.add(dir);
  }
  const byDepth = [...dirs].sort((a, b) => b.length - a.length);
  let pruned = 0;
  for (const dir of byDepth) {
    if (await store.removeDirIfEmpty(dir)) pruned++;
  }

  for (const repoPath of files) {
    await store.copyFile(store.snapshotFile(hash, repoPath), fromRepoPath(store.root, repoPath));
  }

  logger.debug('Working tree restored', { hash, removed, pruned, written: files.length });
  return files;
}
