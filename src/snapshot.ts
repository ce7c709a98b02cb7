/**
 * Snapshot engine: builds the full-tree snapshot for a new commit.
 *
 * Staged files are copied from the working tree; every other tracked file
 * that still exists is carried forward from the previous commit's snapshot,
 * never re-read from the working tree.
 */

import git from 'isomorphic-git';
import {
  FileNotFoundError,
  NothingToCommitError,
  type CommitRecord,
  type CommitResult,
  type ConsistencyFault,
  type RepositoryState,
} from './types.js';
import { fromRepoPath, toRepoPath } from './paths.js';
import type { StateStore } from './store.js';
import type { Logger } from './logger.js';

/** Tracked paths that no longer exist as files in the working tree. */
export async function findDeletions(store: StateStore, tracked: readonly string[]): Promise<string[]> {
  const deleted: string[] = [];
  for (const file of tracked) {
    if (!(await store.isFile(file))) deleted.push(file);
  }
  return deleted;
}

/** True if committing `state` would record nothing. */
export async function hasNothingToCommit(store: StateStore, state: RepositoryState): Promise<boolean> {
  if (state.staged.length > 0) return false;
  return (await findDeletions(store, state.tracked)).length === 0;
}

/**
 * Compute the commit id for a snapshot tree.
 *
 * The id is the git blob id of a manifest listing the parent id, each
 * file's blob id and repo path (sorted by path), and the message.
 *
 * @param files - Repo paths present in `dir`.
 * @returns 40-char lowercase hex id.
 */
export async function snapshotHash(
  store: StateStore,
  dir: string,
  files: readonly string[],
  parent: string | null,
  message: string,
): Promise<string> {
  const lines = [`parent ${parent ?? '-'}`];
  for (const repoPath of [...files].sort()) {
    const data = await store.readBytes(fromRepoPath(dir, repoPath));
    const { oid } = await git.hashBlob({ object: data });
    lines.push(`${oid} ${repoPath}`);
  }
  const manifest = `${lines.join('\n')}\n\n${message}`;
  const { oid } = await git.hashBlob({ object: manifest });
  return oid;
}

/**
 * Build and seal the snapshot for a commit of `state`.
 *
 * Does not touch the state files; the caller appends the returned record
 * to the log once this resolves. On failure the scratch tree is removed.
 *
 * @throws {NothingToCommitError} If nothing is staged and no tracked file was deleted.
 * @throws {FileNotFoundError} If a staged file no longer exists.
 */
export async function buildSnapshot(
  store: StateStore,
  state: RepositoryState,
  message: string,
  logger: Logger,
): Promise<{ record: CommitRecord; result: CommitResult }> {
  const deletions = await findDeletions(store, state.tracked);
  if (state.staged.length === 0 && deletions.length === 0) {
    throw new NothingToCommitError();
  }

  for (const file of state.staged) {
    if (!(await store.isFile(file))) throw new FileNotFoundError(file);
  }

  const root = store.root;
  const parent = state.commits.at(-1) ?? null;
  const scratch = await store.createScratchSnapshot();
  const files: string[] = [];
  const staged: string[] = [];
  const carried: string[] = [];
  const warnings: ConsistencyFault[] = [];

  let hash: string;
  try {
    for (const file of state.staged) {
      const repoPath = toRepoPath(root, file);
      await store.copyFile(file, fromRepoPath(scratch, repoPath));
      staged.push(repoPath);
      files.push(repoPath);
    }

    if (parent !== null) {
      const skip = new Set([...state.staged, ...deletions]);
      for (const file of state.tracked) {
        if (skip.has(file)) continue;
        const repoPath = toRepoPath(root, file);
        const source = store.snapshotFile(parent.hash, repoPath);
        if (!(await store.isFile(source))) {
          const fault = { path: repoPath, error: `missing from snapshot ${parent.hash}` };
          logger.warn('Tracked file missing from previous snapshot; skipped', { ...fault });
          warnings.push(fault);
          continue;
        }
        await store.copyFile(source, fromRepoPath(scratch, repoPath));
        carried.push(repoPath);
        files.push(repoPath);
      }
    }

    hash = await snapshotHash(store, scratch, files, parent?.hash ?? null, message);
    await store.sealSnapshot(scratch, hash);
  } catch (err) {
    await store.removeTree(scratch);
    throw err;
  }

  logger.debug('Snapshot sealed', { hash, staged: staged.length, carried: carried.length });
  return {
    record: { hash, message, timestamp: Date.now() },
    result: {
      hash,
      message,
      staged,
      carried,
      deleted: deletions.map((file) => toRepoPath(root, file)),
      warnings,
    },
  };
}
