/**
 * Commit reference resolution: hash prefixes and the `HEAD` sentinel.
 */

import {
  AmbiguousPrefixError,
  EmptyHistoryError,
  NoSuchCommitError,
  type CommitRecord,
} from './types.js';

export const HEAD_REF = 'HEAD';

/** True if `ref` is the `HEAD` sentinel (case-insensitive). */
export function isHeadRef(ref: string): boolean {
  return ref.trim().toUpperCase() === HEAD_REF;
}

/**
 * Resolve `ref` against the commit log.
 *
 * `HEAD` resolves to the last commit. Anything else is matched as a
 * case-insensitive prefix of commit hashes and must match exactly one.
 *
 * @throws {EmptyHistoryError} If `ref` is `HEAD` and the log is empty.
 * @throws {NoSuchCommitError} If `ref` is empty or matches no commit.
 * @throws {AmbiguousPrefixError} If `ref` matches more than one commit.
 */
export function resolveCommit(commits: readonly CommitRecord[], ref: string): CommitRecord {
  if (isHeadRef(ref)) {
    const last = commits.at(-1);
    if (last === undefined) throw new EmptyHistoryError();
    return last;
  }

  const prefix = ref.trim().toLowerCase();
  if (!prefix) throw new NoSuchCommitError(ref);

  const matches = commits.filter((c) => c.hash.startsWith(prefix));
  if (matches.length === 0) throw new NoSuchCommitError(ref);
  if (matches.length > 1) {
    throw new AmbiguousPrefixError(ref, matches.map((c) => c.hash));
  }
  return matches[0];
}

/** True if `commit` is the last entry of the log. */
export function isLatest(commits: readonly CommitRecord[], commit: CommitRecord): boolean {
  return commits.at(-1)?.hash === commit.hash;
}
