/**
 * snapvc: a minimal local version-control engine.
 *
 * Stage files, commit them as full-tree snapshots, browse the linear
 * history, and restore the working tree to any commit.
 *
 * @example
 * ```ts
 * import { Repository } from 'snapvc';
 *
 * const repo = await Repository.open('/path/to/project', { create: true });
 * await repo.stage(['notes.txt']);
 * const { hash } = await repo.commit('first draft');
 *
 * for await (const entry of repo.log('short')) {
 *   console.log(entry.hash, entry.message);
 * }
 *
 * await repo.checkout(hash.slice(0, 7), { confirmed: true });
 * ```
 */

// Core classes
export { Repository, type RepositoryOpenOptions } from './repository.js';
export { StateStore, retryTransient, isTransient } from './store.js';
export { Logger, ConsoleTransport, type LogLevel, type LogRecord, type LogTransport } from './logger.js';

// Engines
export { buildSnapshot, findDeletions, snapshotHash } from './snapshot.js';
export { restoreSnapshot } from './restore.js';
export { resolveCommit, isHeadRef, isLatest, HEAD_REF } from './resolve.js';
export { withRepoLock, LOCK_FILE } from './lock.js';

// Configuration and discovery
export {
  RepositoryOptionsSchema,
  resolveOptions,
  loadOptionsFromEnv,
  DEFAULT_METADATA_DIR,
  type RepositoryOptionsInput,
  type ResolvedOptions,
} from './config.js';
export { findRepositoryRoot } from './locate.js';
export { resolveWorkPath, toRepoPath, fromRepoPath } from './paths.js';

// Types and errors
export {
  SnapvcError,
  NotARepositoryError,
  RepositoryNotMutableError,
  FileNotFoundError,
  AlreadyStagedError,
  NotStagedError,
  AmbiguousPrefixError,
  NoSuchCommitError,
  EmptyHistoryError,
  NothingToCommitError,
  NotConfirmedError,
  MissingSnapshotError,
  InvalidPathError,
  TransientIOError,
  type CommitRecord,
  type HeadStatus,
  type RepositoryState,
  type StateUpdate,
  type InitResult,
  type StageResult,
  type ConsistencyFault,
  type CommitResult,
  type LogVerbosity,
  type LogEntry,
  type StatusReport,
  type CheckoutResult,
  type ResetResult,
  type MessageProvider,
  type FsModule,
  type FsStat,
} from './types.js';
