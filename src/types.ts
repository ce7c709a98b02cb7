/**
 * Shared types, constants, and error classes for snapvc.
 */

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class SnapvcError extends Error {
  code: string = 'ESNAPVC';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnapvcError';
  }
}

export class NotARepositoryError extends SnapvcError {
  code = 'ENOTREPO';
  constructor(root: string, detail?: string) {
    super(detail ? `Not a snapvc repository: ${root} (${detail})` : `Not a snapvc repository: ${root}`);
    this.name = 'NotARepositoryError';
  }
}

export class RepositoryNotMutableError extends SnapvcError {
  code = 'EDETACHED';
  constructor(operation: string) {
    super(`Cannot ${operation} when HEAD is not checked out`);
    this.name = 'RepositoryNotMutableError';
  }
}

export class FileNotFoundError extends SnapvcError {
  code = 'ENOENT';
  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class AlreadyStagedError extends SnapvcError {
  code = 'ESTAGED';
  constructor(paths: string[]) {
    super(`Already staged: ${paths.join(', ')}`);
    this.name = 'AlreadyStagedError';
  }
}

export class NotStagedError extends SnapvcError {
  code = 'ENOTSTAGED';
  constructor(path: string) {
    super(`Not staged: ${path}`);
    this.name = 'NotStagedError';
  }
}

export class AmbiguousPrefixError extends SnapvcError {
  code = 'EAMBIGUOUS';
  /** Full hashes of every commit the prefix matched. */
  matches: string[];
  constructor(prefix: string, matches: string[]) {
    super(`Ambiguous commit prefix '${prefix}' matches ${matches.length} commits; use a longer prefix`);
    this.name = 'AmbiguousPrefixError';
    this.matches = matches;
  }
}

export class NoSuchCommitError extends SnapvcError {
  code = 'ENOCOMMIT';
  constructor(ref: string) {
    super(`No commit matches '${ref}'`);
    this.name = 'NoSuchCommitError';
  }
}

export class EmptyHistoryError extends SnapvcError {
  code = 'EEMPTY';
  constructor() {
    super('No commits yet: HEAD does not point at anything');
    this.name = 'EmptyHistoryError';
  }
}

export class NothingToCommitError extends SnapvcError {
  code = 'ENOTHING';
  constructor() {
    super('Nothing to commit: no staged files and no deleted tracked files');
    this.name = 'NothingToCommitError';
  }
}

export class NotConfirmedError extends SnapvcError {
  code = 'ENOTCONFIRMED';
  constructor(operation: string, hash: string) {
    super(`Refusing to ${operation} ${hash} without confirmation`);
    this.name = 'NotConfirmedError';
  }
}

export class MissingSnapshotError extends SnapvcError {
  code = 'ENOSNAPSHOT';
  constructor(hash: string) {
    super(`Snapshot for commit ${hash} is missing or unreadable`);
    this.name = 'MissingSnapshotError';
  }
}

export class InvalidPathError extends SnapvcError {
  code = 'EINVALIDPATH';
  constructor(path: string, reason: string) {
    super(`Invalid path '${path}': ${reason}`);
    this.name = 'InvalidPathError';
  }
}

/** Retryable storage failure, raised once bounded retries are exhausted. */
export class TransientIOError extends SnapvcError {
  code = 'ETRANSIENT';
  constructor(operation: string, path: string, cause?: unknown) {
    super(`Transient I/O failure during ${operation}: ${path}`, { cause });
    this.name = 'TransientIOError';
  }
}

/**
 * Return the errno-style `code` of an error thrown by the filesystem,
 * or undefined when there is none.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Repository state
// ---------------------------------------------------------------------------

export interface CommitRecord {
  /** 40-char lowercase hex identifier. */
  hash: string;
  message: string;
  /** Epoch milliseconds at commit time. */
  timestamp: number;
}

export interface HeadStatus {
  /** True when the working tree reflects the latest commit. */
  head: boolean;
  /** Hash the working tree reflects, or null before the first commit. */
  current: string | null;
}

/** Everything the state store persists, apart from snapshot trees. */
export interface RepositoryState {
  staged: string[];
  tracked: string[];
  commits: CommitRecord[];
  status: HeadStatus;
}

/** Partial replacement written back by a state transaction. */
export type StateUpdate = Partial<RepositoryState>;

// ---------------------------------------------------------------------------
// Operation results
// ---------------------------------------------------------------------------

export interface InitResult {
  root: string;
  /** False when the repository already existed. */
  created: boolean;
}

export interface StageResult {
  /** Absolute paths newly queued, in request order. */
  added: string[];
  /** Absolute paths skipped because they were already staged. */
  alreadyStaged: string[];
}

/** A tracked file that could not be carried forward from the previous snapshot. */
export interface ConsistencyFault {
  path: string;
  error: string;
}

export interface CommitResult {
  hash: string;
  message: string;
  /** Repo paths copied from the working tree. */
  staged: string[];
  /** Repo paths copied from the previous snapshot. */
  carried: string[];
  /** Tracked repo paths no longer present in the working tree. */
  deleted: string[];
  warnings: ConsistencyFault[];
}

export type LogVerbosity = 'full' | 'short';

export type LogEntry = CommitRecord;

export interface StatusReport {
  root: string;
  staged: string[];
  head: boolean;
  current: string | null;
  commitCount: number;
}

export interface CheckoutResult {
  hash: string;
  head: boolean;
}

export interface ResetResult {
  hash: string;
  /** Hashes of the commits removed from the log, oldest first. */
  removed: string[];
}

/** Supplies a commit message; the CLI backs this with an editor prompt. */
export interface MessageProvider {
  requestMessage(): Promise<string>;
}

// ---------------------------------------------------------------------------
// FS module interface (Node.js fs compatible)
// ---------------------------------------------------------------------------

export interface FsStat {
  isDirectory(): boolean;
  isFile(): boolean;
  mtimeMs: number;
}

/**
 * The filesystem interface expected by snapvc.
 * Structurally satisfied by Node.js `node:fs`.
 */
export interface FsModule {
  promises: {
    readFile(path: string): Promise<Uint8Array>;
    writeFile(path: string, data: Uint8Array | string): Promise<void>;
    copyFile(src: string, dest: string): Promise<void>;
    unlink(path: string): Promise<void>;
    readdir(path: string): Promise<string[]>;
    mkdir(path: string, options: { recursive: true }): Promise<string | undefined>;
    rmdir(path: string): Promise<void>;
    rm(path: string, options: { recursive?: boolean; force?: boolean }): Promise<void>;
    stat(path: string): Promise<FsStat>;
    rename(path: string, newPath: string): Promise<void>;
    utimes(path: string, atime: Date, mtime: Date): Promise<void>;
    open(path: string, flags: string): Promise<{ close(): Promise<void> }>;
  };
}
