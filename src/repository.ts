/**
 * Repository: the snapshot state machine over one working tree.
 *
 * The repository is either at HEAD (the working tree matches the latest
 * commit and add/remove/commit/reset are allowed) or detached (an older
 * commit is checked out and only read-only commands and checkout work).
 */

import * as nodeFs from 'node:fs';
import * as path from 'node:path';
import {
  AlreadyStagedError,
  FileNotFoundError,
  NotARepositoryError,
  NotConfirmedError,
  NotStagedError,
  NothingToCommitError,
  RepositoryNotMutableError,
  type CheckoutResult,
  type CommitRecord,
  type CommitResult,
  type FsModule,
  type InitResult,
  type LogEntry,
  type LogVerbosity,
  type MessageProvider,
  type ResetResult,
  type StageResult,
  type StatusReport,
} from './types.js';
import { resolveOptions, type RepositoryOptionsInput } from './config.js';
import { Logger } from './logger.js';
import { StateStore } from './store.js';
import { resolveWorkPath, fromRepoPath } from './paths.js';
import { resolveCommit, isLatest } from './resolve.js';
import { buildSnapshot, hasNothingToCommit } from './snapshot.js';
import { restoreSnapshot } from './restore.js';

export interface RepositoryOpenOptions extends RepositoryOptionsInput {
  /** Filesystem module (default: Node.js `node:fs`). */
  fs?: FsModule;
  /** Logger (default: a console logger at `logLevel`). */
  logger?: Logger;
}

/**
 * A snapvc repository rooted at a working-tree directory.
 *
 * Open an existing repository with `Repository.open()`, or call `init()`
 * on a new handle to create one.
 */
export class Repository {
  /** @internal */ _store: StateStore;
  /** @internal */ _logger: Logger;

  /**
   * @param root - Working-tree root; the metadata directory lives directly beneath it.
   * @throws {z.ZodError} If an option is invalid.
   */
  constructor(root: string, opts: RepositoryOpenOptions = {}) {
    const { fs, logger, ...rest } = opts;
    const options = resolveOptions(rest);
    this._logger = logger ?? new Logger({ level: options.logLevel });
    this._store = new StateStore(fs ?? nodeFs, path.resolve(root), options, this._logger.child('store'));
  }

  /**
   * Open an existing repository.
   *
   * @param root - Working-tree root.
   * @param opts.create - Initialize the repository if it does not exist (default: false).
   * @throws {NotARepositoryError} If `root` holds no repository and `create` is false.
   */
  static async open(root: string, opts: RepositoryOpenOptions & { create?: boolean } = {}): Promise<Repository> {
    const { create, ...rest } = opts;
    const repo = new Repository(root, rest);
    if (!(await repo._store.isInitialized())) {
      if (!create) throw new NotARepositoryError(repo.root);
      await repo.init();
    }
    return repo;
  }

  toString(): string {
    return `Repository('${this.root}')`;
  }

  /** Absolute working-tree root. */
  get root(): string {
    return this._store.root;
  }

  /** Absolute path of the metadata directory. */
  get metaDir(): string {
    return this._store.metaDir;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Create the metadata directory and state files.
   *
   * Idempotent: an initialized repository is left untouched and reported
   * with `created: false`.
   */
  async init(): Promise<InitResult> {
    const created = await this._store.initialize();
    this._logger.debug(created ? 'Initialized repository' : 'Repository already initialized', { root: this.root });
    return { root: this.root, created };
  }

  // ---------------------------------------------------------------------------
  // Staging
  // ---------------------------------------------------------------------------

  /**
   * Queue files for the next commit.
   *
   * Paths may be absolute or relative to the root. Paths that are already
   * staged are skipped.
   *
   * @throws {RepositoryNotMutableError} If HEAD is not checked out.
   * @throws {FileNotFoundError} If any path is not an existing file; nothing is staged.
   * @throws {AlreadyStagedError} If every path is already staged.
   * @throws {InvalidPathError} If a path lies outside the working tree.
   */
  async stage(paths: readonly string[]): Promise<StageResult> {
    const store = this._store;
    const files = [...new Set(paths.map((p) => resolveWorkPath(this.root, this.metadataDirName, p)))];

    const result = await store.transaction(async (state) => {
      if (!state.status.head) throw new RepositoryNotMutableError('add files');
      for (const file of files) {
        if (!(await store.isFile(file))) throw new FileNotFoundError(file);
      }

      const existing = new Set(state.staged);
      const added = files.filter((f) => !existing.has(f));
      const alreadyStaged = files.filter((f) => existing.has(f));
      if (files.length > 0 && added.length === 0) throw new AlreadyStagedError(alreadyStaged);

      return {
        update: { staged: [...state.staged, ...added] },
        result: { added, alreadyStaged },
      };
    });

    for (const file of result.alreadyStaged) this._logger.warn('Already staged', { path: file });
    this._logger.debug('Staged files', { count: result.added.length });
    return result;
  }

  /**
   * Remove a file from the staged set. The file stays tracked if it was
   * committed before.
   *
   * @returns The absolute path that was unstaged.
   * @throws {RepositoryNotMutableError} If HEAD is not checked out.
   * @throws {NotStagedError} If the path is not staged.
   */
  async unstage(file: string): Promise<string> {
    const abs = resolveWorkPath(this.root, this.metadataDirName, file);
    await this._store.transaction(async (state) => {
      if (!state.status.head) throw new RepositoryNotMutableError('remove files');
      if (!state.staged.includes(abs)) throw new NotStagedError(abs);
      return { update: { staged: state.staged.filter((f) => f !== abs) }, result: undefined };
    });
    this._logger.debug('Unstaged file', { path: abs });
    return abs;
  }

  // ---------------------------------------------------------------------------
  // Commit
  // ---------------------------------------------------------------------------

  /**
   * Record a full snapshot of the tracked files.
   *
   * `message` may be the text itself or a provider asked for it once the
   * commit is known to be non-empty. The provider runs outside the
   * repository lock; the state is re-read and re-checked afterwards.
   *
   * @throws {RepositoryNotMutableError} If HEAD is not checked out.
   * @throws {NothingToCommitError} If nothing is staged and no tracked file was deleted.
   * @throws {FileNotFoundError} If a staged file was deleted before the commit.
   */
  async commit(message: string | MessageProvider): Promise<CommitResult> {
    const store = this._store;
    const before = await store.readState();
    if (!before.status.head) throw new RepositoryNotMutableError('commit');
    if (await hasNothingToCommit(store, before)) throw new NothingToCommitError();

    const text = typeof message === 'string' ? message : await message.requestMessage();

    const result = await store.transaction(async (state) => {
      if (!state.status.head) throw new RepositoryNotMutableError('commit');
      const { record, result } = await buildSnapshot(store, state, text, this._logger.child('snapshot'));

      const tracked = new Set(state.tracked);
      for (const file of state.staged) tracked.add(file);

      return {
        update: {
          commits: [...state.commits, record],
          tracked: [...tracked],
          staged: [],
          status: { head: true, current: record.hash },
        },
        result,
      };
    });

    this._logger.debug('Committed', { hash: result.hash, warnings: result.warnings.length });
    return result;
  }

  // ---------------------------------------------------------------------------
  // Read-only queries
  // ---------------------------------------------------------------------------

  /**
   * Iterate over the commit log, oldest first.
   *
   * @param verbosity - `'short'` trims each message to its first line.
   */
  async *log(verbosity: LogVerbosity = 'full'): AsyncGenerator<LogEntry> {
    const commits = await this._store.readCommits();
    for (const commit of commits) {
      const message = verbosity === 'short' ? commit.message.split('\n')[0] : commit.message;
      yield { ...commit, message };
    }
  }

  /** Staged files, head flag, and current commit. */
  async status(): Promise<StatusReport> {
    const staged = await this._store.readStaged();
    const status = await this._store.readStatus();
    const commits = await this._store.readCommits();
    return {
      root: this.root,
      staged,
      head: status.head,
      current: status.current,
      commitCount: commits.length,
    };
  }

  /** True if the latest commit is checked out. */
  async isHead(): Promise<boolean> {
    return (await this._store.readStatus()).head;
  }

  /**
   * Resolve a hash prefix or `HEAD` to a commit.
   *
   * @throws {EmptyHistoryError} If `ref` is `HEAD` and there are no commits.
   * @throws {NoSuchCommitError} If nothing matches.
   * @throws {AmbiguousPrefixError} If more than one commit matches.
   */
  async resolve(ref: string): Promise<CommitRecord> {
    return resolveCommit(await this._store.readCommits(), ref);
  }

  // ---------------------------------------------------------------------------
  // Checkout / reset
  // ---------------------------------------------------------------------------

  /**
   * Restore the working tree to a commit.
   *
   * Checking out the latest commit returns to HEAD; any other commit
   * detaches. Uncommitted changes to tracked files are lost, so a
   * non-latest target requires `confirmed`.
   *
   * @throws {NotConfirmedError} If the target is not the latest commit and `confirmed` is not set.
   * @throws {EmptyHistoryError | NoSuchCommitError | AmbiguousPrefixError} If `ref` does not resolve.
   * @throws {MissingSnapshotError} If the target's snapshot is unreadable; nothing is changed.
   */
  async checkout(ref: string, opts: { confirmed?: boolean } = {}): Promise<CheckoutResult> {
    const store = this._store;
    const result = await store.transaction(async (state) => {
      const target = resolveCommit(state.commits, ref);
      const head = isLatest(state.commits, target);
      if (!head && !opts.confirmed) throw new NotConfirmedError('check out', target.hash);

      await restoreSnapshot(store, state.tracked, target.hash, this._logger.child('restore'));
      return {
        update: { status: { head, current: target.hash } },
        result: { hash: target.hash, head },
      };
    });
    this._logger.debug('Checked out', { ...result });
    return result;
  }

  /**
   * Restore the working tree to a commit and discard every later commit.
   *
   * Irreversible: the discarded commits' snapshots are deleted. The tracked
   * set becomes the target's file set and staged files that no longer exist
   * are dropped. Always requires `confirmed`.
   *
   * @throws {RepositoryNotMutableError} If HEAD is not checked out.
   * @throws {NotConfirmedError} If `confirmed` is not set.
   * @throws {EmptyHistoryError | NoSuchCommitError | AmbiguousPrefixError} If `ref` does not resolve.
   */
  async reset(ref: string, opts: { confirmed?: boolean } = {}): Promise<ResetResult> {
    const store = this._store;
    const result = await store.transaction(async (state) => {
      if (!state.status.head) throw new RepositoryNotMutableError('reset');
      const target = resolveCommit(state.commits, ref);
      if (!opts.confirmed) throw new NotConfirmedError('reset to', target.hash);

      const files = await restoreSnapshot(store, state.tracked, target.hash, this._logger.child('restore'));
      const cut = state.commits.findIndex((c) => c.hash === target.hash) + 1;
      const removed = state.commits.slice(cut).map((c) => c.hash);

      const staged: string[] = [];
      for (const file of state.staged) {
        if (await store.isFile(file)) staged.push(file);
      }

      return {
        update: {
          commits: state.commits.slice(0, cut),
          tracked: files.map((f) => fromRepoPath(this.root, f)),
          staged,
          status: { head: true, current: target.hash },
        },
        result: { hash: target.hash, removed },
        after: async () => {
          for (const hash of removed) await store.removeTree(store.snapshotDir(hash));
        },
      };
    });
    this._logger.debug('Reset', { hash: result.hash, removed: result.removed.length });
    return result;
  }

  /** @internal */
  private get metadataDirName(): string {
    return path.basename(this._store.metaDir);
  }
}
