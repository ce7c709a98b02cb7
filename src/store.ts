/**
 * StateStore: durable repository state under the metadata directory.
 *
 * Layout (relative to the metadata directory):
 *
 *   staged.json      ordered absolute paths queued for the next commit
 *   tracked.json     absolute paths that have ever been committed
 *   commits.json     ordered `{hash, message, timestamp}` records
 *   status.json      `{head, current}`
 *   commits/<hash>/  one full snapshot tree per commit
 *   snapvc.lock      advisory lock (see lock.ts)
 *
 * Every state file is replaced by writing a temporary sibling and renaming
 * it over the original, so readers see either the old or the new value.
 */

import * as path from 'node:path';
import { z } from 'zod';
import {
  MissingSnapshotError,
  NotARepositoryError,
  TransientIOError,
  errorCode,
  type CommitRecord,
  type FsModule,
  type HeadStatus,
  type RepositoryState,
  type StateUpdate,
} from './types.js';
import type { ResolvedOptions } from './config.js';
import type { Logger } from './logger.js';
import { withRepoLock, sleep } from './lock.js';
import { fromRepoPath } from './paths.js';

export const SNAPSHOTS_DIR = 'commits';

const STATE_FILES = {
  staged: 'staged.json',
  tracked: 'tracked.json',
  commits: 'commits.json',
  status: 'status.json',
} as const satisfies Record<keyof RepositoryState, string>;

// Write order within one transaction: the commit log is the point of no return.
const WRITE_ORDER: (keyof RepositoryState)[] = ['commits', 'tracked', 'status', 'staged'];

const PathListSchema = z.array(z.string());

const CommitRecordSchema = z.object({
  hash: z.string().regex(/^[0-9a-f]{40}$/),
  message: z.string(),
  timestamp: z.number(),
});

const StateSchemas = {
  staged: PathListSchema,
  tracked: PathListSchema,
  commits: z.array(CommitRecordSchema),
  status: z.object({
    head: z.boolean(),
    current: z.string().nullable().default(null),
  }),
} as const;

const INITIAL_STATE: RepositoryState = {
  staged: [],
  tracked: [],
  commits: [],
  status: { head: true, current: null },
};

// Error codes worth retrying: a file held open by another process shows up
// as EBUSY, or as EPERM/EACCES on Windows.
const TRANSIENT_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'EPERM', 'EACCES', 'ETIMEDOUT']);

export function isTransient(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

/**
 * Run `fn`, retrying with jittered exponential backoff while it fails with
 * a transient error code.
 *
 * @param operation - Short description used in logs and the final error.
 * @param target - Path the operation works on.
 * @throws {TransientIOError} If every retry failed transiently.
 */
export async function retryTransient<T>(
  operation: string,
  target: string,
  opts: { retries: number; logger?: Logger },
  fn: () => Promise<T>,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransient(err)) throw err;
      if (attempt >= opts.retries) throw new TransientIOError(operation, target, err);
      opts.logger?.debug('Transient I/O error, retrying', { operation, path: target, code: errorCode(err), attempt });
      const delay = Math.min(10 * 2 ** attempt, 200);
      await sleep(Math.random() * delay);
    }
  }
}

let tmpCounter = 0;

function tmpName(base: string): string {
  tmpCounter += 1;
  return `${base}.${process.pid}.${Date.now()}.${tmpCounter}.tmp`;
}

export class StateStore {
  readonly root: string;
  readonly metaDir: string;
  readonly snapshotsDir: string;
  /** @internal */ _fsModule: FsModule;
  /** @internal */ _options: ResolvedOptions;
  /** @internal */ _logger: Logger;

  constructor(fsModule: FsModule, root: string, options: ResolvedOptions, logger: Logger) {
    this._fsModule = fsModule;
    this._options = options;
    this._logger = logger;
    this.root = root;
    this.metaDir = path.join(root, options.metadataDir);
    this.snapshotsDir = path.join(this.metaDir, SNAPSHOTS_DIR);
  }

  toString(): string {
    return `StateStore('${this.metaDir}')`;
  }

  /** @internal */
  _io<T>(operation: string, target: string, fn: () => Promise<T>): Promise<T> {
    return retryTransient(operation, target, { retries: this._options.ioRetries, logger: this._logger }, fn);
  }

  // ---------------------------------------------------------------------------
  // Initialization
  // ---------------------------------------------------------------------------

  /**
   * Create the metadata directory and any missing state file.
   *
   * @returns True if anything was created, false if the store was complete.
   */
  async initialize(): Promise<boolean> {
    const p = this._fsModule.promises;
    await this._io('create metadata directory', this.snapshotsDir, () =>
      p.mkdir(this.snapshotsDir, { recursive: true }),
    );
    return this.withLock(async () => {
      let created = false;
      for (const key of WRITE_ORDER) {
        const file = this.statePath(key);
        if (await this.fileExists(file)) continue;
        await this.writeJson(file, INITIAL_STATE[key]);
        created = true;
      }
      return created;
    });
  }

  /** True if every state file is present. */
  async isInitialized(): Promise<boolean> {
    for (const key of WRITE_ORDER) {
      if (!(await this.fileExists(this.statePath(key)))) return false;
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async readStaged(): Promise<string[]> {
    return this.readJson('staged', StateSchemas.staged);
  }

  async readTracked(): Promise<string[]> {
    return this.readJson('tracked', StateSchemas.tracked);
  }

  async readCommits(): Promise<CommitRecord[]> {
    return this.readJson('commits', StateSchemas.commits);
  }

  async readStatus(): Promise<HeadStatus> {
    return this.readJson('status', StateSchemas.status);
  }

  async readState(): Promise<RepositoryState> {
    return {
      staged: await this.readStaged(),
      tracked: await this.readTracked(),
      commits: await this.readCommits(),
      status: await this.readStatus(),
    };
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /**
   * Hold the repository lock for the duration of `fn`.
   *
   * @throws {TransientIOError} If the lock cannot be acquired.
   */
  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return withRepoLock(
      this._fsModule,
      this.metaDir,
      {
        attempts: this._options.lockAttempts,
        retryDelayMs: this._options.lockRetryDelayMs,
        staleMs: this._options.lockStaleMs,
        logger: this._logger,
      },
      fn,
    );
  }

  /**
   * Read-modify-write the repository state as one critical section.
   *
   * `fn` receives the current state and returns the parts to replace
   * alongside its result. Nothing is written if `fn` throws. `after`,
   * if given, runs once the update is durable, still under the lock.
   */
  async transaction<T>(
    fn: (state: RepositoryState) => Promise<{ update: StateUpdate; result: T; after?: () => Promise<void> }>,
  ): Promise<T> {
    return this.withLock(async () => {
      const state = await this.readState();
      const { update, result, after } = await fn(state);
      await this.write(update);
      if (after) await after();
      return result;
    });
  }

  /** @internal Write the given parts of the state in commit-safe order. */
  private async write(update: StateUpdate): Promise<void> {
    for (const key of WRITE_ORDER) {
      const value = update[key];
      if (value !== undefined) await this.writeJson(this.statePath(key), value);
    }
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  /** Absolute path of the snapshot directory for `hash`. */
  snapshotDir(hash: string): string {
    return path.join(this.snapshotsDir, hash);
  }

  /** Create an empty scratch directory to build a snapshot in. */
  async createScratchSnapshot(): Promise<string> {
    const dir = tmpName(path.join(this.snapshotsDir, '.build'));
    await this._io('create snapshot', dir, () => this._fsModule.promises.mkdir(dir, { recursive: true }));
    return dir;
  }

  /**
   * Move a finished scratch directory into place as `commits/<hash>`.
   *
   * An existing directory under that name is unreachable debris (from a
   * truncated history or an interrupted commit) and is replaced.
   */
  async sealSnapshot(scratchDir: string, hash: string): Promise<string> {
    const dest = this.snapshotDir(hash);
    await this.removeTree(dest);
    await this._io('seal snapshot', dest, () => this._fsModule.promises.rename(scratchDir, dest));
    return dest;
  }

  /** Recursively delete `dir`; a missing directory is not an error. */
  async removeTree(dir: string): Promise<void> {
    await this._io('remove directory', dir, () =>
      this._fsModule.promises.rm(dir, { recursive: true, force: true }),
    );
  }

  /**
   * List every file in a commit's snapshot as sorted repo paths.
   *
   * @throws {MissingSnapshotError} If the snapshot directory is missing or unreadable.
   */
  async listSnapshot(hash: string): Promise<string[]> {
    const dir = this.snapshotDir(hash);
    try {
      const st = await this._io('stat snapshot', dir, () => this._fsModule.promises.stat(dir));
      if (!st.isDirectory()) throw new MissingSnapshotError(hash);
      const files = await this.walkFiles(dir);
      return files.sort();
    } catch (err) {
      if (err instanceof MissingSnapshotError) throw err;
      const code = errorCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR' || err instanceof TransientIOError) {
        throw new MissingSnapshotError(hash);
      }
      throw err;
    }
  }

  /**
   * Copy one file, creating the destination's parent directories.
   */
  async copyFile(src: string, dest: string): Promise<void> {
    const p = this._fsModule.promises;
    await this._io('create directory', path.dirname(dest), () => p.mkdir(path.dirname(dest), { recursive: true }));
    await this._io('copy file', src, () => p.copyFile(src, dest));
  }

  /** Read file bytes with transient retry. */
  async readBytes(file: string): Promise<Uint8Array> {
    return this._io('read file', file, () => this._fsModule.promises.readFile(file));
  }

  /** True if `file` exists and is a regular file. */
  async isFile(file: string): Promise<boolean> {
    try {
      const st = await this._io('stat file', file, () => this._fsModule.promises.stat(file));
      return st.isFile();
    } catch (err) {
      const code = errorCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') return false;
      throw err;
    }
  }

  /**
   * Delete a file; returns false if it was already absent. A path that is
   * now a directory (or anything else but a regular file) is left alone.
   */
  async removeFile(file: string): Promise<boolean> {
    if (!(await this.isFile(file))) return false;
    try {
      await this._io('remove file', file, () => this._fsModule.promises.unlink(file));
      return true;
    } catch (err) {
      const code = errorCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') return false;
      throw err;
    }
  }

  /** Remove `dir` if it is empty; returns whether it was removed. */
  async removeDirIfEmpty(dir: string): Promise<boolean> {
    try {
      await this._io('remove directory', dir, () => this._fsModule.promises.rmdir(dir));
      return true;
    } catch (err) {
      const code = errorCode(err);
      if (code === 'ENOTEMPTY' || code === 'EEXIST' || code === 'ENOENT' || code === 'ENOTDIR') return false;
      throw err;
    }
  }

  /** @internal Recursive file listing beneath `dir`, as repo paths. */
  private async walkFiles(dir: string, relDir = ''): Promise<string[]> {
    const p = this._fsModule.promises;
    const result: string[] = [];
    const names = await this._io('list directory', dir, () => p.readdir(dir));
    for (const name of names) {
      const full = path.join(dir, name);
      const rel = relDir ? `${relDir}/${name}` : name;
      const st = await this._io('stat file', full, () => p.stat(full));
      if (st.isDirectory()) {
        result.push(...(await this.walkFiles(full, rel)));
      } else {
        result.push(rel);
      }
    }
    return result;
  }

  /** Absolute path of `repoPath` inside the snapshot for `hash`. */
  snapshotFile(hash: string, repoPath: string): string {
    return fromRepoPath(this.snapshotDir(hash), repoPath);
  }

  // ---------------------------------------------------------------------------
  // JSON files
  // ---------------------------------------------------------------------------

  private statePath(key: keyof RepositoryState): string {
    return path.join(this.metaDir, STATE_FILES[key]);
  }

  private async fileExists(file: string): Promise<boolean> {
    try {
      await this._io('stat file', file, () => this._fsModule.promises.stat(file));
      return true;
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return false;
      throw err;
    }
  }

  private async readJson<K extends keyof RepositoryState>(
    key: K,
    schema: z.ZodType<RepositoryState[K], z.ZodTypeDef, unknown>,
  ): Promise<RepositoryState[K]> {
    const file = this.statePath(key);
    let raw: Uint8Array;
    try {
      raw = await this.readBytes(file);
    } catch (err) {
      const code = errorCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new NotARepositoryError(this.root, `missing ${STATE_FILES[key]}`);
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(new TextDecoder().decode(raw));
    } catch {
      throw new NotARepositoryError(this.root, `corrupt ${STATE_FILES[key]}`);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new NotARepositoryError(this.root, `corrupt ${STATE_FILES[key]}`);
    }
    return parsed.data;
  }

  private async writeJson(file: string, value: unknown): Promise<void> {
    const p = this._fsModule.promises;
    const tmp = tmpName(file);
    const body = JSON.stringify(value, null, 2) + '\n';
    try {
      await this._io('write state', tmp, () => p.writeFile(tmp, body));
      await this._io('replace state', file, () => p.rename(tmp, file));
    } catch (err) {
      await p.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        this._logger.warn('Failed to remove temporary state file', { path: tmp, error: String(cleanupErr) });
      });
      throw err;
    }
  }
}
