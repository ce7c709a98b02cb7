/**
 * Advisory repository lock for serializing state mutations.
 *
 * Uses an atomic lockfile (`snapvc.lock`) for cross-process coordination
 * and an in-process Promise-based mutex (JS is single-threaded, but
 * async operations interleave).
 */

import * as path from 'node:path';
import { TransientIOError, errorCode, type FsModule } from './types.js';
import type { Logger } from './logger.js';

export const LOCK_FILE = 'snapvc.lock';

export interface LockOptions {
  attempts: number;
  retryDelayMs: number;
  staleMs: number;
  logger?: Logger;
}

// Per-repo in-process async mutexes (keyed by metadata directory path)
const mutexes = new Map<string, Promise<void>>();

/**
 * Execute `fn` while holding an advisory lock on the repository.
 *
 * Serializes both in-process async operations (via Promise chain) and
 * cross-process access (via lockfile). The holder refreshes the lockfile's
 * mtime every `opts.staleMs / 3`; a lockfile older than `opts.staleMs` is
 * removed and acquisition retried.
 *
 * @throws {TransientIOError} If the lock is still held after `opts.attempts` tries.
 */
export async function withRepoLock<T>(
  fsModule: FsModule,
  metaDir: string,
  opts: LockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  // In-process serialization: chain on the per-repo promise
  const prev = mutexes.get(metaDir) ?? Promise.resolve();
  let releaseMutex: () => void = () => {};
  const next = new Promise<void>((resolve) => {
    releaseMutex = resolve;
  });
  mutexes.set(metaDir, next);

  await prev;

  const lockPath = path.join(metaDir, LOCK_FILE);
  try {
    await acquireLockFile(fsModule, lockPath, opts);
  } catch (err) {
    releaseMutex();
    throw err;
  }

  const heartbeat = startHeartbeat(fsModule, lockPath, opts);
  try {
    return await fn();
  } finally {
    clearInterval(heartbeat);
    await fsModule.promises.unlink(lockPath).catch((err: unknown) => {
      if (errorCode(err) !== 'ENOENT') {
        opts.logger?.warn('Failed to remove lock file', { path: lockPath, error: String(err) });
      }
    });
    if (mutexes.get(metaDir) === next) mutexes.delete(metaDir);
    releaseMutex();
  }
}

async function acquireLockFile(fsModule: FsModule, lockPath: string, opts: LockOptions): Promise<void> {
  for (let attempt = 0; attempt < opts.attempts; attempt++) {
    try {
      // O_CREAT | O_EXCL: fails if the file already exists
      const handle = await fsModule.promises.open(lockPath, 'wx');
      await handle.close();
      return;
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err;
    }

    if (await removeIfStale(fsModule, lockPath, opts)) continue;

    opts.logger?.debug('Repository lock busy, retrying', { path: lockPath, attempt });
    await sleep(opts.retryDelayMs + Math.random() * opts.retryDelayMs * 2);
  }
  throw new TransientIOError('lock acquisition', lockPath);
}

// Touch the lockfile while it is held so a long operation never looks stale.
function startHeartbeat(fsModule: FsModule, lockPath: string, opts: LockOptions): NodeJS.Timeout {
  const timer = setInterval(() => {
    const now = new Date();
    fsModule.promises.utimes(lockPath, now, now).catch((err: unknown) => {
      opts.logger?.warn('Failed to refresh lock file', { path: lockPath, error: String(err) });
    });
  }, Math.max(1, Math.floor(opts.staleMs / 3)));
  timer.unref();
  return timer;
}

async function removeIfStale(fsModule: FsModule, lockPath: string, opts: LockOptions): Promise<boolean> {
  let age: number;
  try {
    const st = await fsModule.promises.stat(lockPath);
    age = Date.now() - st.mtimeMs;
  } catch (err) {
    // Released between our open and stat
    if (errorCode(err) === 'ENOENT') return true;
    throw err;
  }
  if (age <= opts.staleMs) return false;

  opts.logger?.warn('Removing stale lock file', { path: lockPath, ageMs: Math.round(age) });
  try {
    await fsModule.promises.unlink(lockPath);
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') throw err;
  }
  return true;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
