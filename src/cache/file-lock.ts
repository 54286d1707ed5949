import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { componentLogger } from '../observability/logger';

const log = componentLogger('file-lock');

export interface FileLockOptions {
  /** Give up waiting after this long and run unlocked */
  timeoutMs: number;
  retryDelayMs?: number;
  /** A lock file older than this is considered abandoned */
  staleMs?: number;
}

export interface LockHandle {
  release(): Promise<void>;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function removeLockFile(lockPath: string): Promise<void> {
  try {
    await fs.unlink(lockPath);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'ENOENT') {
      log.warn({ err, lockPath }, 'Failed to remove lock file');
    }
  }
}

/** Remove the lock file only while it still carries our token. */
async function releaseOwnedLock(lockPath: string, token: string): Promise<void> {
  let current: string;
  try {
    current = await fs.readFile(lockPath, 'utf-8');
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'ENOENT') {
      log.warn({ err, lockPath }, 'Failed to read lock file');
    }
    return;
  }
  if (current !== token) {
    log.warn({ lockPath }, 'Lock file taken over by another holder; leaving it');
    return;
  }
  await removeLockFile(lockPath);
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs > staleMs;
  } catch (err) {
    // Vanished between open and stat: the holder released it
    if (isErrnoException(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Take an advisory lock by exclusively creating `lockPath`.
 * Resolves to null when the lock cannot be taken within `timeoutMs`.
 */
export async function acquireFileLock(lockPath: string, options: FileLockOptions): Promise<LockHandle | null> {
  const retryDelayMs = options.retryDelayMs ?? 25;
  const staleMs = options.staleMs ?? 10_000;
  const deadline = Date.now() + options.timeoutMs;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (;;) {
    try {
      const handle = await fs.open(lockPath, 'wx');
      const token = `${process.pid}:${randomBytes(8).toString('hex')}`;
      try {
        await handle.writeFile(token);
      } finally {
        await handle.close();
      }
      return { release: () => releaseOwnedLock(lockPath, token) };
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
    }

    if (await isStale(lockPath, staleMs)) {
      log.warn({ lockPath }, 'Taking over stale lock file');
      await removeLockFile(lockPath);
      continue;
    }

    if (Date.now() >= deadline) return null;
    await sleep(retryDelayMs);
  }
}

/**
 * Run `fn` while holding the lock. Lock contention or lock I/O failure
 * never blocks the work: it runs unlocked and a warning is logged.
 */
export async function withFileLock<T>(lockPath: string, options: FileLockOptions, fn: () => Promise<T>): Promise<T> {
  let lock: LockHandle | null = null;
  try {
    lock = await acquireFileLock(lockPath, options);
    if (!lock) log.warn({ lockPath, timeoutMs: options.timeoutMs }, 'Lock timeout; proceeding unlocked');
  } catch (err) {
    log.warn({ err, lockPath }, 'Lock unavailable; proceeding unlocked');
  }

  try {
    return await fn();
  } finally {
    if (lock) await lock.release();
  }
}
