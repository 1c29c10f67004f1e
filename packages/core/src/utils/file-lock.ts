import path from 'node:path';
import fs from 'graceful-fs';
import lockfile from 'proper-lockfile';
import { LockTimeoutError } from '../errors.js';

/** Options for file lock acquisition. */
export interface LockOptions {
  /** Number of retry attempts (default: 10) */
  retries?: number;
  /** Minimum timeout between retries in ms (default: 50) */
  minTimeout?: number;
  /** Maximum timeout between retries in ms (default: 1000) */
  maxTimeout?: number;
  /** Lock stale threshold in ms (default: 5000) */
  stale?: number;
}

const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  retries: 10,
  minTimeout: 50,
  maxTimeout: 1000,
  stale: 5000,
};

/** proper-lockfile stats the target, so it has to exist before locking. */
async function ensureFile(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.promises.writeFile(filePath, '', { flag: 'wx' });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'EEXIST') throw err;
  }
}

/**
 * Runs `operation` while holding an exclusive lock on `filePath`, creating the
 * file first if needed. Retries with exponential backoff.
 *
 * @throws {LockTimeoutError} If the lock cannot be acquired after retries
 */
export async function withFileLock<T>(
  filePath: string,
  operation: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options };
  await ensureFile(filePath);

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(filePath, {
      retries: {
        retries: opts.retries,
        minTimeout: opts.minTimeout,
        maxTimeout: opts.maxTimeout,
      },
      stale: opts.stale,
    });
  } catch (err) {
    throw new LockTimeoutError(
      `Could not acquire lock on ${filePath} after ${opts.retries} retries: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return await operation();
  } finally {
    await release();
  }
}
