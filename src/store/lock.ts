/**
 * Repository Lock
 *
 * Coarse, cross-process mutual exclusion for every metadata mutation.
 * Acquired by exclusively creating a lock file holding an owner token
 * (pid, acquisition time, random nonce). While held, the file's mtime is
 * refreshed every `staleMs / 3`; a lock file whose mtime is older than
 * `staleMs` belongs to a crashed writer and may be broken.
 *
 * Breaking a stale lock happens under a second, short-lived lock file
 * (`<lock>.break`) and only if the lock still holds the token that was
 * seen to be stale, so two waiters cannot both break it and a fresh
 * lock taken in between is left alone.
 */

import { open, readFile, stat, unlink, utimes } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { LockTimeoutError } from '../errors.js';

export interface FileLockOptions {
  timeoutMs?: number;
  staleMs?: number;
  retryIntervalMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_STALE_MS = 30000;
const DEFAULT_RETRY_INTERVAL_MS = 25;

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exclusively create `path` with `content`. Returns false if it exists.
 */
async function createExclusive(path: string, content: string): Promise<boolean> {
  try {
    const handle = await open(path, 'wx');
    try {
      await handle.writeFile(content);
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if (isErrnoCode(err, 'EEXIST')) return false;
    throw err;
  }
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return null;
    throw err;
  }
}

async function unlinkIfExists(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (!isErrnoCode(err, 'ENOENT')) throw err;
  }
}

export class FileLock {
  readonly lockPath: string;
  private readonly breakPath: string;
  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly retryIntervalMs: number;
  private token: string | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  constructor(lockPath: string, options?: FileLockOptions) {
    this.lockPath = lockPath;
    this.breakPath = `${lockPath}.break`;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.staleMs = options?.staleMs ?? DEFAULT_STALE_MS;
    this.retryIntervalMs = options?.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  }

  /**
   * Wait until the lock is ours. Throws LockTimeoutError after `timeoutMs`.
   */
  async acquire(): Promise<void> {
    const start = Date.now();
    const token = `${process.pid} ${new Date().toISOString()} ${randomBytes(8).toString('hex')}\n`;

    while (!(await createExclusive(this.lockPath, token))) {
      await this.clearIfStale();

      if (Date.now() - start > this.timeoutMs) {
        throw new LockTimeoutError(this.lockPath, this.timeoutMs);
      }
      await sleep(this.retryIntervalMs);
    }

    this.token = token;
    this.startHeartbeat();
  }

  /**
   * Give the lock up. A lock file that no longer holds our token was
   * broken by another process and is not touched.
   */
  async release(): Promise<void> {
    this.stopHeartbeat();
    const token = this.token;
    this.token = null;
    if (token === null) return;

    if ((await readIfExists(this.lockPath)) === token) {
      await unlinkIfExists(this.lockPath);
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Remove the lock file if it still holds `expected`. Returns whether it
   * was removed.
   */
  async breakLock(expected: string): Promise<boolean> {
    if (!(await createExclusive(this.breakPath, `${process.pid}\n`))) {
      await this.clearStaleBreakLock();
      return false;
    }
    try {
      if ((await readIfExists(this.lockPath)) !== expected) return false;
      await unlinkIfExists(this.lockPath);
      return true;
    } finally {
      await unlinkIfExists(this.breakPath);
    }
  }

  private async clearIfStale(): Promise<void> {
    const observed = await readIfExists(this.lockPath);
    if (observed === null) return;

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(this.lockPath)).mtimeMs;
    } catch (err) {
      // The holder released between our read and stat()
      if (isErrnoCode(err, 'ENOENT')) return;
      throw err;
    }

    if (Date.now() - mtimeMs > this.staleMs) {
      await this.breakLock(observed);
    }
  }

  /** A break lock left by a process that died mid-break */
  private async clearStaleBreakLock(): Promise<void> {
    try {
      const info = await stat(this.breakPath);
      if (Date.now() - info.mtimeMs > this.staleMs) {
        await unlinkIfExists(this.breakPath);
      }
    } catch (err) {
      if (!isErrnoCode(err, 'ENOENT')) throw err;
    }
  }

  private startHeartbeat(): void {
    const intervalMs = Math.max(10, Math.floor(this.staleMs / 3));
    this.heartbeat = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        const detail = err instanceof Error ? err.message : String(err);
        process.emitWarning(`Could not refresh lock ${this.lockPath}: ${detail}`);
      });
    }, intervalMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat !== null) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  private async refresh(): Promise<void> {
    if (this.token === null) return;
    const now = new Date();
    await utimes(this.lockPath, now, now);
  }
}
