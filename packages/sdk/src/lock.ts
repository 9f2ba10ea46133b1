/**
 * Advisory file lock for a managed directory
 * Uses exclusive file creation so only one writer holds it at a time.
 * Opt-in: stores without `lock: true` never touch it.
 */

import * as fs from "node:fs/promises";
import { lockFile } from "./paths.js";
import { errorCode } from "./io.js";
import { LockTimeoutError } from "./errors.js";
import { logger } from "./observability/logs.js";

export class FileLock {
  #lockPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(directory: string) {
    this.#lockPath = lockFile(directory);
  }

  /**
   * Path of the lock file
   */
  get path(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock (blocking with retries)
   * @param timeoutMs - Maximum time to wait for lock (default: 30000ms)
   * @param retryIntervalMs - Time between retry attempts (default: 100ms)
   */
  async acquire(timeoutMs: number = 30000, retryIntervalMs: number = 100): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    while (true) {
      let handle: fs.FileHandle;
      try {
        handle = await fs.open(this.#lockPath, "wx");
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw err;
        }

        if (Date.now() - startTime > timeoutMs) {
          throw new LockTimeoutError(this.#lockPath, timeoutMs, { cause: err });
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
        continue;
      }

      try {
        // PID and timestamp for debugging stale locks
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await handle.writeFile(JSON.stringify(lockInfo, null, 2));
        await handle.sync();
      } catch (err) {
        await this.#discard(handle);
        throw err;
      }

      this.#fd = handle;
      this.#acquired = true;
      return;
    }
  }

  /**
   * Close and remove a lock file that was created but never fully written
   */
  async #discard(handle: fs.FileHandle): Promise<void> {
    try {
      await handle.close();
      await fs.unlink(this.#lockPath);
    } catch (err) {
      logger.error("lock.discard", { message: this.#lockPath, details: { error: String(err) } });
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }
      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up by someone else
      if (errorCode(err) !== "ENOENT") {
        logger.error("lock.release", { message: this.#lockPath, details: { error: String(err) } });
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Check if lock is acquired
   */
  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  /**
   * Force remove a stale lock file
   * Only safe when the process that created it is known to be dead
   */
  static async forceRemove(directory: string): Promise<void> {
    try {
      await fs.unlink(lockFile(directory));
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        throw err;
      }
    }
  }
}
