import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLock } from "./lock.js";
import { LockTimeoutError } from "./errors.js";

const failLockWrite = vi.hoisted(() => ({ enabled: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      if (failLockWrite.enabled) {
        vi.spyOn(handle, "writeFile").mockRejectedValueOnce(new Error("disk full"));
      }
      return handle;
    },
  };
});

describe("FileLock", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "simdb-lock-"));
  });

  afterEach(async () => {
    failLockWrite.enabled = false;
    await rm(dir, { recursive: true, force: true });
  });

  it("should create and remove the lock file", async () => {
    const lock = new FileLock(dir);

    await lock.acquire();
    expect(lock.isAcquired()).toBe(true);
    expect(existsSync(join(dir, "simplesimdb.lock"))).toBe(true);

    await lock.release();
    expect(lock.isAcquired()).toBe(false);
    expect(existsSync(lock.path)).toBe(false);
  });

  it("should time out while another holder keeps it", async () => {
    const holder = new FileLock(dir);
    await holder.acquire();

    await expect(new FileLock(dir).acquire(50, 10)).rejects.toThrow(LockTimeoutError);

    await holder.release();
  });

  it("should refuse acquiring twice", async () => {
    const lock = new FileLock(dir);
    await lock.acquire();

    await expect(lock.acquire()).rejects.toThrow("Lock already acquired");

    await lock.release();
  });

  it("should release after the callback throws", async () => {
    const lock = new FileLock(dir);

    await expect(
      lock.withLock(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(existsSync(lock.path)).toBe(false);
  });

  it("should return the callback result", async () => {
    expect(await new FileLock(dir).withLock(async () => 42)).toBe(42);
  });

  it("should leave no lock behind when writing the lock file fails", async () => {
    const lock = new FileLock(dir);
    failLockWrite.enabled = true;

    await expect(lock.acquire()).rejects.toThrow("disk full");

    failLockWrite.enabled = false;
    expect(lock.isAcquired()).toBe(false);
    expect(existsSync(lock.path)).toBe(false);
    expect(await lock.withLock(async () => "next")).toBe("next");
  });

  it("should force remove a stale lock", async () => {
    await writeFile(join(dir, "simplesimdb.lock"), "{}");

    await FileLock.forceRemove(dir);
    await FileLock.forceRemove(dir);

    expect(existsSync(join(dir, "simplesimdb.lock"))).toBe(false);
  });
});
