/**
 * File I/O helpers for managed directories
 *
 * Invariants:
 * - atomicWrite never exposes partial file contents (write → fsync → rename)
 * - Temp files always reside in the same directory as the target
 * - writeNewFile never overwrites an existing file
 * - Removes are idempotent
 * - Reads are UTF-8 only
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { dirname, basename, join } from "node:path";
import {
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

/**
 * Extract the errno code from an unknown error value
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function assertDirectoryPath(dirPath: string): void {
  if (!dirPath || typeof dirPath !== "string") {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  assertDirectoryPath(dirPath);
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Synchronous ensureDirectory, for setters whose postcondition is "directory exists"
 */
export function ensureDirectorySync(dirPath: string): void {
  assertDirectoryPath(dirPath);
  try {
    mkdirSync(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to full sync where it is not supported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Last writer wins for concurrent writes
    await fs.rename(tmp, filePath);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // Temp file may not exist yet
    await fs.unlink(tmp).catch(() => undefined);

    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Create a file with the given content unless it already exists
 * @returns true if the file was written, false if it was already there
 */
export async function writeNewFile(filePath: string, content: string): Promise<boolean> {
  try {
    await fs.writeFile(filePath, content, { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      return false;
    }
    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Overwrite (or create) a file
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (err) {
    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Read a UTF-8 file
 * @throws FileReadError if the file is missing or unreadable
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Read a UTF-8 file, or null if it does not exist
 */
export async function readTextFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Whether a regular file exists at the path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Remove a file (idempotent - no error if it doesn't exist)
 * @returns true if a file was removed
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw new FileRemoveError(filePath, { cause: err });
  }
}

/**
 * Remove a directory if it is empty
 * @returns true if the directory was removed, false if it is missing or still has content
 */
export async function removeDirectoryIfEmpty(dirPath: string): Promise<boolean> {
  try {
    await fs.rmdir(dirPath);
    return true;
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOTEMPTY" || code === "EEXIST" || code === "ENOENT" || code === "EBUSY") {
      return false;
    }
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param dirPath - Directory path to list
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    // Sorted for determinism
    return files.sort();
  } catch (err) {
    // Missing directory lists as empty
    if (errorCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}
