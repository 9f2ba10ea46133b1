import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  atomicWrite,
  ensureDirectory,
  errorCode,
  fileExists,
  listFiles,
  readTextFile,
  readTextFileIfExists,
  removeDirectoryIfEmpty,
  removeFile,
  writeNewFile,
} from "./io.js";
import { DirectoryError, FileReadError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "simdb-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "test.json");

      await atomicWrite(filePath, '{"test": "data"}');

      expect(await readTextFile(filePath)).toBe('{"test": "data"}');
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "test.json"), "content");

      const files = await readdir(testDir);
      expect(files).toEqual(["test.json"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "test.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "a", "b", "test.json");

      await atomicWrite(filePath, "nested");

      expect(await readTextFile(filePath)).toBe("nested");
    });

    it("should fail when the parent is a file", async () => {
      const blocker = join(testDir, "blocker");
      await writeFile(blocker, "x");

      await expect(atomicWrite(join(blocker, "test.json"), "x")).rejects.toThrow(DirectoryError);
    });
  });

  describe("writeNewFile", () => {
    it("should write only once", async () => {
      const filePath = join(testDir, "input.json");

      expect(await writeNewFile(filePath, "first")).toBe(true);
      expect(await writeNewFile(filePath, "second")).toBe(false);
      expect(await readFile(filePath, "utf-8")).toBe("first");
    });
  });

  describe("reads", () => {
    it("should throw FileReadError for missing files", async () => {
      await expect(readTextFile(join(testDir, "missing.json"))).rejects.toThrow(FileReadError);
    });

    it("should return null for missing optional files", async () => {
      expect(await readTextFileIfExists(join(testDir, "missing.json"))).toBeNull();
    });
  });

  describe("fileExists", () => {
    it("should report regular files only", async () => {
      const filePath = join(testDir, "out.nc");
      await writeFile(filePath, "data");
      await mkdir(join(testDir, "sub"));

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(join(testDir, "sub"))).toBe(false);
      expect(await fileExists(join(testDir, "missing.nc"))).toBe(false);
    });

    it("should be false below a regular file", async () => {
      const filePath = join(testDir, "out.nc");
      await writeFile(filePath, "data");

      expect(await fileExists(join(filePath, "child"))).toBe(false);
    });
  });

  describe("removeFile", () => {
    it("should be idempotent", async () => {
      const filePath = join(testDir, "out.nc");
      await writeFile(filePath, "data");

      expect(await removeFile(filePath)).toBe(true);
      expect(await removeFile(filePath)).toBe(false);
    });
  });

  describe("removeDirectoryIfEmpty", () => {
    it("should remove empty directories", async () => {
      const dir = join(testDir, "empty");
      await mkdir(dir);

      expect(await removeDirectoryIfEmpty(dir)).toBe(true);
      expect(await readdir(testDir)).toEqual([]);
    });

    it("should keep directories with content", async () => {
      await writeFile(join(testDir, "keep.txt"), "x");

      expect(await removeDirectoryIfEmpty(testDir)).toBe(false);
      expect(await readdir(testDir)).toEqual(["keep.txt"]);
    });

    it("should ignore missing directories", async () => {
      expect(await removeDirectoryIfEmpty(join(testDir, "missing"))).toBe(false);
    });
  });

  describe("listFiles", () => {
    it("should list files sorted and filtered by extension", async () => {
      await writeFile(join(testDir, "b.json"), "{}");
      await writeFile(join(testDir, "a.json"), "{}");
      await writeFile(join(testDir, "a.nc"), "");
      await mkdir(join(testDir, "dir.json"));

      expect(await listFiles(testDir, ".json")).toEqual(["a.json", "b.json"]);
      expect(await listFiles(testDir, "nc")).toEqual(["a.nc"]);
      expect(await listFiles(testDir)).toEqual(["a.json", "a.nc", "b.json"]);
    });

    it("should list a missing directory as empty", async () => {
      expect(await listFiles(join(testDir, "missing"))).toEqual([]);
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dir = join(testDir, "x", "y");

      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await readdir(join(testDir, "x"))).toEqual(["y"]);
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(DirectoryError);
    });
  });

  describe("errorCode", () => {
    it("should extract errno codes", async () => {
      const err = await readFile(join(testDir, "missing")).catch((e: unknown) => e);

      expect(errorCode(err)).toBe("ENOENT");
      expect(errorCode(new Error("plain"))).toBeUndefined();
      expect(errorCode("ENOENT")).toBeUndefined();
    });
  });
});
