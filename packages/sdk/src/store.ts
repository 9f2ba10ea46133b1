/**
 * Main store implementation
 */

import { join, resolve } from "node:path";
import type {
  Store,
  StoreOptions,
  CreateOptions,
  ContentKey,
  DisplaySink,
  FileEntry,
  InputRecord,
  Registry,
} from "./types.js";
import { hashInput, hashStoredInput } from "./hash.js";
import { canonicalize, safeParseJson } from "./format/canonical.js";
import { parseInputRecord } from "./format/parse.js";
import { NameRegistry } from "./registry.js";
import { inputFile, outputFile, isInputFileName } from "./paths.js";
import { buildArguments, runExecutable } from "./runner.js";
import { FileLock } from "./lock.js";
import {
  ensureDirectory,
  ensureDirectorySync,
  fileExists,
  listFiles,
  readTextFile,
  removeDirectoryIfEmpty,
  removeFile,
  writeNewFile,
} from "./io.js";
import { validateExecutable, validateFileComponent, validateRestartIndex } from "./validation.js";
import { EntryNotFoundError, ExecutionError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

export const DEFAULT_DIRECTORY = "./data";
export const DEFAULT_FILETYPE = "nc";
export const DEFAULT_EXECUTABLE = "./execute.sh";

/**
 * Display sink writing to the process streams
 */
export const processDisplay: DisplaySink = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function prepareDirectory(directory: string): string {
  const absolute = resolve(directory);
  ensureDirectorySync(absolute);
  return absolute;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function compareEntries(a: FileEntry, b: FileEntry): number {
  if (a.id !== b.id) {
    return a.id < b.id ? -1 : 1;
  }
  return a.n - b.n;
}

/**
 * Content-addressed store of simulation outputs
 *
 * Each input record is hashed; the hash (or a registered display name) names an
 * input file and a chain of output files. Missing outputs are produced by running
 * the configured executable; existing ones are returned untouched.
 *
 * Every call runs to completion before returning, one executable at a time.
 * Without `lock: true` two processes may race on the same entry.
 *
 * @example
 * ```typescript
 * const store = openStore({ directory: "./runs", filetype: "nc", executable: "./simulate.sh" });
 *
 * const first = await store.create({ nx: 64, dt: float(0.01) });
 * const second = await store.create({ nx: 64, dt: float(0.01) }, { n: 1 });
 *
 * for (const entry of await store.files()) {
 *   console.log(entry.id, entry.n, entry.outputFile);
 * }
 * ```
 */
class Manager implements Store {
  #directory: string;
  #filetype: string;
  #executable: string;
  #registry: NameRegistry;
  #lock: boolean;
  #display: DisplaySink;

  constructor(options: StoreOptions = {}) {
    this.#directory = prepareDirectory(options.directory ?? DEFAULT_DIRECTORY);
    this.#registry = new NameRegistry(this.#directory);
    this.#filetype = validateFileComponent(options.filetype ?? DEFAULT_FILETYPE, "filetype");
    this.#executable = validateExecutable(options.executable ?? DEFAULT_EXECUTABLE);
    this.#lock = options.lock ?? false;
    this.#display = options.display ?? processDisplay;
  }

  get directory(): string {
    return this.#directory;
  }

  get filetype(): string {
    return this.#filetype;
  }

  get executable(): string {
    return this.#executable;
  }

  /**
   * Point the store at another directory, creating it if needed
   *
   * Postcondition: the directory exists when this returns.
   */
  setDirectory(directory: string): void {
    this.#directory = prepareDirectory(directory);
    this.#registry = new NameRegistry(this.#directory);
  }

  setFiletype(filetype: string): void {
    this.#filetype = validateFileComponent(filetype, "filetype");
  }

  setExecutable(executable: string): void {
    this.#executable = validateExecutable(executable);
  }

  hash(record: InputRecord): ContentKey {
    return hashInput(record);
  }

  async inputFile(record: InputRecord): Promise<string> {
    const name = await this.#registry.resolve(hashInput(record));
    return inputFile(this.#directory, name);
  }

  async outputFile(record: InputRecord, n = 0): Promise<string> {
    validateRestartIndex(n);
    const name = await this.#registry.resolve(hashInput(record));
    return outputFile(this.#directory, name, n, this.#filetype);
  }

  /**
   * Return the output for (record, n), running the executable if it is missing
   *
   * For n > 0 the output of n - 1 is passed as third argument; the caller is
   * responsible for it existing. On a non-zero exit the output (and for n = 0 the
   * input) is removed before the error policy applies.
   *
   * @returns Intended output path (absent after an absorbed failure)
   * @throws {SerializationError} If the record is not JSON data
   * @throws {NamingConflictError} If `name` cannot be bound
   * @throws {ExecutionError} On failure with `onError: "raise"`
   */
  async create(record: InputRecord, options: CreateOptions = {}): Promise<string> {
    return this.#mutate(() => this.#create(record, options));
  }

  async recreate(record: InputRecord, options: CreateOptions = {}): Promise<string> {
    return this.#mutate(async () => {
      await this.#delete(record, options.n ?? 0);
      return this.#create(record, options);
    });
  }

  async select(record: InputRecord, n = 0): Promise<string> {
    const path = await this.outputFile(record, n);
    if (!(await fileExists(path))) {
      throw new EntryNotFoundError(path);
    }
    return path;
  }

  async exists(record: InputRecord, n = 0): Promise<boolean> {
    return fileExists(await this.outputFile(record, n));
  }

  async count(record: InputRecord): Promise<number> {
    const name = await this.#registry.resolve(hashInput(record));
    return this.#countChain(name);
  }

  async register(record: InputRecord, name: string): Promise<void> {
    const key = hashInput(record);
    await this.#mutate(() => this.#registry.register(key, name));
  }

  async registry(): Promise<Registry> {
    return this.#registry.read();
  }

  async files(): Promise<FileEntry[]> {
    const registry = await this.#registry.read();
    const candidates = (await listFiles(this.#directory, ".json")).filter(isInputFileName);
    const seen = new Set<ContentKey>();
    const entries: FileEntry[] = [];

    for (const fileName of candidates) {
      const path = join(this.#directory, fileName);
      const text = await readTextFile(path);
      const parsed = safeParseJson(text);
      if (!parsed.success || !isJsonObject(parsed.data)) {
        logger.warn("store.files.skip", {
          directory: this.#directory,
          message: `${fileName} is not a JSON object input file`,
        });
        continue;
      }

      const key = hashStoredInput(text);
      if (seen.has(key)) continue;
      seen.add(key);

      const id = registry[key] ?? key;
      const length = await this.#countChain(id);
      for (let n = 0; n < length; n++) {
        entries.push({
          id,
          n,
          inputFile: inputFile(this.#directory, id),
          outputFile: outputFile(this.#directory, id, n, this.#filetype),
        });
      }
    }

    return entries.sort(compareEntries);
  }

  /**
   * Input records of every entry, read back with float identity intact so a
   * row can be handed to select(), exists() or delete() again
   */
  async table(): Promise<InputRecord[]> {
    const rows: InputRecord[] = [];
    for (const entry of await this.files()) {
      if (entry.n !== 0) continue;
      rows.push(parseInputRecord(await readTextFile(entry.inputFile)));
    }
    return rows;
  }

  async delete(record: InputRecord, n = 0): Promise<void> {
    await this.#mutate(() => this.#delete(record, n));
  }

  /**
   * Remove everything files() reports, clear the registry, then remove the
   * directory if nothing else is left in it
   */
  async deleteAll(): Promise<void> {
    await this.#mutate(async () => {
      for (const entry of await this.files()) {
        if (entry.n === 0) {
          await removeFile(entry.inputFile);
        }
        await removeFile(entry.outputFile);
      }
      await this.#registry.clear();
    });

    // Outside the lock: the lock file itself lives in the directory
    const removed = await removeDirectoryIfEmpty(this.#directory);
    logger.debug("store.deleteAll", {
      directory: this.#directory,
      message: removed ? "directory removed" : "directory kept",
    });
  }

  async #create(record: InputRecord, options: CreateOptions): Promise<string> {
    const n = validateRestartIndex(options.n ?? 0);
    const onError = options.onError ?? "raise";
    const onStdout = options.onStdout ?? "ignore";

    const key = hashInput(record);
    if (options.name) {
      await this.#registry.register(key, options.name);
    }
    const name = await this.#registry.resolve(key);
    const directory = this.#directory;
    const output = outputFile(directory, name, n, this.#filetype);

    if (await fileExists(output)) {
      metrics.recordHit(directory);
      logger.debug("store.create.hit", { directory, key, details: { n } });
      return output;
    }

    logger.debug("store.create.run", { directory, key, details: { n } });

    // Chain members share one input file; never rewrite it
    const input = inputFile(directory, name);
    await ensureDirectory(directory);
    await writeNewFile(input, canonicalize(record, { indent: 4 }) + "\n");

    const previous = n > 0 ? outputFile(directory, name, n - 1, this.#filetype) : undefined;
    const args = buildArguments(input, output, previous);
    const outcome = await runExecutable(this.#executable, args);
    metrics.recordRun(directory, outcome.durationMs, outcome.ok);

    if (outcome.ok) {
      if (onStdout === "display") {
        this.#display.stdout(outcome.stdout);
      }
      return output;
    }

    await removeFile(output);
    if (n === 0) {
      await removeFile(input);
    }

    logger.debug("store.create.failed", {
      directory,
      key,
      details: { n, exitCode: outcome.exitCode, signal: outcome.signal },
    });

    switch (onError) {
      case "raise":
        throw new ExecutionError(
          [this.#executable, ...args],
          outcome.exitCode,
          outcome.stderr,
          outcome.stdout
        );
      case "display":
        this.#display.stderr(outcome.stderr);
        break;
      case "ignore":
        break;
    }

    return output;
  }

  async #delete(record: InputRecord, n: number): Promise<void> {
    validateRestartIndex(n);
    const key = hashInput(record);
    const name = await this.#registry.resolve(key);

    await removeFile(outputFile(this.#directory, name, n, this.#filetype));
    if (n === 0) {
      await removeFile(inputFile(this.#directory, name));
      await this.#registry.forget(key);
    }
  }

  async #countChain(name: string): Promise<number> {
    let n = 0;
    while (await fileExists(outputFile(this.#directory, name, n, this.#filetype))) {
      n++;
    }
    return n;
  }

  async #mutate<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.#lock) {
      return fn();
    }
    await ensureDirectory(this.#directory);
    return new FileLock(this.#directory).withLock(fn);
  }
}

/**
 * Open a store over a directory (created if missing)
 */
export function openStore(options: StoreOptions = {}): Store {
  return new Manager(options);
}
