/**
 * Core types for the simulation store
 */

import type { FloatValue } from "./format/canonical.js";

/**
 * Any value that can appear in an input record
 *
 * `FloatValue` marks a number that must keep float identity (`10.0` instead of `10`).
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | FloatValue
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Parameter set handed to the simulation executable
 */
export type InputRecord = { [key: string]: JsonValue };

/**
 * SHA-1 hex digest of the canonical input (40 lowercase hex characters)
 */
export type ContentKey = string;

/**
 * Mapping ContentKey → display name, as persisted in the registry sidecar
 */
export type Registry = Record<ContentKey, string>;

/**
 * What to do when the executable exits with a non-zero code
 * - "raise": throw an ExecutionError carrying stderr
 * - "display": write stderr to the display sink and return
 * - "ignore": return silently
 */
export type ErrorPolicy = "raise" | "display" | "ignore";

/**
 * What to do with the executable's standard output on success
 */
export type StdoutPolicy = "ignore" | "display";

/**
 * Destination for captured process output shown to the user
 */
export interface DisplaySink {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * Options for openStore()
 */
export interface StoreOptions {
  /** Managed directory; created if missing (default: "./data") */
  directory?: string;
  /** Extension of the output files, without the dot (default: "nc") */
  filetype?: string;
  /** Program that turns an input file into an output file (default: "./execute.sh") */
  executable?: string;
  /** Hold an advisory lock file during mutating operations (default: false) */
  lock?: boolean;
  /** Where "display" policies write (default: process stdout/stderr) */
  display?: DisplaySink;
}

/**
 * Options for create() and recreate()
 */
export interface CreateOptions {
  /** Restart index, beginning with 0 (default: 0) */
  n?: number;
  /** Human-readable name to register for the input (default: "" = none) */
  name?: string;
  /** Error policy (default: "raise") */
  onError?: ErrorPolicy;
  /** Stdout policy (default: "ignore") */
  onStdout?: StdoutPolicy;
}

/**
 * One existing output of the managed directory
 */
export interface FileEntry {
  /** Display name (registered name or ContentKey) */
  id: string;
  /** Restart index */
  n: number;
  /** Absolute path of the shared input file */
  inputFile: string;
  /** Absolute path of the output file for index n */
  outputFile: string;
}

/**
 * Simulation store interface
 */
export interface Store {
  /** Managed directory */
  readonly directory: string;
  /** Output file extension */
  readonly filetype: string;
  /** Executable invoked on cache misses */
  readonly executable: string;

  /**
   * Change the managed directory; it exists once this returns
   */
  setDirectory(directory: string): void;

  /**
   * Change the output file extension for subsequent calls
   */
  setFiletype(filetype: string): void;

  /**
   * Change the executable for subsequent calls
   */
  setExecutable(executable: string): void;

  /**
   * ContentKey of an input record
   */
  hash(record: InputRecord): ContentKey;

  /**
   * Path of the input file for a record (no existence check)
   */
  inputFile(record: InputRecord): Promise<string>;

  /**
   * Path of the output file for a record and restart index (no existence check)
   */
  outputFile(record: InputRecord, n?: number): Promise<string>;

  /**
   * Return the existing output or run the executable to produce it
   */
  create(record: InputRecord, options?: CreateOptions): Promise<string>;

  /**
   * delete() followed by create()
   */
  recreate(record: InputRecord, options?: CreateOptions): Promise<string>;

  /**
   * Path of an existing output; throws EntryNotFoundError otherwise
   */
  select(record: InputRecord, n?: number): Promise<string>;

  /**
   * Whether the output file for index n exists
   */
  exists(record: InputRecord, n?: number): Promise<boolean>;

  /**
   * Number of contiguous existing outputs starting at index 0
   */
  count(record: InputRecord): Promise<number>;

  /**
   * Bind a display name to a record
   */
  register(record: InputRecord, name: string): Promise<void>;

  /**
   * Copy of the current ContentKey → name map
   */
  registry(): Promise<Registry>;

  /**
   * Every existing output, sorted by (id, n)
   */
  files(): Promise<FileEntry[]>;

  /**
   * Parsed inputs of every entry with an index-0 output
   */
  table(): Promise<InputRecord[]>;

  /**
   * Remove the output of index n; for n = 0 also the input file and name
   */
  delete(record: InputRecord, n?: number): Promise<void>;

  /**
   * Remove every entry reported by files(), the registry and, if empty, the directory
   */
  deleteAll(): Promise<void>;
}
