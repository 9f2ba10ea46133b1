/**
 * simdb SDK
 *
 * A content-addressed, file-based cache of simulation outputs
 */

// Re-export types
export type {
  JsonValue,
  InputRecord,
  ContentKey,
  Registry,
  ErrorPolicy,
  StdoutPolicy,
  DisplaySink,
  StoreOptions,
  CreateOptions,
  FileEntry,
  Store,
} from "./types.js";

// Store and single-slot runner
export {
  openStore,
  processDisplay,
  DEFAULT_DIRECTORY,
  DEFAULT_FILETYPE,
  DEFAULT_EXECUTABLE,
} from "./store.js";
export { Repeater } from "./repeater.js";
export type { RepeaterOptions, RunOptions } from "./repeater.js";

// Building blocks
export { float, FloatValue, canonicalize, compactCanonicalText } from "./format/canonical.js";
export type { CanonicalOptions } from "./format/canonical.js";
export { parseInputRecord } from "./format/parse.js";
export { hashInput, hashStoredInput, hashCanonical, serializeInput, isContentKey } from "./hash.js";
export { NameRegistry } from "./registry.js";
export {
  REGISTRY_NAME,
  OUTPUT_MARKER,
  inputFile,
  outputFile,
  registryFile,
  lockFile,
  restartSuffix,
  isInputFileName,
} from "./paths.js";
export { buildArguments, runExecutable } from "./runner.js";
export type { ExecutionOutcome } from "./runner.js";
export { FileLock } from "./lock.js";
export { errorCode, fileExists, readTextFileIfExists } from "./io.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { RunMetrics } from "./observability/metrics.js";

// Errors
export {
  SimStoreError,
  SerializationError,
  ExecutionError,
  EntryNotFoundError,
  NamingConflictError,
  ValidationError,
  RegistryReadError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
  LockTimeoutError,
} from "./errors.js";
export type { NamingConflictReason } from "./errors.js";

export const VERSION = "0.1.0";
