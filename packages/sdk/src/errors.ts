/**
 * Error types for simulation store operations
 *
 * Invariants:
 * - File-level errors include the absolute target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all simulation store errors
 */
export abstract class SimStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an input record cannot be written as canonical JSON
 */
export class SerializationError extends SimStoreError {
  readonly code = "E_SERIALIZE";

  constructor(
    public readonly pointer: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Input is not JSON-representable at "${pointer || "/"}": ${reason}`, options);
  }
}

/**
 * Thrown when the simulation executable exits with a non-zero code
 * (only under the "raise" error policy)
 */
export class ExecutionError extends SimStoreError {
  readonly code = "E_EXEC";

  constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly stdout: string,
    options?: ErrorOptions
  ) {
    const status = exitCode === null ? "could not be run" : `exited with code ${exitCode}`;
    super(`Command ${args.join(" ")} ${status}`, options);
  }
}

/**
 * Thrown when a selected entry has no output file
 */
export class EntryNotFoundError extends SimStoreError {
  readonly code = "ENOENT";

  constructor(
    public readonly outputFile: string,
    options?: ErrorOptions
  ) {
    super(`Entry does not exist: ${outputFile}`, options);
  }
}

/**
 * Reasons a display name cannot be registered
 */
export type NamingConflictReason = "reserved" | "key-bound" | "orphan" | "name-taken";

/**
 * Thrown when a display name would break the registry invariants
 */
export class NamingConflictError extends SimStoreError {
  readonly code = "E_NAME_CONFLICT";

  constructor(
    public readonly reason: NamingConflictReason,
    public readonly displayName: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when an argument is outside its allowed domain
 */
export class ValidationError extends SimStoreError {
  readonly code = "E_VALIDATION";
}

/**
 * Thrown when the registry sidecar exists but does not hold a name map
 */
export class RegistryReadError extends SimStoreError {
  readonly code = "E_REGISTRY";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Registry file is corrupt: ${filePath}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends SimStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends SimStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file removal operation fails
 */
export class FileRemoveError extends SimStoreError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends SimStoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends SimStoreError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when the advisory lock cannot be acquired in time
 */
export class LockTimeoutError extends SimStoreError {
  readonly code = "E_LOCK";

  constructor(
    public readonly lockFile: string,
    timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms: ${lockFile}. ` +
        `A crashed process may have left it behind; delete it if no other writer is running.`,
      options
    );
  }
}
