/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_DIRECTORY, DEFAULT_EXECUTABLE, DEFAULT_FILETYPE } from "@simdb/sdk";

export type Env = Record<string, string | undefined>;

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the managed directory
 * Priority: CLI option > SIMDB_DIR env var > default "./data"
 */
export function resolveDirectory(cliDir?: string, env: Env = process.env): string {
  const dir = cliDir ?? env.SIMDB_DIR ?? DEFAULT_DIRECTORY;
  return path.resolve(expandTilde(dir));
}

/**
 * Resolve the output file extension
 * Priority: CLI option > SIMDB_FILETYPE env var > default "nc"
 */
export function resolveFiletype(cliFiletype?: string, env: Env = process.env): string {
  const filetype = cliFiletype ?? env.SIMDB_FILETYPE ?? DEFAULT_FILETYPE;
  return filetype.startsWith(".") ? filetype.slice(1) : filetype;
}

/**
 * Resolve the simulation executable
 * Priority: CLI option > SIMDB_EXECUTABLE env var > default "./execute.sh"
 *
 * Bare names are kept as they are so that PATH lookup still applies.
 */
export function resolveExecutable(cliExecutable?: string, env: Env = process.env): string {
  return expandTilde(cliExecutable ?? env.SIMDB_EXECUTABLE ?? DEFAULT_EXECUTABLE);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: Env = process.env): boolean {
  return env.SIMDB_CLI_DEBUG === "1";
}
