/**
 * Store construction for CLI commands
 */

import { openStore, Repeater } from "@simdb/sdk";
import type { DisplaySink, Store } from "@simdb/sdk";
import { resolveDirectory, resolveExecutable, resolveFiletype } from "./env.js";
import type { CliIO } from "./io.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  dir?: string;
  filetype?: string;
  exec?: string;
  lock?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

function displayFor(io: CliIO): DisplaySink {
  return { stdout: io.stdout, stderr: io.stderr };
}

/**
 * Open the store the global options and environment point at
 */
export function openCliStore(options: GlobalOptions, io: CliIO): Store {
  return openStore({
    directory: resolveDirectory(options.dir, io.env),
    filetype: resolveFiletype(options.filetype, io.env),
    executable: resolveExecutable(options.exec, io.env),
    lock: options.lock ?? false,
    display: displayFor(io),
  });
}

/**
 * Single-slot runner over a fixed file pair
 */
export function openCliRepeater(
  options: GlobalOptions,
  io: CliIO,
  files: { input: string; output: string }
): Repeater {
  return new Repeater({
    executable: resolveExecutable(options.exec, io.env),
    inputFile: files.input,
    outputFile: files.output,
    display: displayFor(io),
  });
}
