/**
 * Stub executables standing in for a simulation program
 *
 * Stubs are POSIX shell scripts; they are called like the real program:
 *   stub inputFile outputFile [previousOutputFile]
 */

import { chmod, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { readTextFileIfExists } from "@simdb/sdk";

/**
 * What the stub writes into its output file (second argument)
 * - "args": every argument on its own line
 * - "copy": a copy of the input file
 * - "none": nothing, the output file is not created
 */
export type StubOutput = "args" | "copy" | "none";

export interface StubOptions {
  /** Output behaviour (default: "args") */
  output?: StubOutput;
  /** Exit code (default: 0) */
  exitCode?: number;
  /** Text printed to stdout */
  stdout?: string;
  /** Number of "a" characters printed to stdout after `stdout` */
  stdoutBytes?: number;
  /** Text printed to stderr */
  stderr?: string;
  /** File that receives one line per invocation with the space-joined arguments */
  callLog?: string;
}

/**
 * Quote a string for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Write an executable stub script
 * @param dir - Directory to place the script in
 * @param name - File name of the script
 * @returns Absolute path of the script
 */
export async function writeStubExecutable(
  dir: string,
  name: string,
  options: StubOptions = {}
): Promise<string> {
  const { output = "args", exitCode = 0, stdout, stdoutBytes, stderr, callLog } = options;
  const lines = ["#!/bin/sh"];

  if (callLog) {
    lines.push(`printf '%s\\n' "$*" >> ${shellQuote(callLog)}`);
  }
  if (stdout !== undefined) {
    lines.push(`printf '%s' ${shellQuote(stdout)}`);
  }
  if (stdoutBytes !== undefined) {
    lines.push(`head -c ${stdoutBytes} /dev/zero | tr '\\0' a`);
  }
  if (stderr !== undefined) {
    lines.push(`printf '%s' ${shellQuote(stderr)} >&2`);
  }

  switch (output) {
    case "args":
      lines.push(`printf '%s\\n' "$@" > "$2"`);
      break;
    case "copy":
      lines.push(`cp "$1" "$2"`);
      break;
    case "none":
      break;
  }

  lines.push(`exit ${exitCode}`);

  const path = join(dir, name);
  await writeFile(path, lines.join("\n") + "\n", "utf-8");
  await chmod(path, 0o755);
  return path;
}

/**
 * Read the invocations recorded by a stub's call log
 * @returns One array of arguments per invocation (empty if the stub never ran)
 */
export async function readCallLog(callLog: string): Promise<string[][]> {
  const content = await readTextFileIfExists(callLog);
  if (content === null) {
    return [];
  }
  return content
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => line.split(" "));
}
