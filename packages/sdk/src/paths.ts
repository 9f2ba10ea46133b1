/**
 * File naming scheme for managed directories
 *
 * Pure functions, no I/O. Every file name the store touches is built here so that
 * registry access and entry paths cannot drift apart.
 *
 * Layout for display name `d` and output extension `ext`:
 *   d.json          input file, shared by the whole restart chain
 *   d.ext           output of restart index 0
 *   d0x1.ext        output of restart index 1 (hex suffix: 0xa for 10)
 *   d_out.json      output of index 0 when ext is "json"
 *   simplesimdb.json  registry sidecar
 */

import { join } from "node:path";

/**
 * Reserved stem of the registry sidecar; also refused as a display name
 */
export const REGISTRY_NAME = "simplesimdb";

const INPUT_EXTENSION = "json";

/**
 * Stem suffix that keeps JSON outputs apart from input files
 */
export const OUTPUT_MARKER = "_out";

/**
 * Suffix appended to the stem of restart outputs
 */
export function restartSuffix(n: number): string {
  return n > 0 ? `0x${n.toString(16)}` : "";
}

/**
 * Path of the input file for a display name
 */
export function inputFile(directory: string, name: string): string {
  return join(directory, `${name}.${INPUT_EXTENSION}`);
}

/**
 * Path of the output file for a display name and restart index
 */
export function outputFile(directory: string, name: string, n: number, filetype: string): string {
  const stem = name + restartSuffix(n);
  if (filetype === INPUT_EXTENSION) {
    return join(directory, `${stem}${OUTPUT_MARKER}.${INPUT_EXTENSION}`);
  }
  return join(directory, `${stem}.${filetype}`);
}

/**
 * Path of the registry sidecar
 */
export function registryFile(directory: string): string {
  return join(directory, `${REGISTRY_NAME}.${INPUT_EXTENSION}`);
}

/**
 * Path of the advisory lock file
 */
export function lockFile(directory: string): string {
  return join(directory, `${REGISTRY_NAME}.lock`);
}

/**
 * Whether a directory entry is an input file (not an output, not the registry)
 */
export function isInputFileName(fileName: string): boolean {
  return (
    fileName.endsWith(`.${INPUT_EXTENSION}`) &&
    !fileName.endsWith(`${OUTPUT_MARKER}.${INPUT_EXTENSION}`) &&
    fileName !== `${REGISTRY_NAME}.${INPUT_EXTENSION}`
  );
}
