/**
 * Output rendering helpers
 */

import type { FileEntry } from "@simdb/sdk";

type Color = "red" | "green" | "yellow";

type Write = (text: string) => void;

/**
 * Print JSON
 */
export function printJson(write: Write, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  write(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(write: Write, lines: readonly string[]): void {
  for (const line of lines) {
    write(line + "\n");
  }
}

/**
 * One `ls` line: id, restart index and output path
 */
export function formatEntry(entry: FileEntry): string {
  return `${entry.id}\t${entry.n}\t${entry.outputFile}`;
}

/**
 * Apply ANSI color only when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
