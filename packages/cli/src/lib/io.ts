/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import type { Env } from "./env.js";
import { CliError } from "./errors.js";

/**
 * Everything a command touches outside the store
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  isStdinTTY(): boolean;
  /** Ask a yes/no question on the terminal */
  confirm(question: string): Promise<boolean>;
  /** Whether stderr may carry ANSI colors */
  colors: boolean;
  env: Env;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read an input record file
 */
export async function readRecordFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read input file: ${filePath}`, { cause: err });
  }
}

async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = await rl.question(`${question} (y/N) `);
    return answer.trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

/**
 * CliIO bound to the current process
 */
export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: () => readStdin(),
  isStdinTTY: () => process.stdin.isTTY ?? false,
  confirm: confirmOnTerminal,
  colors: process.stderr.isTTY ?? false,
  env: process.env,
};
