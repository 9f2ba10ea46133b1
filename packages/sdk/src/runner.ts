/**
 * Execution of the external simulation program
 *
 * Argument shape:
 *   fresh run (n = 0):  executable inputFile outputFile
 *   restart  (n > 0):   executable inputFile outputFile previousOutputFile
 *
 * Only the exit code decides success. Output is captured, never interpreted.
 * No timeout and no output limit are applied: a hung executable hangs the caller.
 */

import { execa } from "execa";

/**
 * Result of one executable run
 */
export type ExecutionOutcome =
  | {
      ok: true;
      stdout: string;
      stderr: string;
      durationMs: number;
    }
  | {
      ok: false;
      /** null when the process could not be spawned or was killed by a signal */
      exitCode: number | null;
      signal: string | null;
      stdout: string;
      stderr: string;
      durationMs: number;
    };

function toText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Build the positional arguments for a run
 */
export function buildArguments(
  inputFile: string,
  outputFile: string,
  previousOutputFile?: string
): string[] {
  return previousOutputFile === undefined
    ? [inputFile, outputFile]
    : [inputFile, outputFile, previousOutputFile];
}

/**
 * Run the executable to completion and classify the outcome
 */
export async function runExecutable(
  executable: string,
  args: readonly string[]
): Promise<ExecutionOutcome> {
  const result = await execa(executable, args, {
    reject: false,
    stdin: "ignore",
    stripFinalNewline: false,
    maxBuffer: { stdout: Infinity, stderr: Infinity },
  });

  const stdout = toText(result.stdout);
  const stderr = toText(result.stderr);

  // Spawn failures and signals leave exitCode undefined
  if (result.exitCode === 0) {
    return { ok: true, stdout, stderr, durationMs: result.durationMs };
  }

  return {
    ok: false,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
    stdout,
    // Spawn failures have no stderr of their own
    stderr: stderr || (result instanceof Error ? result.message : ""),
    durationMs: result.durationMs,
  };
}
