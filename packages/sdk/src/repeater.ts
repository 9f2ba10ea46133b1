/**
 * Single-slot runner: one fixed input/output file pair, reused for every run
 *
 * For sweeps where keeping every parameter set on disk is not wanted. No hashing,
 * no registry, no restart chain, no cache check.
 */

import type { DisplaySink, ErrorPolicy, InputRecord, StdoutPolicy } from "./types.js";
import { canonicalize } from "./format/canonical.js";
import { serializeInput } from "./hash.js";
import { removeFile, writeTextFile } from "./io.js";
import { buildArguments, runExecutable } from "./runner.js";
import { validateExecutable } from "./validation.js";
import { ExecutionError, ValidationError } from "./errors.js";
import { processDisplay, DEFAULT_EXECUTABLE } from "./store.js";
import { logger } from "./observability/logs.js";

export interface RepeaterOptions {
  /** Program to run (default: "./execute.sh") */
  executable?: string;
  /** Input file rewritten before every run (default: "temp.json") */
  inputFile?: string;
  /** Output file the executable writes (default: "temp.nc") */
  outputFile?: string;
  /** Where "display" policies write (default: process stdout/stderr) */
  display?: DisplaySink;
}

export interface RunOptions {
  /** Error policy (default: "display") */
  onError?: ErrorPolicy;
  /** Stdout policy (default: "ignore") */
  onStdout?: StdoutPolicy;
}

function validateFilePath(value: string, label: string): string {
  if (!value || typeof value !== "string") {
    throw new ValidationError(`${label} must be a non-empty string`);
  }
  return value;
}

export class Repeater {
  #executable: string;
  #inputFile: string;
  #outputFile: string;
  #display: DisplaySink;

  constructor(options: RepeaterOptions = {}) {
    this.#executable = validateExecutable(options.executable ?? DEFAULT_EXECUTABLE);
    this.#inputFile = validateFilePath(options.inputFile ?? "temp.json", "inputFile");
    this.#outputFile = validateFilePath(options.outputFile ?? "temp.nc", "outputFile");
    this.#display = options.display ?? processDisplay;
  }

  get executable(): string {
    return this.#executable;
  }

  get inputFile(): string {
    return this.#inputFile;
  }

  get outputFile(): string {
    return this.#outputFile;
  }

  setExecutable(executable: string): void {
    this.#executable = validateExecutable(executable);
  }

  setInputFile(inputFile: string): void {
    this.#inputFile = validateFilePath(inputFile, "inputFile");
  }

  setOutputFile(outputFile: string): void {
    this.#outputFile = validateFilePath(outputFile, "outputFile");
  }

  /**
   * Overwrite the input file with the record and run the executable
   *
   * Failed runs leave both files as they are.
   * @throws {ExecutionError} On failure with `onError: "raise"`
   */
  async run(record: InputRecord, options: RunOptions = {}): Promise<void> {
    const onError = options.onError ?? "display";
    const onStdout = options.onStdout ?? "ignore";

    // Surface SerializationError before touching the slot
    serializeInput(record);
    await writeTextFile(this.#inputFile, canonicalize(record, { indent: 4 }) + "\n");

    const args = buildArguments(this.#inputFile, this.#outputFile);
    const outcome = await runExecutable(this.#executable, args);

    if (outcome.ok) {
      if (onStdout === "display") {
        this.#display.stdout(outcome.stdout);
      }
      return;
    }

    logger.debug("repeater.run.failed", {
      message: this.#inputFile,
      details: { exitCode: outcome.exitCode, signal: outcome.signal },
    });

    switch (onError) {
      case "raise":
        throw new ExecutionError(
          [this.#executable, ...args],
          outcome.exitCode,
          outcome.stderr,
          outcome.stdout
        );
      case "display":
        this.#display.stderr(outcome.stderr);
        break;
      case "ignore":
        break;
    }
  }

  /**
   * Remove the input and output files if present
   */
  async clean(): Promise<void> {
    await removeFile(this.#inputFile);
    await removeFile(this.#outputFile);
  }
}
