import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { createTempRoot, readCallLog, removeDir, writeStubExecutable } from "@simdb/testkit";
import type { StubOptions } from "@simdb/testkit";
import { Repeater } from "./repeater.js";
import { ExecutionError, SerializationError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { DisplaySink } from "./types.js";

describe("Repeater", () => {
  let root: string;
  let callLog: string;
  let input: string;
  let output: string;
  let shown: { stdout: string[]; stderr: string[] };
  let display: DisplaySink;

  beforeEach(async () => {
    root = await createTempRoot();
    callLog = join(root, "calls.log");
    input = join(root, "temp.json");
    output = join(root, "temp.nc");
    shown = { stdout: [], stderr: [] };
    display = {
      stdout: (text) => {
        shown.stdout.push(text);
      },
      stderr: (text) => {
        shown.stderr.push(text);
      },
    };
    logger.setEnabled(false);
  });

  afterEach(async () => {
    logger.setEnabled(true);
    await removeDir(root);
  });

  async function slot(options: StubOptions = {}): Promise<Repeater> {
    const executable = await writeStubExecutable(root, "simulate.sh", { callLog, ...options });
    return new Repeater({ executable, inputFile: input, outputFile: output, display });
  }

  it("should default to the conventional file names", () => {
    const repeater = new Repeater();

    expect(repeater.executable).toBe("./execute.sh");
    expect(repeater.inputFile).toBe("temp.json");
    expect(repeater.outputFile).toBe("temp.nc");
  });

  it("should write the input and run the executable", async () => {
    const repeater = await slot();

    await repeater.run({ b: 1, a: "x" });

    expect(await readFile(input, "utf-8")).toBe('{\n    "a": "x",\n    "b": 1\n}\n');
    expect(await readFile(output, "utf-8")).toBe(`${input}\n${output}\n`);
    expect(await readCallLog(callLog)).toEqual([[input, output]]);
  });

  it("should run every time and overwrite the input", async () => {
    const repeater = await slot();

    await repeater.run({ x: 1 });
    await repeater.run({ x: 1 });
    await repeater.run({ x: 2 });

    expect(await readCallLog(callLog)).toHaveLength(3);
    expect(await readFile(input, "utf-8")).toBe('{\n    "x": 2\n}\n');
  });

  it("should display stderr on failure by default and keep the files", async () => {
    const repeater = await slot({ exitCode: 1, stderr: "bad input" });

    await repeater.run({ x: 1 });

    expect(shown.stderr).toEqual(["bad input"]);
    expect(existsSync(input)).toBe(true);
    expect(existsSync(output)).toBe(true);
  });

  it("should raise when asked to", async () => {
    const repeater = await slot({ exitCode: 1, stderr: "bad input" });

    await expect(repeater.run({ x: 1 }, { onError: "raise" })).rejects.toThrow(ExecutionError);
  });

  it("should ignore failures when asked to", async () => {
    const repeater = await slot({ exitCode: 1, stderr: "bad input" });

    await repeater.run({ x: 1 }, { onError: "ignore" });

    expect(shown.stderr).toEqual([]);
  });

  it("should display stdout when asked to", async () => {
    const repeater = await slot({ stdout: "done\n" });

    await repeater.run({ x: 1 }, { onStdout: "display" });

    expect(shown.stdout).toEqual(["done\n"]);
  });

  it("should reject records that are not JSON before writing", async () => {
    const repeater = await slot();

    await expect(repeater.run({ x: Number.NaN })).rejects.toThrow(SerializationError);
    expect(existsSync(input)).toBe(false);
    expect(await readCallLog(callLog)).toEqual([]);
  });

  it("should clean both files", async () => {
    const repeater = await slot();
    await repeater.run({ x: 1 });

    await repeater.clean();
    await repeater.clean();

    expect(existsSync(input)).toBe(false);
    expect(existsSync(output)).toBe(false);
  });

  it("should use a new file pair after the setters", async () => {
    const repeater = await slot();
    const otherInput = join(root, "other.json");
    const otherOutput = join(root, "other.nc");

    repeater.setInputFile(otherInput);
    repeater.setOutputFile(otherOutput);
    await repeater.run({ x: 1 });

    expect(await readCallLog(callLog)).toEqual([[otherInput, otherOutput]]);
  });
});
