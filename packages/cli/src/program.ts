/**
 * simdb command line program
 *
 * Built per invocation so tests can drive it in-process with their own CliIO.
 */

import { Command, CommanderError } from "commander";
import { hashInput, logger, VERSION } from "@simdb/sdk";
import type { CreateOptions, ErrorPolicy, InputRecord, Store } from "@simdb/sdk";
import { parseErrorPolicy, parseNonNegativeInt, parseRecord } from "./lib/arg.js";
import { isVerbose } from "./lib/env.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { readRecordFile } from "./lib/io.js";
import type { CliIO } from "./lib/io.js";
import { colorize, formatEntry, printJson, printLines } from "./lib/render.js";
import { openCliRepeater, openCliStore } from "./lib/store.js";
import type { GlobalOptions } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";
import type { MetricSink } from "./lib/telemetry.js";

export type { CliIO } from "./lib/io.js";

type RecordSourceOptions = {
  data?: string;
  file?: string;
};

type RestartOptions = RecordSourceOptions & {
  restart: number;
};

type CreateCommandOptions = RestartOptions & {
  name?: string;
  onError: ErrorPolicy;
  showStdout?: boolean;
};

type RemoveOptions = RestartOptions & {
  force?: boolean;
};

type RepeatOptions = RecordSourceOptions & {
  input: string;
  output: string;
  onError?: ErrorPolicy;
  showStdout?: boolean;
};

/**
 * Read the input record from --file, --data or stdin
 */
async function loadRecord(options: RecordSourceOptions, io: CliIO): Promise<InputRecord> {
  if (options.file !== undefined && options.data !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.file !== undefined) {
    return parseRecord(await readRecordFile(options.file), `file ${options.file}`);
  }

  if (options.data !== undefined) {
    return parseRecord(options.data, "--data");
  }

  if (io.isStdinTTY()) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }

  let stdin: string;
  try {
    stdin = await io.readStdin();
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", {
      cause: err,
    });
  }
  if (!stdin.trim()) {
    throw new CliError("stdin is empty");
  }
  return parseRecord(stdin, "stdin");
}

/**
 * Require --force, or a "y" on an interactive terminal
 */
async function confirmRemoval(question: string, force: boolean | undefined, io: CliIO): Promise<void> {
  if (force) {
    return;
  }
  if (!io.isStdinTTY()) {
    throw new CliError("Use --force to confirm removal in non-interactive mode");
  }
  if (!(await io.confirm(question))) {
    throw new CliError("Aborted by user");
  }
}

function addRecordSource(command: Command): Command {
  return command
    .option("--data <json>", "Inline JSON input record")
    .option("--file <path>", "Read the input record from a JSON file");
}

function addRestartIndex(command: Command): Command {
  return command.option(
    "-n, --restart <n>",
    "Restart index",
    (value: string) => parseNonNegativeInt(value, "-n"),
    0
  );
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const store = (): Store => openCliStore(globals(), io);
  const sink: MetricSink = {
    enabled: () => Boolean(globals().verbose) || isVerbose(io.env),
    write: io.stderr,
  };
  const info = (text: string): void => {
    if (!globals().quiet) {
      io.stdout(text + "\n");
    }
  };

  // Settings below are inherited by every subcommand
  program
    .configureOutput({
      writeOut: io.stdout,
      writeErr: (str) => io.stderr(colorize(str, "red", io.colors)),
    })
    .exitOverride();

  program
    .name("simdb")
    .description("Content-addressed cache of simulation outputs")
    .version(VERSION)
    .option("--dir <path>", "Managed directory (env SIMDB_DIR, default ./data)")
    .option("--filetype <ext>", "Output file extension (env SIMDB_FILETYPE, default nc)")
    .option("--exec <path>", "Simulation executable (env SIMDB_EXECUTABLE, default ./execute.sh)")
    .option("--lock", "Hold an advisory lock file while changing the directory")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      logger.setEnabled(!globals().quiet);
    });

  const createCommand = (name: "create" | "recreate", description: string): void => {
    addRestartIndex(addRecordSource(program.command(name).description(description)))
      .option("--name <name>", "Display name to register for the input")
      .option("--on-error <policy>", "raise, display or ignore", parseErrorPolicy, "raise")
      .option("--show-stdout", "Print the executable's standard output")
      .action(async (options: CreateCommandOptions) => {
        await withTiming(sink, `cli.${name}`, async () => {
          const record = await loadRecord(options, io);
          const createOptions: CreateOptions = {
            n: options.restart,
            name: options.name,
            onError: options.onError,
            onStdout: options.showStdout ? "display" : "ignore",
          };

          const target = store();
          const output =
            name === "create"
              ? await target.create(record, createOptions)
              : await target.recreate(record, createOptions);

          io.stdout(output + "\n");
        });
      });
  };

  createCommand("create", "Return the output for an input, running the executable if it is missing");
  createCommand("recreate", "Delete the output for an input and run the executable again");

  addRestartIndex(
    addRecordSource(program.command("select").description("Print the output path of an existing entry"))
  ).action(async (options: RestartOptions) => {
    await withTiming(sink, "cli.select", async () => {
      const record = await loadRecord(options, io);
      io.stdout((await store().select(record, options.restart)) + "\n");
    });
  });

  addRestartIndex(
    addRecordSource(program.command("exists").description("Print whether an output exists"))
  ).action(async (options: RestartOptions) => {
    await withTiming(sink, "cli.exists", async () => {
      const record = await loadRecord(options, io);
      io.stdout(String(await store().exists(record, options.restart)) + "\n");
    });
  });

  addRecordSource(
    program.command("count").description("Print the number of contiguous restart outputs")
  ).action(async (options: RecordSourceOptions) => {
    await withTiming(sink, "cli.count", async () => {
      const record = await loadRecord(options, io);
      io.stdout(String(await store().count(record)) + "\n");
    });
  });

  addRecordSource(program.command("hash").description("Print the content key of an input")).action(
    async (options: RecordSourceOptions) => {
      await withTiming(sink, "cli.hash", async () => {
        const record = await loadRecord(options, io);
        io.stdout(hashInput(record) + "\n");
      });
    }
  );

  addRecordSource(
    program.command("register <name>").description("Bind a display name to an input")
  ).action(async (name: string, options: RecordSourceOptions) => {
    await withTiming(sink, "cli.register", async () => {
      const record = await loadRecord(options, io);
      await store().register(record, name);
      info(`Registered ${name}`);
    });
  });

  program
    .command("ls")
    .description("List every existing output")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withTiming(sink, "cli.ls", async () => {
        const entries = await store().files();
        if (options.json) {
          printJson(io.stdout, entries);
        } else {
          printLines(io.stdout, entries.map(formatEntry));
        }
      });
    });

  program
    .command("table")
    .description("Print the input of every entry as a JSON array")
    .action(async () => {
      await withTiming(sink, "cli.table", async () => {
        printJson(io.stdout, await store().table());
      });
    });

  addRestartIndex(addRecordSource(program.command("rm").description("Remove an output")))
    .option("--force", "Remove without confirmation")
    .action(async (options: RemoveOptions) => {
      await withTiming(sink, "cli.rm", async () => {
        const record = await loadRecord(options, io);
        const target = store();
        const output = await target.outputFile(record, options.restart);

        await confirmRemoval(`Remove ${output}?`, options.force, io);
        await target.delete(record, options.restart);

        info(`Removed ${output}`);
      });
    });

  program
    .command("purge")
    .description("Remove every entry, the registry and, if empty, the directory")
    .option("--force", "Remove without confirmation")
    .action(async (options: { force?: boolean }) => {
      await withTiming(sink, "cli.purge", async () => {
        const target = store();

        await confirmRemoval(`Remove every entry in ${target.directory}?`, options.force, io);
        await target.deleteAll();

        info(`Purged ${target.directory}`);
      });
    });

  addRecordSource(
    program.command("repeat").description("Run the executable on a fixed input/output pair")
  )
    .option("--input <path>", "Input file rewritten before the run", "temp.json")
    .option("--output <path>", "Output file handed to the executable", "temp.nc")
    .option("--on-error <policy>", "raise, display or ignore (default: display)", parseErrorPolicy)
    .option("--show-stdout", "Print the executable's standard output")
    .action(async (options: RepeatOptions) => {
      await withTiming(sink, "cli.repeat", async () => {
        const record = await loadRecord(options, io);
        const repeater = openCliRepeater(globals(), io, {
          input: options.input,
          output: options.output,
        });

        await repeater.run(record, {
          onError: options.onError,
          onStdout: options.showStdout ? "display" : "ignore",
        });

        io.stdout(options.output + "\n");
      });
    });

  return program;
}

/**
 * Parse and run one command line
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed its own messages
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = Boolean(program.opts<GlobalOptions>().verbose) || isVerbose(io.env);
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.colors) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}
