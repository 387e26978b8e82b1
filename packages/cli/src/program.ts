/**
 * seqindex command-line program
 *
 * Exit codes:
 * - 0: success
 * - 1: usage/validation/storage error
 * - 2: sequence not found
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { logger, validateMetadata, type MatchMode, type SequenceMetadata } from "@seqindex/sdk";
import {
  collect,
  parseId,
  parseJson,
  parseK,
  parseLimit,
  parseMode,
  parseNonNegativeInt,
  parseThreshold,
} from "./lib/arg.js";
import { isVerbose, resolveEngineSettings, resolveRoot, type EngineSettings } from "./lib/env.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { processIo, type CliIo } from "./lib/io.js";
import { colorize, renderJson, renderLines, renderResults, renderSequences } from "./lib/render.js";
import { withCliStore, type CliStoreSettings } from "./lib/store.js";
import { withTiming, type MetricSink } from "./lib/telemetry.js";

export const CLI_VERSION = "0.1.0";

type GlobalOptions = {
  root?: string;
  k?: number;
  threshold?: number;
  caseSensitive?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

type MetadataFlags = {
  name?: string;
  tag?: string[];
  metadata?: unknown;
};

type JsonFlag = {
  json?: boolean;
};

interface CommandContext {
  settings: CliStoreSettings;
  quiet: boolean;
  sink: MetricSink;
}

/**
 * Build metadata from --metadata, --name and --tag
 * @returns undefined when no metadata flag was given
 */
function metadataFromFlags(flags: MetadataFlags): SequenceMetadata | undefined {
  if (flags.metadata === undefined && flags.name === undefined && flags.tag === undefined) {
    return undefined;
  }

  const metadata = validateMetadata(flags.metadata);
  if (flags.name !== undefined) {
    metadata.name = flags.name;
  }
  if (flags.tag !== undefined) {
    metadata.tags = flags.tag;
  }
  return metadata;
}

/**
 * Take symbols from the argument, or from stdin when it is omitted or "-"
 *
 * Line breaks in piped input are dropped so wrapped sequence files can be fed directly.
 */
async function resolveSymbols(arg: string | undefined, io: CliIo): Promise<string> {
  if (arg !== undefined && arg !== "-") {
    return arg;
  }

  if (io.isStdinTTY()) {
    throw new CliError("No symbols provided. Pass them as an argument or pipe them to stdin");
  }

  let input: string;
  try {
    input = await io.readStdin();
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", { cause: err });
  }

  const symbols = input
    .split(/\r?\n/)
    .map((line) => line.trim())
    .join("");
  if (symbols.length === 0) {
    throw new CliError("stdin is empty");
  }
  return symbols;
}

/**
 * Merge engine flags with the environment
 *
 * Bad environment values surface as CliError: commander only reports the
 * argument errors it raises itself.
 */
function engineSettings(opts: GlobalOptions): EngineSettings {
  try {
    return resolveEngineSettings({
      k: opts.k,
      threshold: opts.threshold,
      caseSensitive: opts.caseSensitive,
    });
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      throw new CliError(err.message, { cause: err });
    }
    throw err;
  }
}

function addMetadataOptions(command: Command): Command {
  return command
    .option("--name <name>", "Sequence name")
    .option("--tag <tag>", "Tag (repeatable)", collect)
    .option("--metadata <json>", "Metadata as a JSON object", (value: string) =>
      parseJson(value, "--metadata")
    );
}

/**
 * Create the commander program writing to `io`
 */
export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();

  const context = (): CommandContext => {
    const opts = program.opts<GlobalOptions>();

    return {
      settings: { root: resolveRoot(opts.root), ...engineSettings(opts) },
      quiet: opts.quiet ?? false,
      sink: { verbose: (opts.verbose ?? false) || isVerbose(), write: io.stderr },
    };
  };

  program
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
      outputError: (str, write) =>
        write(io === processIo ? colorize(str, "red", process.stderr) : str),
    })
    .exitOverride();

  // Global options
  program
    .name("seqindex")
    .description("seqindex - sequence store with exact, contains, fuzzy and prefix search")
    .version(CLI_VERSION)
    .option("--root <path>", "Data directory root")
    .option("--k <n>", "k-mer length", parseK)
    .option("--threshold <t>", "Minimum fuzzy score between 0 and 1", parseThreshold)
    .option("--case-sensitive", "Preserve case when indexing and searching")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program
    .command("init")
    .description("Initialize a new sequence store")
    .action(async () => {
      const ctx = context();
      await withTiming(
        "cli.init",
        async () => {
          await withCliStore(ctx.settings, (store) => store.stats());

          if (!ctx.quiet) {
            io.stdout(`Initialized store at ${ctx.settings.root}\n`);
          }
        },
        ctx.sink
      );
    });

  addMetadataOptions(
    program
      .command("add")
      .argument("[symbols]", "Sequence symbols (reads stdin when omitted or -)")
      .description("Store a new sequence and print its id")
  ).action(async (arg: string | undefined, flags: MetadataFlags) => {
    const ctx = context();
    await withTiming(
      "cli.add",
      async () => {
        const symbols = await resolveSymbols(arg, io);
        const metadata = metadataFromFlags(flags);
        const id = await withCliStore(ctx.settings, (store) => store.create(symbols, metadata));
        io.stdout(`${id}\n`);
      },
      ctx.sink
    );
  });

  program
    .command("get")
    .argument("<id>", "Sequence id", parseId)
    .description("Print a sequence as JSON")
    .option("--raw", "Output compact JSON")
    .action(async (id: number, flags: { raw?: boolean }) => {
      const ctx = context();
      await withTiming(
        "cli.get",
        async () => {
          const sequence = await withCliStore(ctx.settings, (store) => store.read(id));
          io.stdout(renderJson(sequence, { raw: flags.raw }));
        },
        ctx.sink
      );
    });

  addMetadataOptions(
    program
      .command("update")
      .argument("<id>", "Sequence id", parseId)
      .argument("[symbols]", "New symbols (reads stdin when omitted or -)")
      .description("Replace the symbols of a sequence; metadata is kept unless given")
  ).action(async (id: number, arg: string | undefined, flags: MetadataFlags) => {
    const ctx = context();
    await withTiming(
      "cli.update",
      async () => {
        const symbols = await resolveSymbols(arg, io);
        const metadata = metadataFromFlags(flags);
        await withCliStore(ctx.settings, (store) => store.update(id, symbols, metadata));

        if (!ctx.quiet) {
          io.stdout(`Updated ${id}\n`);
        }
      },
      ctx.sink
    );
  });

  program
    .command("rm")
    .argument("<id>", "Sequence id", parseId)
    .description("Delete a sequence")
    .action(async (id: number) => {
      const ctx = context();
      await withTiming(
        "cli.rm",
        async () => {
          await withCliStore(ctx.settings, (store) => store.delete(id));

          if (!ctx.quiet) {
            io.stdout(`Removed ${id}\n`);
          }
        },
        ctx.sink
      );
    });

  program
    .command("ls")
    .description("List sequences in id order")
    .option("--offset <n>", "Number of sequences to skip", (value: string) =>
      parseNonNegativeInt(value, "offset", Number.MAX_SAFE_INTEGER)
    )
    .option("--limit <n>", "Maximum number of sequences", parseLimit)
    .option("--json", "Output the page as JSON")
    .action(async (flags: JsonFlag & { offset?: number; limit?: number }) => {
      const ctx = context();
      await withTiming(
        "cli.ls",
        async () => {
          const page = await withCliStore(ctx.settings, (store) =>
            store.listPage({ offset: flags.offset, limit: flags.limit })
          );
          io.stdout(flags.json ? renderJson(page) : renderSequences(page.items));
        },
        ctx.sink
      );
    });

  program
    .command("search")
    .argument("<pattern>", "Pattern to look for")
    .description("Search sequences and print `id<TAB>score` lines")
    .option("--mode <mode>", "exact, contains, fuzzy or prefix", parseMode, "contains")
    .option("--limit <n>", "Maximum number of results", (value: string) =>
      parseNonNegativeInt(value, "limit")
    )
    .option("--json", "Output results as JSON")
    .action(
      async (pattern: string, flags: JsonFlag & { mode: MatchMode; limit?: number }) => {
        const ctx = context();
        await withTiming(
          `cli.search.${flags.mode}`,
          async () => {
            const results = await withCliStore(ctx.settings, (store) =>
              store.search(pattern, flags.mode, { limit: flags.limit })
            );
            io.stdout(flags.json ? renderJson(results) : renderResults(results));
          },
          ctx.sink
        );
      }
    );

  program
    .command("expr")
    .argument("<expression...>", 'Boolean expression, e.g. ACG AND (TTT OR "GGC")')
    .description("Search with AND, OR and parentheses over contained terms")
    .option("--limit <n>", "Maximum number of results", (value: string) =>
      parseNonNegativeInt(value, "limit")
    )
    .option("--json", "Output results as JSON")
    .action(async (parts: string[], flags: JsonFlag & { limit?: number }) => {
      const ctx = context();
      await withTiming(
        "cli.expr",
        async () => {
          const results = await withCliStore(ctx.settings, (store) =>
            store.searchExpression(parts.join(" "), { limit: flags.limit })
          );
          io.stdout(flags.json ? renderJson(results) : renderResults(results));
        },
        ctx.sink
      );
    });

  program
    .command("snippet")
    .argument("<id>", "Sequence id", parseId)
    .argument("<pattern>", "Pattern to highlight")
    .description("Print an excerpt around the first occurrence of a pattern")
    .option("--width <n>", "Symbols of context on each side", (value: string) =>
      parseNonNegativeInt(value, "width")
    )
    .option("--open <marker>", "Marker before each occurrence")
    .option("--close <marker>", "Marker after each occurrence")
    .option("--json", "Output the snippet as JSON")
    .action(
      async (
        id: number,
        pattern: string,
        flags: JsonFlag & { width?: number; open?: string; close?: string }
      ) => {
        const ctx = context();
        await withTiming(
          "cli.snippet",
          async () => {
            const snippet = await withCliStore(ctx.settings, (store) =>
              store.snippet(id, pattern, { width: flags.width, open: flags.open, close: flags.close })
            );
            io.stdout(flags.json ? renderJson(snippet) : renderLines([snippet.excerpt]));
          },
          ctx.sink
        );
      }
    );

  program
    .command("stats")
    .description("Print store and index statistics as JSON")
    .action(async () => {
      const ctx = context();
      await withTiming(
        "cli.stats",
        async () => {
          const stats = await withCliStore(ctx.settings, (store) => store.stats());
          io.stdout(renderJson(stats));
        },
        ctx.sink
      );
    });

  program
    .command("verify")
    .description("Compare the index with the store (exit 1 when inconsistent)")
    .action(async () => {
      const ctx = context();
      await withTiming(
        "cli.verify",
        async () => {
          const report = await withCliStore(ctx.settings, (store) => store.verify());
          io.stdout(renderJson(report));

          if (!report.consistent) {
            throw new CliError("Index is inconsistent with the store", { exitCode: 1 });
          }
        },
        ctx.sink
      );
    });

  program
    .command("reindex")
    .description("Rebuild the index from the stored sequences")
    .option("--json", "Output the rebuild report as JSON")
    .action(async (flags: JsonFlag) => {
      const ctx = context();
      await withTiming(
        "cli.reindex",
        async () => {
          const report = await withCliStore(ctx.settings, (store) => store.rebuild());

          if (flags.json) {
            io.stdout(renderJson(report));
          } else if (!ctx.quiet) {
            io.stdout(`Rebuilt index: ${report.sequences} sequences, ${report.kmers} k-mers\n`);
          }
        },
        ctx.sink
      );
    });

  program.hook("preAction", () => {
    if (program.opts<GlobalOptions>().quiet) {
      logger.setEnabled(false);
    }
  });

  return program;
}

/**
 * Run the CLI with user arguments (without node and script path)
 * @returns Process exit code
 */
export async function runCli(args: string[], io: CliIo = processIo): Promise<number> {
  const program = createProgram(io);
  const loggingEnabled = logger.isEnabled();

  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = (program.opts<GlobalOptions>().verbose ?? false) || isVerbose();
    const message = `Error: ${formatCliError(err, verbose)}`;
    io.stderr(`${io === processIo ? colorize(message, "red", process.stderr) : message}\n`);
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setEnabled(loggingEnabled);
  }
}
