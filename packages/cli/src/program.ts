/**
 * strata command definitions
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import {
  PROTECTED_KEYS,
  collect,
  isPlainObject,
  logger,
  type Document,
  type QueryOptions,
} from "@strata/core";
import { parseDate, parseNonNegativeInt, parseSort } from "./lib/arg.js";
import { CliError, formatCliError, mapStoreErrorToExitCode } from "./lib/errors.js";
import { readJsonInput, type JsonInputOptions } from "./lib/io.js";
import { colorize, formatRecordLine, printJson, printLines } from "./lib/render.js";
import { withFileStore, type GlobalOptions } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

/** Fields `annotate` never writes: they always come from the scan */
const ignoredKeys = new Set<string>([...PROTECTED_KEYS, "path"]);

interface ListOptions {
  json?: boolean;
  limit?: number;
}

interface QueryCommandOptions extends JsonInputOptions {
  limit?: number;
  skip?: number;
  sort?: string[];
  fields?: string[];
}

interface NewerOptions {
  since: Date;
  json?: boolean;
}

function printRecords(records: Document[], root: string, json?: boolean): void {
  if (json) {
    printJson(records);
  } else {
    printLines(records.map((r) => formatRecordLine(r, root)));
  }
}

/**
 * Build the command tree. Commander errors are thrown rather than exiting
 * the process so callers decide the exit code.
 */
export function createProgram(): Command {
  const program = new Command();
  const globals = () => program.opts<GlobalOptions>();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("strata")
    .description("Query and annotate the files below a directory")
    .version(VERSION)
    .option("--root <path>", "Directory to scan")
    .option("--json-name <name>", "Metadata side-file name (default: FileStore.json)")
    .option("--max-depth <n>", "Deepest directory level to scan", (val) =>
      parseNonNegativeInt(val, "--max-depth")
    )
    .option("--filter <glob...>", "Only include files matching one of these globs")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      if (globals().quiet) {
        logger.setEnabled(false);
      }
    });

  // Scan command
  program
    .command("scan")
    .description("List file records")
    .option("--json", "Output as JSON array")
    .option("--limit <n>", "Maximum number of records", (val) => parseNonNegativeInt(val, "--limit"))
    .action(async (options: ListOptions) => {
      await withTiming("cli.scan", async () => {
        await withFileStore(globals(), {}, async (store) => {
          const records = await collect(store.query({ sort: { path: 1 }, limit: options.limit }));
          printRecords(records, store.path, options.json);
        });
      });
    });

  // Query command
  program
    .command("query")
    .description("Query file records with filter criteria")
    .option("--file <path>", "Read criteria from JSON file")
    .option("--data <json>", "Inline JSON criteria")
    .option("--limit <n>", "Maximum results", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--skip <n>", "Skip N results", (val) => parseNonNegativeInt(val, "--skip"))
    .option("--sort <field...>", "Sort fields; prefix with - for descending")
    .option("--fields <field...>", "Fields to return")
    .action(async (options: QueryCommandOptions) => {
      await withTiming("cli.query", async () => {
        const criteria = await readJsonInput(options);
        if (!isPlainObject(criteria)) {
          throw new InvalidArgumentError("Query criteria must be a JSON object");
        }

        const query: QueryOptions = {
          criteria,
          properties: options.fields,
          sort: options.sort ? parseSort(options.sort) : undefined,
          skip: options.skip,
          limit: options.limit,
        };

        await withFileStore(globals(), {}, async (store) => {
          // Always output as JSON array
          printJson(await collect(store.query(query)));
        });
      });
    });

  // Orphans command
  program
    .command("orphans")
    .description("List metadata entries whose file is gone")
    .option("--json", "Output as JSON array")
    .action(async (options: ListOptions) => {
      await withTiming("cli.orphans", async () => {
        await withFileStore(globals(), {}, async (store) => {
          const orphans = await collect(store.query({ criteria: { orphan: true }, sort: { path: 1 } }));
          printRecords(orphans, store.path, options.json);
        });
      });
    });

  // Annotate command
  program
    .command("annotate <fileId>")
    .description("Merge JSON fields into a record's metadata")
    .option("--file <path>", "Read fields from JSON file")
    .option("--data <json>", "Inline JSON fields")
    .action(async (fileId: string, options: JsonInputOptions) => {
      await withTiming("cli.annotate", async () => {
        const fields = await readJsonInput(options);
        if (!isPlainObject(fields)) {
          throw new InvalidArgumentError("Annotation must be a JSON object");
        }

        const ignored = Object.keys(fields).filter((f) => ignoredKeys.has(f));
        await withFileStore(globals(), { readOnly: false }, async (store) => {
          const existing = await store.queryOne({ criteria: { file_id: fileId } });
          if (!existing) {
            throw new CliError(`Record not found: ${fileId}`, { exitCode: 2 });
          }
          await store.update({ ...fields, file_id: fileId });
        });

        if (!globals().quiet) {
          if (ignored.length > 0) {
            const note = `Ignored protected fields: ${ignored.join(", ")}`;
            console.error(colorize(note, "yellow", process.stderr));
          }
          console.log(`Annotated ${fileId}`);
        }
      });
    });

  // Newer command
  program
    .command("newer")
    .description("List records of files modified after a date")
    .requiredOption("--since <date>", "ISO 8601 date", (val) => parseDate(val, "--since"))
    .option("--json", "Output as JSON array")
    .action(async (options: NewerOptions) => {
      await withTiming("cli.newer", async () => {
        await withFileStore(globals(), {}, async (store) => {
          const records = await collect(
            store.query({ criteria: { last_updated: { $gt: options.since } }, sort: { path: 1 } })
          );
          printRecords(records, store.path, options.json);
        });
      });
    });

  // Last-updated command
  program
    .command("last-updated")
    .description("Print the latest modification time under the root")
    .action(async () => {
      await withTiming("cli.last_updated", async () => {
        await withFileStore(globals(), {}, async (store) => {
          console.log((await store.lastUpdated()).toISOString());
        });
      });
    });

  return program;
}

/**
 * Parse `argv` and run the selected command
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already written its own usage errors
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }
    const verbose = program.opts<GlobalOptions>().verbose ?? false;
    console.error(`Error: ${formatCliError(err, verbose)}`);
    return mapStoreErrorToExitCode(err);
  } finally {
    logger.setEnabled(true);
  }
}
