#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point.
 *
 * Usage:
 *   npm run genescreen -- [options] <contigs.fa ...>
 *   npm run genescreen -- --summary <report.tab ...>
 *   npm run genescreen -- --list
 *   npm run genescreen -- --setupdb
 */

import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { blastAligner } from "./aligner/blast";
import { defaultDatabaseDir, describeDatabase, listDatabases, setupDatabase } from "./database/registry";
import { DatabaseError, ScreenError, ValidationError } from "./errors";
import { ConsoleLogger, type Logger } from "./logger";
import { DEFAULT_MIN_COVERAGE, DEFAULT_MIN_IDENTITY, screenFiles } from "./operations/screen";
import { formatSummary, summarizeReports } from "./operations/summary";
import type { Delimiter } from "./types";

const DEFAULT_DATABASE = "ncbi";

const USAGE = `Usage: genescreen [options] <contigs.fa ...>
       genescreen --summary [options] <report.tab ...>
       genescreen --list | --setupdb [--datadir DIR]

Screening
  --db NAME        database to screen against (default: ${DEFAULT_DATABASE})
  --datadir DIR    database root directory (default: $GENESCREEN_DB_DIR or ./db)
  --minid N        minimum percent identity (default: ${DEFAULT_MIN_IDENTITY})
  --mincov N       minimum percent coverage (default: ${DEFAULT_MIN_COVERAGE})
  --threads N      aligner threads (default: 1)

Output
  --csv            comma-separated output instead of tabs
  --nopath         write file basenames only
  --noheader       suppress the header line

Modes
  --summary        merge reports into a presence/absence matrix
  --list           list installed databases
  --setupdb        index every installed database

General
  --quiet          no progress messages
  --debug          verbose progress messages
  --help           show this help
`;

/**
 * Streams the CLI writes to; replaced in tests
 */
export interface CliIO {
  stdout: (line: string) => void;
  logger: (quiet: boolean, debug: boolean) => Logger;
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(line + "\n"),
  logger: (quiet, debug) => new ConsoleLogger(quiet ? "error" : debug ? "debug" : "info"),
};

function parseNumberOption(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ValidationError(`--${name} expects a number, got '${raw}'`);
  }
  return value;
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      db: { type: "string", default: DEFAULT_DATABASE },
      datadir: { type: "string" },
      minid: { type: "string" },
      mincov: { type: "string" },
      threads: { type: "string" },
      csv: { type: "boolean", default: false },
      nopath: { type: "boolean", default: false },
      noheader: { type: "boolean", default: false },
      summary: { type: "boolean", default: false },
      list: { type: "boolean", default: false },
      setupdb: { type: "boolean", default: false },
      quiet: { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/**
 * Run the CLI with the given arguments
 *
 * @returns Process exit status
 */
export async function main(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.logger(false, false).error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const { values, positionals } = parsed;
  const logger = io.logger(values.quiet === true, values.debug === true);

  if (values.help === true) {
    USAGE.trimEnd()
      .split("\n")
      .forEach((line) => io.stdout(line));
    return 0;
  }

  const delimiter: Delimiter = values.csv === true ? "," : "\t";
  const dataDir = values.datadir ?? defaultDatabaseDir();

  try {
    if (values.list === true) {
      io.stdout(["DATABASE", "SEQUENCES", "DBTYPE", "INDEXED"].join(delimiter));
      for (const database of await listDatabases(dataDir, logger)) {
        io.stdout(
          [database.name, String(database.sequenceCount), database.type, database.indexed ? "yes" : "no"].join(
            delimiter
          )
        );
      }
      return 0;
    }

    if (values.setupdb === true) {
      for (const database of await listDatabases(dataDir, logger)) {
        await setupDatabase(database, logger);
      }
      return 0;
    }

    if (positionals.length === 0) {
      throw new ValidationError("No input files given (see --help)");
    }

    if (values.summary === true) {
      const matrix = await summarizeReports(positionals, logger);
      formatSummary(matrix, { delimiter, noPath: values.nopath === true }).forEach((line) => io.stdout(line));
      return 0;
    }

    const minIdentity = parseNumberOption("minid", values.minid, DEFAULT_MIN_IDENTITY);
    const minCoverage = parseNumberOption("mincov", values.mincov, DEFAULT_MIN_COVERAGE);
    const threads = parseNumberOption("threads", values.threads, 1);

    const database = await describeDatabase(dataDir, values.db ?? DEFAULT_DATABASE);
    if (!database.indexed) {
      throw new DatabaseError(`Database '${database.name}' is not indexed; run with --setupdb`, database.name);
    }
    logger.info(`Using ${database.type} database ${database.name}: ${database.sequenceCount} sequences`);

    const results = await screenFiles(
      positionals,
      blastAligner(database, { minIdentity, threads }, logger),
      {
        database: database.name,
        minCoverage,
        minIdentity,
        delimiter,
        noHeader: values.noheader === true,
        noPath: values.nopath === true,
      },
      io.stdout,
      logger
    );
    logger.info(`Screened ${results.length} files`);
    return 0;
  } catch (error) {
    if (error instanceof ScreenError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}

const entryPoint = process.argv[1];
if (entryPoint !== undefined && import.meta.url === pathToFileURL(entryPoint).href) {
  main(process.argv.slice(2)).then(
    (status) => {
      process.exitCode = status;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
