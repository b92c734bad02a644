/**
 * BLAST+ adapter
 *
 * Builds the search command for a database (blastn for nucleotide
 * databases, blastx for protein ones) and returns the raw tabular rows for
 * the pipeline to parse. Search parameters are fixed apart from identity
 * and thread count.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { BLAST_FIELDS, BLAST_OUTFMT } from "../formats/blast-tabular";
import { type CommandSpec, formatCommand, runCommand } from "../io/command";
import { splitLines } from "../io/stream-utils";
import { type Logger, SilentLogger } from "../logger";
import type { DatabaseInfo } from "../types";

export const DEFAULT_EVALUE = "1E-20";

/** Genetic code used to translate queries against protein databases */
export const BACTERIAL_GENETIC_CODE = 11;

export interface BlastSearchOptions {
  /** Minimum percent identity, passed to blastn as -perc_identity */
  minIdentity: number;
  threads?: number;
}

const BlastSearchOptionsSchema = type({
  minIdentity: "0<=number<=100",
  "threads?": "number.integer>=1",
});

/**
 * Produces aligner output rows for one query file
 */
export type AlignmentSource = (query: string) => Promise<Iterable<string> | AsyncIterable<string>>;

/**
 * Build the search command for a query file against a database
 */
export function buildSearchCommand(
  database: DatabaseInfo,
  query: string,
  options: BlastSearchOptions
): CommandSpec {
  const validation = BlastSearchOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid search options: ${validation.summary}`);
  }

  const common = [
    "-db",
    database.path,
    "-outfmt",
    BLAST_OUTFMT,
    "-num_threads",
    String(options.threads ?? 1),
    "-evalue",
    DEFAULT_EVALUE,
    "-culling_limit",
    "1",
    "-query",
    query,
  ];

  if (database.type === "prot") {
    return {
      command: "blastx",
      args: [
        "-task",
        "blastx-fast",
        "-seg",
        "no",
        "-query_gencode",
        String(BACTERIAL_GENETIC_CODE),
        ...common,
      ],
    };
  }

  return {
    command: "blastn",
    args: ["-task", "blastn", "-dust", "no", "-perc_identity", String(options.minIdentity), ...common],
  };
}

/**
 * Alignment source that runs BLAST+ against a database
 */
export function blastAligner(
  database: DatabaseInfo,
  options: BlastSearchOptions,
  logger: Logger = new SilentLogger()
): AlignmentSource {
  return async (query) => {
    const spec = buildSearchCommand(database, query, options);
    logger.debug(`Running: ${formatCommand(spec)}`);
    const { stdout } = await runCommand(spec);
    const lines = splitLines(stdout);
    return database.type === "prot" ? filterByIdentity(lines, options.minIdentity) : lines;
  };
}

/**
 * Drop rows below the identity cutoff. blastx takes no -perc_identity, so
 * protein searches apply it here; rows without a readable identity are kept
 * for the parser to reject.
 */
export function* filterByIdentity(lines: Iterable<string>, minIdentity: number): Iterable<string> {
  const column = BLAST_FIELDS.indexOf("pident");
  for (const line of lines) {
    const raw = line.split("\t")[column]?.trim() ?? "";
    const identity = Number(raw);
    if (raw === "" || Number.isNaN(identity) || identity >= minIdentity) {
      yield line;
    }
  }
}
