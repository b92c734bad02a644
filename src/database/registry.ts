/**
 * Reference database registry
 *
 * A database is a directory under the database root holding a FASTA file
 * named "sequences", indexed for the aligner with makeblastdb:
 *
 *   <root>/<name>/sequences
 *   <root>/<name>/sequences.nin   (or .pin for protein databases)
 *
 * The registry only reads this layout; it never downloads or edits
 * sequences.
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { DatabaseError } from "../errors";
import { createStream, exists, isDirectory, listDirectory } from "../io/file-reader";
import { type CommandSpec, formatCommand, runCommand } from "../io/command";
import { readLines } from "../io/stream-utils";
import { type Logger, SilentLogger } from "../logger";
import type { DatabaseInfo, DatabaseType } from "../types";

export const SEQUENCES_FILE = "sequences";

/** Residues sampled from the start of a database for type detection */
const TYPE_SAMPLE_SIZE = 1000;

const NUCLEOTIDE_ALPHABET = /^[ACGTUNRYSWKMBDHV\-.*]*$/i;

/**
 * Database root: $GENESCREEN_DB_DIR, else the db/ directory of the package
 */
export function defaultDatabaseDir(): string {
  const fromEnv = process.env["GENESCREEN_DB_DIR"];
  if (fromEnv !== undefined && fromEnv !== "") {
    return fromEnv;
  }
  return fileURLToPath(new URL("../../db", import.meta.url));
}

/**
 * Classify a residue sample as nucleotide or protein
 *
 * Anything made only of IUPAC nucleotide codes (and gap/stop symbols) is
 * nucleotide; anything else is protein.
 */
export function detectDatabaseType(sample: string): DatabaseType {
  return NUCLEOTIDE_ALPHABET.test(sample) ? "nucl" : "prot";
}

/**
 * Inspect one database directory
 *
 * @throws {DatabaseError} If the database has no sequences or no residues
 */
export async function describeDatabase(root: string, name: string): Promise<DatabaseInfo> {
  const path = join(root, name, SEQUENCES_FILE);
  if (!(await exists(path))) {
    throw new DatabaseError(`Database '${name}' not found: no ${SEQUENCES_FILE} file`, name, path);
  }

  let sequenceCount = 0;
  let sample = "";
  for await (const line of readLines(await createStream(path))) {
    if (line.startsWith(">")) {
      sequenceCount++;
    } else if (sample.length < TYPE_SAMPLE_SIZE) {
      sample += line.trim();
    }
  }

  if (sequenceCount === 0 || sample === "") {
    throw new DatabaseError(`Database '${name}' contains no sequences`, name, path);
  }

  const [nin, pin] = await Promise.all([exists(`${path}.nin`), exists(`${path}.pin`)]);

  return {
    name,
    type: detectDatabaseType(sample.slice(0, TYPE_SAMPLE_SIZE)),
    sequenceCount,
    path,
    indexed: nin || pin,
  };
}

/**
 * Describe every database under a root directory, sorted by name.
 * Directories without a sequences file are skipped.
 */
export async function listDatabases(
  root: string,
  logger: Logger = new SilentLogger()
): Promise<DatabaseInfo[]> {
  if (!(await isDirectory(root))) {
    throw new DatabaseError(`Database directory '${root}' does not exist`, "", root);
  }

  const databases: DatabaseInfo[] = [];
  for (const entry of await listDirectory(root)) {
    if (!(await exists(join(root, entry, SEQUENCES_FILE)))) {
      logger.debug(`Skipping ${entry}: no ${SEQUENCES_FILE} file`);
      continue;
    }
    databases.push(await describeDatabase(root, entry));
  }
  return databases;
}

/**
 * Command that indexes a database for the aligner
 */
export function buildIndexCommand(database: DatabaseInfo): CommandSpec {
  return {
    command: "makeblastdb",
    args: ["-in", database.path, "-title", database.name, "-dbtype", database.type, "-hash_index"],
  };
}

/**
 * (Re)index a database with makeblastdb
 */
export async function setupDatabase(
  database: DatabaseInfo,
  logger: Logger = new SilentLogger()
): Promise<void> {
  const spec = buildIndexCommand(database);
  logger.info(`Indexing ${database.name} (${database.sequenceCount} sequences)`);
  logger.debug(`Running: ${formatCommand(spec)}`);
  await runCommand(spec);
}
