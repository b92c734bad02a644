/**
 * BLAST tabular (-outfmt 6) alignment parser
 *
 * The aligner is asked for a fixed custom column list, so every row must
 * carry exactly BLAST_FIELDS.length tab-separated fields. Rows are turned
 * into AlignmentRecord objects with the reference coordinates of minus-strand
 * hits swapped, and nothing else changed.
 */

import { MalformedAlignmentRowError } from "../errors";
import { createStream } from "../io/file-reader";
import { readLines, splitLines } from "../io/stream-utils";
import type { AlignmentRecord } from "../types";

/**
 * Column list requested from the aligner, in output order
 */
export const BLAST_FIELDS = [
  "qseqid",
  "qstart",
  "qend",
  "qlen",
  "sseqid",
  "sstart",
  "send",
  "slen",
  "sstrand",
  "evalue",
  "length",
  "pident",
  "gaps",
  "gapopen",
  "stitle",
] as const;

export type BlastField = (typeof BLAST_FIELDS)[number];

/**
 * Value of the aligner's -outfmt argument for BLAST_FIELDS
 */
export const BLAST_OUTFMT = `6 ${BLAST_FIELDS.join(" ")}`;

/**
 * Parse one aligner output row into a normalized record
 *
 * @param line - Raw tab-separated row
 * @param source - Input file the alignments belong to, for error messages
 * @param lineNumber - Position of the row in the aligner output
 * @throws {MalformedAlignmentRowError} If the field count or a numeric field is wrong
 */
export function parseAlignmentRow(
  line: string,
  source: string,
  lineNumber?: number
): AlignmentRecord {
  const fields = line.split("\t");

  if (fields.length !== BLAST_FIELDS.length) {
    throw new MalformedAlignmentRowError(
      `Aligner output has ${fields.length} fields, expected ${BLAST_FIELDS.length}`,
      source,
      BLAST_FIELDS.length,
      fields.length,
      lineNumber,
      line
    );
  }

  const text = (name: BlastField): string => fields[BLAST_FIELDS.indexOf(name)] ?? "";
  const numeric = (name: BlastField): number => {
    const raw = text(name).trim();
    const value = Number(raw);
    if (raw === "" || !Number.isFinite(value)) {
      throw new MalformedAlignmentRowError(
        `Field '${name}' is not numeric ('${raw}')`,
        source,
        BLAST_FIELDS.length,
        fields.length,
        lineNumber,
        line
      );
    }
    return value;
  };

  const strand = text("sstrand");
  let referenceStart = numeric("sstart");
  let referenceEnd = numeric("send");
  if (strand === "minus") {
    [referenceStart, referenceEnd] = [referenceEnd, referenceStart];
  }

  return {
    queryId: text("qseqid"),
    queryStart: numeric("qstart"),
    queryEnd: numeric("qend"),
    queryLength: numeric("qlen"),
    referenceId: text("sseqid"),
    referenceStart,
    referenceEnd,
    referenceLength: numeric("slen"),
    referenceStrand: strand,
    evalue: numeric("evalue"),
    alignmentLength: numeric("length"),
    percentIdentity: numeric("pident"),
    gaps: numeric("gaps"),
    gapOpenings: numeric("gapopen"),
    referenceTitle: text("stitle"),
    ...(lineNumber !== undefined && { lineNumber }),
  };
}

/**
 * Streaming parser for aligner output belonging to one input file
 *
 * @example
 * ```typescript
 * const parser = new BlastTabularParser("contigs.fa");
 * for await (const record of parser.parseLines(alignerLines)) {
 *   console.log(record.referenceId);
 * }
 * ```
 */
export class BlastTabularParser {
  /**
   * @param source - Input file the alignments were computed for
   */
  constructor(private readonly source: string) {}

  async *parseString(data: string): AsyncIterable<AlignmentRecord> {
    yield* this.parseLines(splitLines(data));
  }

  async *parseFile(filePath: string): AsyncIterable<AlignmentRecord> {
    const stream = await createStream(filePath);
    yield* this.parseLines(readLines(stream));
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<AlignmentRecord> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse rows in arrival order, skipping blank lines
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<AlignmentRecord> {
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === "") continue;
      yield parseAlignmentRow(line, this.source, lineNumber);
    }
  }
}
