/**
 * @module formats/hit-table
 * @description Hit table (screening report) layout and writer
 *
 * A hit table is a delimiter-separated text file: an optional header line
 * whose first column name carries a leading "#", then one line per GeneHit
 * in HIT_TABLE_COLUMNS order. The summary aggregator reads these files back.
 */

import { basename } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import type { Delimiter, GeneHit } from "../types";
import { DelimiterSchema } from "../types";

// =============================================================================
// CONSTANTS
// =============================================================================

export const HIT_TABLE_COLUMNS = [
  "FILE",
  "SEQUENCE",
  "START",
  "END",
  "STRAND",
  "GENE",
  "COVERAGE",
  "COVERAGE_MAP",
  "GAPS",
  "%COVERAGE",
  "%IDENTITY",
  "DATABASE",
  "ACCESSION",
  "PRODUCT",
  "RESISTANCE",
] as const;

export type HitTableColumn = (typeof HIT_TABLE_COLUMNS)[number];

/**
 * Prefix marking header and comment lines
 */
export const COMMENT_PREFIX = "#";

export const DEFAULT_DELIMITER: Delimiter = "\t";

// =============================================================================
// WRITER
// =============================================================================

export interface HitTableWriterOptions {
  delimiter?: Delimiter;
  /** Write the basename of the FILE column instead of the full path */
  noPath?: boolean;
}

const HitTableWriterOptionsSchema = type({
  "delimiter?": DelimiterSchema,
  "noPath?": "boolean",
});

/**
 * Formats hit table lines (without line terminators)
 *
 * @example
 * ```typescript
 * const writer = new HitTableWriter({ delimiter: "," });
 * console.log(writer.formatHeader());
 * for (const hit of hits) console.log(writer.formatHit(hit));
 * ```
 */
export class HitTableWriter {
  readonly delimiter: Delimiter;
  private readonly noPath: boolean;

  constructor(options: HitTableWriterOptions = {}) {
    const validation = HitTableWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid hit table writer options: ${validation.summary}`);
    }
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.noPath = options.noPath ?? false;
  }

  formatHeader(): string {
    return `${COMMENT_PREFIX}${HIT_TABLE_COLUMNS.join(this.delimiter)}`;
  }

  formatHit(hit: GeneHit): string {
    const values: Record<HitTableColumn, string> = {
      FILE: this.noPath ? basename(hit.file) : hit.file,
      SEQUENCE: hit.sequence,
      START: String(hit.start),
      END: String(hit.end),
      STRAND: hit.strand,
      GENE: hit.gene,
      COVERAGE: hit.coverage,
      COVERAGE_MAP: hit.coverageMap,
      GAPS: hit.gaps,
      "%COVERAGE": hit.percentCoverage.toFixed(2),
      "%IDENTITY": hit.percentIdentity.toFixed(2),
      DATABASE: hit.database,
      ACCESSION: hit.accession,
      PRODUCT: hit.product,
      RESISTANCE: hit.resistance,
    };
    return HIT_TABLE_COLUMNS.map((column) => values[column]).join(this.delimiter);
  }

  /**
   * Format a whole table, optionally preceded by the header
   */
  formatTable(hits: Iterable<GeneHit>, includeHeader = true): string[] {
    const lines = includeHeader ? [this.formatHeader()] : [];
    for (const hit of hits) {
      lines.push(this.formatHit(hit));
    }
    return lines;
  }
}

// =============================================================================
// READER HELPERS
// =============================================================================

/**
 * Column names of a header line, with the leading "#" removed
 */
export function parseHeaderLine(line: string, delimiter: Delimiter): string[] {
  const columns = line.split(delimiter);
  const [first = "", ...rest] = columns;
  return [first.startsWith(COMMENT_PREFIX) ? first.slice(COMMENT_PREFIX.length) : first, ...rest];
}

/**
 * Detect the delimiter of a report from its header line
 *
 * Picks the candidate that splits the line into the most columns; a header
 * with neither delimiter is read as tab-separated.
 */
export function detectReportDelimiter(
  line: string,
  candidates: readonly Delimiter[] = [DEFAULT_DELIMITER, ","]
): Delimiter {
  let best: Delimiter = DEFAULT_DELIMITER;
  let bestCount = 0;

  for (const delimiter of candidates) {
    const count = line.split(delimiter).length - 1;
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

export function isCommentLine(line: string): boolean {
  return line.startsWith(COMMENT_PREFIX);
}
