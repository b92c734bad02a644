/**
 * Core type definitions for gene screening
 *
 * Records flow through the pipeline in three shapes: the raw aligner row
 * (AlignmentRecord), the same row once its coverage is known (ScoredRecord),
 * and the enriched report row (GeneHit). Option objects are validated with
 * the ArkType schemas at the bottom of this module.
 */

import { type } from "arktype";

/**
 * Output field separators a hit table may use
 */
export type Delimiter = "\t" | ",";

/**
 * Strand as reported by the aligner. Nucleotide searches report "plus" or
 * "minus"; translated searches report "N/A".
 */
export type ReferenceStrand = "plus" | "minus" | (string & {});

/**
 * Strand symbol written to the hit table
 */
export type StrandSymbol = "+" | "-";

/**
 * One alignment row as produced by the aligner, after strand normalization
 */
export interface AlignmentRecord {
  readonly queryId: string;
  readonly queryStart: number;
  readonly queryEnd: number;
  readonly queryLength: number;
  readonly referenceId: string;
  /** Swapped with referenceEnd when the strand is minus */
  readonly referenceStart: number;
  readonly referenceEnd: number;
  readonly referenceLength: number;
  readonly referenceStrand: ReferenceStrand;
  readonly evalue: number;
  readonly alignmentLength: number;
  readonly percentIdentity: number;
  /** Total gap bases in the alignment */
  readonly gaps: number;
  readonly gapOpenings: number;
  readonly referenceTitle: string;
  /** Line of the aligner output this record came from */
  readonly lineNumber?: number;
}

/**
 * An alignment record that passed deduplication, tagged with its coverage
 */
export interface ScoredRecord extends AlignmentRecord {
  readonly percentCoverage: number;
}

/**
 * Result of splitting a reference identifier.
 *
 * "annotated" identifiers follow the database~~~gene~~~accession~~~resistance
 * layout; "plain" identifiers carry no usable structure and name the gene
 * directly.
 */
export type ReferenceIdentifier =
  | {
      readonly kind: "annotated";
      readonly database: string;
      readonly gene: string;
      readonly accession: string;
      readonly resistance: string;
    }
  | {
      readonly kind: "plain";
      readonly gene: string;
    };

/**
 * One row of the hit table
 */
export interface GeneHit {
  readonly file: string;
  readonly sequence: string;
  readonly start: number;
  readonly end: number;
  readonly strand: StrandSymbol;
  readonly gene: string;
  /** Reference span as "start-end/length" */
  readonly coverage: string;
  readonly coverageMap: string;
  /** "gapOpenings/gapBases" */
  readonly gaps: string;
  readonly percentCoverage: number;
  readonly percentIdentity: number;
  readonly database: string;
  readonly accession: string;
  readonly product: string;
  readonly resistance: string;
}

/**
 * One row of the summary matrix
 */
export interface SummaryRow {
  readonly key: string;
  /** Distinct genes present for this key */
  readonly numFound: number;
  /** One entry per gene in SummaryMatrix.genes order */
  readonly cells: readonly string[];
}

export interface SummaryMatrix {
  readonly genes: readonly string[];
  readonly rows: readonly SummaryRow[];
}

/**
 * Sequence alphabet of a reference database
 */
export type DatabaseType = "nucl" | "prot";

export interface DatabaseInfo {
  readonly name: string;
  readonly type: DatabaseType;
  readonly sequenceCount: number;
  /** Path of the database's sequences FASTA file */
  readonly path: string;
  /** Whether aligner index files exist next to the sequences */
  readonly indexed: boolean;
}

// =============================================================================
// OPTIONS
// =============================================================================

export interface CoverageMapOptions {
  /** Number of cells in the bar (default 15) */
  width?: number;
  /** Glyph for covered cells (default "=") */
  covered?: string;
  /** Glyph for uncovered cells (default ".") */
  uncovered?: string;
  /**
   * "gapped" splits the bar with a "/" when the alignment opened gaps;
   * "never" (default) always draws a single bar
   */
  broken?: "never" | "gapped";
}

export interface ScreenOptions {
  /** Database name; used as the DATABASE column for unannotated identifiers */
  database: string;
  /** Minimum percent coverage, inclusive (default 80) */
  minCoverage?: number;
  /** Minimum percent identity, applied by the aligner (default 80) */
  minIdentity?: number;
  delimiter?: Delimiter;
  noHeader?: boolean;
  /** Write only the basename of input files */
  noPath?: boolean;
  coverageMap?: CoverageMapOptions;
}

export interface SummaryOptions {
  delimiter?: Delimiter;
  noPath?: boolean;
}

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

export const DelimiterSchema = type.enumerated("\t", ",");

export const CoverageMapOptionsSchema = type({
  "width?": "number.integer>=2",
  "covered?": "string==1",
  "uncovered?": "string==1",
  "broken?": "'never'|'gapped'",
});

export const ScreenOptionsSchema = type({
  database: "string>0",
  "minCoverage?": "0<=number<=100",
  "minIdentity?": "0<=number<=100",
  "delimiter?": DelimiterSchema,
  "noHeader?": "boolean",
  "noPath?": "boolean",
  "coverageMap?": CoverageMapOptionsSchema,
});

export const SummaryOptionsSchema = type({
  "delimiter?": DelimiterSchema,
  "noPath?": "boolean",
});

export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without NUL bytes", actual: "a path with NUL bytes" });
  }
  return true;
});
