/**
 * genescreen - screen contigs against reference gene databases
 *
 * @example
 * ```typescript
 * import { screenAlignments, HitTableWriter } from "genescreen";
 *
 * const { hits } = await screenAlignments("sample.fa", alignerRows, {
 *   database: "ncbi",
 *   minCoverage: 80,
 * });
 * const writer = new HitTableWriter();
 * writer.formatTable(hits).forEach((line) => console.log(line));
 * ```
 */

// Core types
export type {
  AlignmentRecord,
  CoverageMapOptions,
  DatabaseInfo,
  DatabaseType,
  Delimiter,
  GeneHit,
  ReferenceIdentifier,
  ReferenceStrand,
  ScoredRecord,
  ScreenOptions,
  StrandSymbol,
  SummaryMatrix,
  SummaryOptions,
  SummaryRow,
} from "./types";
export { ScreenOptionsSchema, SummaryOptionsSchema } from "./types";

// Errors
export {
  AlignerError,
  DatabaseError,
  FileError,
  InvalidReportHeaderError,
  MalformedAlignmentRowError,
  ParseError,
  ScreenError,
  StreamError,
  UnreadableInputFileError,
  ValidationError,
} from "./errors";

// Logging
export type { LogEntry, Logger, LogLevel } from "./logger";
export { ConsoleLogger, MemoryLogger, SilentLogger } from "./logger";

// Formats
export { BLAST_FIELDS, BLAST_OUTFMT, BlastTabularParser, parseAlignmentRow } from "./formats/blast-tabular";
export type { HitTableWriterOptions } from "./formats/hit-table";
export { detectReportDelimiter, HIT_TABLE_COLUMNS, HitTableWriter } from "./formats/hit-table";

// Operations
export type { CoverageSpan } from "./operations/coverage-map";
export { DEFAULT_COVERAGE_MAP_OPTIONS, renderCoverageMap } from "./operations/coverage-map";
export type { HitFilterOptions, HitFilterStats } from "./operations/hit-filter";
export { HitFilter, percentCoverage } from "./operations/hit-filter";
export type { HitBuildContext } from "./operations/hit-table";
export { buildGeneHit, compareHits, HitTableBuilder, sortHits } from "./operations/hit-table";
export type { ResolvedIdentifier } from "./operations/identifier";
export {
  cleanProduct,
  decomposeIdentifier,
  IDENTIFIER_SEPARATOR,
  resolveIdentifier,
} from "./operations/identifier";
export type { ScreenResult } from "./operations/screen";
export {
  DEFAULT_MIN_COVERAGE,
  DEFAULT_MIN_IDENTITY,
  ScreenRun,
  screenAlignments,
  screenFiles,
} from "./operations/screen";
export type { SummaryAggregatorOptions } from "./operations/summary";
export {
  ABSENCE_MARKER,
  formatSummary,
  SummaryAggregator,
  summarizeReports,
} from "./operations/summary";

// External tools
export type { AlignmentSource, BlastSearchOptions } from "./aligner/blast";
export { blastAligner, buildSearchCommand } from "./aligner/blast";
export {
  buildIndexCommand,
  defaultDatabaseDir,
  describeDatabase,
  detectDatabaseType,
  listDatabases,
  setupDatabase,
} from "./database/registry";
