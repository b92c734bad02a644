/**
 * SummaryAggregator - merges hit tables into a gene presence matrix
 *
 * Each report contributes rows keyed either by its own path or, when a
 * single report is summarized, by the FILE column of its rows (so one
 * combined report still yields one matrix row per screened file).
 *
 * The first line read in a run is the header that names the columns of
 * every later row, in every file. Reports with a different column layout
 * are not detected and will be misread; keep report layouts uniform.
 * Each report's delimiter is detected from its header line, so tab and
 * comma reports can be mixed and the output delimiter is independent.
 */

import { basename } from "node:path";
import { type } from "arktype";
import { InvalidReportHeaderError, UnreadableInputFileError, ValidationError } from "../errors";
import {
  COMMENT_PREFIX,
  DEFAULT_DELIMITER,
  detectReportDelimiter,
  isCommentLine,
  parseHeaderLine,
} from "../formats/hit-table";
import { createStream } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import { type Logger, SilentLogger } from "../logger";
import type { Delimiter, SummaryMatrix, SummaryOptions, SummaryRow } from "../types";
import { SummaryOptionsSchema } from "../types";

/** Cell value for a gene not found under a report-key */
export const ABSENCE_MARKER = ".";

/** Joins several coverage values found for one gene under one key */
export const VALUE_SEPARATOR = ";";

const FILE_COLUMN = "FILE";
const GENE_COLUMN = "GENE";
const COVERAGE_COLUMN = "%COVERAGE";

export interface SummaryAggregatorOptions {
  /**
   * Key rows by their FILE column instead of the report path. Used when a
   * single report is summarized.
   */
  keyByFileColumn?: boolean;
}

const SummaryAggregatorOptionsSchema = type({
  "keyByFileColumn?": "boolean",
});

export class SummaryAggregator {
  private header: string[] | null = null;
  private headerDelimiter: Delimiter = DEFAULT_DELIMITER;
  private readonly keyByFileColumn: boolean;
  private readonly seenReports = new Set<string>();
  private readonly genes = new Set<string>();
  private readonly coverage = new Map<string, Map<string, string[]>>();

  constructor(
    options: SummaryAggregatorOptions = {},
    private readonly logger: Logger = new SilentLogger()
  ) {
    const validation = SummaryAggregatorOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid summary options: ${validation.summary}`);
    }
    this.keyByFileColumn = options.keyByFileColumn ?? false;
  }

  /**
   * Read one report file from disk
   *
   * @returns false if the path was already added and has been skipped
   * @throws {UnreadableInputFileError} If the file cannot be opened
   */
  async addFile(path: string): Promise<boolean> {
    if (this.seenReports.has(path)) {
      this.logger.warn(`Skipping duplicate input: ${path}`);
      return false;
    }

    let stream: ReadableStream<Uint8Array>;
    try {
      stream = await createStream(path);
    } catch (error) {
      throw new UnreadableInputFileError(path, error);
    }

    await this.addReport(path, readLines(stream));
    return true;
  }

  /**
   * Consume the lines of one report
   *
   * @param path - Report path; the report-key unless rows are keyed by FILE
   * @returns false if the path was already added and has been skipped
   */
  async addReport(path: string, lines: Iterable<string> | AsyncIterable<string>): Promise<boolean> {
    if (this.seenReports.has(path)) {
      this.logger.warn(`Skipping duplicate input: ${path}`);
      return false;
    }
    this.seenReports.add(path);

    let rows = 0;
    let delimiter = this.headerDelimiter;
    let firstLine = true;
    for await (const line of lines) {
      if (line.trim() === "") continue;

      if (firstLine) {
        firstLine = false;
        if (this.header === null || isCommentLine(line)) {
          delimiter = detectReportDelimiter(line);
        }
      }

      if (this.header === null) {
        this.header = this.establishHeader(line, path, delimiter);
        this.headerDelimiter = delimiter;
        continue;
      }
      if (isCommentLine(line)) continue;

      this.addRow(line, path, delimiter);
      rows++;
    }

    this.logger.debug(`Read ${rows} rows from ${path}`);
    return true;
  }

  /**
   * Build the matrix from everything added so far
   */
  finish(): SummaryMatrix {
    const genes = [...this.genes].sort(compareText);
    const keys = [...this.coverage.keys()].sort(compareText);

    const rows: SummaryRow[] = keys.map((key) => {
      const byGene = this.coverage.get(key) ?? new Map<string, string[]>();
      return {
        key,
        numFound: byGene.size,
        cells: genes.map((gene) => byGene.get(gene)?.join(VALUE_SEPARATOR) ?? ABSENCE_MARKER),
      };
    });

    return { genes, rows };
  }

  private establishHeader(line: string, path: string, delimiter: Delimiter): string[] {
    const columns = parseHeaderLine(line, delimiter);
    const required = this.keyByFileColumn
      ? [FILE_COLUMN, GENE_COLUMN, COVERAGE_COLUMN]
      : [GENE_COLUMN, COVERAGE_COLUMN];
    const missing = required.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
      throw new InvalidReportHeaderError("Report header lacks required columns", path, missing);
    }
    return columns;
  }

  private addRow(line: string, path: string, delimiter: Delimiter): void {
    const header = this.header ?? [];
    const values = line.split(delimiter);
    const row = new Map(header.map((column, index) => [column, values[index] ?? ""] as const));

    const key = this.keyByFileColumn ? row.get(FILE_COLUMN) ?? "" : path;
    const gene = row.get(GENE_COLUMN) ?? "";
    const coverage = row.get(COVERAGE_COLUMN) ?? "";

    this.genes.add(gene);
    let byGene = this.coverage.get(key);
    if (byGene === undefined) {
      byGene = new Map();
      this.coverage.set(key, byGene);
    }
    const found = byGene.get(gene);
    if (found === undefined) {
      byGene.set(gene, [coverage]);
    } else {
      found.push(coverage);
    }
  }
}

/**
 * Render a summary matrix as delimited lines, header first
 */
export function formatSummary(matrix: SummaryMatrix, options: SummaryOptions = {}): string[] {
  const validation = SummaryOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid summary options: ${validation.summary}`);
  }

  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const header = [`${COMMENT_PREFIX}FILE`, "NUM_FOUND", ...matrix.genes].join(delimiter);
  const rows = matrix.rows.map((row) =>
    [options.noPath === true ? basename(row.key) : row.key, String(row.numFound), ...row.cells].join(
      delimiter
    )
  );
  return [header, ...rows];
}

/**
 * Summarize report files in argument order
 *
 * A single report is keyed by its FILE column; several reports are keyed by
 * their paths. Repeated paths are skipped with a warning.
 */
export async function summarizeReports(
  paths: readonly string[],
  logger: Logger = new SilentLogger()
): Promise<SummaryMatrix> {
  const aggregator = new SummaryAggregator({ keyByFileColumn: paths.length === 1 }, logger);
  for (const path of paths) {
    await aggregator.addFile(path);
  }
  return aggregator.finish();
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
