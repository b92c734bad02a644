/**
 * Screening pipeline
 *
 * For each input file: aligner rows are parsed, deduplicated and filtered
 * by coverage, enriched into hit table rows, sorted and written. Files are
 * processed one at a time; the header is written once per run.
 */

import { type } from "arktype";
import type { AlignmentSource } from "../aligner/blast";
import { ValidationError } from "../errors";
import { BlastTabularParser } from "../formats/blast-tabular";
import { DEFAULT_DELIMITER, HitTableWriter } from "../formats/hit-table";
import { type Logger, SilentLogger } from "../logger";
import type { Delimiter, GeneHit, ScreenOptions } from "../types";
import { ScreenOptionsSchema } from "../types";
import { HitFilter, type HitFilterStats } from "./hit-filter";
import { HitTableBuilder } from "./hit-table";

export const DEFAULT_MIN_COVERAGE = 80;
export const DEFAULT_MIN_IDENTITY = 80;

export interface ScreenResult {
  file: string;
  hits: GeneHit[];
  stats: HitFilterStats;
}

/**
 * Screen the aligner output of one input file
 *
 * @param file - Input file the alignments were computed for
 * @param lines - Raw aligner rows, in aligner order
 * @throws {MalformedAlignmentRowError} On the first row with the wrong shape
 */
export async function screenAlignments(
  file: string,
  lines: Iterable<string> | AsyncIterable<string>,
  options: ScreenOptions
): Promise<ScreenResult> {
  const validation = ScreenOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid screen options: ${validation.summary}`);
  }

  const delimiter: Delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const filter = new HitFilter({ minCoverage: options.minCoverage ?? DEFAULT_MIN_COVERAGE });
  const builder = new HitTableBuilder({
    file,
    database: options.database,
    delimiter,
    ...(options.coverageMap !== undefined && { coverageMap: options.coverageMap }),
  });

  const records = new BlastTabularParser(file).parseLines(lines);
  for await (const record of filter.filter(records)) {
    builder.add(record);
  }

  return { file, hits: builder.build(), stats: filter.stats };
}

/**
 * One screening run over several input files
 *
 * @example
 * ```typescript
 * const run = new ScreenRun({ database: "ncbi" }, (line) => console.log(line));
 * for (const file of files) {
 *   await run.screenFile(file, await aligner(file));
 * }
 * ```
 */
export class ScreenRun {
  private readonly writer: HitTableWriter;
  private headerWritten: boolean;
  private totalHits = 0;

  constructor(
    private readonly options: ScreenOptions,
    private readonly output: (line: string) => void,
    private readonly logger: Logger = new SilentLogger()
  ) {
    const validation = ScreenOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid screen options: ${validation.summary}`);
    }
    this.writer = new HitTableWriter({
      delimiter: options.delimiter ?? DEFAULT_DELIMITER,
      noPath: options.noPath ?? false,
    });
    this.headerWritten = options.noHeader ?? false;
  }

  /**
   * Write the header if it has not been written (or suppressed) yet
   */
  writeHeader(): void {
    if (this.headerWritten) return;
    this.output(this.writer.formatHeader());
    this.headerWritten = true;
  }

  async screenFile(file: string, lines: Iterable<string> | AsyncIterable<string>): Promise<ScreenResult> {
    this.writeHeader();
    this.logger.info(`Processing: ${file}`);

    const result = await screenAlignments(file, lines, this.options);
    for (const hit of result.hits) {
      this.output(this.writer.formatHit(hit));
    }

    this.totalHits += result.hits.length;
    this.logger.info(`Found ${result.hits.length} genes in ${file}`);
    this.logger.debug(`Filter statistics for ${file}`, { ...result.stats });
    return result;
  }

  get hitCount(): number {
    return this.totalHits;
  }
}

/**
 * Screen input files in order using an alignment source
 */
export async function screenFiles(
  files: readonly string[],
  source: AlignmentSource,
  options: ScreenOptions,
  output: (line: string) => void,
  logger: Logger = new SilentLogger()
): Promise<ScreenResult[]> {
  const run = new ScreenRun(options, output, logger);
  run.writeHeader();

  const results: ScreenResult[] = [];
  for (const file of files) {
    results.push(await run.screenFile(file, await source(file)));
  }
  return results;
}
