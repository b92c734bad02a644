/**
 * HitFilter - coverage filtering and span deduplication for one input file
 *
 * Records arrive in aligner order. The first record seen for a
 * (query id, query start, query end) span claims it; later records for the
 * same span are dropped whatever they score. Coverage is then checked
 * against the configured minimum (inclusive).
 *
 * A HitFilter holds the seen-span set for a single file; create a new one
 * for every file.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { AlignmentRecord, ScoredRecord } from "../types";

const HitFilterOptionsSchema = type({
  minCoverage: "0<=number<=100",
});

export interface HitFilterOptions {
  minCoverage: number;
}

/**
 * Counters describing what a filter did with its input
 */
export interface HitFilterStats {
  seen: number;
  accepted: number;
  duplicates: number;
  belowCoverage: number;
}

/**
 * Percent of the reference covered by an alignment, net of gap bases.
 * Not clamped: malformed input can push it below 0 or above 100, and a
 * zero reference length gives NaN or Infinity, which the filter rejects.
 */
export function percentCoverage(
  record: Pick<AlignmentRecord, "alignmentLength" | "gaps" | "referenceLength">
): number {
  return (100 * (record.alignmentLength - record.gaps)) / record.referenceLength;
}

/**
 * Key identifying a query span
 */
export function spanKey(record: Pick<AlignmentRecord, "queryId" | "queryStart" | "queryEnd">): string {
  return `${record.queryId}\u0000${record.queryStart}\u0000${record.queryEnd}`;
}

export class HitFilter {
  private readonly seenSpans = new Set<string>();
  private readonly minCoverage: number;
  private readonly counters: HitFilterStats = {
    seen: 0,
    accepted: 0,
    duplicates: 0,
    belowCoverage: 0,
  };

  constructor(options: HitFilterOptions) {
    const validation = HitFilterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid hit filter options: ${validation.summary}`);
    }
    this.minCoverage = options.minCoverage;
  }

  /**
   * Decide on a single record
   *
   * @returns The record with its coverage, or null when it is dropped
   */
  accept(record: AlignmentRecord): ScoredRecord | null {
    this.counters.seen++;

    const key = spanKey(record);
    if (this.seenSpans.has(key)) {
      this.counters.duplicates++;
      return null;
    }
    this.seenSpans.add(key);

    const coverage = percentCoverage(record);
    if (!Number.isFinite(coverage) || coverage < this.minCoverage) {
      this.counters.belowCoverage++;
      return null;
    }

    this.counters.accepted++;
    return { ...record, percentCoverage: coverage };
  }

  /**
   * Filter a record stream, preserving arrival order
   */
  async *filter(
    records: Iterable<AlignmentRecord> | AsyncIterable<AlignmentRecord>
  ): AsyncIterable<ScoredRecord> {
    for await (const record of records) {
      const scored = this.accept(record);
      if (scored !== null) {
        yield scored;
      }
    }
  }

  get stats(): Readonly<HitFilterStats> {
    return { ...this.counters };
  }
}
