/**
 * Hit table building
 *
 * Turns scored alignment records into GeneHit rows (identifier columns,
 * coverage span, coverage map, cleaned product) and orders them for output.
 */

import type { CoverageMapOptions, Delimiter, GeneHit, ScoredRecord } from "../types";
import { renderCoverageMap } from "./coverage-map";
import { cleanProduct, decomposeIdentifier, resolveIdentifier } from "./identifier";

export interface HitBuildContext {
  /** Input file the hit belongs to */
  file: string;
  /** Database selected for the run, used for unannotated identifiers */
  database: string;
  delimiter: Delimiter;
  coverageMap?: CoverageMapOptions;
}

/**
 * Enrich one accepted record into a report row
 */
export function buildGeneHit(record: ScoredRecord, context: HitBuildContext): GeneHit {
  const identifier = resolveIdentifier(decomposeIdentifier(record.referenceId), context.database);

  return {
    file: context.file,
    sequence: record.queryId,
    start: record.queryStart,
    end: record.queryEnd,
    strand: record.referenceStrand === "minus" ? "-" : "+",
    gene: identifier.gene,
    coverage: `${record.referenceStart}-${record.referenceEnd}/${record.referenceLength}`,
    coverageMap: renderCoverageMap(record, context.coverageMap),
    gaps: `${record.gapOpenings}/${record.gaps}`,
    percentCoverage: record.percentCoverage,
    percentIdentity: record.percentIdentity,
    database: identifier.database,
    accession: identifier.accession,
    product: cleanProduct(record.referenceTitle, context.delimiter),
    resistance: identifier.resistance,
  };
}

/**
 * Order hits by sequence id, then by start position
 */
export function compareHits(a: GeneHit, b: GeneHit): number {
  if (a.sequence !== b.sequence) {
    return a.sequence < b.sequence ? -1 : 1;
  }
  return a.start - b.start;
}

export function sortHits(hits: readonly GeneHit[]): GeneHit[] {
  return [...hits].sort(compareHits);
}

/**
 * Collects the hits of one input file and hands them out sorted
 */
export class HitTableBuilder {
  private readonly hits: GeneHit[] = [];

  constructor(private readonly context: HitBuildContext) {}

  add(record: ScoredRecord): GeneHit {
    const hit = buildGeneHit(record, this.context);
    this.hits.push(hit);
    return hit;
  }

  get size(): number {
    return this.hits.length;
  }

  build(): GeneHit[] {
    return sortHits(this.hits);
  }
}
