/**
 * Coverage map rendering
 *
 * Draws a fixed-width ASCII bar showing which part of the reference sequence
 * an alignment spans, e.g. "===============" for a full-length hit or
 * "........=======" for one covering the 3' half. Purely cosmetic: nothing
 * downstream reads it back.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { CoverageMapOptions } from "../types";
import { CoverageMapOptionsSchema } from "../types";

export const DEFAULT_COVERAGE_MAP_OPTIONS: Required<CoverageMapOptions> = {
  width: 15,
  covered: "=",
  uncovered: ".",
  broken: "never",
};

/**
 * Reference span of an accepted alignment
 */
export interface CoverageSpan {
  referenceStart: number;
  referenceEnd: number;
  referenceLength: number;
  gapOpenings: number;
}

/**
 * Render the coverage bar for one alignment
 *
 * Cells are mapped by integer division of the coordinates by
 * length / width; a cell is covered when its index lies in the inclusive
 * range of the mapped start and end. In "gapped" broken mode an alignment
 * with gap openings is drawn one cell narrower and split with "/" at the
 * midpoint, so the result keeps the configured width.
 *
 * @example
 * ```typescript
 * renderCoverageMap({ referenceStart: 1, referenceEnd: 861, referenceLength: 861, gapOpenings: 0 });
 * // "==============="
 * ```
 */
export function renderCoverageMap(span: CoverageSpan, options: CoverageMapOptions = {}): string {
  const validation = CoverageMapOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid coverage map options: ${validation.summary}`);
  }

  const { width, covered, uncovered, broken } = { ...DEFAULT_COVERAGE_MAP_OPTIONS, ...options };
  const isBroken = broken === "gapped" && span.gapOpenings > 0;
  const cells = isBroken ? width - 1 : width;

  const scale = span.referenceLength / cells;
  const first = Math.trunc(span.referenceStart / scale);
  const last = Math.trunc(span.referenceEnd / scale);

  let map = "";
  for (let cell = 0; cell < cells; cell++) {
    map += cell >= first && cell <= last ? covered : uncovered;
  }

  if (isBroken) {
    const middle = Math.trunc(cells / 2);
    map = `${map.slice(0, middle)}/${map.slice(middle)}`;
  }
  return map;
}
