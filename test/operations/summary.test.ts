/**
 * Summary matrix aggregation
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { InvalidReportHeaderError, UnreadableInputFileError } from "../../src/errors";
import { MemoryLogger } from "../../src/logger";
import { formatSummary, SummaryAggregator, summarizeReports } from "../../src/operations/summary";
import { reportHeader, reportRow } from "../utils/fixtures";

describe("SummaryAggregator", () => {
  test("one row per report, genes as columns", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("A", [
      reportHeader(),
      reportRow({ GENE: "X", "%COVERAGE": "100.00" }),
      reportRow({ GENE: "Y", "%COVERAGE": "95.00" }),
    ]);
    await aggregator.addReport("B", [reportHeader(), reportRow({ GENE: "X", "%COVERAGE": "80.00" })]);

    expect(aggregator.finish()).toEqual({
      genes: ["X", "Y"],
      rows: [
        { key: "A", numFound: 2, cells: ["100.00", "95.00"] },
        { key: "B", numFound: 1, cells: ["80.00", "."] },
      ],
    });
  });

  test("disjoint gene sets fill the gaps with the absence marker", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("a.tab", [reportHeader(), reportRow({ GENE: "tetA", "%COVERAGE": "99.00" })]);
    await aggregator.addReport("b.tab", [reportHeader(), reportRow({ GENE: "sul1", "%COVERAGE": "88.10" })]);

    const matrix = aggregator.finish();

    expect(matrix.genes).toEqual(["sul1", "tetA"]);
    expect(matrix.rows.map((row) => row.cells)).toEqual([
      [".", "99.00"],
      ["88.10", "."],
    ]);
  });

  test("a gene found twice under one key keeps both values", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("a.tab", [
      reportHeader(),
      reportRow({ GENE: "blaTEM", "%COVERAGE": "100.00" }),
      reportRow({ GENE: "blaTEM", "%COVERAGE": "45.50" }),
    ]);

    const [row] = aggregator.finish().rows;

    expect(row?.numFound).toBe(1);
    expect(row?.cells).toEqual(["100.00;45.50"]);
  });

  test("only the first header is read; later comment lines are skipped", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("a.tab", [
      "",
      reportHeader(),
      reportRow({ GENE: "X", "%COVERAGE": "90.00" }),
    ]);
    await aggregator.addReport("b.tab", [
      reportHeader(),
      "# a note",
      reportRow({ GENE: "X", "%COVERAGE": "91.00" }),
    ]);

    expect(aggregator.finish().rows.map((row) => row.cells)).toEqual([["90.00"], ["91.00"]]);
  });

  test("keys by the FILE column when asked", async () => {
    const aggregator = new SummaryAggregator({ keyByFileColumn: true });
    await aggregator.addReport("all.tab", [
      reportHeader(),
      reportRow({ FILE: "s2.fa", GENE: "X", "%COVERAGE": "100.00" }),
      reportRow({ FILE: "s1.fa", GENE: "Y", "%COVERAGE": "97.00" }),
      reportRow({ FILE: "s2.fa", GENE: "Y", "%COVERAGE": "81.00" }),
    ]);

    expect(aggregator.finish()).toEqual({
      genes: ["X", "Y"],
      rows: [
        { key: "s1.fa", numFound: 1, cells: [".", "97.00"] },
        { key: "s2.fa", numFound: 2, cells: ["100.00", "81.00"] },
      ],
    });
  });

  test("keys sort by code unit", async () => {
    const aggregator = new SummaryAggregator();
    for (const key of ["b", "B", "a10", "a2"]) {
      await aggregator.addReport(key, [reportHeader(), reportRow({ GENE: "X", "%COVERAGE": "100.00" })]);
    }

    expect(aggregator.finish().rows.map((row) => row.key)).toEqual(["B", "a10", "a2", "b"]);
  });

  test("a report with only a header adds no row", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("empty.tab", [reportHeader()]);
    await aggregator.addReport("full.tab", [reportHeader(), reportRow({ GENE: "X", "%COVERAGE": "100.00" })]);

    expect(aggregator.finish().rows.map((row) => row.key)).toEqual(["full.tab"]);
  });

  test("skips a repeated report with a warning", async () => {
    const logger = new MemoryLogger();
    const aggregator = new SummaryAggregator({}, logger);
    const lines = [reportHeader(), reportRow({ GENE: "X", "%COVERAGE": "100.00" })];

    expect(await aggregator.addReport("a.tab", lines)).toBe(true);
    expect(await aggregator.addReport("a.tab", lines)).toBe(false);

    expect(logger.messages("warn")).toEqual(["Skipping duplicate input: a.tab"]);
    expect(aggregator.finish().rows[0]?.cells).toEqual(["100.00"]);
  });

  test("reads CSV reports", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("a.csv", [reportHeader(","), reportRow({ GENE: "X", "%COVERAGE": "99.90" }, ",")]);

    expect(aggregator.finish().rows[0]?.cells).toEqual(["99.90"]);
  });

  test("detects the delimiter of each report from its header", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("a.tab", [reportHeader(), reportRow({ GENE: "X", "%COVERAGE": "100.00" })]);
    await aggregator.addReport("b.csv", [reportHeader(","), reportRow({ GENE: "Y", "%COVERAGE": "85.00" }, ",")]);

    expect(aggregator.finish()).toEqual({
      genes: ["X", "Y"],
      rows: [
        { key: "a.tab", numFound: 1, cells: ["100.00", "."] },
        { key: "b.csv", numFound: 1, cells: [".", "85.00"] },
      ],
    });
  });

  test("rows of a report without its own header use the run's delimiter", async () => {
    const aggregator = new SummaryAggregator();
    await aggregator.addReport("a.csv", [reportHeader(","), reportRow({ GENE: "X", "%COVERAGE": "99.00" }, ",")]);
    await aggregator.addReport("b.csv", [reportRow({ GENE: "X", "%COVERAGE": "98.00" }, ",")]);

    expect(aggregator.finish().rows.map((row) => row.cells)).toEqual([["99.00"], ["98.00"]]);
  });

  test("rejects a header without GENE or %COVERAGE", async () => {
    const aggregator = new SummaryAggregator();
    const run = aggregator.addReport("bad.tab", ["#FILE\tSEQUENCE\tGENE", "a\tb\tc"]);

    await expect(run).rejects.toBeInstanceOf(InvalidReportHeaderError);
    await expect(new SummaryAggregator().addReport("bad.tab", ["#FILE\tSEQUENCE\tGENE"])).rejects.toThrow(
      "Report header lacks required columns: %COVERAGE (in 'bad.tab')"
    );
  });

  test("requires FILE when keying by the FILE column", async () => {
    const aggregator = new SummaryAggregator({ keyByFileColumn: true });
    await expect(aggregator.addReport("r.tab", ["#GENE\t%COVERAGE"])).rejects.toThrow(
      "Report header lacks required columns: FILE (in 'r.tab')"
    );
  });
});

describe("formatSummary", () => {
  const matrix = {
    genes: ["X", "Y"],
    rows: [
      { key: "/runs/A.tab", numFound: 2, cells: ["100.00", "95.00"] },
      { key: "/runs/B.tab", numFound: 1, cells: ["80.00", "."] },
    ],
  };

  test("header first, then one line per key", () => {
    expect(formatSummary(matrix)).toEqual([
      "#FILE\tNUM_FOUND\tX\tY",
      "/runs/A.tab\t2\t100.00\t95.00",
      "/runs/B.tab\t1\t80.00\t.",
    ]);
  });

  test("noPath and CSV", () => {
    expect(formatSummary(matrix, { delimiter: ",", noPath: true })).toEqual([
      "#FILE,NUM_FOUND,X,Y",
      "A.tab,2,100.00,95.00",
      "B.tab,1,80.00,.",
    ]);
  });

  test("an empty matrix is just the header", () => {
    expect(formatSummary({ genes: [], rows: [] })).toEqual(["#FILE\tNUM_FOUND"]);
  });
});

describe("summarizeReports", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "summary-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function report(name: string, rows: string[]): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, [reportHeader(), ...rows].join("\n") + "\n");
    return path;
  }

  test("several reports are keyed by path", async () => {
    const a = await report("a.tab", [reportRow({ FILE: "s1.fa", GENE: "X", "%COVERAGE": "100.00" })]);
    const b = await report("b.tab", [reportRow({ FILE: "s1.fa", GENE: "Y", "%COVERAGE": "90.00" })]);

    const matrix = await summarizeReports([a, b]);

    expect(matrix.rows.map((row) => row.key)).toEqual([a, b]);
  });

  test("tab reports can be written out comma-separated", async () => {
    const a = await report("a.tab", [reportRow({ FILE: "s1.fa", GENE: "X", "%COVERAGE": "100.00" })]);
    const b = await report("b.tab", [reportRow({ FILE: "s2.fa", GENE: "Y", "%COVERAGE": "90.00" })]);

    const matrix = await summarizeReports([a, b]);

    expect(formatSummary(matrix, { delimiter: ",", noPath: true })).toEqual([
      "#FILE,NUM_FOUND,X,Y",
      "a.tab,1,100.00,.",
      "b.tab,1,.,90.00",
    ]);
  });

  test("a single report is keyed by its FILE column", async () => {
    const all = await report("all.tab", [
      reportRow({ FILE: "s1.fa", GENE: "X", "%COVERAGE": "100.00" }),
      reportRow({ FILE: "s2.fa", GENE: "X", "%COVERAGE": "85.00" }),
    ]);

    const matrix = await summarizeReports([all]);

    expect(matrix.rows).toEqual([
      { key: "s1.fa", numFound: 1, cells: ["100.00"] },
      { key: "s2.fa", numFound: 1, cells: ["85.00"] },
    ]);
  });

  test("a path given twice is keyed by path and read once", async () => {
    const logger = new MemoryLogger();
    const a = await report("a.tab", [reportRow({ FILE: "s1.fa", GENE: "X", "%COVERAGE": "100.00" })]);

    const matrix = await summarizeReports([a, a], logger);

    expect(matrix.rows).toEqual([{ key: a, numFound: 1, cells: ["100.00"] }]);
    expect(logger.messages("warn")).toEqual([`Skipping duplicate input: ${a}`]);
  });

  test("a missing report is an unreadable input", async () => {
    const missing = join(dir, "missing.tab");

    await expect(summarizeReports([missing])).rejects.toBeInstanceOf(UnreadableInputFileError);
  });
});
