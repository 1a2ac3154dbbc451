import fs from "fs";
import os from "os";
import path from "path";
import { utils, write } from "xlsx";
import { SourceUnavailableError } from "@src/reports/errors";
import { gridSourceFromSheets } from "@src/reports/grid/cell_grid_reader";
import { openWorkbook, workbookFromBuffer } from "@src/reports/grid/workbook_reader";
import { ReportDecoder } from "@src/reports/decoder";
import { buildReportGrid } from "../../__tests__/report_grid";

function workbookBuffer(sheets: Record<string, unknown[][]>): Buffer {
  const wb = utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    utils.book_append_sheet(wb, utils.aoa_to_sheet(rows), name);
  }
  const out: unknown = write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("expected a Buffer from xlsx.write");
  return out;
}

describe("WorkbookGridSource", () => {
  test("lists sheets in workbook order", () => {
    const source = workbookFromBuffer(
      workbookBuffer({ Weekly_Report: [["a"]], History: [["b"]] }),
      "mem.xlsx"
    );
    expect(source.label).toBe("mem.xlsx");
    expect(source.sheetNames()).toEqual(["Weekly_Report", "History"]);
  });

  test("returns raw values with blanks as null", () => {
    const source = workbookFromBuffer(
      workbookBuffer({ S: [["text", 12.5], [null, true, "plain"]] })
    );
    expect(source.readSheet("S")).toEqual([
      ["text", 12.5, null],
      [null, true, "plain"],
    ]);
  });

  test("anchors the grid at A1 when the used range starts later", () => {
    const wb = utils.book_new();
    const sheet = utils.aoa_to_sheet([["x"]], { origin: "C2" });
    utils.book_append_sheet(wb, sheet, "Offset");
    const out: unknown = write(wb, { type: "buffer", bookType: "xlsx" });
    if (!Buffer.isBuffer(out)) throw new Error("expected a Buffer");
    const grid = workbookFromBuffer(out).readSheet("Offset");
    expect(grid).toEqual([
      [null, null, null],
      [null, null, "x"],
    ]);
  });

  test("throws SourceUnavailableError for a missing sheet", () => {
    const source = workbookFromBuffer(workbookBuffer({ S: [["a"]] }), "mem.xlsx");
    expect(() => source.readSheet("Weekly_Report")).toThrow(SourceUnavailableError);
    expect(() => source.readSheet("Weekly_Report")).toThrow(
      'Sheet "Weekly_Report" not found in mem.xlsx'
    );
  });

  test("feeds the decoder end to end", () => {
    const grid = buildReportGrid({
      reportDate: 46045,
      positions: { total: [0, 0, 1000, 400, 0, 0, 0, 0, 0, 0] },
    });
    const source = workbookFromBuffer(workbookBuffer({ Weekly_Report: grid }));
    const { metadata, observations } = new ReportDecoder().decodeSheet(source);
    expect(metadata.reportDate).toBe("2026-01-23");
    expect(
      observations.find(
        (o) => o.category === "investment_funds" && o.positionType === "total"
      )
    ).toMatchObject({ long: 1000, short: 400, net: 600 });
  });
});

describe("openWorkbook", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cot-reader-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("reads a workbook file from disk", () => {
    const file = path.join(dir, "report.xlsx");
    fs.writeFileSync(file, workbookBuffer({ Weekly_Report: [["venue", "Test"]] }));
    const source = openWorkbook(file);
    expect(source.label).toBe(file);
    expect(source.readSheet("Weekly_Report")).toEqual([["venue", "Test"]]);
  });

  test("wraps a missing file in SourceUnavailableError", () => {
    const file = path.join(dir, "missing.xlsx");
    let caught: unknown;
    try {
      openWorkbook(file);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SourceUnavailableError);
    expect(caught).toMatchObject({ code: "SOURCE_UNAVAILABLE", source: file });
  });
});

describe("gridSourceFromSheets", () => {
  test("hands out copies of the stored grids", () => {
    const source = gridSourceFromSheets("mem", { S: [[1, 2]] });
    const grid = source.readSheet("S");
    grid[0][0] = 99;
    expect(source.readSheet("S")).toEqual([[1, 2]]);
  });
});
