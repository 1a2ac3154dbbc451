import fs from "fs";
import os from "os";
import path from "path";
import { utils, write } from "xlsx";
import { runArchiveCli } from "@src/reports/script/archive_cli";
import type { AppConfig } from "@src/util/config";
import { buildReportGrid } from "../../__tests__/report_grid";

describe("runArchiveCli", () => {
  let dir: string;
  let config: AppConfig;
  let lines: string[];
  const print = (line: string) => {
    lines.push(line);
  };

  function writeReport(name: string): string {
    const wb = utils.book_new();
    const grid = buildReportGrid({
      reportDate: "2026-01-23",
      positions: { total: [0, 0, 1000, 400, 0, 0, 0, 0, 0, 0] },
    });
    utils.book_append_sheet(wb, utils.aoa_to_sheet(grid), "Weekly_Report");
    const out: unknown = write(wb, { type: "buffer", bookType: "xlsx" });
    if (!Buffer.isBuffer(out)) throw new Error("expected a Buffer");
    const file = path.join(dir, name);
    fs.writeFileSync(file, out);
    return file;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cot-cli-"));
    config = {
      archiveDir: path.join(dir, "data"),
      primarySheet: "Weekly_Report",
      windowWeeks: 13,
    };
    lines = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("prints usage for unknown commands", () => {
    expect(runArchiveCli(["frobnicate"], print, config)).toBe(1);
    expect(lines[0]).toBe("Usage: cot-archive <command> [args]");
  });

  test("imports a workbook, then lists and shows it", () => {
    const file = writeReport("DEBM.xlsx");

    expect(runArchiveCli(["import", "DEBM", file], print, config)).toBe(0);
    expect(lines).toEqual([
      `Importing ${file} for contract DEBM`,
      "Import complete. Latest date: 2026-01-23",
    ]);

    lines = [];
    expect(runArchiveCli(["list"], print, config)).toBe(0);
    expect(lines).toEqual(["Stored contracts: DEBM"]);

    lines = [];
    expect(runArchiveCli(["show", "DEBM"], print, config)).toBe(0);
    expect(lines.slice(0, 4)).toEqual([
      "=== DEBM Summary ===",
      "Total records: 15",
      "Date range: 2026-01-23 to 2026-01-23",
      "Latest report (2026-01-23):",
    ]);
    expect(lines).toHaveLength(10);
    expect(lines[6]).toBe(
      ["Investment Funds      ", "1000", "400", "600", "0", "0"].join("\t")
    );
  });

  test("show reports a contract without history", () => {
    expect(runArchiveCli(["show", "DEPM"], print, config)).toBe(1);
    expect(lines).toEqual(["No historical data found for DEPM"]);
  });

  test("import exits 1 when a file cannot be opened", () => {
    const missing = path.join(dir, "missing.xlsx");
    expect(runArchiveCli(["import", "DEBM", missing], print, config)).toBe(1);
    expect(lines[1]).toMatch(/^Failed: .*missing\.xlsx: Cannot open workbook/);
    expect(lines[2]).toBe("Import complete. Latest date: none");
  });
});
