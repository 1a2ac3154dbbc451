/**
 * SheetJS-backed GridSource for workbook files (xlsx, xls, csv).
 *
 * Cells are returned as stored: numbers stay numbers (including date serials,
 * since workbooks are read without cellDates), text stays text, error cells
 * yield their display text and empty cells are null.
 */
import { read, readFile, utils, type CellObject, type WorkBook, type WorkSheet } from "xlsx";
import { SourceUnavailableError, describeError } from "../errors";
import { getLogger } from "../../util/logger";
import type { CellGrid, CellValue, GridSource } from "./cell_grid_reader";

const logger = getLogger("reports/workbook_reader");

export class WorkbookGridSource implements GridSource {
  readonly label: string;
  private readonly workbook: WorkBook;

  constructor(label: string, workbook: WorkBook) {
    this.label = label;
    this.workbook = workbook;
  }

  sheetNames(): string[] {
    return [...this.workbook.SheetNames];
  }

  readSheet(sheetName: string): CellGrid {
    const sheet: WorkSheet | undefined = this.workbook.Sheets[sheetName];
    if (!sheet) {
      throw new SourceUnavailableError(
        this.label,
        `Sheet "${sheetName}" not found in ${this.label}`
      );
    }
    const grid = sheetToGrid(sheet);
    logger.debug(
      { source: this.label, sheet: sheetName, rows: grid.length },
      "sheet read"
    );
    return grid;
  }
}

/**
 * Opens a workbook file from disk.
 * @throws SourceUnavailableError when the file is missing or unreadable
 */
export function openWorkbook(filePath: string): WorkbookGridSource {
  try {
    return new WorkbookGridSource(filePath, readFile(filePath, { cellDates: false }));
  } catch (err) {
    throw new SourceUnavailableError(
      filePath,
      `Cannot open workbook ${filePath}: ${describeError(err)}`,
      { cause: err }
    );
  }
}

export function workbookFromBuffer(
  buffer: Buffer,
  label = "<buffer>"
): WorkbookGridSource {
  try {
    return new WorkbookGridSource(
      label,
      read(buffer, { type: "buffer", cellDates: false })
    );
  } catch (err) {
    throw new SourceUnavailableError(
      label,
      `Cannot read workbook ${label}: ${describeError(err)}`,
      { cause: err }
    );
  }
}

function sheetToGrid(sheet: WorkSheet): CellGrid {
  const ref = sheet["!ref"];
  if (typeof ref !== "string" || ref.length === 0) return [];
  // Anchor at A1 even when the used range starts further in
  const { e: end } = utils.decode_range(ref);
  const grid: CellGrid = [];
  for (let r = 0; r <= end.r; r++) {
    const row: CellValue[] = [];
    for (let c = 0; c <= end.c; c++) {
      const cell: CellObject | undefined = sheet[utils.encode_cell({ r, c })];
      row.push(toCellValue(cell));
    }
    grid.push(row);
  }
  return grid;
}

function toCellValue(cell: CellObject | undefined): CellValue {
  if (!cell) return null;
  switch (cell.t) {
    case "n":
      return typeof cell.v === "number" ? cell.v : null;
    case "s":
      return typeof cell.v === "string" ? cell.v : null;
    case "b":
      return typeof cell.v === "boolean" ? cell.v : null;
    case "e":
      return cell.w ?? null;
    case "d":
      return cell.v instanceof Date ? cell.v.toISOString() : null;
    default:
      return null;
  }
}
