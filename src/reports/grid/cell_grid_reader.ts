import { SourceUnavailableError } from "../errors";

/** Raw cell content, uncoerced. Blank cells are null. */
export type CellValue = string | number | boolean | null;

/** Zero-based `[row][column]` grid anchored at the sheet's A1 cell. */
export type CellGrid = CellValue[][];

/**
 * A spreadsheet-like source made of named sheets.
 */
export interface GridSource {
  /** Human-readable origin, used in logs and errors */
  readonly label: string;
  sheetNames(): string[];
  /** @throws SourceUnavailableError when the sheet does not exist */
  readSheet(sheetName: string): CellGrid;
}

export function cellAt(grid: CellGrid, row: number, column: number): CellValue {
  return grid[row]?.[column] ?? null;
}

/**
 * In-memory source over already materialized grids, in insertion order.
 */
export function gridSourceFromSheets(
  label: string,
  sheets: Record<string, CellGrid>
): GridSource {
  const names = Object.keys(sheets);
  return {
    label,
    sheetNames: () => [...names],
    readSheet(sheetName: string): CellGrid {
      const grid = sheets[sheetName];
      if (!grid) {
        throw new SourceUnavailableError(
          label,
          `Sheet "${sheetName}" not found in ${label}`
        );
      }
      return grid.map((row) => [...row]);
    },
  };
}
