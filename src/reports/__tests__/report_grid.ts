import type { CellGrid, CellValue } from "@src/reports/grid/cell_grid_reader";
import type { PositionType } from "@src/reports/types/domain";

/** Five (long, short) pairs in category order */
export type BlockRow = CellValue[];

export interface ReportGridSpec {
  tradingVenue?: CellValue;
  reportDate?: CellValue;
  publicationDatetime?: CellValue;
  contractName?: CellValue;
  contractCode?: CellValue;
  positions?: Partial<Record<PositionType, BlockRow>>;
  changes?: Partial<Record<PositionType, BlockRow>>;
  percentages?: Partial<Record<PositionType, BlockRow>>;
}

const EMPTY_ROW: BlockRow = [0, 0, 0, 0, 0, 0, 0, 0, 0, 0];

function blockRows(
  label: string,
  block: Partial<Record<PositionType, BlockRow>> | undefined
): CellGrid {
  const types: PositionType[] = ["risk_reducing", "other", "total"];
  return types.map((t) => [label, t, "", ...(block?.[t] ?? EMPTY_ROW)]);
}

/**
 * Builds a 20-row sheet grid in the weekly report layout.
 */
export function buildReportGrid(spec: ReportGridSpec = {}): CellGrid {
  return [
    ["Trading Venue", spec.tradingVenue ?? "Test Exchange"],
    ["Venue Identifier", "XTST"],
    ["Report Date", spec.reportDate ?? "2026-01-23"],
    ["Publication Date", spec.publicationDatetime ?? "2026-01-27 15:00:00"],
    ["Contract Name", spec.contractName ?? "Test Power Base Future"],
    ["Contract Code", spec.contractCode ?? "DEBM"],
    ["Report Status", "Final"],
    ["Report Type", "Weekly"],
    [null],
    ["", "", "", "Investment Firms", null, "Investment Funds"],
    ["", "", "", "Long", "Short", "Long", "Short"],
    ...blockRows("Number of positions", spec.positions),
    ...blockRows("Changes since last report", spec.changes),
    ...blockRows("Percentage of total open interest", spec.percentages),
  ];
}
