/**
 * Positional schema of a weekly report sheet.
 *
 * Every index is zero-based against the sheet's A1 cell. A new report variant
 * only needs a new ReportLayout value; the decoder reads nothing else.
 */
import type { Category, PositionType, ReportMetadata } from "./types/domain";

export interface CategoryColumns {
  readonly category: Category;
  /** long (or long_pct) column */
  readonly first: number;
  /** short (or short_pct) column */
  readonly second: number;
}

export type BlockRows = Readonly<Record<PositionType, number>>;

export interface ReportLayout {
  readonly metadataColumn: number;
  readonly metadataRows: Readonly<Record<keyof ReportMetadata, number>>;
  readonly blocks: {
    readonly positions: BlockRows;
    readonly changes: BlockRows;
    readonly percentages: BlockRows;
  };
  readonly categories: readonly CategoryColumns[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function defineLayout(layout: ReportLayout): ReportLayout {
  return deepFreeze(layout);
}

export const DEFAULT_REPORT_LAYOUT: ReportLayout = defineLayout({
  metadataColumn: 1,
  metadataRows: {
    tradingVenue: 0,
    venueIdentifier: 1,
    reportDate: 2,
    publicationDatetime: 3,
    contractName: 4,
    contractCode: 5,
    reportStatus: 6,
    reportType: 7,
  },
  blocks: {
    positions: { risk_reducing: 11, other: 12, total: 13 },
    changes: { risk_reducing: 14, other: 15, total: 16 },
    percentages: { risk_reducing: 17, other: 18, total: 19 },
  },
  categories: [
    { category: "investment_firms", first: 3, second: 4 },
    { category: "investment_funds", first: 5, second: 6 },
    { category: "other_financial", first: 7, second: 8 },
    { category: "commercial", first: 9, second: 10 },
    { category: "compliance_operators", first: 11, second: 12 },
  ],
});
