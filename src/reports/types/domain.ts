/**
 * Domain types for weekly Commitment of Traders reports.
 */
import { z } from "zod";

export const CATEGORIES = [
  "investment_firms",
  "investment_funds",
  "other_financial",
  "commercial",
  "compliance_operators",
] as const;

export const POSITION_TYPES = ["risk_reducing", "other", "total"] as const;

export const CategorySchema = z.enum(CATEGORIES);
export const PositionTypeSchema = z.enum(POSITION_TYPES);

export type Category = z.infer<typeof CategorySchema>;
export type PositionType = z.infer<typeof PositionTypeSchema>;

export interface ReportMetadata {
  readonly tradingVenue: string;
  readonly venueIdentifier: string;
  /** YYYY-MM-DD */
  readonly reportDate: string;
  readonly publicationDatetime: string;
  readonly contractName: string;
  readonly contractCode: string;
  readonly reportStatus: string;
  readonly reportType: string;
}

export interface Observation {
  reportDate: string;
  contractCode: string;
  category: Category;
  positionType: PositionType;
  long: number;
  short: number;
  /** Always long - short */
  net: number;
  longChange: number;
  shortChange: number;
  /** Always longChange - shortChange */
  netChange: number;
  longPct: number;
  shortPct: number;
}

export type ObservationInput = Omit<Observation, "net" | "netChange">;

/**
 * Builds an observation, deriving net and netChange from the legs.
 */
export function createObservation(input: ObservationInput): Observation {
  return {
    reportDate: input.reportDate,
    contractCode: input.contractCode,
    category: input.category,
    positionType: input.positionType,
    long: input.long,
    short: input.short,
    net: input.long - input.short,
    longChange: input.longChange,
    shortChange: input.shortChange,
    netChange: input.longChange - input.shortChange,
    longPct: input.longPct,
    shortPct: input.shortPct,
  };
}

export interface InstrumentSeries {
  contractCode: string;
  observations: Observation[];
}

/**
 * Key of an observation inside one contract's archive.
 */
export function observationKey(
  o: Pick<Observation, "reportDate" | "category" | "positionType">
): string {
  return `${o.reportDate}#${o.category}#${o.positionType}`;
}

const categoryRank = new Map<Category, number>(
  CATEGORIES.map((c, i): [Category, number] => [c, i])
);
const positionTypeRank = new Map<PositionType, number>(
  POSITION_TYPES.map((p, i): [PositionType, number] => [p, i])
);

/**
 * Orders observations sharing a report date: category first, then position type.
 */
export function compareWithinDate(a: Observation, b: Observation): number {
  return (
    (categoryRank.get(a.category) ?? 0) - (categoryRank.get(b.category) ?? 0) ||
    (positionTypeRank.get(a.positionType) ?? 0) -
      (positionTypeRank.get(b.positionType) ?? 0)
  );
}

/**
 * Display names of each participant category.
 */
export const CATEGORY_LABELS: Readonly<
  Record<Category, { readonly name: string; readonly shortName: string }>
> = Object.freeze({
  investment_firms: {
    name: "Investment Firms or credit institutions",
    shortName: "Investment Firms",
  },
  investment_funds: { name: "Investment Funds", shortName: "Investment Funds" },
  other_financial: {
    name: "Other Financial Institutions",
    shortName: "Other Financial",
  },
  commercial: { name: "Commercial Undertakings", shortName: "Commercial" },
  compliance_operators: {
    name: "Operators with compliance obligations under Directive 2003/87/EC",
    shortName: "Compliance Operators",
  },
});
