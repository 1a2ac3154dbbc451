/**
 * Read-side helpers over an instrument series.
 */
import { getLogger } from "../util/logger";
import {
  compareWithinDate,
  type InstrumentSeries,
  type Observation,
  type PositionType,
} from "./types/domain";

const logger = getLogger("reports/series_window");

/**
 * Ascending by report date; same-date rows in category then position type order.
 */
export function sortChronologically(observations: readonly Observation[]): Observation[] {
  return [...observations].sort(
    (a, b) => a.reportDate.localeCompare(b.reportDate) || compareWithinDate(a, b)
  );
}

/**
 * Descending by report date, the order archives are stored in.
 */
export function sortNewestFirst(observations: readonly Observation[]): Observation[] {
  return [...observations].sort(
    (a, b) => b.reportDate.localeCompare(a.reportDate) || compareWithinDate(a, b)
  );
}

export function distinctReportDates(observations: readonly Observation[]): string[] {
  return Array.from(new Set(observations.map((o) => o.reportDate))).sort((a, b) =>
    b.localeCompare(a)
  );
}

/**
 * Observations of one position type on the `weekCount` most recent distinct
 * report dates, oldest first. Returns whatever exists when the series is
 * shorter than requested.
 */
export function recent(
  series: InstrumentSeries,
  positionType: PositionType,
  weekCount: number
): Observation[] {
  if (weekCount <= 0) return [];
  const filtered = series.observations.filter((o) => o.positionType === positionType);
  const dates = distinctReportDates(filtered);
  if (dates.length < weekCount) {
    logger.warn(
      {
        contractCode: series.contractCode,
        positionType,
        requested: weekCount,
        available: dates.length,
      },
      "fewer report dates than requested"
    );
  }
  const window = new Set(dates.slice(0, weekCount));
  return sortChronologically(filtered.filter((o) => window.has(o.reportDate)));
}
