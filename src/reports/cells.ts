/**
 * Cell value normalization used by the report decoder.
 */
import type { CellValue } from "./grid/cell_grid_reader";

// Serial 25569 is 1970-01-01 in the 1900 date system
const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 24 * 3600 * 1000;

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const DAY_FIRST_DATE = /^(\d{1,2})[./](\d{1,2})[./](\d{4})$/;
// Free-form dates need a four-digit year plus a month name or two more numbers
const FREE_FORM_YEAR = /(?<!\d)\d{4}(?!\d)/;
const MONTH_NAME =
  /\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\b/i;
const THREE_NUMBERS = /\d+\D+\d+\D+\d+/;
const LONG_DIGIT_RUN = /\d{5,}/;

/**
 * Numeric cell → number. Blank, text, boolean or non-finite input yields 0.
 */
export function cleanNumber(value: CellValue): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL.test(trimmed)) return 0;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function cellText(value: CellValue): string {
  if (value === null) return "";
  if (typeof value === "string") return value.trim();
  return String(value);
}

export function excelSerialToDate(serial: number): Date {
  return new Date(Math.round((serial - EXCEL_EPOCH_OFFSET_DAYS) * MS_PER_DAY));
}

/**
 * Parses a report date cell into YYYY-MM-DD, or null when it is not a date.
 */
export function parseCalendarDate(value: CellValue): string | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return null;
    return excelSerialToDate(Math.floor(value)).toISOString().slice(0, 10);
  }
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text) return null;

  const iso = ISO_DATE.exec(text);
  if (iso) return formatYmd(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const dayFirst = DAY_FIRST_DATE.exec(text);
  if (dayFirst)
    return formatYmd(
      Number(dayFirst[3]),
      Number(dayFirst[2]),
      Number(dayFirst[1])
    );

  if (!looksLikeFreeFormDate(text)) return null;
  const parsed = new Date(text);
  if (Number.isNaN(parsed.getTime())) return null;
  return formatYmd(
    parsed.getFullYear(),
    parsed.getMonth() + 1,
    parsed.getDate()
  );
}

/**
 * Publication timestamps: date serials become ISO timestamps, text is kept.
 */
export function parseTimestamp(value: CellValue): string {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return excelSerialToDate(value).toISOString();
  }
  return cellText(value);
}

function looksLikeFreeFormDate(text: string): boolean {
  return (
    FREE_FORM_YEAR.test(text) &&
    !LONG_DIGIT_RUN.test(text) &&
    (MONTH_NAME.test(text) || THREE_NUMBERS.test(text))
  );
}

function formatYmd(year: number, month: number, day: number): string | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (
    d.getUTCFullYear() !== year ||
    d.getUTCMonth() !== month - 1 ||
    d.getUTCDate() !== day
  ) {
    return null;
  }
  const m = String(month).padStart(2, "0");
  const dd = String(day).padStart(2, "0");
  return `${String(year).padStart(4, "0")}-${m}-${dd}`;
}
