/**
 * File-backed archive of observations, one CSV per contract code.
 *
 * Layout: `<dataDir>/<CONTRACT>_history.csv`, header row first, rows stored
 * newest report date first. Writes go to a temp file in the same directory
 * and are renamed over the archive, so readers never see a partial file.
 * Appends are read-modify-write over the whole series; run at most one writer
 * per contract at a time.
 */
import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { getLogger } from "../../util/logger";
import { loadConfig } from "../../util/config";
import { ArchiveFormatError, describeError } from "../errors";
import { recent, sortNewestFirst } from "../series_window";
import {
  CategorySchema,
  PositionTypeSchema,
  observationKey,
  type InstrumentSeries,
  type Observation,
} from "../types/domain";

export const ARCHIVE_COLUMNS = [
  "report_date",
  "contract_code",
  "category",
  "position_type",
  "long",
  "short",
  "net",
  "long_change",
  "short_change",
  "net_change",
  "long_pct",
  "short_pct",
] as const;

const FILE_SUFFIX = "_history.csv";
const CONTRACT_CODE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// Blank numeric cells read as 0, matching the decoder's cleaning rule
const numeric = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? 0 : v),
  z.coerce.number().finite()
);

function sameValue(a: number, b: number): boolean {
  return Math.abs(a - b) <= 1e-9 * Math.max(1, Math.abs(a), Math.abs(b));
}

export const ArchiveRowSchema = z
  .object({
    report_date: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}(?:[ T].*)?$/, "expected YYYY-MM-DD")
      .transform((s) => s.slice(0, 10)),
    contract_code: z.string().min(1),
    category: CategorySchema,
    position_type: PositionTypeSchema,
    long: numeric,
    short: numeric,
    net: numeric,
    long_change: numeric,
    short_change: numeric,
    net_change: numeric,
    long_pct: numeric,
    short_pct: numeric,
  })
  .refine((r) => sameValue(r.net, r.long - r.short), {
    message: "net must equal long - short",
    path: ["net"],
  })
  .refine((r) => sameValue(r.net_change, r.long_change - r.short_change), {
    message: "net_change must equal long_change - short_change",
    path: ["net_change"],
  });

type ArchiveRow = z.infer<typeof ArchiveRowSchema>;

function toObservation(row: ArchiveRow): Observation {
  return {
    reportDate: row.report_date,
    contractCode: row.contract_code,
    category: row.category,
    positionType: row.position_type,
    long: row.long,
    short: row.short,
    net: row.net,
    longChange: row.long_change,
    shortChange: row.short_change,
    netChange: row.net_change,
    longPct: row.long_pct,
    shortPct: row.short_pct,
  };
}

function toRow(o: Observation): Array<string | number> {
  return [
    o.reportDate,
    o.contractCode,
    o.category,
    o.positionType,
    o.long,
    o.short,
    o.net,
    o.longChange,
    o.shortChange,
    o.netChange,
    o.longPct,
    o.shortPct,
  ];
}

export interface ObservationStoreOptions {
  dataDir?: string;
  /** Default window for getWeeklyTotals */
  windowWeeks?: number;
}

export interface AppendOptions {
  deduplicate?: boolean;
}

export interface DateRange {
  /** inclusive, YYYY-MM-DD */
  start?: string;
  /** inclusive, YYYY-MM-DD */
  end?: string;
}

export class ObservationStore {
  readonly dataDir: string;
  private readonly windowWeeks: number;
  private readonly logger = getLogger("reports/observation_store");

  constructor(options: ObservationStoreOptions = {}) {
    const needsConfig =
      options.dataDir === undefined || options.windowWeeks === undefined;
    const config = needsConfig ? loadConfig() : undefined;
    this.dataDir = options.dataDir ?? config?.archiveDir ?? "data";
    this.windowWeeks = options.windowWeeks ?? config?.windowWeeks ?? 13;
    fs.mkdirSync(this.dataDir, { recursive: true });
  }

  getStorageFile(contractCode: string): string {
    if (!CONTRACT_CODE.test(contractCode)) {
      throw new Error(`Invalid contract code: ${JSON.stringify(contractCode)}`);
    }
    return path.join(this.dataDir, `${contractCode}${FILE_SUFFIX}`);
  }

  /**
   * Loads the archive for a contract, or null when none has been written yet.
   * @throws ArchiveFormatError when a stored row is malformed
   */
  load(contractCode: string): InstrumentSeries | null {
    const file = this.getStorageFile(contractCode);
    if (!fs.existsSync(file)) {
      this.logger.debug({ contractCode, file }, "no archive yet");
      return null;
    }

    const text = fs.readFileSync(file, "utf-8");
    const records: unknown = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
    if (!Array.isArray(records)) {
      throw new ArchiveFormatError(file, 1, "archive is not a table");
    }

    const observations = records.map((record: unknown, index: number) => {
      const parsed = ArchiveRowSchema.safeParse(record);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.join(".") || "row";
        throw new ArchiveFormatError(
          file,
          index + 2,
          `${where}: ${issue?.message ?? "invalid row"}`
        );
      }
      return toObservation(parsed.data);
    });

    return { contractCode, observations };
  }

  /**
   * Replaces the archive atomically. Rows are written in the given order.
   */
  save(contractCode: string, series: InstrumentSeries): void {
    const file = this.getStorageFile(contractCode);
    const content = stringify(series.observations.map(toRow), {
      header: true,
      columns: [...ARCHIVE_COLUMNS],
    });
    const tmp = path.join(
      this.dataDir,
      `.${path.basename(file)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
      const data = Buffer.from(content, "utf-8");
      const fd = fs.openSync(tmp, "w");
      try {
        let offset = 0;
        while (offset < data.length) {
          const written = fs.writeSync(fd, data, offset, data.length - offset);
          if (written <= 0) {
            throw new Error(
              `Short write to ${tmp}: ${offset} of ${data.length} bytes written`
            );
          }
          offset += written;
        }
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, file);
    } catch (err) {
      this.removeQuietly(tmp);
      throw err;
    }

    this.logger.info(
      { contractCode, file, records: series.observations.length },
      "archive saved"
    );
  }

  /**
   * Merges observations into the contract's archive and persists the result.
   *
   * With deduplication on, one row survives per (reportDate, category,
   * positionType): the last one appended, so re-ingested corrections replace
   * stored values. Stored order: newest date first, then category, then
   * position type.
   */
  append(
    contractCode: string,
    observations: readonly Observation[],
    options: AppendOptions = {}
  ): InstrumentSeries {
    const deduplicate = options.deduplicate ?? true;
    const existing = this.load(contractCode)?.observations ?? [];

    const incoming = observations.filter((o) => o.contractCode === contractCode);
    if (incoming.length !== observations.length) {
      this.logger.warn(
        {
          contractCode,
          dropped: observations.length - incoming.length,
        },
        "ignoring observations of other contracts"
      );
    }

    let combined: Observation[] = [...existing, ...incoming];
    if (deduplicate) {
      const byKey = new Map<string, Observation>();
      for (const o of combined) byKey.set(observationKey(o), o);
      combined = [...byKey.values()];
    }

    const series: InstrumentSeries = {
      contractCode,
      observations: sortNewestFirst(combined),
    };
    this.save(contractCode, series);
    this.logger.debug(
      {
        contractCode,
        existing: existing.length,
        appended: incoming.length,
        stored: series.observations.length,
      },
      "archive merged"
    );
    return series;
  }

  getLatestDate(contractCode: string): string | null {
    const series = this.load(contractCode);
    if (!series || series.observations.length === 0) return null;
    return series.observations.reduce(
      (max, o) => (o.reportDate > max ? o.reportDate : max),
      series.observations[0].reportDate
    );
  }

  getDateRange(contractCode: string, range: DateRange = {}): Observation[] | null {
    const series = this.load(contractCode);
    if (!series) return null;
    return series.observations.filter(
      (o) =>
        (range.start === undefined || o.reportDate >= range.start) &&
        (range.end === undefined || o.reportDate <= range.end)
    );
  }

  /**
   * `total` observations of the most recent weeks, oldest first.
   */
  getWeeklyTotals(
    contractCode: string,
    weeks: number = this.windowWeeks
  ): Observation[] | null {
    const series = this.load(contractCode);
    if (!series) return null;
    return recent(series, "total", weeks);
  }

  listContracts(): string[] {
    return fs
      .readdirSync(this.dataDir)
      .filter((name) => name.endsWith(FILE_SUFFIX) && !name.startsWith("."))
      .map((name) => name.slice(0, -FILE_SUFFIX.length))
      .sort();
  }

  private removeQuietly(file: string): void {
    try {
      fs.rmSync(file, { force: true });
    } catch (cleanupErr) {
      this.logger.warn(
        { file, error: describeError(cleanupErr) },
        "could not remove temp file"
      );
    }
  }
}
