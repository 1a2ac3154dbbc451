/**
 * Decodes weekly report sheets into metadata and observations.
 *
 * A sheet carries eight header rows followed by three blocks (positions,
 * week-on-week changes, percentages of open interest), each with one row per
 * position type and a long/short column pair per participant category. The
 * exact offsets come from a ReportLayout.
 */
import { getLogger } from "../util/logger";
import { DEFAULT_PRIMARY_SHEET } from "../util/config";
import { cellAt, type CellGrid, type GridSource } from "./grid/cell_grid_reader";
import { cellText, cleanNumber, parseCalendarDate, parseTimestamp } from "./cells";
import { DecodeError, describeError, type ReportErrorCode, ReportError } from "./errors";
import { DEFAULT_REPORT_LAYOUT, type BlockRows, type ReportLayout } from "./layout";
import {
  POSITION_TYPES,
  createObservation,
  type Category,
  type Observation,
  type PositionType,
  type ReportMetadata,
} from "./types/domain";

export interface DecodedSheet {
  metadata: ReportMetadata;
  observations: Observation[];
}

export interface SheetOutcome {
  sheet: string;
  reportDate: string;
  contractCode: string;
  count: number;
}

export interface SheetFailure {
  sheet: string;
  code?: ReportErrorCode;
  error: string;
}

export interface DecodedSource {
  source: string;
  observations: Observation[];
  sheets: SheetOutcome[];
  failures: SheetFailure[];
}

export interface LatestReport {
  metadata: ReportMetadata;
  /** `total` observations of the primary sheet, in category order */
  positions: Observation[];
}

export interface ReportDecoderOptions {
  layout?: ReportLayout;
  primarySheet?: string;
}

interface BlockEntry {
  category: Category;
  positionType: PositionType;
  first: number;
  second: number;
}

export class ReportDecoder {
  private readonly layout: ReportLayout;
  private readonly primarySheet: string;
  private readonly logger = getLogger("reports/decoder");

  constructor(options: ReportDecoderOptions = {}) {
    this.layout = options.layout ?? DEFAULT_REPORT_LAYOUT;
    this.primarySheet = options.primarySheet ?? DEFAULT_PRIMARY_SHEET;
  }

  /**
   * Reads the header rows. The report date is normalized to YYYY-MM-DD.
   * @throws DecodeError when the report date or contract code is unusable
   */
  extractMetadata(grid: CellGrid): ReportMetadata {
    const { metadataRows: rows, metadataColumn: col } = this.layout;
    const at = (row: number) => cellAt(grid, row, col);

    const rawDate = at(rows.reportDate);
    const reportDate = parseCalendarDate(rawDate);
    if (!reportDate) {
      throw new DecodeError(
        "reportDate",
        `Unparseable report date: ${JSON.stringify(rawDate)}`
      );
    }
    const contractCode = cellText(at(rows.contractCode));
    if (!contractCode) {
      throw new DecodeError("contractCode", "Missing contract code");
    }

    return Object.freeze({
      tradingVenue: cellText(at(rows.tradingVenue)),
      venueIdentifier: cellText(at(rows.venueIdentifier)),
      reportDate,
      publicationDatetime: parseTimestamp(at(rows.publicationDatetime)),
      contractName: cellText(at(rows.contractName)),
      contractCode,
      reportStatus: cellText(at(rows.reportStatus)),
      reportType: cellText(at(rows.reportType)),
    });
  }

  /**
   * @throws DecodeError when the header is unusable or the sheet ends before
   * the last data row of the layout
   */
  decodeGrid(grid: CellGrid): DecodedSheet {
    const metadata = this.extractMetadata(grid);
    const { blocks } = this.layout;
    const lastRow = Math.max(
      ...Object.values(blocks).flatMap((rows: BlockRows) => Object.values(rows))
    );
    if (grid.length <= lastRow) {
      throw new DecodeError(
        "rows",
        `Sheet has ${grid.length} rows, layout needs ${lastRow + 1}`
      );
    }
    const positions = this.readBlock(grid, blocks.positions, metadata);
    const changes = this.readBlock(grid, blocks.changes, metadata);
    const percentages = this.readBlock(grid, blocks.percentages, metadata);

    // Left join changes and percentages onto positions
    const observations: Observation[] = [];
    for (const [key, pos] of positions) {
      const chg = changes.get(key);
      const pct = percentages.get(key);
      observations.push(
        createObservation({
          reportDate: metadata.reportDate,
          contractCode: metadata.contractCode,
          category: pos.category,
          positionType: pos.positionType,
          long: pos.first,
          short: pos.second,
          longChange: chg?.first ?? 0,
          shortChange: chg?.second ?? 0,
          longPct: pct?.first ?? 0,
          shortPct: pct?.second ?? 0,
        })
      );
    }
    return { metadata, observations };
  }

  decodeSheet(source: GridSource, sheetName: string = this.primarySheet): DecodedSheet {
    return this.decodeGrid(source.readSheet(sheetName));
  }

  /**
   * Decodes every sheet of a source. Sheets that fail are logged and reported
   * in `failures`; the others still contribute their observations.
   */
  decodeSource(source: GridSource): DecodedSource {
    const result: DecodedSource = {
      source: source.label,
      observations: [],
      sheets: [],
      failures: [],
    };

    for (const sheet of source.sheetNames()) {
      try {
        const { metadata, observations } = this.decodeSheet(source, sheet);
        result.observations.push(...observations);
        result.sheets.push({
          sheet,
          reportDate: metadata.reportDate,
          contractCode: metadata.contractCode,
          count: observations.length,
        });
      } catch (err) {
        const failure: SheetFailure = { sheet, error: describeError(err) };
        if (err instanceof ReportError) failure.code = err.code;
        result.failures.push(failure);
        this.logger.warn(
          { source: source.label, sheet, code: failure.code, error: failure.error },
          "could not decode sheet, skipping"
        );
      }
    }

    this.logger.info(
      {
        source: source.label,
        decoded: result.sheets.length,
        failed: result.failures.length,
        observations: result.observations.length,
      },
      "report source decoded"
    );
    return result;
  }

  latestReport(source: GridSource): LatestReport {
    const { metadata, observations } = this.decodeSheet(source);
    return {
      metadata,
      positions: observations.filter((o) => o.positionType === "total"),
    };
  }

  private readBlock(
    grid: CellGrid,
    rows: BlockRows,
    metadata: ReportMetadata
  ): Map<string, BlockEntry> {
    const entries = new Map<string, BlockEntry>();
    for (const positionType of POSITION_TYPES) {
      const row = rows[positionType];
      for (const { category, first, second } of this.layout.categories) {
        const key = [
          metadata.reportDate,
          metadata.contractCode,
          category,
          positionType,
        ].join("#");
        entries.set(key, {
          category,
          positionType,
          first: cleanNumber(cellAt(grid, row, first)),
          second: cleanNumber(cellAt(grid, row, second)),
        });
      }
    }
    return entries;
  }
}
