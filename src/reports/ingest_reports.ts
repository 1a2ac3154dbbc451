/**
 * Business logic: decode report workbooks and fold them into the archive.
 *
 * One bad file or one failing contract never stops the batch; failures are
 * logged and returned in the summary.
 */
import { getLogger } from "../util/logger";
import { ObservationStore } from "./db/observation_store";
import { ReportDecoder, type SheetFailure } from "./decoder";
import { describeError } from "./errors";
import type { GridSource } from "./grid/cell_grid_reader";
import { openWorkbook } from "./grid/workbook_reader";
import type { Observation } from "./types/domain";

export interface IngestOptions {
  store: ObservationStore;
  decoder?: ReportDecoder;
  /** When set, only these contract codes are appended */
  contracts?: readonly string[];
  /** Opens a file as a grid source; defaults to SheetJS */
  open?: (file: string) => GridSource;
}

export interface ContractIngest {
  contractCode: string;
  appended: number;
  stored: number;
  latestDate: string | null;
}

export interface IngestFailure {
  file: string;
  contractCode?: string;
  error: string;
}

export interface IngestSummary {
  files: number;
  contracts: ContractIngest[];
  skippedSheets: Array<SheetFailure & { file: string }>;
  failures: IngestFailure[];
}

function groupByContract(observations: readonly Observation[]): Map<string, Observation[]> {
  const groups = new Map<string, Observation[]>();
  for (const o of observations) {
    const group = groups.get(o.contractCode);
    if (group) group.push(o);
    else groups.set(o.contractCode, [o]);
  }
  return groups;
}

export function ingestReportFiles(
  files: readonly string[],
  options: IngestOptions
): IngestSummary {
  const logger = getLogger("reports/ingest_reports");
  const decoder = options.decoder ?? new ReportDecoder();
  const open = options.open ?? openWorkbook;
  const wanted = options.contracts ? new Set(options.contracts) : undefined;

  const summary: IngestSummary = {
    files: files.length,
    contracts: [],
    skippedSheets: [],
    failures: [],
  };

  for (const file of files) {
    let groups: Map<string, Observation[]>;
    try {
      const decoded = decoder.decodeSource(open(file));
      summary.skippedSheets.push(...decoded.failures.map((f) => ({ ...f, file })));
      groups = groupByContract(decoded.observations);
    } catch (err) {
      const error = describeError(err);
      summary.failures.push({ file, error });
      logger.error({ file, error }, "report file skipped");
      continue;
    }

    for (const [contractCode, observations] of groups) {
      if (wanted && !wanted.has(contractCode)) {
        logger.debug({ file, contractCode }, "contract not requested");
        continue;
      }
      try {
        const series = options.store.append(contractCode, observations);
        const latestDate = series.observations[0]?.reportDate ?? null;
        summary.contracts.push({
          contractCode,
          appended: observations.length,
          stored: series.observations.length,
          latestDate,
        });
        logger.info(
          { file, contractCode, appended: observations.length, latestDate },
          "contract archive updated"
        );
      } catch (err) {
        const error = describeError(err);
        summary.failures.push({ file, contractCode, error });
        logger.error({ file, contractCode, error }, "contract append failed");
      }
    }
  }

  return summary;
}
