#!/usr/bin/env node
/* eslint-disable no-console */
// node dist/reports/script/archive_cli.js <command> ...
import "dotenv/config";
import { loadConfig, type AppConfig } from "../../util/config";
import { ObservationStore } from "../db/observation_store";
import { ReportDecoder } from "../decoder";
import { describeError } from "../errors";
import { ingestReportFiles } from "../ingest_reports";
import { distinctReportDates } from "../series_window";
import { CATEGORY_LABELS } from "../types/domain";

const USAGE = [
  "Usage: cot-archive <command> [args]",
  "",
  "Commands:",
  "  import <contract> <file> [file...]  - Import report workbooks for a contract",
  "  show <contract>                     - Show the latest stored report",
  "  list                                - List contracts in the archive",
];

export type Print = (line: string) => void;

function formatNumber(n: number): string {
  return Number.isInteger(n) ? n.toString() : n.toFixed(2);
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + " ".repeat(width - value.length);
}

function show(store: ObservationStore, contract: string, print: Print): number {
  const series = store.load(contract);
  if (!series) {
    print(`No historical data found for ${contract}`);
    return 1;
  }
  const dates = distinctReportDates(series.observations);
  print(`=== ${contract} Summary ===`);
  print(`Total records: ${series.observations.length}`);
  if (dates.length === 0) return 0;

  const latest = dates[0];
  print(`Date range: ${dates[dates.length - 1]} to ${latest}`);
  print(`Latest report (${latest}):`);
  print(
    [pad("category", 22), "long", "short", "net", "long_change", "short_change"].join(
      "\t"
    )
  );
  for (const o of series.observations) {
    if (o.reportDate !== latest || o.positionType !== "total") continue;
    print(
      [
        pad(CATEGORY_LABELS[o.category].shortName, 22),
        formatNumber(o.long),
        formatNumber(o.short),
        formatNumber(o.net),
        formatNumber(o.longChange),
        formatNumber(o.shortChange),
      ].join("\t")
    );
  }
  return 0;
}

/**
 * Runs one CLI command and returns the process exit code.
 */
export function runArchiveCli(
  args: readonly string[],
  print: Print = console.log,
  config: AppConfig = loadConfig()
): number {
  const [command, ...rest] = args;
  const store = new ObservationStore({
    dataDir: config.archiveDir,
    windowWeeks: config.windowWeeks,
  });

  if (command === "list") {
    const contracts = store.listContracts();
    print(`Stored contracts: ${contracts.join(", ")}`);
    return 0;
  }

  if (command === "import" && rest.length >= 2) {
    const [contract, ...files] = rest;
    print(`Importing ${files.join(", ")} for contract ${contract}`);
    const summary = ingestReportFiles(files, {
      store,
      decoder: new ReportDecoder({ primarySheet: config.primarySheet }),
      contracts: [contract],
    });
    for (const failure of summary.failures) {
      print(`Failed: ${failure.file}: ${failure.error}`);
    }
    for (const skipped of summary.skippedSheets) {
      print(`Warning: could not parse sheet ${skipped.sheet}: ${skipped.error}`);
    }
    print(`Import complete. Latest date: ${store.getLatestDate(contract) ?? "none"}`);
    return summary.failures.length > 0 ? 1 : 0;
  }

  if (command === "show" && rest.length >= 1) {
    return show(store, rest[0], print);
  }

  for (const line of USAGE) print(line);
  return 1;
}

if (require.main === module) {
  try {
    process.exitCode = runArchiveCli(process.argv.slice(2));
  } catch (err) {
    console.error("Error:", describeError(err));
    process.exitCode = 1;
  }
}
