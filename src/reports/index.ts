export * from "./types/domain";
export * from "./errors";
export * from "./layout";
export * from "./grid/cell_grid_reader";
export * from "./grid/workbook_reader";
export * from "./decoder";
export * from "./series_window";
export * from "./db/observation_store";
export * from "./ingest_reports";
export { loadConfig, type AppConfig } from "../util/config";
