import { z } from "zod";
import { getNumber, getString } from "./env";

export const AppConfigSchema = z.object({
  /** Directory holding one `<CONTRACT>_history.csv` per instrument */
  archiveDir: z.string().min(1),
  /** Sheet decoded when a caller asks for "the" report of a workbook */
  primarySheet: z.string().min(1),
  /** Default number of distinct report dates in a recent window */
  windowWeeks: z.number().int().positive(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_PRIMARY_SHEET = "Weekly_Report";
export const DEFAULT_WINDOW_WEEKS = 13;

/**
 * Builds the application config from the environment. Throws a ZodError when
 * a value is present but invalid (e.g. WINDOW_WEEKS=0).
 */
export function loadConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return AppConfigSchema.parse({
    archiveDir: getString("ARCHIVE_DIR", "data"),
    primarySheet: getString("PRIMARY_SHEET", DEFAULT_PRIMARY_SHEET),
    windowWeeks: getNumber("WINDOW_WEEKS", DEFAULT_WINDOW_WEEKS),
    ...overrides,
  });
}
