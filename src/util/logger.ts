import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isProduction, isTest } from "./env";

/**
 * Structured logger shared by the decoder, the archive and the CLI.
 * - Local runs: pretty-printed through pino-pretty
 * - Production: JSON lines on stdout
 * - Jest: silent unless LOG_LEVEL asks otherwise
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "cot-archive",
    stage: getStage(),
  },
  redact: {
    paths: ["*.password", "*.secret", "*.token", "*.apiKey"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

// The pretty transport runs in a worker thread; keep it out of test runs
const usePretty = !isProduction() && !isTest();

const rootLogger: Logger = pino(
  usePretty
    ? {
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            messageKey: "message",
            ignore: "pid,hostname",
          },
        },
      }
    : baseOptions
);

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

export default rootLogger;
