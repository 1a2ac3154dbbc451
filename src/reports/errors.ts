export type ReportErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "DECODE_ERROR"
  | "ARCHIVE_FORMAT";

export class ReportError extends Error {
  readonly code: ReportErrorCode;

  constructor(code: ReportErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A workbook file or one of its sheets cannot be opened.
 */
export class SourceUnavailableError extends ReportError {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super("SOURCE_UNAVAILABLE", message, options);
    this.source = source;
  }
}

/**
 * A report sheet has an unusable header field or lacks the layout's rows.
 */
export class DecodeError extends ReportError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("DECODE_ERROR", message);
    this.field = field;
  }
}

/**
 * A persisted archive row does not match the archive schema.
 */
export class ArchiveFormatError extends ReportError {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number, message: string) {
    super("ARCHIVE_FORMAT", `${file}:${line}: ${message}`);
    this.file = file;
    this.line = line;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
