import type { CalendarDate } from "./calendar.js";

export class HistoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HistoryError";
  }
}

/** Network failure, timeout or non-success status. Retryable; nothing was written. */
export class SourceFetchError extends HistoryError {
  readonly code = "SOURCE_FETCH_FAILED";
  readonly date: CalendarDate;

  constructor(date: CalendarDate, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Fetching readings for ${date} failed: ${reason}`, { cause });
    this.name = "SourceFetchError";
    this.date = date;
  }
}

export type StoreOperation =
  | "initialize"
  | "latestDate"
  | "upsertMinuteAverages"
  | "markDayEmpty"
  | "averagesForDate"
  | "summary";

export class StoreError extends HistoryError {
  readonly code = "STORE_FAILED";
  readonly operation: StoreOperation;
  readonly date: CalendarDate | null;

  constructor(operation: StoreOperation, message: string, options?: { date?: CalendarDate; cause?: unknown }) {
    const where = options?.date ? ` for ${options.date}` : "";
    super(`Store ${operation}${where} failed: ${message}`, { cause: options?.cause });
    this.name = "StoreError";
    this.operation = operation;
    this.date = options?.date ?? null;
  }
}

export class SettingsError extends HistoryError {
  readonly code = "INVALID_SETTINGS";

  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}
