/** Types shared by the history engine, its store and its reading sources */

import type { CalendarDate, DailyWindow } from "./calendar.js";

/** One sensor record as the source returned it; null marks a missing field. */
export interface RawSample {
  timestampMillis: number | null;
  value: number | null;
}

export interface MinuteRow {
  minuteOfDay: number;
  average: number;
}

export interface StoreSummary {
  days: number;
  rows: number;
  firstDate: CalendarDate | null;
  latestDate: CalendarDate | null;
}

export interface LatestReading {
  value: number;
  timestampMillis: number;
  dateString: string | null;
  direction: string | null;
}

/** Every reading source (Nightscout or a test double) must implement this */
export interface ReadingSource {
  name: string;
  /** Raw samples in `[startMillis, endMillis)`. Rejects on transport failure. */
  fetchRange(window: DailyWindow): Promise<RawSample[]>;
}

export interface AggregateStore {
  initialize(): Promise<void>;
  latestDate(): Promise<CalendarDate | null>;
  upsertMinuteAverages(date: CalendarDate, rows: readonly MinuteRow[]): Promise<number>;
  /** Insert the `(date, 0, 0)` placeholder unless the date already has rows. */
  markDayEmpty(date: CalendarDate): Promise<boolean>;
}

export interface HistoryLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
