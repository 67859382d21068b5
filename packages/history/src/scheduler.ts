import * as out from "@glucose-archive/shared/output";

import { addDays, dailyWindow, dateInZone, type CalendarDate } from "./calendar.js";
import { HistoryError, SourceFetchError, StoreError } from "./errors.js";
import { reduceToMinuteAverages } from "./reducer.js";
import type { AggregateStore, HistoryLogger, MinuteRow, RawSample, ReadingSource } from "./types.js";

export const DEFAULT_INITIAL_BACKFILL_DAYS = 14;

/**
 * The day to process next, or null when history is complete up to yesterday.
 * Today is never eligible: it is not a complete day yet.
 */
export function nextDueDay(
  today: CalendarDate,
  watermark: CalendarDate | null,
  initialBackfillDays: number,
): CalendarDate | null {
  const lastCompletableDay = addDays(today, -1);
  const next = watermark === null ? addDays(today, -initialBackfillDays) : addDays(watermark, 1);
  return next <= lastCompletableDay ? next : null;
}

export type DayResult =
  | { kind: "stored"; date: CalendarDate; minutes: number }
  | { kind: "empty"; date: CalendarDate; marked: boolean };

export interface DayFailure {
  date: CalendarDate;
  error: HistoryError;
}

export type StepResult =
  | { status: "idle"; caughtUpTo: CalendarDate }
  | { status: "processed"; day: DayResult }
  | ({ status: "failed" } & DayFailure);

export interface CatchUpResult {
  processed: DayResult[];
  /** Set when a day failed; the watermark stays at the last processed day. */
  failure: DayFailure | null;
}

export interface SchedulerSettings {
  timeZone: string;
  initialBackfillDays: number;
}

export interface BackfillSchedulerOptions {
  store: AggregateStore;
  source: ReadingSource;
  settings: SchedulerSettings;
  clock?: () => Date;
  logger?: HistoryLogger;
}

const consoleLogger: HistoryLogger = {
  info: out.info,
  warn: out.warn,
  error: out.error,
};

/**
 * Drives fetch -> reduce -> store one calendar day at a time, resuming from
 * the store's watermark. `catchUp()` runs until current; `step()` does at
 * most one day per call for callers that re-invoke it on a cadence.
 */
export class BackfillScheduler {
  private readonly store: AggregateStore;
  private readonly source: ReadingSource;
  private readonly settings: SchedulerSettings;
  private readonly clock: () => Date;
  private readonly logger: HistoryLogger;

  constructor(options: BackfillSchedulerOptions) {
    this.store = options.store;
    this.source = options.source;
    this.settings = options.settings;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  today(): CalendarDate {
    return dateInZone(this.clock().getTime(), this.settings.timeZone);
  }

  async nextDay(): Promise<CalendarDate | null> {
    const watermark = await this.store.latestDate();
    if (watermark === null) {
      this.logger.info(
        `History is empty. Starting backfill ${this.settings.initialBackfillDays} days back.`,
      );
    }
    return nextDueDay(this.today(), watermark, this.settings.initialBackfillDays);
  }

  async processDay(date: CalendarDate): Promise<DayResult> {
    const window = dailyWindow(date, this.settings.timeZone);
    this.logger.info(`Fetching readings for ${date}...`);

    let samples: RawSample[];
    try {
      samples = await this.source.fetchRange(window);
    } catch (e: unknown) {
      throw new SourceFetchError(date, e);
    }

    const averages = reduceToMinuteAverages(samples, this.settings.timeZone);
    if (averages.size === 0) {
      const marked = await this.store.markDayEmpty(date);
      this.logger.info(
        samples.length === 0
          ? `No readings for ${date}; marked the day as checked.`
          : `No usable readings among ${samples.length} for ${date}; marked the day as checked.`,
      );
      return { kind: "empty", date, marked };
    }

    const rows: MinuteRow[] = [...averages].map(([minuteOfDay, average]) => ({ minuteOfDay, average }));
    const minutes = await this.store.upsertMinuteAverages(date, rows);
    this.logger.info(`Stored ${minutes} minute averages for ${date}.`);
    return { kind: "stored", date, minutes };
  }

  /**
   * Process every overdue day. Stops at the first failed day so the next run
   * resumes from the same point.
   */
  async catchUp(): Promise<CatchUpResult> {
    const processed: DayResult[] = [];
    let previous: CalendarDate | null = null;

    while (true) {
      let date: CalendarDate | null = null;
      try {
        date = await this.nextDay();
        if (date === null) {
          this.logger.info(`History is current up to ${addDays(this.today(), -1)}.`);
          return { processed, failure: null };
        }
        if (previous !== null && date <= previous) {
          throw new StoreError("latestDate", `watermark did not advance past ${date}`, { date });
        }
        processed.push(await this.processDay(date));
        previous = date;
      } catch (e: unknown) {
        if (!(e instanceof HistoryError)) throw e;
        const failedDate = date ?? previous ?? this.today();
        this.report(e, "Stopping catch-up.");
        return { processed, failure: { date: failedDate, error: e } };
      }
    }
  }

  /** Process at most one overdue day. Failures are reported, never thrown. */
  async step(): Promise<StepResult> {
    let date: CalendarDate | null = null;
    try {
      date = await this.nextDay();
      if (date === null) {
        const caughtUpTo = addDays(this.today(), -1);
        this.logger.info(`History is current up to ${caughtUpTo}.`);
        return { status: "idle", caughtUpTo };
      }
      return { status: "processed", day: await this.processDay(date) };
    } catch (e: unknown) {
      if (!(e instanceof HistoryError)) throw e;
      this.report(e, "Will retry on the next run.");
      return { status: "failed", date: date ?? this.today(), error: e };
    }
  }

  private report(error: HistoryError, suffix: string): void {
    if (error instanceof SourceFetchError) {
      this.logger.warn(`${error.message}. ${suffix}`);
    } else {
      this.logger.error(`${error.message}. ${suffix}`);
    }
  }
}
