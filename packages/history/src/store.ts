import { mkdirSync } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";

import type { CalendarDate } from "./calendar.js";
import { isCalendarDate } from "./calendar.js";
import { StoreError, type StoreOperation } from "./errors.js";
import type { AggregateStore, MinuteRow, StoreSummary } from "./types.js";

export const DEFAULT_DATABASE_FILE = "running_averages.sqlite";
const BUSY_TIMEOUT_MS = 5000;
const MINUTES_PER_DAY = 1440;

export interface SqliteAggregateStoreOptions {
  databaseFile?: string;
}

type SummaryRow = {
  days: number;
  rowCount: number;
  firstDate: string | null;
  latestDate: string | null;
};

/**
 * Per-minute averages in a single SQLite table keyed by `(date_str, minute_of_day)`.
 *
 * Every operation opens its own connection and closes it before returning, so
 * several processes may share the file; conflicts are settled by SQLite
 * (`INSERT OR REPLACE` / `INSERT OR IGNORE`) and `busy_timeout`.
 */
export class SqliteAggregateStore implements AggregateStore {
  readonly databaseFile: string;

  constructor(options: SqliteAggregateStoreOptions = {}) {
    this.databaseFile = path.resolve(options.databaseFile ?? DEFAULT_DATABASE_FILE);
  }

  async initialize(): Promise<void> {
    try {
      mkdirSync(path.dirname(this.databaseFile), { recursive: true });
    } catch (error) {
      throw new StoreError("initialize", errorMessage(error), { cause: error });
    }

    this.withConnection("initialize", (db) => {
      db.pragma("journal_mode = WAL");
      db.exec(`
        CREATE TABLE IF NOT EXISTS running_averages (
          date_str TEXT NOT NULL,
          minute_of_day INTEGER NOT NULL,
          avg_sgv INTEGER NOT NULL,
          PRIMARY KEY (date_str, minute_of_day)
        )
      `);
      db.exec("CREATE INDEX IF NOT EXISTS idx_minute_of_day ON running_averages (minute_of_day)");
    });
  }

  async latestDate(): Promise<CalendarDate | null> {
    return this.withConnection("latestDate", (db) => {
      const row = db
        .prepare<[], { latest: string | null }>("SELECT MAX(date_str) AS latest FROM running_averages")
        .get();
      return row?.latest ?? null;
    });
  }

  async upsertMinuteAverages(date: CalendarDate, rows: readonly MinuteRow[]): Promise<number> {
    assertDate("upsertMinuteAverages", date);
    for (const row of rows) {
      if (!Number.isInteger(row.minuteOfDay) || row.minuteOfDay < 0 || row.minuteOfDay >= MINUTES_PER_DAY) {
        throw new StoreError("upsertMinuteAverages", `minute ${row.minuteOfDay} is outside 0-1439`, { date });
      }
      if (!Number.isInteger(row.average)) {
        throw new StoreError("upsertMinuteAverages", `average ${row.average} at minute ${row.minuteOfDay} is not an integer`, { date });
      }
    }
    if (rows.length === 0) return 0;

    return this.withConnection(
      "upsertMinuteAverages",
      (db) => {
        const insert = db.prepare<[string, number, number]>(
          "INSERT OR REPLACE INTO running_averages (date_str, minute_of_day, avg_sgv) VALUES (?, ?, ?)",
        );
        const writeAll = db.transaction((batch: readonly MinuteRow[]) => {
          for (const row of batch) insert.run(date, row.minuteOfDay, row.average);
        });
        writeAll(rows);
        return rows.length;
      },
      date,
    );
  }

  async markDayEmpty(date: CalendarDate): Promise<boolean> {
    assertDate("markDayEmpty", date);
    return this.withConnection(
      "markDayEmpty",
      (db) => {
        const result = db
          .prepare<[string, string]>(
            `INSERT OR IGNORE INTO running_averages (date_str, minute_of_day, avg_sgv)
             SELECT ?, 0, 0
             WHERE NOT EXISTS (SELECT 1 FROM running_averages WHERE date_str = ?)`,
          )
          .run(date, date);
        return result.changes > 0;
      },
      date,
    );
  }

  async averagesForDate(date: CalendarDate): Promise<MinuteRow[]> {
    assertDate("averagesForDate", date);
    return this.withConnection(
      "averagesForDate",
      (db) =>
        db
          .prepare<[string], MinuteRow>(
            `SELECT minute_of_day AS minuteOfDay, avg_sgv AS average
             FROM running_averages WHERE date_str = ? ORDER BY minute_of_day ASC`,
          )
          .all(date),
      date,
    );
  }

  async summary(): Promise<StoreSummary> {
    return this.withConnection("summary", (db) => {
      const row = db
        .prepare<[], SummaryRow>(
          `SELECT COUNT(DISTINCT date_str) AS days, COUNT(*) AS rowCount,
                  MIN(date_str) AS firstDate, MAX(date_str) AS latestDate
           FROM running_averages`,
        )
        .get();
      return {
        days: row?.days ?? 0,
        rows: row?.rowCount ?? 0,
        firstDate: row?.firstDate ?? null,
        latestDate: row?.latestDate ?? null,
      };
    });
  }

  private withConnection<T>(operation: StoreOperation, fn: (db: SqliteDatabase) => T, date?: CalendarDate): T {
    let db: SqliteDatabase | null = null;
    try {
      db = new Database(this.databaseFile);
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      return fn(db);
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(operation, errorMessage(error), { date, cause: error });
    } finally {
      db?.close();
    }
  }
}

function assertDate(operation: StoreOperation, date: string): void {
  if (!isCalendarDate(date)) {
    throw new StoreError(operation, `"${date}" is not a YYYY-MM-DD date`);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
