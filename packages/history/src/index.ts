export {
  addDays,
  dailyWindow,
  dateInZone,
  formatMinuteOfDay,
  isCalendarDate,
  isRepresentableTime,
  midnightMillis,
  minuteOfDay,
} from "./calendar.js";
export type { CalendarDate, DailyWindow } from "./calendar.js";
export { calculateNextDelay, runOnCadence } from "./cadence.js";
export { HistoryError, SettingsError, SourceFetchError, StoreError } from "./errors.js";
export type { StoreOperation } from "./errors.js";
export { NightscoutSource, directionArrow, parseServerUrl } from "./providers/nightscout.js";
export type { NightscoutSourceOptions } from "./providers/nightscout.js";
export { reduceToMinuteAverages } from "./reducer.js";
export { describeDay, exitCodeFor, runCatchUp, runStep, runWatch } from "./runs.js";
export type { RunOutput, WatchResult } from "./runs.js";
export { BackfillScheduler, nextDueDay, DEFAULT_INITIAL_BACKFILL_DAYS } from "./scheduler.js";
export type {
  BackfillSchedulerOptions,
  CatchUpResult,
  DayFailure,
  DayResult,
  SchedulerSettings,
  StepResult,
} from "./scheduler.js";
export { mergeSettings, parseStoredSettings, resolveSettings } from "./settings.js";
export type { HistorySettings, StoredSettings } from "./settings.js";
export { SqliteAggregateStore, DEFAULT_DATABASE_FILE } from "./store.js";
export type {
  AggregateStore,
  HistoryLogger,
  LatestReading,
  MinuteRow,
  RawSample,
  ReadingSource,
  StoreSummary,
} from "./types.js";
