import { z } from "zod";

import { isValidTimeZone, systemTimeZone } from "./calendar.js";
import { SettingsError } from "./errors.js";
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
} from "./providers/nightscout.js";
import { DEFAULT_INITIAL_BACKFILL_DAYS } from "./scheduler.js";
import { DEFAULT_DATABASE_FILE } from "./store.js";

/** Config module name: settings live in `<config dir>/history.json`. */
export const SETTINGS_MODULE = "history";

const timeZoneSchema = z
  .string()
  .trim()
  .min(1)
  .refine(isValidTimeZone, (zone) => ({ message: `Unknown time zone: ${zone}` }));

export const storedSettingsSchema = z
  .object({
    server: z.string().trim().min(1),
    dbFile: z.string().trim().min(1),
    credentialFile: z.string().trim().min(1),
    initialDaysBack: z.number().int().nonnegative(),
    timeZone: timeZoneSchema,
    fetchTimeoutMs: z.number().int().positive(),
    pageSize: z.number().int().positive(),
    maxPages: z.number().int().positive(),
  })
  .partial();

export type StoredSettings = z.infer<typeof storedSettingsSchema>;

export interface HistorySettings {
  server: string | null;
  dbFile: string;
  credentialFile: string | null;
  initialDaysBack: number;
  timeZone: string;
  /** False when the zone was taken from the machine rather than configured. */
  timeZoneConfigured: boolean;
  fetchTimeoutMs: number;
  pageSize: number;
  maxPages: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseStoredSettings(raw: unknown, source: string): StoredSettings {
  if (raw === null || raw === undefined) return {};
  const result = storedSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new SettingsError(`Invalid settings in ${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** `overrides` wins wherever it has a value; undefined keys keep the base value. */
export function mergeSettings(base: StoredSettings, overrides: StoredSettings): StoredSettings {
  return {
    server: overrides.server ?? base.server,
    dbFile: overrides.dbFile ?? base.dbFile,
    credentialFile: overrides.credentialFile ?? base.credentialFile,
    initialDaysBack: overrides.initialDaysBack ?? base.initialDaysBack,
    timeZone: overrides.timeZone ?? base.timeZone,
    fetchTimeoutMs: overrides.fetchTimeoutMs ?? base.fetchTimeoutMs,
    pageSize: overrides.pageSize ?? base.pageSize,
    maxPages: overrides.maxPages ?? base.maxPages,
  };
}

/**
 * Defaults, then the settings file, then command-line overrides.
 * The time zone falls back to the machine's zone, pinned here once.
 */
export function resolveSettings(
  stored: StoredSettings,
  overrides: StoredSettings,
  fallbackTimeZone: () => string = systemTimeZone,
): HistorySettings {
  const checked = parseStoredSettings(mergeSettings(stored, overrides), "command-line options");

  return {
    server: checked.server ?? null,
    dbFile: checked.dbFile ?? DEFAULT_DATABASE_FILE,
    credentialFile: checked.credentialFile ?? null,
    initialDaysBack: checked.initialDaysBack ?? DEFAULT_INITIAL_BACKFILL_DAYS,
    timeZone: checked.timeZone ?? fallbackTimeZone(),
    timeZoneConfigured: checked.timeZone !== undefined,
    fetchTimeoutMs: checked.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    pageSize: checked.pageSize ?? DEFAULT_PAGE_SIZE,
    maxPages: checked.maxPages ?? DEFAULT_MAX_PAGES,
  };
}
