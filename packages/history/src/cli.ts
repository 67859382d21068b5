import { Command, InvalidArgumentError } from "commander";
import {
  getModuleConfigPath,
  readConfig,
  requireUserToken,
  writeConfig,
  error as showError,
} from "@glucose-archive/shared";
import * as out from "@glucose-archive/shared/output";

import { dateInZone, formatMinuteOfDay, isCalendarDate } from "./calendar.js";
import { NightscoutSource, directionArrow, parseServerUrl } from "./providers/nightscout.js";
import { runCatchUp, runStep, runWatch } from "./runs.js";
import { BackfillScheduler, nextDueDay } from "./scheduler.js";
import {
  SETTINGS_MODULE,
  mergeSettings,
  parseStoredSettings,
  resolveSettings,
  type HistorySettings,
  type StoredSettings,
} from "./settings.js";
import { SqliteAggregateStore } from "./store.js";

const DEFAULT_WATCH_MINUTES = 5;

interface GlobalOptions {
  server?: string;
  credentialFile?: string;
  dbFile?: string;
  initialDaysBack?: number;
  timeZone?: string;
  timeout?: number;
}

// ── Option parsers ───────────────────────────────────────────────

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a whole number.");
  return n;
}

function positiveInt(value: string): number {
  const n = nonNegativeInt(value);
  if (n === 0) throw new InvalidArgumentError("Expected a number greater than zero.");
  return n;
}

// ── Wiring ───────────────────────────────────────────────────────

function overrides(): StoredSettings {
  const opts = program.opts<GlobalOptions>();
  return {
    server: opts.server,
    credentialFile: opts.credentialFile,
    dbFile: opts.dbFile,
    initialDaysBack: opts.initialDaysBack,
    timeZone: opts.timeZone,
    fetchTimeoutMs: opts.timeout,
  };
}

function storedSettings(): StoredSettings {
  return parseStoredSettings(readConfig(SETTINGS_MODULE), getModuleConfigPath(SETTINGS_MODULE));
}

function loadSettings(): HistorySettings {
  const settings = resolveSettings(storedSettings(), overrides());
  if (!settings.timeZoneConfigured) {
    out.warn(
      `No time zone configured; using this machine's zone (${settings.timeZone}) for day boundaries. ` +
        "Pin one with --time-zone or setup.",
    );
  }
  return settings;
}

async function openStore(settings: HistorySettings): Promise<SqliteAggregateStore> {
  const store = new SqliteAggregateStore({ databaseFile: settings.dbFile });
  await store.initialize();
  return store;
}

function createSource(settings: HistorySettings): NightscoutSource {
  if (!settings.server) {
    throw new Error("No Nightscout server configured. Run: glucose-history setup <server>");
  }
  return new NightscoutSource({
    baseUrl: parseServerUrl(settings.server),
    token: requireUserToken(settings.credentialFile ?? undefined),
    timeoutMs: settings.fetchTimeoutMs,
    pageSize: settings.pageSize,
    maxPages: settings.maxPages,
  });
}

async function createScheduler(): Promise<BackfillScheduler> {
  const settings = loadSettings();
  const source = createSource(settings);
  const store = await openStore(settings);
  return new BackfillScheduler({
    store,
    source,
    settings: { timeZone: settings.timeZone, initialBackfillDays: settings.initialDaysBack },
  });
}

// ── Program ──────────────────────────────────────────────────────

const program = new Command();
program
  .name("glucose-history")
  .description("Archive Nightscout glucose readings as per-minute daily averages")
  .version("0.1.0")
  .option("--server <url>", "Nightscout URL (e.g. https://example.herokuapp.com)")
  .option("--credential-file <path>", "JSON file containing the Nightscout user_token")
  .option("--db-file <path>", "SQLite database file")
  .option("--initial-days-back <days>", "Days to backfill when the archive is empty", nonNegativeInt)
  .option("--time-zone <zone>", "IANA time zone for day boundaries (e.g. Europe/London)")
  .option("--timeout <ms>", "Per-request fetch timeout in milliseconds", positiveInt);

program
  .command("setup <server>")
  .description("Save the Nightscout server and any global options given with it")
  .action((server: string) => {
    parseServerUrl(server);
    const merged = parseStoredSettings(
      mergeSettings(storedSettings(), { ...overrides(), server }),
      "setup arguments",
    );
    const path = writeConfig(SETTINGS_MODULE, merged);
    out.success(`Settings saved to ${path}.`);
    if (!merged.timeZone) out.info("Tip: pin a time zone with: glucose-history --time-zone <zone> setup <server>");
    out.info("Now run: glucose-history catch-up");
  });

program
  .command("catch-up")
  .description("Process every overdue day until the archive is current to yesterday")
  .action(async () => {
    process.exitCode = await runCatchUp(await createScheduler());
  });

program
  .command("step")
  .description("Process at most one overdue day (for cron-style schedulers)")
  .action(async () => {
    process.exitCode = await runStep(await createScheduler());
  });

program
  .command("watch")
  .description("Run step on a fixed cadence until interrupted")
  .option("--interval <minutes>", "Minutes between steps", positiveInt, DEFAULT_WATCH_MINUTES)
  .action(async (opts: { interval: number }) => {
    const scheduler = await createScheduler();
    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    out.info(`Stepping every ${opts.interval} minute(s). Ctrl-C to stop.`);
    const { runs, exitCode } = await runWatch(scheduler, opts.interval, controller.signal);
    out.info(`Stopped after ${runs} step(s).`);
    process.exitCode = exitCode;
  });

program
  .command("status")
  .description("Show the archive watermark and what is due next")
  .option("--json", "Print as JSON")
  .action(async (opts: { json?: boolean }) => {
    const settings = loadSettings();
    const store = await openStore(settings);
    const summary = await store.summary();
    const today = dateInZone(Date.now(), settings.timeZone);
    const due = nextDueDay(today, summary.latestDate, settings.initialDaysBack);

    if (opts.json) {
      out.json({ databaseFile: store.databaseFile, timeZone: settings.timeZone, ...summary, nextDue: due });
      return;
    }
    console.log(`Database:  ${store.databaseFile}`);
    console.log(`Time zone: ${settings.timeZone}`);
    console.log(`Days:      ${summary.days} (${summary.rows} minute rows)`);
    console.log(`Range:     ${summary.firstDate ?? "-"} .. ${summary.latestDate ?? "-"}`);
    console.log(`Next due:  ${due ?? `none (current up to yesterday)`}`);
  });

program
  .command("show <date>")
  .description("Print the stored per-minute averages for a day (YYYY-MM-DD)")
  .option("--json", "Print as JSON")
  .action(async (date: string, opts: { json?: boolean }) => {
    if (!isCalendarDate(date)) throw new Error(`Expected a YYYY-MM-DD date, got "${date}"`);
    const store = await openStore(loadSettings());
    const rows = await store.averagesForDate(date);

    if (opts.json) {
      out.json(rows);
      return;
    }
    if (rows.length === 0) {
      out.info(`Nothing stored for ${date}.`);
      return;
    }
    const [first] = rows;
    if (rows.length === 1 && first && first.minuteOfDay === 0 && first.average === 0) {
      out.info(`${date} was checked and had no readings.`);
      return;
    }

    out.heading(`${date}: ${rows.length} minutes`);
    out.table(
      ["Time", "mg/dL"],
      rows.map((r) => [formatMinuteOfDay(r.minuteOfDay), r.average]),
    );
  });

program
  .command("current")
  .description("Latest glucose reading from Nightscout")
  .action(async () => {
    const reading = await createSource(loadSettings()).latest();
    if (!reading) {
      out.info("No data available.");
      return;
    }
    const at = reading.dateString ?? new Date(reading.timestampMillis).toISOString();
    console.log(`${reading.value} mg/dL ${directionArrow(reading.direction)}`);
    console.log(`  at ${at}`);
  });

// ── Run ──────────────────────────────────────────────────────────

try {
  await program.parseAsync(process.argv);
} catch (e: unknown) {
  showError(e instanceof Error ? e.message : String(e));
  process.exit(1);
}
