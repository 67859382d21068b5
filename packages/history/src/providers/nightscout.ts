import { z } from "zod";
import { HttpClient, type FetchLike } from "@glucose-archive/shared";

import { MAX_EPOCH_MS, type DailyWindow } from "../calendar.js";
import type { LatestReading, RawSample, ReadingSource } from "../types.js";

const ENTRIES_PATH = "/api/v1/entries.json";

export const DEFAULT_PAGE_SIZE = 300;
export const DEFAULT_MAX_PAGES = 10;
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

export interface NightscoutSourceOptions {
  /** Base URL as returned by `parseServerUrl`. */
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  pageSize?: number;
  maxPages?: number;
  fetch?: FetchLike;
}

// ── Raw API types ────────────────────────────────────────────────

// Fields are checked one by one: a record with a bad `sgv` still parses and
// is dropped later by the reducer instead of failing the whole page.
const rawEntrySchema = z.object({
  _id: z.string().nullish().catch(null),
  date: z.number().min(-MAX_EPOCH_MS).max(MAX_EPOCH_MS).nullish().catch(null),
  sgv: z.number().finite().nullish().catch(null),
  dateString: z.string().nullish().catch(null),
  direction: z.string().nullish().catch(null),
});

type RawEntry = z.infer<typeof rawEntrySchema>;

const rawEntriesSchema = z.array(z.unknown());

const EMPTY_ENTRY: RawEntry = { _id: null, date: null, sgv: null, dateString: null, direction: null };

// ── Helpers ──────────────────────────────────────────────────────

/**
 * Normalise `https://host[:port]`, `host:port` or a bare `host` to a base URL.
 * Without a scheme the server is assumed to speak plain http.
 */
export function parseServerUrl(urlOrHost: string): string {
  const input = urlOrHost.trim();
  if (input.startsWith("http://") || input.startsWith("https://")) {
    const url = new URL(input);
    const port = url.port || (url.protocol === "https:" ? "443" : "80");
    return `${url.protocol}//${url.hostname}:${port}`;
  }

  const [host, port, ...rest] = input.split(":");
  if (!host || rest.length > 0) {
    throw new Error(`Invalid Nightscout server: ${urlOrHost}`);
  }
  if (port === undefined) return `http://${host}:80`;
  if (!/^\d+$/.test(port) || Number(port) < 1 || Number(port) > 65535) {
    throw new Error(`Invalid port in Nightscout server: ${urlOrHost}`);
  }
  return `http://${host}:${Number(port)}`;
}

function parseEntries(body: unknown): RawEntry[] {
  const list = rawEntriesSchema.safeParse(body);
  if (!list.success) {
    throw new Error("Unexpected response shape from Nightscout: not an array");
  }
  return list.data.map((item) => {
    const entry = rawEntrySchema.safeParse(item);
    return entry.success ? entry.data : EMPTY_ENTRY;
  });
}

const DIRECTION_ARROWS: Record<string, string> = {
  DoubleUp: "↑↑",
  SingleUp: "↑",
  FortyFiveUp: "↗",
  Flat: "→",
  FortyFiveDown: "↘",
  SingleDown: "↓",
  DoubleDown: "↓↓",
};

/** Trend arrow for a Nightscout `direction`; "?" for anything not computable. */
export function directionArrow(direction: string | null): string {
  return (direction && DIRECTION_ARROWS[direction]) || "?";
}

// Identifies an entry across overlapping pages. Uploads without an `_id` fall
// back to their reading, so exact duplicates of one reading count once.
function entryKey(entry: RawEntry): string {
  return entry._id ?? `${entry.date}:${entry.sgv}:${entry.dateString}`;
}

function toSample(entry: RawEntry): RawSample {
  return { timestampMillis: entry.date ?? null, value: entry.sgv ?? null };
}

// ── Provider ─────────────────────────────────────────────────────

export class NightscoutSource implements ReadingSource {
  readonly name = "nightscout";
  private readonly http: HttpClient;
  private readonly pageSize: number;
  private readonly maxPages: number;

  constructor(options: NightscoutSourceOptions) {
    this.http = new HttpClient({
      baseUrl: options.baseUrl,
      headers: { "api-secret": options.token },
      timeoutMs: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      fetch: options.fetch,
    });
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  /**
   * Entries come back newest first. A full page means there may be more, so
   * the next request asks for everything at or below the oldest timestamp
   * seen. Entries at that timestamp already collected come back again, so the
   * request widens `count` by their number and drops them.
   *
   * Rejects rather than return a partial day when the window needs more than
   * `maxPages` requests.
   */
  async fetchRange(window: DailyWindow): Promise<RawSample[]> {
    const samples: RawSample[] = [];
    let boundary: { date: number; seen: Set<string> } | null = null;

    for (let page = 0; page < this.maxPages; page += 1) {
      const count = this.pageSize + (boundary?.seen.size ?? 0);
      const params: Record<string, number> = { "find[date][$gte]": window.startMillis, count };
      if (boundary) params["find[date][$lte]"] = boundary.date;
      else params["find[date][$lt]"] = window.endMillis;

      const entries = await this.entries(params);
      const current: { date: number; seen: Set<string> } | null = boundary;
      const fresh = current
        ? entries.filter((e) => e.date !== current.date || !current.seen.has(entryKey(e)))
        : entries;
      samples.push(...fresh.map(toSample));
      if (entries.length < count) return samples;

      const dates = entries.flatMap((e) => (typeof e.date === "number" ? [e.date] : []));
      if (dates.length === 0) {
        throw new Error(`Cannot page Nightscout entries for ${window.date}: a full page carried no dates`);
      }
      const oldest = Math.min(...dates);
      const next: { date: number; seen: Set<string> } = current && current.date === oldest ? current : { date: oldest, seen: new Set<string>() };
      for (const entry of entries) {
        if (entry.date === oldest) next.seen.add(entryKey(entry));
      }
      boundary = next;
    }

    throw new Error(
      `Nightscout has more than ${this.maxPages} pages of ${this.pageSize} entries for ${window.date}; raise maxPages`,
    );
  }

  async latest(): Promise<LatestReading | null> {
    const [entry] = await this.entries({ count: 1 });
    if (!entry || typeof entry.sgv !== "number" || typeof entry.date !== "number") return null;
    return {
      value: entry.sgv,
      timestampMillis: entry.date,
      dateString: entry.dateString ?? null,
      direction: entry.direction ?? null,
    };
  }

  private async entries(params: Record<string, number>): Promise<RawEntry[]> {
    return parseEntries(await this.http.get(ENTRIES_PATH, params));
  }
}
