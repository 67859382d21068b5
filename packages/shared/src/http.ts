export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  /** Abort a request that has not answered within this many ms. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export type QueryParams = Record<string, string | number | undefined>;

const DEFAULT_TIMEOUT_MS = 15_000;

/** Non-success status, timeout or network failure. `status` is null when no response arrived. */
export class HttpError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpError";
    this.status = status;
  }
}

export class HttpClient {
  constructor(private opts: HttpOptions) {}

  url(path: string, params?: QueryParams): string {
    let url = `${this.opts.baseUrl.replace(/\/+$/, "")}${path}`;
    if (params) {
      const searchParams = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && value !== "") {
          searchParams.set(key, String(value));
        }
      }
      const qs = searchParams.toString();
      if (qs) url += `?${qs}`;
    }
    return url;
  }

  /** GET `path` and parse the JSON body; undefined for 204. */
  async get(path: string, params?: QueryParams): Promise<unknown> {
    const method = "GET";
    const url = this.url(path, params);

    const timeoutMs = this.opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const init: RequestInit = { method, headers: { ...this.opts.headers }, signal: controller.signal };

    const doFetch = this.opts.fetch ?? fetch;
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      let res: Response;
      try {
        res = await doFetch(url, init);
      } catch (e: unknown) {
        if (controller.signal.aborted) {
          throw new HttpError(`Timed out after ${timeoutMs}ms: ${method} ${path}`, null, { cause: e });
        }
        const reason = e instanceof Error ? e.message : String(e);
        throw new HttpError(`Network error ${method} ${path}: ${reason}`, null, { cause: e });
      }

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new HttpError(`HTTP ${res.status} ${method} ${path}: ${text}`, res.status);
      }

      if (res.status === 204) return undefined;

      try {
        return await res.json();
      } catch (e: unknown) {
        if (controller.signal.aborted) {
          throw new HttpError(`Timed out after ${timeoutMs}ms: ${method} ${path}`, null, { cause: e });
        }
        throw new HttpError(`Invalid JSON from ${method} ${path}`, res.status, { cause: e });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
