/** Milliseconds until the next wall-clock multiple of `intervalMinutes`. */
export function calculateNextDelay(intervalMinutes: number, now: number = Date.now()): number {
  const intervalMs = intervalMinutes * 60 * 1000;
  const next = Math.ceil(now / intervalMs) * intervalMs;
  return Math.max(next - now, 0);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `task` on aligned interval boundaries until `signal` aborts. Runs never
 * overlap: the next delay is measured after the previous run settles.
 * Returns the number of completed runs.
 */
export async function runOnCadence(
  task: () => Promise<void>,
  intervalMinutes: number,
  signal: AbortSignal,
  now: () => number = Date.now,
): Promise<number> {
  if (!(intervalMinutes > 0)) {
    throw new RangeError(`Interval must be a positive number of minutes, got ${intervalMinutes}`);
  }

  const intervalMs = intervalMinutes * 60 * 1000;
  let runs = 0;
  while (!signal.aborted) {
    // On a boundary exactly, wait for the next one rather than re-running now.
    await sleep(calculateNextDelay(intervalMinutes, now()) || intervalMs, signal);
    if (signal.aborted) break;
    await task();
    runs += 1;
  }
  return runs;
}
