import { isRepresentableTime, minuteOfDay } from "./calendar.js";
import type { RawSample } from "./types.js";

function isUsable(sample: RawSample): sample is { timestampMillis: number; value: number } {
  return (
    typeof sample.timestampMillis === "number" &&
    isRepresentableTime(sample.timestampMillis) &&
    typeof sample.value === "number" &&
    Number.isFinite(sample.value)
  );
}

/**
 * Reduce one day's samples to `minuteOfDay -> average`, bucketing on the wall
 * clock of `timeZone`. Samples missing a value or a timestamp, or with a
 * timestamp no `Date` can hold, are skipped.
 *
 * Averages are rounded with `Math.round` (half up, toward +Infinity), so a
 * mean of 110.5 is stored as 111.
 */
export function reduceToMinuteAverages(samples: readonly RawSample[], timeZone: string): Map<number, number> {
  const buckets = new Map<number, { sum: number; count: number }>();

  for (const sample of samples) {
    if (!isUsable(sample)) continue;
    const minute = minuteOfDay(sample.timestampMillis, timeZone);
    const bucket = buckets.get(minute);
    if (bucket) {
      bucket.sum += sample.value;
      bucket.count += 1;
    } else {
      buckets.set(minute, { sum: sample.value, count: 1 });
    }
  }

  const averages = new Map<number, number>();
  for (const [minute, { sum, count }] of [...buckets].sort(([a], [b]) => a - b)) {
    averages.set(minute, Math.round(sum / count));
  }
  return averages;
}
