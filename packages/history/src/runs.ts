import * as out from "@glucose-archive/shared/output";

import { runOnCadence } from "./cadence.js";
import { StoreError, type HistoryError } from "./errors.js";
import type { BackfillScheduler, DayResult } from "./scheduler.js";

/** Where run summaries go; the terminal helpers by default. */
export interface RunOutput {
  heading(text: string): void;
  success(text: string): void;
  info(text: string): void;
  blank(): void;
}

const terminal: RunOutput = {
  heading: out.heading,
  success: out.success,
  info: out.info,
  blank: out.blank,
};

/** Fetch failures are retried by the next run; store failures must fail the process. */
export function exitCodeFor(error: HistoryError): number {
  return error instanceof StoreError ? 1 : 0;
}

export function describeDay(day: DayResult): string {
  return day.kind === "stored"
    ? `${day.date}: ${day.minutes} minutes`
    : `${day.date}: no readings${day.marked ? "" : " (already recorded)"}`;
}

export async function runCatchUp(
  scheduler: Pick<BackfillScheduler, "catchUp">,
  output: RunOutput = terminal,
): Promise<number> {
  const { processed, failure } = await scheduler.catchUp();

  output.blank();
  output.heading(`Processed ${processed.length} day(s)`);
  for (const day of processed) output.info(`  ${describeDay(day)}`);
  if (!failure) return 0;

  output.info(`Stopped at ${failure.date}; the next run resumes from there.`);
  return exitCodeFor(failure.error);
}

export async function runStep(
  scheduler: Pick<BackfillScheduler, "step">,
  output: RunOutput = terminal,
): Promise<number> {
  const result = await scheduler.step();
  if (result.status === "processed") output.success(describeDay(result.day));
  return result.status === "failed" ? exitCodeFor(result.error) : 0;
}

export interface WatchResult {
  runs: number;
  exitCode: number;
}

/**
 * Step on a cadence until `signal` aborts. A failed step never ends the loop;
 * the exit code is 1 once any step hit a store failure.
 */
export async function runWatch(
  scheduler: Pick<BackfillScheduler, "step">,
  intervalMinutes: number,
  signal: AbortSignal,
  output: RunOutput = terminal,
): Promise<WatchResult> {
  let exitCode = 0;
  const runs = await runOnCadence(async () => {
    exitCode = Math.max(exitCode, await runStep(scheduler, output));
  }, intervalMinutes, signal);
  return { runs, exitCode };
}
