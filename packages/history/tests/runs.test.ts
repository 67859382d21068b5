import { afterEach, describe, expect, it, vi } from "vitest";

import { SourceFetchError, StoreError } from "../src/errors.js";
import { describeDay, runCatchUp, runStep, runWatch, type RunOutput } from "../src/runs.js";
import type { BackfillScheduler, StepResult } from "../src/scheduler.js";

const fetchFailure = new SourceFetchError("2024-03-07", new Error("HTTP 503"));
const storeFailure = new StoreError("upsertMinuteAverages", "disk I/O error", { date: "2024-03-07" });

function recordingOutput() {
  return { heading: vi.fn(), success: vi.fn(), info: vi.fn(), blank: vi.fn() } satisfies RunOutput;
}

describe("describeDay", () => {
  it("names the stored minutes or the empty day", () => {
    expect(describeDay({ kind: "stored", date: "2024-03-06", minutes: 288 })).toBe("2024-03-06: 288 minutes");
    expect(describeDay({ kind: "empty", date: "2024-03-06", marked: true })).toBe("2024-03-06: no readings");
    expect(describeDay({ kind: "empty", date: "2024-03-06", marked: false })).toBe(
      "2024-03-06: no readings (already recorded)",
    );
  });
});

describe("runCatchUp", () => {
  it("exits 0 when a fetch fails and lists the days already done", async () => {
    const output = recordingOutput();
    const scheduler: Pick<BackfillScheduler, "catchUp"> = {
      catchUp: async () => ({
        processed: [{ kind: "stored", date: "2024-03-06", minutes: 12 }],
        failure: { date: "2024-03-07", error: fetchFailure },
      }),
    };

    expect(await runCatchUp(scheduler, output)).toBe(0);
    expect(output.heading).toHaveBeenCalledWith("Processed 1 day(s)");
    expect(output.info.mock.calls).toEqual([
      ["  2024-03-06: 12 minutes"],
      ["Stopped at 2024-03-07; the next run resumes from there."],
    ]);
  });

  it("exits 1 when the store fails", async () => {
    const scheduler: Pick<BackfillScheduler, "catchUp"> = {
      catchUp: async () => ({ processed: [], failure: { date: "2024-03-07", error: storeFailure } }),
    };

    expect(await runCatchUp(scheduler, recordingOutput())).toBe(1);
  });

  it("exits 0 when current", async () => {
    const scheduler: Pick<BackfillScheduler, "catchUp"> = {
      catchUp: async () => ({ processed: [], failure: null }),
    };

    expect(await runCatchUp(scheduler, recordingOutput())).toBe(0);
  });
});

describe("runStep", () => {
  const stepping = (result: StepResult): Pick<BackfillScheduler, "step"> => ({ step: async () => result });

  it("maps each outcome to an exit code", async () => {
    const output = recordingOutput();

    expect(await runStep(stepping({ status: "idle", caughtUpTo: "2024-03-19" }), output)).toBe(0);
    expect(
      await runStep(stepping({ status: "processed", day: { kind: "stored", date: "2024-03-06", minutes: 3 } }), output),
    ).toBe(0);
    expect(await runStep(stepping({ status: "failed", date: "2024-03-07", error: fetchFailure }), output)).toBe(0);
    expect(await runStep(stepping({ status: "failed", date: "2024-03-07", error: storeFailure }), output)).toBe(1);
    expect(output.success).toHaveBeenCalledTimes(1);
    expect(output.success).toHaveBeenCalledWith("2024-03-06: 3 minutes");
  });
});

describe("runWatch", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function scripted(results: StepResult[], controller: AbortController): Pick<BackfillScheduler, "step"> {
    let calls = 0;
    return {
      step: async () => {
        const result = results[calls] ?? { status: "idle", caughtUpTo: "2024-03-19" };
        calls += 1;
        if (calls === results.length) controller.abort();
        return result;
      },
    };
  }

  it("keeps stepping past failures and exits 1 after a store failure", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const controller = new AbortController();
    const scheduler = scripted(
      [
        { status: "failed", date: "2024-03-07", error: storeFailure },
        { status: "failed", date: "2024-03-07", error: fetchFailure },
        { status: "processed", day: { kind: "stored", date: "2024-03-07", minutes: 5 } },
      ],
      controller,
    );

    const done = runWatch(scheduler, 1, controller.signal, recordingOutput());
    await vi.advanceTimersByTimeAsync(3 * 60_000);

    await expect(done).resolves.toEqual({ runs: 3, exitCode: 1 });
  });

  it("exits 0 when only fetches failed", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const controller = new AbortController();
    const scheduler = scripted(
      [
        { status: "failed", date: "2024-03-07", error: fetchFailure },
        { status: "failed", date: "2024-03-07", error: fetchFailure },
      ],
      controller,
    );

    const done = runWatch(scheduler, 1, controller.signal, recordingOutput());
    await vi.advanceTimersByTimeAsync(2 * 60_000);

    await expect(done).resolves.toEqual({ runs: 2, exitCode: 0 });
  });
});
