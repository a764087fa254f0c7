import { formatElapsed, StepTimer } from "../batch/timing";

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

describe("StepTimer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T10:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("records each step and the total", async () => {
    const timer = new StepTimer();

    const value = await timer.time("transcribe segment 1/2", async () => {
      vi.advanceTimersByTime(1500);
      return "done";
    });
    await timer.time("transcribe segment 2/2", async () => {
      vi.advanceTimersByTime(250);
    });

    expect(value).toBe("done");
    expect(timer.records).toEqual([
      { step: "transcribe segment 1/2", elapsedMs: 1500 },
      { step: "transcribe segment 2/2", elapsedMs: 250 },
    ]);
    expect(timer.elapsedMs()).toBe(1750);
  });

  test("records a step that throws", async () => {
    const timer = new StepTimer();

    await expect(
      timer.time("write transcript", async () => {
        vi.advanceTimersByTime(40);
        throw new Error("disk full");
      }),
    ).rejects.toThrow("disk full");

    expect(timer.records).toEqual([{ step: "write transcript", elapsedMs: 40 }]);
  });
});

describe("formatElapsed", () => {
  test("formats as H:MM:SS", () => {
    expect(formatElapsed(0)).toBe("0:00:00");
    expect(formatElapsed(312_000)).toBe("0:05:12");
    expect(formatElapsed(3_725_000)).toBe("1:02:05");
  });

  test("truncates fractions of a second", () => {
    expect(formatElapsed(59_999)).toBe("0:00:59");
  });

  test("keeps counting hours past a day", () => {
    expect(formatElapsed(26 * 3600_000 + 61_000)).toBe("26:01:01");
  });
});
