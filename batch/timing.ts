import { intervalToDuration } from "date-fns";

/**
 * Wall-clock time spent in one named step, e.g. "transcribe segment 2/5"
 */
export interface TimingRecord {
  step: string;
  elapsedMs: number;
}

/**
 * Collects timing records for one file's processing
 */
export class StepTimer {
  readonly records: TimingRecord[] = [];
  private readonly startedAt = Date.now();

  /**
   * Run `fn` and record how long it took, whether it succeeds or throws
   */
  async time<T>(step: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      return await fn();
    } finally {
      this.records.push({ step, elapsedMs: Date.now() - start });
    }
  }

  /**
   * Elapsed time since the timer was created
   */
  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }
}

/**
 * Format milliseconds as H:MM:SS, whole seconds truncated
 */
export function formatElapsed(ms: number): string {
  const duration = intervalToDuration({ start: 0, end: Math.max(0, Math.floor(ms / 1000) * 1000) });
  const hours = (duration.days ?? 0) * 24 + (duration.hours ?? 0);
  const minutes = String(duration.minutes ?? 0).padStart(2, "0");
  const seconds = String(duration.seconds ?? 0).padStart(2, "0");
  return `${hours}:${minutes}:${seconds}`;
}
