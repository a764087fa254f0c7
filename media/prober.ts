/**
 * Duration Prober
 *
 * Reads a media container's duration with ffprobe. Duration only decides
 * whether a file gets segmented, so every failure maps to `undefined`.
 */
import ffmpeg from "fluent-ffmpeg";

import type { SegmentationConfig } from "../config";
import log from "../log";

/**
 * The subset of ffprobe output the prober reads
 */
export interface ProbeData {
  format?: { duration?: number | string };
  streams?: {
    codec_type?: string;
    duration?: number | string;
    duration_ts?: number | string;
    time_base?: string;
  }[];
}

export interface DurationSource {
  probeDuration(filePath: string): Promise<number | undefined>;
}

export class DurationProber implements DurationSource {
  private readonly ffprobePath?: string;

  constructor(config: Pick<SegmentationConfig, "ffprobePath"> = {}) {
    this.ffprobePath = config.ffprobePath;
  }

  /**
   * Duration in seconds, or undefined when it cannot be determined
   */
  probeDuration(filePath: string): Promise<number | undefined> {
    return new Promise((resolve) => {
      try {
        const command = ffmpeg(filePath);
        if (this.ffprobePath) command.setFfprobePath(this.ffprobePath);
        command.ffprobe((err: unknown, data: ProbeData) => {
          if (err) {
            log.debug(`Could not probe duration of ${filePath}`, {
              error: err instanceof Error ? err.message : String(err),
            });
            resolve(undefined);
            return;
          }
          resolve(extractDuration(data));
        });
      } catch (err) {
        log.debug(`Could not probe duration of ${filePath}`, {
          error: err instanceof Error ? err.message : String(err),
        });
        resolve(undefined);
      }
    });
  }
}

/**
 * Container duration, falling back to the first audio stream's
 * duration_ts × time_base, then to that stream's own duration.
 */
export function extractDuration(data: ProbeData | undefined): number | undefined {
  const declared = toSeconds(data?.format?.duration);
  if (declared !== undefined) return declared;

  const audio = data?.streams?.find((stream) => stream.codec_type === "audio");
  if (!audio) return undefined;

  const ticks = toSeconds(audio.duration_ts);
  const timeBase = parseTimeBase(audio.time_base);
  if (ticks !== undefined && timeBase !== undefined) {
    return (ticks * timeBase.numerator) / timeBase.denominator;
  }

  return toSeconds(audio.duration);
}

function toSeconds(value: number | string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

function parseTimeBase(
  value: string | undefined,
): { numerator: number; denominator: number } | undefined {
  const match = value?.match(/^(\d+)\/(\d+)$/);
  if (!match) return undefined;
  const numerator = Number(match[1]);
  const denominator = Number(match[2]);
  return denominator > 0 && numerator > 0 ? { numerator, denominator } : undefined;
}
