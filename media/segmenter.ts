/**
 * Segmenter Module
 *
 * Splits a media file into time-bounded pieces with ffmpeg's segment muxer.
 * Segments are stream copies of the first audio track; nothing is re-encoded.
 */
import ffmpeg from "fluent-ffmpeg";
import fs from "fs/promises";
import path from "path";

import type { SegmentationConfig } from "../config";
import { SegmentationFailure, SegmentationToolUnavailable } from "../errors";
import log from "../log";
import type { MediaFile, Segment } from "./types";

export interface MediaSegmenter {
  isAvailable(): Promise<boolean>;
  segment(source: MediaFile, outputDir: string): Promise<Segment[]>;
}

/**
 * The unsplit fallback: the source itself as the only segment
 */
export function wholeFile(source: MediaFile): Segment[] {
  return [{ path: source.path, index: 0, temporary: false }];
}

export class Segmenter implements MediaSegmenter {
  private readonly config: SegmentationConfig;
  private availability?: Promise<boolean>;

  constructor(config: SegmentationConfig) {
    this.config = config;
  }

  /**
   * Whether segmentation is enabled and ffmpeg can be run. The check runs
   * once per instance.
   */
  isAvailable(): Promise<boolean> {
    if (!this.config.enabled) return Promise.resolve(false);
    this.availability ??= this.checkTool();
    return this.availability;
  }

  /**
   * Split `source` into `<outputDir>/<stem>_NNN<ext>` files of at most
   * `segmentSeconds` each. Falls back to the unsplit source when ffmpeg is
   * unavailable, fails, or produces nothing.
   */
  async segment(source: MediaFile, outputDir: string): Promise<Segment[]> {
    if (!(await this.isAvailable())) return wholeFile(source);

    // leftovers from an earlier run must not mix with this run's segments
    await fs.rm(outputDir, { recursive: true, force: true });
    await fs.mkdir(outputDir, { recursive: true });
    // ffmpeg expands printf-style tokens in the output name
    const pattern = path.join(
      outputDir,
      `${source.stem.replaceAll("%", "%%")}_%03d${source.extension}`,
    );

    log.info(`Splitting into segments: ${source.name}`, {
      segmentSeconds: this.config.segmentSeconds,
      outputDir,
    });

    try {
      await this.runSegmentMuxer(source.path, pattern);
    } catch (err) {
      const failure = new SegmentationFailure(source.name, err);
      log.warn(`${failure.message}; transcribing the whole file instead`, {
        code: failure.code,
      });
      await fs.rm(outputDir, { recursive: true, force: true });
      return wholeFile(source);
    }

    const names = (await fs.readdir(outputDir))
      .map((name) => ({ name, ordinal: segmentOrdinal(name, source) }))
      .filter((entry): entry is { name: string; ordinal: number } => entry.ordinal !== undefined)
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((entry) => entry.name);

    if (names.length === 0) {
      log.warn(`No segments produced for '${source.name}'; transcribing the whole file instead`);
      await fs.rm(outputDir, { recursive: true, force: true });
      return wholeFile(source);
    }

    log.info(`Created ${names.length} segment(s) for ${source.name}`);
    return names.map((name, index) => ({
      path: path.join(outputDir, name),
      index,
      temporary: true,
    }));
  }

  private checkTool(): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const command = ffmpeg();
      if (this.config.ffmpegPath) command.setFfmpegPath(this.config.ffmpegPath);
      command.getAvailableFormats((err) => {
        if (err) {
          const unavailable = new SegmentationToolUnavailable(err);
          log.warn(`${unavailable.message}; files will be transcribed unsplit`, {
            code: unavailable.code,
          });
          resolve(false);
          return;
        }
        resolve(true);
      });
    });
  }

  private runSegmentMuxer(inputPath: string, outputPattern: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const command = ffmpeg(inputPath);
      if (this.config.ffmpegPath) command.setFfmpegPath(this.config.ffmpegPath);

      command
        .outputOptions([
          "-map",
          "0:a:0",
          "-c",
          "copy",
          "-f",
          "segment",
          "-segment_time",
          String(this.config.segmentSeconds),
          "-reset_timestamps",
          "1",
        ])
        .output(outputPattern)
        .on("start", (commandLine: string) => {
          log.debug(`Segmentation started: ${commandLine}`);
        })
        .on("end", () => {
          resolve();
        })
        .on("error", (err: Error) => {
          reject(err);
        })
        .run();
    });
  }
}

/**
 * The segment number in `<stem>_NNN<ext>`. ffmpeg widens the number past
 * 999, so ordering is numeric rather than by name.
 */
function segmentOrdinal(name: string, source: MediaFile): number | undefined {
  const prefix = `${source.stem}_`;
  if (!name.startsWith(prefix) || !name.endsWith(source.extension)) return undefined;
  const digits = name.slice(prefix.length, name.length - source.extension.length);
  return /^\d+$/.test(digits) ? Number(digits) : undefined;
}
