/**
 * File Orchestrator
 *
 * Runs one media file through the pipeline:
 *
 *   probing → segmenting | skipped → transcribing → writing → cleaning_up → done
 *
 * with `failed` reachable from every non-terminal state. Segments are
 * transcribed one at a time, in order; the first failing segment fails the
 * whole file and nothing is written for it.
 */
import fs from "fs/promises";
import path from "path";

import type { TranscriptionConfig } from "../config";
import { CleanupFailure } from "../errors";
import log from "../log";
import type { DurationSource } from "../media/prober";
import { type MediaSegmenter, wholeFile } from "../media/segmenter";
import type { MediaFile, Segment } from "../media/types";
import type { SegmentTranscriberLike } from "../transcription";
import { formatElapsed, StepTimer, type TimingRecord } from "./timing";

export type FileState =
  | "probing"
  | "segmenting"
  | "skipped"
  | "transcribing"
  | "writing"
  | "cleaning_up"
  | "done"
  | "failed";

export interface OrchestratorCollaborators {
  prober: DurationSource;
  segmenter: MediaSegmenter;
  transcriber: SegmentTranscriberLike;
}

export interface FileOutcome {
  file: MediaFile;
  transcriptPath: string;
  /** Number of engine calls made for the file */
  segmentCount: number;
  segmented: boolean;
  durationSeconds?: number;
  detectedLanguage?: string;
  states: FileState[];
  timings: TimingRecord[];
  elapsedMs: number;
}

export interface SegmentationDecision {
  enabled: boolean;
  toolAvailable: boolean;
  durationSeconds?: number;
  minDurationSeconds: number;
}

/**
 * Segment only when it is enabled, ffmpeg is there, and the file is known
 * to be at least the threshold long
 */
export function shouldSegment(decision: SegmentationDecision): boolean {
  return (
    decision.enabled &&
    decision.toolAvailable &&
    decision.durationSeconds !== undefined &&
    decision.durationSeconds >= decision.minDurationSeconds
  );
}

/**
 * Join per-segment text in order, skipping segments that produced nothing
 */
export function joinTranscript(parts: readonly string[], joiner: string): string {
  return parts
    .filter((part) => part.length > 0)
    .join(joiner)
    .trim();
}

export function transcriptPathFor(file: MediaFile, outputDir: string): string {
  return path.join(outputDir, `transcript_${file.stem}.txt`);
}

export function segmentDirFor(file: MediaFile, outputDir: string): string {
  return path.join(outputDir, `${file.stem}_segs`);
}

export class FileOrchestrator {
  private readonly config: TranscriptionConfig;
  private readonly collaborators: OrchestratorCollaborators;

  constructor(config: TranscriptionConfig, collaborators: OrchestratorCollaborators) {
    this.config = config;
    this.collaborators = collaborators;
  }

  /**
   * Transcribe one file and write its transcript.
   *
   * @param progress Prefix for log lines, e.g. "[2/7]"
   * @throws TranscriptionFailure when any segment fails
   */
  async process(file: MediaFile, progress = "[1/1]"): Promise<FileOutcome> {
    const { prober, segmenter, transcriber } = this.collaborators;
    const timer = new StepTimer();
    const states: FileState[] = [];
    const enter = (state: FileState) => {
      states.push(state);
      log.debug(`${progress} ${file.name}: ${state}`);
    };

    log.info(`${progress} Transcribing: ${file.name}`);

    const transcriptPath = transcriptPathFor(file, this.config.outputDir);
    const segmentDir = segmentDirFor(file, this.config.outputDir);
    let segments: Segment[] = [];

    try {
      enter("probing");
      const durationSeconds = await timer.time("probe duration", () =>
        prober.probeDuration(file.path),
      );
      const toolAvailable = await segmenter.isAvailable();

      const split = shouldSegment({
        enabled: this.config.segmentation.enabled,
        toolAvailable,
        durationSeconds,
        minDurationSeconds: this.config.segmentation.minDurationSeconds,
      });

      if (split) {
        enter("segmenting");
        segments = await timer.time("segment", () => segmenter.segment(file, segmentDir));
      } else {
        enter("skipped");
        log.debug(`${progress} Segmentation skipped for ${file.name}`, {
          durationSeconds,
          toolAvailable,
        });
        segments = wholeFile(file);
      }

      enter("transcribing");
      const parts: string[] = [];
      let detectedLanguage: string | undefined;
      for (const segment of segments) {
        const step = `transcribe segment ${segment.index + 1}/${segments.length}`;
        if (segments.length > 1) {
          log.info(`${progress} [segment ${segment.index + 1}/${segments.length}] ${path.basename(segment.path)}`);
        }
        const result = await timer.time(step, () => transcriber.transcribeSegment(segment.path));
        parts.push(result.text);
        detectedLanguage ??= result.language;
      }

      const segmented = segments.some((segment) => segment.temporary);

      enter("writing");
      const text = joinTranscript(parts, this.config.joiner);
      await timer.time("write transcript", async () => {
        await fs.mkdir(this.config.outputDir, { recursive: true });
        await fs.writeFile(transcriptPath, `${text}\n`, "utf-8");
      });
      log.info(`✓ Transcript saved to: ${transcriptPath}`);

      enter("cleaning_up");
      await this.cleanupSegments(segments, segmentDir);
      segments = [];
      await this.deleteOriginal(file);

      enter("done");
      const elapsedMs = timer.elapsedMs();
      log.info(
        `Transcription took: ${formatElapsed(elapsedMs)} | detected language: ${detectedLanguage ?? "n/a"}`,
        { file: file.name, segments: parts.length },
      );

      return {
        file,
        transcriptPath,
        segmentCount: parts.length,
        segmented,
        durationSeconds,
        detectedLanguage,
        states,
        timings: timer.records,
        elapsedMs,
      };
    } catch (error) {
      enter("failed");
      await this.cleanupSegments(segments, segmentDir);
      throw error;
    }
  }

  /**
   * Remove temporary segments and their directory. Failures are logged and
   * never rethrown.
   */
  private async cleanupSegments(segments: readonly Segment[], segmentDir: string): Promise<void> {
    if (!this.config.segmentation.deleteTempSegments) return;

    const temporary = segments.filter((segment) => segment.temporary);
    if (temporary.length === 0) return;

    log.info("Cleaning up temporary files...");
    for (const segment of temporary) {
      try {
        await fs.unlink(segment.path);
        log.debug(`Deleted: ${path.basename(segment.path)}`);
      } catch (error) {
        if (isNotFound(error)) continue;
        const failure = new CleanupFailure(segment.path, error);
        log.warn(failure.message, { code: failure.code });
      }
    }

    try {
      await fs.rmdir(segmentDir);
    } catch (error) {
      if (!isNotFound(error)) {
        const failure = new CleanupFailure(segmentDir, error);
        log.warn(failure.message, { code: failure.code });
      }
    }
  }

  /**
   * Apply the delete-original policy after a successful transcript
   */
  private async deleteOriginal(file: MediaFile): Promise<void> {
    const { scope, extensions } = this.config.deleteOriginal;
    if (scope === "none") return;
    if (scope === "matching" && !extensions.includes(file.extension)) return;

    try {
      await fs.unlink(file.path);
      log.info(`Deleted: ${file.name}`);
    } catch (error) {
      const failure = new CleanupFailure(file.path, error);
      log.warn(failure.message, { code: failure.code });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
