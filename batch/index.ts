/**
 * Batch Driver
 *
 * Loads the engine once, then runs every media file of the input folder
 * through the FileOrchestrator in order. A failing file is logged and
 * skipped; it never stops the batch.
 */
import type { TranscriptionConfig } from "../config";
import { errorMessage, PipelineError } from "../errors";
import log from "../log";
import {
  DurationProber,
  type DurationSource,
  type MediaFile,
  type MediaSegmenter,
  scanMediaFiles,
  Segmenter,
} from "../media";
import { SegmentTranscriber, type TranscriptionEngine } from "../transcription";
import { type FileOutcome, FileOrchestrator } from "./orchestrator";
import { formatElapsed } from "./timing";

export interface BatchCollaborators {
  engine: TranscriptionEngine;
  prober?: DurationSource;
  segmenter?: MediaSegmenter;
}

export interface FailedFile {
  file: MediaFile;
  code: string;
  error: string;
}

export interface BatchSummary {
  total: number;
  succeeded: FileOutcome[];
  failed: FailedFile[];
  elapsedMs: number;
}

/**
 * Transcribe every supported file under `config.inputDir`.
 *
 * @throws MissingInputError / NoMediaFoundError before the engine is loaded
 * @throws EngineLoadError when the engine cannot be loaded
 */
export async function runBatch(
  config: TranscriptionConfig,
  collaborators: BatchCollaborators,
): Promise<BatchSummary> {
  const startTime = Date.now();

  const files = await scanMediaFiles(config.inputDir, config.supportedExtensions);

  await collaborators.engine.load();

  const orchestrator = new FileOrchestrator(config, {
    prober: collaborators.prober ?? new DurationProber(config.segmentation),
    segmenter: collaborators.segmenter ?? new Segmenter(config.segmentation),
    transcriber: new SegmentTranscriber(collaborators.engine, config.decoding),
  });

  const succeeded: FileOutcome[] = [];
  const failed: FailedFile[] = [];

  for (const [index, file] of files.entries()) {
    const progress = `[${index + 1}/${files.length}]`;
    try {
      succeeded.push(await orchestrator.process(file, progress));
    } catch (error) {
      const code = error instanceof PipelineError ? error.code : "unexpected";
      log.error(`Error with '${file.name}': ${errorMessage(error)}`, { code });
      failed.push({ file, code, error: errorMessage(error) });
    }
  }

  const elapsedMs = Date.now() - startTime;
  log.info(`All done! ${succeeded.length}/${files.length} transcript(s) written in ${formatElapsed(elapsedMs)}`, {
    outputDir: config.outputDir,
    failed: failed.map((entry) => entry.file.name),
  });

  return { total: files.length, succeeded, failed, elapsedMs };
}
