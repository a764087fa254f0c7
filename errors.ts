/**
 * Error taxonomy for the transcription pipeline.
 *
 * Every error raised by the pipeline carries a stable `code` so the batch
 * driver and the CLI can tell fatal startup errors from per-file ones.
 */

export type PipelineErrorCode =
  | "missing_input"
  | "no_media_found"
  | "engine_load"
  | "invalid_config"
  | "segmentation_tool_unavailable"
  | "segmentation_failure"
  | "transcription_failure"
  | "cleanup_failure";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }

  /**
   * Errors that stop the run before any file is processed
   */
  get fatal(): boolean {
    return (
      this.code === "missing_input" ||
      this.code === "no_media_found" ||
      this.code === "engine_load" ||
      this.code === "invalid_config"
    );
  }
}

export class MissingInputError extends PipelineError {
  constructor(readonly directory: string) {
    super("missing_input", `Input folder '${directory}' does not exist`);
  }
}

export class NoMediaFoundError extends PipelineError {
  constructor(
    readonly directory: string,
    supportedExtensions: readonly string[],
  ) {
    const human = [...new Set(supportedExtensions.map((ext) => ext.replace(/^\./, "")))]
      .sort()
      .join(", ");
    super("no_media_found", `No supported files (${human}) in '${directory}'`);
  }
}

export class EngineLoadError extends PipelineError {
  constructor(model: string, cause: unknown) {
    super("engine_load", `Model load failed for '${model}': ${errorMessage(cause)}`, cause);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("invalid_config", message);
  }
}

export class SegmentationToolUnavailable extends PipelineError {
  constructor(cause: unknown) {
    super(
      "segmentation_tool_unavailable",
      `ffmpeg is not available for segmentation: ${errorMessage(cause)}`,
      cause,
    );
  }
}

export class SegmentationFailure extends PipelineError {
  constructor(source: string, cause: unknown) {
    super("segmentation_failure", `ffmpeg failed while segmenting '${source}': ${errorMessage(cause)}`, cause);
  }
}

export class TranscriptionFailure extends PipelineError {
  constructor(
    readonly segmentPath: string,
    cause: unknown,
  ) {
    super("transcription_failure", `Transcription failed for '${segmentPath}': ${errorMessage(cause)}`, cause);
  }
}

export class CleanupFailure extends PipelineError {
  constructor(
    readonly target: string,
    cause: unknown,
  ) {
    super("cleanup_failure", `Could not delete ${target}: ${errorMessage(cause)}`, cause);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
