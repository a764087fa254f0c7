import { TranscriptionFailure } from "../errors";
import log from "../log";
import type {
  DecodingOptions,
  EngineTranscription,
  SegmentTranscript,
  TranscriptionEngine,
} from "./types";

export type * from "./types";
export { WhisperClient } from "./whisperClient";

export interface SegmentTranscriberLike {
  transcribeSegment(segmentPath: string): Promise<SegmentTranscript>;
}

/**
 * Runs the engine over one segment and flattens its output to text.
 * No retries: the first engine error fails the segment.
 */
export class SegmentTranscriber implements SegmentTranscriberLike {
  private readonly engine: TranscriptionEngine;
  private readonly decoding: DecodingOptions;

  constructor(engine: TranscriptionEngine, decoding: DecodingOptions) {
    this.engine = engine;
    this.decoding = decoding;
  }

  /**
   * @throws TranscriptionFailure when the engine raises
   */
  async transcribeSegment(segmentPath: string): Promise<SegmentTranscript> {
    let result: EngineTranscription;
    try {
      result = await this.engine.transcribeFile(segmentPath, this.decoding);
    } catch (error) {
      throw new TranscriptionFailure(segmentPath, error);
    }

    const text = result.segments
      .map((segment) => segment.text)
      .join("")
      .trim();

    log.debug("Segment transcribed", {
      segmentPath,
      segments: result.segments.length,
      characters: text.length,
      language: result.language,
    });

    return { text, language: result.language };
  }
}
