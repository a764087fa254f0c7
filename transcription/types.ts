/**
 * Type definitions for the transcription service
 */

export type WhisperDevice = "cuda" | "cpu";

export type ComputeType = "float16" | "float32" | "int8" | "int8_float16";

/**
 * Decoding knobs handed to the engine on every call
 */
export interface DecodingOptions {
  /**
   * Language hint, or undefined to let the engine detect it
   */
  language?: string;

  /**
   * Voice-activity filtering before decoding
   */
  vadFilter: boolean;

  beamSize: number;

  /**
   * Internal chunk length in seconds; the engine default applies when unset
   */
  chunkLength?: number;

  /**
   * Segments more likely than this to be silence are dropped (0-1)
   */
  noSpeechThreshold: number;
}

/**
 * Represents a time-aligned segment returned by the engine
 */
export interface TranscriptionSegment {
  /**
   * Segment index in the transcription
   */
  index: number;

  /**
   * Start time in seconds
   */
  start: number;

  /**
   * End time in seconds
   */
  end: number;

  /**
   * Text content of this segment
   */
  text: string;
}

/**
 * Result of one engine call
 */
export interface EngineTranscription {
  /**
   * Ordered text segments
   */
  segments: TranscriptionSegment[];

  /**
   * Language the engine detected in the audio, when it reports one
   */
  language?: string;

  /**
   * Audio duration in seconds, when reported
   */
  duration?: number;
}

/**
 * Speech-to-text engine. Loaded once, then shared read-only by every file.
 */
export interface TranscriptionEngine {
  load(): Promise<void>;
  transcribeFile(filePath: string, options: DecodingOptions): Promise<EngineTranscription>;
}

/**
 * Text of one segment plus the language metadata passed through from the engine
 */
export interface SegmentTranscript {
  text: string;
  language?: string;
}
