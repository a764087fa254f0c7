import path from "path";

import type { Env } from "./env";
import { ConfigError } from "./errors";
import type { ComputeType, DecodingOptions, WhisperDevice } from "./transcription/types";

export type DeleteOriginalScope = "none" | "matching" | "all";

export interface EngineConfig {
  readonly model: string;
  readonly device: WhisperDevice;
  readonly computeType: ComputeType;
  readonly baseUrl?: string;
  readonly apiKey: string;
}

export interface SegmentationConfig {
  readonly enabled: boolean;
  readonly segmentSeconds: number;
  /**
   * Files shorter than this (seconds) are transcribed unsplit
   */
  readonly minDurationSeconds: number;
  readonly deleteTempSegments: boolean;
  readonly ffmpegPath?: string;
  readonly ffprobePath?: string;
}

export interface DeleteOriginalPolicy {
  readonly scope: DeleteOriginalScope;
  /**
   * Extensions removed under the "matching" scope
   */
  readonly extensions: readonly string[];
}

/**
 * Immutable configuration shared by every pipeline component
 */
export interface TranscriptionConfig {
  readonly engine: EngineConfig;
  readonly decoding: Readonly<DecodingOptions>;
  readonly segmentation: SegmentationConfig;
  readonly inputDir: string;
  readonly outputDir: string;
  readonly supportedExtensions: readonly string[];
  readonly deleteOriginal: DeleteOriginalPolicy;
  /**
   * Placed between the text of consecutive segments
   */
  readonly joiner: string;
}

export const MEDIA_EXTENSIONS: readonly string[] = [
  ".mkv", ".mp4", ".mov", ".avi", ".webm", ".m4a", ".wav", ".mp3", ".flac", ".aac", ".ogg", ".wma",
];

/**
 * Upload formats the hosted OpenAI transcription API takes
 */
export const HOSTED_API_EXTENSIONS: readonly string[] = [
  ".flac", ".m4a", ".mp3", ".mp4", ".mpeg", ".mpga", ".oga", ".ogg", ".wav", ".webm",
];

const HOSTED_MEDIA_EXTENSIONS = MEDIA_EXTENSIONS.filter((ext) => HOSTED_API_EXTENSIONS.includes(ext));

export type ConfigOverrides = {
  [K in keyof TranscriptionConfig]?: TranscriptionConfig[K] extends string | readonly string[] ?
    TranscriptionConfig[K]
  : Partial<TranscriptionConfig[K]>;
};

export const DEFAULT_CONFIG: TranscriptionConfig = {
  engine: {
    model: "whisper-1",
    device: "cuda",
    computeType: "int8_float16",
    apiKey: "",
  },
  decoding: {
    language: "en",
    vadFilter: false,
    beamSize: 5,
    noSpeechThreshold: 0.6,
  },
  segmentation: {
    enabled: true,
    segmentSeconds: 300,
    minDurationSeconds: 420,
    deleteTempSegments: true,
  },
  inputDir: "video_files",
  outputDir: "transcripts",
  supportedExtensions: HOSTED_MEDIA_EXTENSIONS,
  deleteOriginal: { scope: "none", extensions: [".mkv"] },
  joiner: " ",
};

/**
 * Build the frozen configuration from validated environment values.
 *
 * Without WHISPER_BASE_URL the hosted API is used, so only the formats it
 * accepts are scanned for by default.
 *
 * @throws ConfigError when the hosted API is paired with formats it rejects
 */
export function configFromEnv(env: Env, cwd: string = process.cwd()): TranscriptionConfig {
  const hosted = env.WHISPER_BASE_URL === undefined;
  const supportedExtensions =
    env.SUPPORTED_EXTENSIONS ?? (hosted ? HOSTED_MEDIA_EXTENSIONS : MEDIA_EXTENSIONS);

  if (hosted) {
    const rejected = supportedExtensions.filter((ext) => !HOSTED_API_EXTENSIONS.includes(ext));
    if (rejected.length > 0) {
      throw new ConfigError(
        `The hosted Whisper API does not accept ${rejected.join(", ")} files; ` +
          "set WHISPER_BASE_URL to a compatible server or remove them from SUPPORTED_EXTENSIONS",
      );
    }
  }

  return createConfig({
    engine: {
      model: env.WHISPER_MODEL,
      device: env.WHISPER_DEVICE,
      computeType: env.WHISPER_COMPUTE_TYPE,
      baseUrl: env.WHISPER_BASE_URL,
      apiKey: env.OPENAI_API_KEY,
    },
    decoding: {
      language: env.TRANSCRIPTION_LANGUAGE === "auto" ? undefined : env.TRANSCRIPTION_LANGUAGE,
      vadFilter: env.VAD_FILTER,
      beamSize: env.BEAM_SIZE,
      chunkLength: env.CHUNK_LENGTH,
      noSpeechThreshold: env.NO_SPEECH_THRESHOLD,
    },
    segmentation: {
      enabled: env.SEGMENTATION_ENABLED,
      segmentSeconds: env.SEGMENT_SECONDS,
      minDurationSeconds: env.MIN_DURATION_TO_SEGMENT,
      deleteTempSegments: env.DELETE_TEMP_SEGMENTS,
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
    },
    inputDir: path.resolve(cwd, env.INPUT_DIR),
    outputDir: path.resolve(cwd, env.OUTPUT_DIR),
    supportedExtensions,
    deleteOriginal: {
      scope: env.DELETE_ORIGINAL,
      extensions: env.DELETE_ORIGINAL_EXTENSIONS,
    },
    joiner: env.TRANSCRIPT_JOINER,
  });
}

/**
 * Merge overrides onto the defaults and freeze the result
 */
export function createConfig(overrides: ConfigOverrides = {}): TranscriptionConfig {
  return Object.freeze({
    engine: Object.freeze({ ...DEFAULT_CONFIG.engine, ...overrides.engine }),
    decoding: Object.freeze({ ...DEFAULT_CONFIG.decoding, ...overrides.decoding }),
    segmentation: Object.freeze({ ...DEFAULT_CONFIG.segmentation, ...overrides.segmentation }),
    inputDir: overrides.inputDir ?? DEFAULT_CONFIG.inputDir,
    outputDir: overrides.outputDir ?? DEFAULT_CONFIG.outputDir,
    supportedExtensions: Object.freeze([
      ...(overrides.supportedExtensions ?? DEFAULT_CONFIG.supportedExtensions),
    ]),
    deleteOriginal: Object.freeze({
      scope: overrides.deleteOriginal?.scope ?? DEFAULT_CONFIG.deleteOriginal.scope,
      extensions: Object.freeze([
        ...(overrides.deleteOriginal?.extensions ?? DEFAULT_CONFIG.deleteOriginal.extensions),
      ]),
    }),
    joiner: overrides.joiner ?? DEFAULT_CONFIG.joiner,
  });
}
