import dotenv from "@dotenvx/dotenvx";
import * as v from "valibot";

import { ConfigError } from "./errors";

dotenv.config({ quiet: true });

const Flag = v.pipe(
  v.picklist(["true", "false", "1", "0", "yes", "no"]),
  v.transform((value) => value === "true" || value === "1" || value === "yes"),
);

const PositiveInteger = v.pipe(
  v.string(),
  v.transform(Number),
  v.number(),
  v.integer(),
  v.minValue(1),
);

const Probability = v.pipe(
  v.string(),
  v.transform(Number),
  v.number(),
  v.minValue(0),
  v.maxValue(1),
);

const ExtensionList = v.pipe(
  v.string(),
  v.transform((value) =>
    value
      .split(",")
      .map((ext) => ext.trim().toLowerCase())
      .filter((ext) => ext.length > 0)
      .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`)),
  ),
  v.minLength(1),
);

export const Env = v.looseObject({
  INPUT_DIR: v.optional(v.pipe(v.string(), v.minLength(1)), "video_files"),
  OUTPUT_DIR: v.optional(v.pipe(v.string(), v.minLength(1)), "transcripts"),

  OPENAI_API_KEY: v.pipe(v.string(), v.minLength(1)),
  WHISPER_BASE_URL: v.optional(v.pipe(v.string(), v.url())),
  WHISPER_MODEL: v.optional(v.pipe(v.string(), v.minLength(1)), "whisper-1"),
  WHISPER_DEVICE: v.optional(v.picklist(["cuda", "cpu"]), "cuda"),
  WHISPER_COMPUTE_TYPE: v.optional(
    v.picklist(["float16", "float32", "int8", "int8_float16"]),
    "int8_float16",
  ),

  TRANSCRIPTION_LANGUAGE: v.optional(v.pipe(v.string(), v.minLength(2)), "en"),
  VAD_FILTER: v.optional(Flag, "false"),
  BEAM_SIZE: v.optional(PositiveInteger, "5"),
  CHUNK_LENGTH: v.optional(PositiveInteger),
  NO_SPEECH_THRESHOLD: v.optional(Probability, "0.6"),

  SEGMENTATION_ENABLED: v.optional(Flag, "true"),
  SEGMENT_SECONDS: v.optional(PositiveInteger, "300"),
  MIN_DURATION_TO_SEGMENT: v.optional(PositiveInteger, "420"),
  DELETE_TEMP_SEGMENTS: v.optional(Flag, "true"),

  DELETE_ORIGINAL: v.optional(v.picklist(["none", "matching", "all"]), "none"),
  DELETE_ORIGINAL_EXTENSIONS: v.optional(ExtensionList, ".mkv"),
  // defaults depend on the engine, see configFromEnv
  SUPPORTED_EXTENSIONS: v.optional(ExtensionList),
  TRANSCRIPT_JOINER: v.optional(v.string(), " "),

  FFMPEG_PATH: v.optional(v.pipe(v.string(), v.minLength(1))),
  FFPROBE_PATH: v.optional(v.pipe(v.string(), v.minLength(1))),

  LOG_LEVEL: v.optional(
    v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: v.optional(Flag),
});

export type Env = v.InferOutput<typeof Env>;

/**
 * Parse and validate the process environment, .env included
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = v.safeParse(Env, source);
  if (!result.success) {
    const problems = result.issues
      .map((issue) => `${v.getDotPath(issue) ?? "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  return result.output;
}
