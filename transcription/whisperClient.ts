import fs from "fs";

import type { EngineConfig } from "../config";
import { EngineLoadError } from "../errors";
import log from "../log";
import type {
  DecodingOptions,
  EngineTranscription,
  TranscriptionEngine,
  TranscriptionSegment,
} from "./types";

import OpenAI from "openai";
import * as v from "valibot";

/**
 * faster-whisper drops a silent-looking segment only when decoding was
 * also unsure of it
 */
const LOG_PROB_THRESHOLD = -1;

const HOSTED_UPLOAD_LIMIT_MB = 25;

const VerboseTranscription = v.object({
  text: v.string(),
  language: v.optional(v.string()),
  duration: v.optional(v.number()),
  segments: v.optional(
    v.array(
      v.object({
        start: v.number(),
        end: v.number(),
        text: v.string(),
        avg_logprob: v.optional(v.number()),
        no_speech_prob: v.optional(v.number()),
      }),
    ),
  ),
});

export type VerboseTranscription = v.InferOutput<typeof VerboseTranscription>;

type VerboseSegment = NonNullable<VerboseTranscription["segments"]>[number];

/**
 * Extra multipart fields understood by faster-whisper servers
 */
interface DecodingFields {
  beam_size?: number;
  vad_filter?: boolean;
  chunk_length?: number;
  no_speech_threshold?: number;
  device?: string;
  compute_type?: string;
}

/**
 * Client for a Whisper transcription endpoint: the hosted OpenAI API, or any
 * OpenAI-compatible server selected with `baseUrl`.
 */
export class WhisperClient implements TranscriptionEngine {
  private client: OpenAI;
  private config: EngineConfig;

  /**
   * Create a new WhisperClient instance
   */
  constructor(config: EngineConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI API key is required");
    }

    this.config = config;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      // the pipeline never retries a failed transcription
      maxRetries: 0,
    });
  }

  /**
   * Check that the configured model is served by the endpoint
   */
  async load(): Promise<void> {
    const { model, device, computeType } = this.config;
    log.info(`Loading Whisper model '${model}' on ${device} (${computeType})`, {
      baseUrl: this.config.baseUrl,
    });

    try {
      await this.client.models.retrieve(model);
    } catch (error) {
      throw new EngineLoadError(model, error);
    }

    log.info("Model ready.", { model });
  }

  /**
   * Transcribe an audio or video file
   *
   * @param filePath Path to the media file
   * @param options Decoding knobs for this call
   * @returns Ordered text segments and the detected language
   */
  async transcribeFile(
    filePath: string,
    options: DecodingOptions,
  ): Promise<EngineTranscription> {
    const startTime = Date.now();

    if (!fs.existsSync(filePath)) {
      throw new Error(`Audio file not found: ${filePath}`);
    }

    const fileSize = fs.statSync(filePath).size;
    if (this.config.baseUrl === undefined && fileSize > HOSTED_UPLOAD_LIMIT_MB * 1024 * 1024) {
      throw new Error(
        `${filePath} is ${(fileSize / 1024 / 1024).toFixed(1)} MB; the hosted API accepts at most ${HOSTED_UPLOAD_LIMIT_MB} MB per upload`,
      );
    }
    log.debug("Starting transcription", {
      filePath,
      fileSize,
      model: this.config.model,
      language: options.language,
    });

    const fileStream = fs.createReadStream(filePath);

    try {
      const request = {
        file: fileStream,
        model: this.config.model,
        language: options.language,
        response_format: "verbose_json" as const,
        timestamp_granularities: ["segment" as const],
        temperature: 0,
        ...this.decodingFields(options),
      };
      const response: unknown = await this.client.audio.transcriptions.create(request);

      const processingTime = (Date.now() - startTime) / 1000;
      log.debug("Transcription completed", {
        filePath,
        processingTime,
      });

      return toEngineTranscription(
        v.parse(VerboseTranscription, response),
        options.noSpeechThreshold,
      );
    } catch (error) {
      log.debug("Error transcribing file", {
        filePath,
        error: error instanceof Error ? error.message : String(error),
        model: this.config.model,
      });
      throw error;
    } finally {
      fileStream.destroy();
    }
  }

  /**
   * faster-whisper servers read the decoding knobs as extra form fields.
   * The hosted API only gets the fields it documents.
   */
  private decodingFields(options: DecodingOptions): DecodingFields {
    if (!this.config.baseUrl) return {};

    const fields: DecodingFields = {
      beam_size: options.beamSize,
      vad_filter: options.vadFilter,
      no_speech_threshold: options.noSpeechThreshold,
      device: this.config.device,
      compute_type: this.config.computeType,
    };
    if (options.chunkLength !== undefined) fields.chunk_length = options.chunkLength;
    return fields;
  }
}

/**
 * Normalize a verbose_json response: drop segments judged to be silence and
 * turn a segment-less response into a single segment.
 */
export function toEngineTranscription(
  response: VerboseTranscription,
  noSpeechThreshold: number,
): EngineTranscription {
  const raw: VerboseSegment[] = response.segments ?? [
    { start: 0, end: response.duration ?? 0, text: response.text },
  ];

  const segments: TranscriptionSegment[] = raw
    .filter((segment) => !isSilence(segment, noSpeechThreshold))
    .map((segment, index) => ({
      index,
      start: segment.start,
      end: segment.end,
      text: segment.text,
    }));

  return {
    segments,
    language: response.language,
    duration: response.duration,
  };
}

function isSilence(segment: VerboseSegment, threshold: number): boolean {
  if (segment.no_speech_prob === undefined || segment.no_speech_prob <= threshold) {
    return false;
  }
  return segment.avg_logprob === undefined || segment.avg_logprob < LOG_PROB_THRESHOLD;
}
