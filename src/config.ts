import "dotenv/config";
import { createRequire } from "node:module";
import { z } from "zod";
import {
  DEFAULT_PASTE_URL,
  DEFAULT_SOURCE_HOST_MARKER,
  DEFAULT_SPEECH_API_BASE_URL,
  DEFAULT_WHISPER_MODEL,
} from "./constants.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServiceConfig {
  ffmpegCmd: string;
  ytdlpCmd: string;
  downloadTimeoutMs: number;
  extractTimeoutMs: number;
  sourceHostMarker: string;
  // OpenAI-compatible transcription service
  speechApiBaseUrl: string; // e.g., http://localhost:5689/openai/v1
  speechApiKey?: string;
  speechModel: string;
  speechLanguage?: string; // hint, e.g. "en"
  speechTimeoutMs: number;
  pasteUrl: string;
  pasteTimeoutMs: number;
  logLevel: LogLevel;
}

// Unset and empty variables both fall back to the default
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const timeoutMs = (fallback: number) =>
  z.coerce.number().int().min(1000).default(fallback);

const EnvSchema = z.object({
  FFMPEG_CMD: optionalString,
  YTDLP_CMD: optionalString,
  DOWNLOAD_TIMEOUT_MS: timeoutMs(120000),
  EXTRACT_TIMEOUT_MS: timeoutMs(120000),
  SOURCE_HOST_MARKER: optionalString,
  SPEECH_API_BASE_URL: z.string().url().default(DEFAULT_SPEECH_API_BASE_URL),
  SPEECH_API_KEY: optionalString,
  SPEECH_MODEL: optionalString,
  SPEECH_LANGUAGE: optionalString,
  SPEECH_TIMEOUT_MS: timeoutMs(600000),
  PASTE_URL: z.string().url().default(DEFAULT_PASTE_URL),
  PASTE_TIMEOUT_MS: timeoutMs(30000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

const requireFromHere = createRequire(import.meta.url);

const FfmpegInstallerSchema = z.object({ path: z.string().min(1) });

function requireFfmpegInstaller(): unknown {
  return requireFromHere("@ffmpeg-installer/ffmpeg");
}

/**
 * Path of the ffmpeg binary bundled by `@ffmpeg-installer/ffmpeg`, or null
 * when the package or its platform binary is missing (it throws on load then).
 */
export function bundledFfmpegPath(load: () => unknown = requireFfmpegInstaller): string | null {
  try {
    return FfmpegInstallerSchema.parse(load()).path;
  } catch {
    return null;
  }
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  loadFfmpegInstaller: () => unknown = requireFfmpegInstaller
): ServiceConfig {
  // Blank numeric/url variables behave as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.parse(cleaned);

  return {
    ffmpegCmd: parsed.FFMPEG_CMD ?? bundledFfmpegPath(loadFfmpegInstaller) ?? "ffmpeg",
    ytdlpCmd: parsed.YTDLP_CMD ?? "yt-dlp",
    downloadTimeoutMs: parsed.DOWNLOAD_TIMEOUT_MS,
    extractTimeoutMs: parsed.EXTRACT_TIMEOUT_MS,
    sourceHostMarker: parsed.SOURCE_HOST_MARKER ?? DEFAULT_SOURCE_HOST_MARKER,
    speechApiBaseUrl: parsed.SPEECH_API_BASE_URL.replace(/\/+$/, ""),
    speechApiKey: parsed.SPEECH_API_KEY,
    speechModel: parsed.SPEECH_MODEL ?? DEFAULT_WHISPER_MODEL,
    speechLanguage: parsed.SPEECH_LANGUAGE,
    speechTimeoutMs: parsed.SPEECH_TIMEOUT_MS,
    pasteUrl: parsed.PASTE_URL,
    pasteTimeoutMs: parsed.PASTE_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
