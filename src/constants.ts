/**
 * Defaults shared across the pipeline stages and the CLI.
 * Per-stage placeholder values live next to the stage that writes them.
 */

// Host marker a source URL must contain to be accepted
export const DEFAULT_SOURCE_HOST_MARKER = "tiktok.com";

export const VIDEO_FILE_NAME = "video.mp4";
export const VIDEO_EXTENSION = ".mp4";
export const AUDIO_EXTENSION = ".wav";

export const SUPPORTED_AUDIO_EXTENSIONS = [".wav", ".mp3"] as const;

export type AudioExtension = (typeof SUPPORTED_AUDIO_EXTENSIONS)[number];

export function isSupportedAudioExtension(ext: string): ext is AudioExtension {
  return SUPPORTED_AUDIO_EXTENSIONS.some((supported) => supported === ext);
}

// Default model for the OpenAI-compatible transcription endpoint
export const DEFAULT_WHISPER_MODEL = "distil-large-v3";

export const DEFAULT_SPEECH_API_BASE_URL = "http://localhost:5689/openai/v1";

export const DEFAULT_PASTE_URL = "https://paste.rs";

export const WORK_DIR_PREFIX = "clipscribe-";
