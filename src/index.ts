export {
  runPipeline,
  fetchTextFromUrl,
  resolveEngines,
  createWorkDir,
  cleanText,
  downloadVideo,
  validateSourceUrl,
  extractAudio,
  audioPathFor,
  transcribeAudio,
  YtDlpDownloadEngine,
  FfmpegMediaEngine,
  WhisperApiSpeechEngine,
  PLACEHOLDER_VIDEO_BYTES,
  PLACEHOLDER_AUDIO_BYTES,
  PLACEHOLDER_TRANSCRIPT,
} from "./pipeline/index.js";
export { saveTranscript } from "./output/file.js";
export { copyTranscript, ClipboardyIntegration, type CopyOptions } from "./output/clipboard.js";
export { shareTranscript, UndiciHttpClient, type ShareOptions } from "./output/paste.js";
export { loadConfig, type ServiceConfig } from "./config.js";
export {
  PipelineError,
  InvalidInputError,
  NotFoundError,
  EngineError,
  type InvalidInputReason,
  type EngineName,
} from "./errors.js";
export type { Result } from "./utils/result.js";
export type * from "./types.js";
