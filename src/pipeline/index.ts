import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import { WORK_DIR_PREFIX } from "../constants.js";
import type { PipelineEngines, PipelineOptions, PipelineResult } from "../types.js";
import { logger } from "../utils/logger.js";
import { cleanText } from "./clean.js";
import { downloadVideo, validateSourceUrl, YtDlpDownloadEngine } from "./download.js";
import { extractAudio, FfmpegMediaEngine } from "./extract.js";
import { transcribeAudio, WhisperApiSpeechEngine } from "./transcribe.js";

const log = logger.child({ stage: "pipeline" });

/** Fill in yt-dlp, ffmpeg and the Whisper API for any engine not supplied. */
export function resolveEngines(overrides: Partial<PipelineEngines> = {}): PipelineEngines {
  return {
    download: overrides.download ?? new YtDlpDownloadEngine(),
    media: overrides.media ?? new FfmpegMediaEngine(),
    speech: overrides.speech ?? new WhisperApiSpeechEngine(),
  };
}

export function createWorkDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), WORK_DIR_PREFIX));
}

/**
 * fetch -> extract -> transcribe -> clean, each stage finishing before the
 * next starts. Input errors from any stage propagate unchanged.
 */
export async function runPipeline(url: string, options: PipelineOptions = {}): Promise<PipelineResult> {
  // Reject bad URLs before a scratch directory is created for them
  validateSourceUrl(url, options.hostMarker);

  // An empty string means "not supplied"
  const workDir = options.workDir || createWorkDir();
  const engines = resolveEngines(options.engines);
  log.debug({ url, workDir }, "pipeline started");

  const videoPath = await downloadVideo(url, workDir, {
    engine: engines.download,
    hostMarker: options.hostMarker,
  });
  const audioPath = await extractAudio(videoPath, { engine: engines.media });
  const rawText = await transcribeAudio(audioPath, { engine: engines.speech });
  const text = cleanText(rawText);

  log.debug({ workDir, chars: text.length }, "pipeline finished");
  return { workDir, videoPath, audioPath, rawText, text };
}

/** Cleaned transcript text for a video URL. */
export async function fetchTextFromUrl(url: string, options: PipelineOptions = {}): Promise<string> {
  const { text } = await runPipeline(url, options);
  return text;
}

export { cleanText } from "./clean.js";
export { downloadVideo, validateSourceUrl, YtDlpDownloadEngine, PLACEHOLDER_VIDEO_BYTES } from "./download.js";
export { extractAudio, audioPathFor, FfmpegMediaEngine, PLACEHOLDER_AUDIO_BYTES } from "./extract.js";
export { transcribeAudio, WhisperApiSpeechEngine, PLACEHOLDER_TRANSCRIPT } from "./transcribe.js";
