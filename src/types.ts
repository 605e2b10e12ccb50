/**
 * Capabilities the pipeline consumes. Each may throw on any failure;
 * callers decide whether that failure is absorbed.
 */

export interface DownloadEngine {
  download(url: string, destinationPath: string): Promise<void>;
}

export interface MediaEngine {
  extractAudio(videoPath: string, destinationPath: string): Promise<void>;
}

export interface SpeechEngine {
  recognize(audioPath: string): Promise<string>;
}

export interface ClipboardIntegration {
  copy(text: string): Promise<void>;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  post(url: string, body: Uint8Array): Promise<HttpResponse>;
}

export interface PipelineEngines {
  download: DownloadEngine;
  media: MediaEngine;
  speech: SpeechEngine;
}

export interface PipelineOptions {
  /** Scratch directory for this run's artifacts. Defaults to a fresh directory under the OS temp dir. */
  workDir?: string;
  /** Host marker a source URL must contain. Defaults to `SOURCE_HOST_MARKER` (tiktok.com). */
  hostMarker?: string;
  /** Engines to use instead of yt-dlp, ffmpeg and the Whisper API. Missing ones use the defaults. */
  engines?: Partial<PipelineEngines>;
}

export interface PipelineResult {
  workDir: string;
  videoPath: string;
  audioPath: string;
  rawText: string;
  text: string;
}
