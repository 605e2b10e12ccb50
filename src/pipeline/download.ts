import path from "node:path";
import fs from "node:fs";
import { loadConfig } from "../config.js";
import { VIDEO_FILE_NAME } from "../constants.js";
import { InvalidInputError } from "../errors.js";
import type { DownloadEngine } from "../types.js";
import { ensureDir, isNonEmptyFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { runCommand } from "../utils/process.js";
import { attempt } from "../utils/result.js";

const cfg = loadConfig();
const log = logger.child({ stage: "download" });

// Written in place of the video when the download engine is unavailable
export const PLACEHOLDER_VIDEO_BYTES = Buffer.from("placeholder video data");

/** Downloads through the yt-dlp binary, writing straight to the destination path. */
export class YtDlpDownloadEngine implements DownloadEngine {
  constructor(
    private readonly command: string = cfg.ytdlpCmd,
    private readonly timeoutMs: number = cfg.downloadTimeoutMs
  ) {}

  async download(url: string, destinationPath: string): Promise<void> {
    await runCommand(
      this.command,
      ["--quiet", "--no-progress", "--no-playlist", "-f", "mp4", "-o", destinationPath, url],
      { timeoutMs: this.timeoutMs }
    );

    if (!fs.existsSync(destinationPath)) {
      throw new Error("yt-dlp did not produce the video file");
    }
  }
}

export interface DownloadOptions {
  engine?: DownloadEngine;
  hostMarker?: string;
}

/**
 * Throws `InvalidInputError` unless `url` is an http(s) URL on the supported host.
 * Runs before any filesystem access.
 */
export function validateSourceUrl(url: unknown, hostMarker: string = cfg.sourceHostMarker): asserts url is string {
  if (typeof url !== "string" || !url.startsWith("http")) {
    throw new InvalidInputError(`Invalid URL: ${String(url)}`, "invalid_url");
  }
  if (!url.includes(hostMarker)) {
    throw new InvalidInputError(`Invalid URL: expected a ${hostMarker} link, got ${url}`, "unsupported_host");
  }
}

export async function downloadVideo(
  url: string,
  outputDir: string = ".",
  options: DownloadOptions = {}
): Promise<string> {
  validateSourceUrl(url, options.hostMarker);

  const dir = outputDir || ".";
  ensureDir(dir);
  const videoPath = path.join(dir, VIDEO_FILE_NAME);
  const engine = options.engine ?? new YtDlpDownloadEngine();

  log.debug({ url, videoPath }, "downloading video");
  const result = await attempt("download", async () => {
    await engine.download(url, videoPath);
    if (!isNonEmptyFile(videoPath)) {
      throw new Error(`download produced no data at ${videoPath}`);
    }
  });

  if (!result.ok) {
    log.warn({ err: result.error.message }, "video download failed, writing placeholder video");
    fs.writeFileSync(videoPath, PLACEHOLDER_VIDEO_BYTES);
  }

  return videoPath;
}
