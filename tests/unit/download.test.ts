import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { downloadVideo, PLACEHOLDER_VIDEO_BYTES, validateSourceUrl } from "../../src/pipeline/download.js";
import { InvalidInputError } from "../../src/errors.js";
import type { DownloadEngine } from "../../src/types.js";
import { FAKE_VIDEO, TIKTOK_URL, makeTempDir, removeDir, workingEngines } from "../helpers/fakes.js";

describe("downloadVideo", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    removeDir(tmp);
  });

  describe("URL validation", () => {
    it.each(["ftp://www.tiktok.com/@a/video/1", "", "www.tiktok.com/@a/video/1"])(
      "rejects %j as invalid_url before touching the filesystem",
      async (url) => {
        const outDir = path.join(tmp, "out");
        const { download } = workingEngines();

        await expect(downloadVideo(url, outDir, { engine: download })).rejects.toMatchObject({
          name: "InvalidInputError",
          reason: "invalid_url",
        });
        expect(fs.existsSync(outDir)).toBe(false);
        expect(download.download).not.toHaveBeenCalled();
      }
    );

    it("rejects URLs from other hosts as unsupported_host", async () => {
      const outDir = path.join(tmp, "out");

      const error = await downloadVideo("https://example.com/video/1", outDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ reason: "unsupported_host" });
      expect(fs.existsSync(outDir)).toBe(false);
    });

    it("checks the scheme before the host", () => {
      let caught: unknown;
      try {
        validateSourceUrl("ftp://example.com/x", "tiktok.com");
      } catch (e) {
        caught = e;
      }

      expect(caught).toMatchObject({ reason: "invalid_url" });
    });

    it("rejects non-string input", () => {
      expect(() => validateSourceUrl(42, "tiktok.com")).toThrow("Invalid URL: 42");
    });

    it("accepts a custom host marker", async () => {
      const { download } = workingEngines();

      const videoPath = await downloadVideo("https://platform.example/@u/v/1", tmp, {
        engine: download,
        hostMarker: "platform.example",
      });

      expect(videoPath).toBe(path.join(tmp, "video.mp4"));
    });
  });

  it("creates the output directory and downloads to video.mp4 inside it", async () => {
    const outDir = path.join(tmp, "nested", "dir");
    const { download } = workingEngines();

    const videoPath = await downloadVideo(TIKTOK_URL, outDir, { engine: download });

    expect(videoPath).toBe(path.join(outDir, "video.mp4"));
    expect(download.download).toHaveBeenCalledWith(TIKTOK_URL, videoPath);
    expect(fs.readFileSync(videoPath, "utf-8")).toBe(FAKE_VIDEO);
  });

  it("downloads into the current directory when the output directory is empty", async () => {
    const { download } = workingEngines();
    const cwd = process.cwd();
    process.chdir(tmp);

    try {
      const videoPath = await downloadVideo(TIKTOK_URL, "", { engine: download });

      expect(videoPath).toBe("video.mp4");
      expect(fs.readFileSync(path.join(tmp, "video.mp4"), "utf-8")).toBe(FAKE_VIDEO);
    } finally {
      process.chdir(cwd);
    }
  });

  it("writes the placeholder when the engine throws", async () => {
    const engine: DownloadEngine = {
      download: vi.fn(async () => {
        throw new Error("network unreachable");
      }),
    };

    const videoPath = await downloadVideo(TIKTOK_URL, tmp, { engine });

    expect(fs.readFileSync(videoPath)).toEqual(PLACEHOLDER_VIDEO_BYTES);
  });

  it("writes the placeholder when the engine produces no file", async () => {
    const engine: DownloadEngine = { download: vi.fn(async () => undefined) };

    const videoPath = await downloadVideo(TIKTOK_URL, tmp, { engine });

    expect(fs.readFileSync(videoPath)).toEqual(PLACEHOLDER_VIDEO_BYTES);
  });

  it("writes the placeholder when the engine leaves an empty file", async () => {
    const engine: DownloadEngine = {
      download: vi.fn(async (_url: string, destinationPath: string) => {
        fs.writeFileSync(destinationPath, "");
      }),
    };

    const videoPath = await downloadVideo(TIKTOK_URL, tmp, { engine });

    expect(fs.statSync(videoPath).size).toBe(PLACEHOLDER_VIDEO_BYTES.length);
  });

  it("overwrites a previous video in the same directory", async () => {
    fs.writeFileSync(path.join(tmp, "video.mp4"), "old run");
    const { download } = workingEngines();

    const videoPath = await downloadVideo(TIKTOK_URL, tmp, { engine: download });

    expect(fs.readFileSync(videoPath, "utf-8")).toBe(FAKE_VIDEO);
  });
});
