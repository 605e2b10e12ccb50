/**
 * Default engines: yt-dlp and ffmpeg invocations (process runner mocked),
 * the Whisper API client and the paste client (undici MockAgent).
 */

import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from "undici";

vi.mock("../../src/utils/process.js", () => ({ runCommand: vi.fn() }));

import { runCommand } from "../../src/utils/process.js";
import { YtDlpDownloadEngine, downloadVideo, PLACEHOLDER_VIDEO_BYTES } from "../../src/pipeline/download.js";
import { FfmpegMediaEngine } from "../../src/pipeline/extract.js";
import { WhisperApiSpeechEngine, transcribeAudio, PLACEHOLDER_TRANSCRIPT } from "../../src/pipeline/transcribe.js";
import { UndiciHttpClient } from "../../src/output/paste.js";
import { TIKTOK_URL, makeTempDir, removeDir } from "../helpers/fakes.js";

const runCommandMock = vi.mocked(runCommand);

describe("default engines", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = makeTempDir();
    runCommandMock.mockReset();
  });

  afterEach(() => {
    removeDir(tmp);
  });

  describe("YtDlpDownloadEngine", () => {
    it("asks yt-dlp for a single mp4 at the destination path", async () => {
      const dest = path.join(tmp, "video.mp4");
      runCommandMock.mockImplementation(async () => {
        fs.writeFileSync(dest, "mp4");
        return { stdout: "", stderr: "", exitCode: 0 };
      });

      await new YtDlpDownloadEngine("yt-dlp", 5000).download(TIKTOK_URL, dest);

      expect(runCommandMock).toHaveBeenCalledWith(
        "yt-dlp",
        ["--quiet", "--no-progress", "--no-playlist", "-f", "mp4", "-o", dest, TIKTOK_URL],
        { timeoutMs: 5000 }
      );
    });

    it("fails when yt-dlp exits cleanly without writing the file", async () => {
      runCommandMock.mockResolvedValue({ stdout: "", stderr: "", exitCode: 0 });

      await expect(
        new YtDlpDownloadEngine("yt-dlp", 5000).download(TIKTOK_URL, path.join(tmp, "video.mp4"))
      ).rejects.toThrow("yt-dlp did not produce the video file");
    });

    it("leaves a placeholder video when yt-dlp is missing", async () => {
      runCommandMock.mockRejectedValue(new Error("Command failed (yt-dlp): code=ENOENT"));

      const videoPath = await downloadVideo(TIKTOK_URL, tmp);

      expect(fs.readFileSync(videoPath)).toEqual(PLACEHOLDER_VIDEO_BYTES);
    });
  });

  describe("FfmpegMediaEngine", () => {
    it("converts to 16 kHz mono wav", async () => {
      runCommandMock.mockResolvedValue({ stdout: "", stderr: "", exitCode: 0 });

      await new FfmpegMediaEngine("/opt/ffmpeg", 7000).extractAudio("in/video.mp4", "in/video.wav");

      expect(runCommandMock).toHaveBeenCalledWith(
        "/opt/ffmpeg",
        ["-y", "-i", "in/video.mp4", "-vn", "-ac", "1", "-ar", "16000", "in/video.wav"],
        { timeoutMs: 7000 }
      );
    });
  });

  describe("HTTP engines", () => {
    let original: Dispatcher;
    let agent: MockAgent;

    beforeEach(() => {
      original = getGlobalDispatcher();
      agent = new MockAgent();
      agent.disableNetConnect();
      setGlobalDispatcher(agent);
    });

    afterEach(async () => {
      setGlobalDispatcher(original);
      await agent.close();
    });

    const writeAudio = (): string => {
      const audioPath = path.join(tmp, "video.wav");
      fs.writeFileSync(audioPath, "RIFF....WAVE");
      return audioPath;
    };

    it("returns the text of a transcription response", async () => {
      agent
        .get("http://asr.test")
        .intercept({ path: "/v1/audio/transcriptions", method: "POST" })
        .reply(200, { text: "hello from the clip", language: "en" });

      const engine = new WhisperApiSpeechEngine({
        baseUrl: "http://asr.test/v1/",
        model: "distil-large-v3",
        timeoutMs: 5000,
      });

      await expect(engine.recognize(writeAudio())).resolves.toBe("hello from the clip");
    });

    it("raises on a non-success status", async () => {
      agent
        .get("http://asr.test")
        .intercept({ path: "/v1/audio/transcriptions", method: "POST" })
        .reply(503, "model loading");

      const engine = new WhisperApiSpeechEngine({ baseUrl: "http://asr.test/v1", timeoutMs: 5000 });

      await expect(engine.recognize(writeAudio())).rejects.toThrow(
        "Transcription request failed: 503 model loading"
      );
    });

    it("falls back to the placeholder transcript when the service errors", async () => {
      agent
        .get("http://asr.test")
        .intercept({ path: "/v1/audio/transcriptions", method: "POST" })
        .reply(500, "boom");

      const engine = new WhisperApiSpeechEngine({ baseUrl: "http://asr.test/v1", timeoutMs: 5000 });

      await expect(transcribeAudio(writeAudio(), { engine })).resolves.toBe(PLACEHOLDER_TRANSCRIPT);
    });

    it("posts plain text to the paste service", async () => {
      agent
        .get("https://paste.test")
        .intercept({ path: "/", method: "POST" })
        .reply(201, "https://paste.test/Xy9\n");

      const res = await new UndiciHttpClient(5000).post("https://paste.test/", Buffer.from("this is a test", "utf-8"));

      expect(res).toEqual({ status: 201, body: "https://paste.test/Xy9\n" });
    });
  });
});
