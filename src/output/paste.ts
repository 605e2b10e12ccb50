import { request } from "undici";
import { loadConfig } from "../config.js";
import { fetchTextFromUrl } from "../pipeline/index.js";
import type { HttpClient, HttpResponse, PipelineOptions } from "../types.js";
import { logger } from "../utils/logger.js";
import { attempt } from "../utils/result.js";

const cfg = loadConfig();
const log = logger.child({ stage: "share" });

export class UndiciHttpClient implements HttpClient {
  constructor(private readonly timeoutMs: number = cfg.pasteTimeoutMs) {}

  async post(url: string, body: Uint8Array): Promise<HttpResponse> {
    const res = await request(url, {
      method: "POST",
      headers: { "content-type": "text/plain; charset=utf-8" },
      body,
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });
    return { status: res.statusCode, body: await res.body.text() };
  }
}

export interface ShareOptions extends PipelineOptions {
  http?: HttpClient;
  /** Paste endpoint. Defaults to `PASTE_URL` (https://paste.rs). */
  pasteUrl?: string;
}

/**
 * Fetch the transcript and upload it to the paste service. Returns the
 * service's response (the paste URL) on HTTP 200, otherwise the transcript.
 */
export async function shareTranscript(url: string, options: ShareOptions = {}): Promise<string> {
  const text = await fetchTextFromUrl(url, options);
  const http = options.http ?? new UndiciHttpClient();
  const pasteUrl = options.pasteUrl ?? cfg.pasteUrl;

  const result = await attempt("http", async () => {
    const res = await http.post(pasteUrl, Buffer.from(text, "utf-8"));
    if (res.status !== 200) {
      throw new Error(`paste service responded ${res.status}`);
    }
    return res.body.trim();
  });

  if (!result.ok) {
    log.warn({ err: result.error.message, pasteUrl }, "publishing transcript failed, returning text");
    return text;
  }
  return result.value;
}
