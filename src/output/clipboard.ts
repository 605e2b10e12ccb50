import clipboard from "clipboardy";
import { fetchTextFromUrl } from "../pipeline/index.js";
import type { ClipboardIntegration, PipelineOptions } from "../types.js";
import { logger } from "../utils/logger.js";
import { attempt } from "../utils/result.js";

const log = logger.child({ stage: "clipboard" });

export class ClipboardyIntegration implements ClipboardIntegration {
  async copy(text: string): Promise<void> {
    await clipboard.write(text);
  }
}

export interface CopyOptions extends PipelineOptions {
  clipboard?: ClipboardIntegration;
}

/**
 * Fetch the transcript and put it on the system clipboard. A missing or
 * failing clipboard is ignored; the text is returned either way.
 */
export async function copyTranscript(url: string, options: CopyOptions = {}): Promise<string> {
  const text = await fetchTextFromUrl(url, options);
  const target = options.clipboard ?? new ClipboardyIntegration();

  const result = await attempt("clipboard", () => target.copy(text));
  if (!result.ok) {
    log.debug({ err: result.error.message }, "clipboard copy skipped");
  }
  return text;
}
