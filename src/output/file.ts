import path from "node:path";
import fs from "node:fs";
import { fetchTextFromUrl } from "../pipeline/index.js";
import type { PipelineOptions } from "../types.js";
import { ensureDir } from "../utils/fs.js";

/**
 * Fetch the transcript for `url` and write it to `outputFile`, replacing any
 * existing content. Returns `outputFile`.
 */
export async function saveTranscript(
  url: string,
  outputFile: string,
  options: PipelineOptions = {}
): Promise<string> {
  const text = await fetchTextFromUrl(url, options);
  ensureDir(path.dirname(outputFile));
  fs.writeFileSync(outputFile, text, "utf-8");
  return outputFile;
}
