// Standalone "um"/"uh": no letter, digit or underscore on either side.
// An optional comma and any whitespace after the filler go with it.
const FILLER_PATTERN = /(?<![\p{L}\p{N}_])(?:um|uh)(?![\p{L}\p{N}_]),?\s*/giu;

// Trailing terminators, along with any spaces left between them ("wait. !")
const TRAILING_TERMINATORS = /[\s.!?]+$/u;

/**
 * Normalize raw transcript text: drop filler words, collapse whitespace and
 * remove trailing sentence punctuation. Idempotent.
 */
export function cleanText(text: string): string {
  if (!text || !text.trim()) {
    return "";
  }

  let cleaned = text.trim();
  cleaned = cleaned.replace(FILLER_PATTERN, "");
  cleaned = cleaned.replace(/\s+/g, " ");
  cleaned = cleaned.replace(TRAILING_TERMINATORS, "");
  return cleaned.trim();
}
