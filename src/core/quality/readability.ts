import type { ReadabilityLabel, ReadabilityRecord } from "../types";

const SENTENCE_TERMINATOR = /[.!?]/g;

/**
 * Words-per-sentence heuristic over prose only.
 *
 * `proseLines` must already exclude front-matter and fenced code. Sentences are counted as
 * terminal punctuation characters with a floor of one, so text without punctuation is a single
 * sentence rather than a division by zero.
 */
export function analyzeReadability(
  proseLines: readonly string[],
): ReadabilityRecord {
  const text = proseLines.join("\n");
  const words = text.split(/\s+/).filter((token) => token.length > 0).length;
  const terminators = text.match(SENTENCE_TERMINATOR)?.length ?? 0;
  const sentences = Math.max(1, terminators);
  const ratio = words / sentences;
  return {
    words,
    sentences,
    wordsPerSentence: Math.round(ratio * 100) / 100,
    label: readabilityLabel(ratio),
  };
}

export function readabilityLabel(wordsPerSentence: number): ReadabilityLabel {
  if (wordsPerSentence < 10) return "Simple";
  if (wordsPerSentence > 20) return "Complex";
  return "Good";
}
