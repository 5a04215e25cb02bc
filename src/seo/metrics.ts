import { countOccurrences, countWords } from "./nlp";
import type { ExtractedText, SeoMetrics } from "./types";

export const WORDS_PER_MINUTE = 200;

export function readingTimeMinutes(wordCount: number) {
  if (wordCount <= 0) return 0;
  return Math.ceil(wordCount / WORDS_PER_MINUTE);
}

// Percent, one decimal place. Rounded on the per-mille scale.
export function keywordDensityPercent(occurrences: number, wordCount: number) {
  if (wordCount <= 0 || occurrences <= 0) return 0;
  return Math.round((occurrences * 1000) / wordCount) / 10;
}

export function calculateMetrics(extracted: ExtractedText, primaryKeyword: string): SeoMetrics {
  const wordCount = countWords(extracted.plainText);
  const keyword = primaryKeyword.trim();
  const keywordOccurrences = keyword && wordCount ? countOccurrences(extracted.plainText, keyword) : 0;

  return {
    wordCount,
    readingTimeMinutes: readingTimeMinutes(wordCount),
    keywordOccurrences,
    keywordDensityPercent: keywordDensityPercent(keywordOccurrences, wordCount),
    headingCount: extracted.headings.length,
  };
}
