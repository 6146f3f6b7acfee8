import { syllable } from "syllable";

export interface TextStatistics {
  fleschKincaidGrade: number;
  fleschReadingEase: number;
  gunningFog: number;
  sentenceCount: number;
}

const round1 = (value: number) => Math.round(value * 10) / 10;

function words(text: string): string[] {
  return text
    .replace(/[^\p{L}\p{N}\s'-]/gu, " ")
    .split(/\s+/)
    .filter((word) => /[\p{L}\p{N}]/u.test(word));
}

/**
 * Sentences are runs ending in `.`, `!` or `?`; fragments of two words or
 * fewer (abbreviations, list markers) are not counted. Always at least 1.
 */
export function countSentences(text: string): number {
  const sentences = text.match(/\b[^.!?]+[.!?]*/g) ?? [];
  const counted = sentences.filter((sentence) => words(sentence).length > 2);
  return Math.max(1, counted.length);
}

export function computeTextStatistics(text: string): TextStatistics {
  const tokens = words(text);
  const wordCount = Math.max(1, tokens.length);
  const sentenceCount = countSentences(text);

  let syllables = 0;
  let complexWords = 0;
  for (const token of tokens) {
    const count = syllable(token);
    syllables += count;
    if (count >= 3) complexWords++;
  }

  const wordsPerSentence = wordCount / sentenceCount;
  const syllablesPerWord = syllables / wordCount;

  return {
    fleschReadingEase: round1(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord),
    fleschKincaidGrade: round1(0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59),
    gunningFog: round1(0.4 * (wordsPerSentence + (100 * complexWords) / wordCount)),
    sentenceCount,
  };
}
