import type { CheckResult, DuplicateContentData, DuplicateGroup } from "@shared/audit-types";
import type { PageRecord } from "./types";
import { BOILERPLATE_SELECTORS, extractText } from "./extractor";
import stopWordList from "./data/stop-words.json";

const STOP_WORDS = new Set<string>(stopWordList);
const MAX_FEATURES = 1000;
const MIN_TEXT_LENGTH = 100;

type Vector = Map<string, number>;

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/\b\w\w+\b/g) ?? []).filter((token) => !STOP_WORDS.has(token));
}

/** L2-normalized TF-IDF vectors with smoothed idf, limited to the most frequent terms. */
export function buildTfidfVectors(documents: string[]): Vector[] {
  const tokenized = documents.map(tokenize);

  const corpusFrequency = new Map<string, number>();
  const documentFrequency = new Map<string, number>();
  for (const tokens of tokenized) {
    for (const token of tokens) {
      corpusFrequency.set(token, (corpusFrequency.get(token) ?? 0) + 1);
    }
    for (const token of new Set(tokens)) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }
  }

  const vocabulary = new Set(
    Array.from(corpusFrequency.entries())
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, MAX_FEATURES)
      .map(([term]) => term)
  );

  const n = documents.length;
  return tokenized.map((tokens) => {
    const vector: Vector = new Map();
    for (const token of tokens) {
      if (vocabulary.has(token)) vector.set(token, (vector.get(token) ?? 0) + 1);
    }

    let norm = 0;
    for (const [term, tf] of vector) {
      const idf = Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1;
      const weight = tf * idf;
      vector.set(term, weight);
      norm += weight * weight;
    }

    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (const [term, weight] of vector) vector.set(term, weight / norm);
    }
    return vector;
  });
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  let dot = 0;
  for (const [term, weight] of a) {
    dot += weight * (b.get(term) ?? 0);
  }
  return dot;
}

export function detectDuplicateContent(
  pages: PageRecord[],
  threshold = 0.8
): CheckResult<DuplicateContentData> {
  const texts: string[] = [];
  const pageUrls: string[] = [];

  for (const page of pages) {
    if (!page.html) continue;
    const text = extractText(page.html, [...BOILERPLATE_SELECTORS, "script", "style"]);
    if (text.length > MIN_TEXT_LENGTH) {
      texts.push(text);
      pageUrls.push(page.url);
    }
  }

  if (texts.length < 2) {
    return {
      passed: true,
      message: "Insufficient content for duplicate analysis",
      data: { duplicateGroups: [], pageUrls, totalDuplicates: 0 },
    };
  }

  const vectors = buildTfidfVectors(texts);
  const grouped = new Set<number>();
  const duplicateGroups: DuplicateGroup[] = [];

  for (let i = 0; i < vectors.length; i++) {
    if (grouped.has(i)) continue;

    const members: number[] = [];
    let best = 0;
    for (let j = i + 1; j < vectors.length; j++) {
      if (grouped.has(j)) continue;
      const similarity = cosineSimilarity(vectors[i], vectors[j]);
      if (similarity >= threshold) {
        members.push(j);
        grouped.add(j);
        best = Math.max(best, similarity);
      }
    }

    if (members.length > 0) {
      grouped.add(i);
      duplicateGroups.push({
        similarityScore: Math.round(best * 1000) / 1000,
        urls: [pageUrls[i], ...members.map((j) => pageUrls[j])],
      });
    }
  }

  const data = { duplicateGroups, pageUrls, totalDuplicates: duplicateGroups.length };

  if (duplicateGroups.length > 0) {
    return {
      passed: false,
      message: `Found ${duplicateGroups.length} groups of duplicate/similar content`,
      data,
    };
  }

  return { passed: true, message: "No duplicate content detected", data };
}
