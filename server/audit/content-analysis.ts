import * as cheerio from "cheerio";
import { extractJsonLdBlocks, extractText } from "./extractor";
import { computeTextStatistics } from "./text-stats";

export interface StructuredDataSummary {
  schemaCount: number;
  richnessScore: number;
}

const READABILITY_BUCKETS: Array<[minEase: number, score: number]> = [
  [90, 100],
  [80, 90],
  [70, 80],
  [60, 70],
  [50, 60],
  [30, 50],
];

/** Coarse 0-100 readability from Flesch reading ease; 0 when there is too little text. */
export function analyzeReadabilityBucket(html: string): number {
  const text = extractText(html, ["script", "style"]);
  if (text.length < 100) return 0;

  const { fleschReadingEase } = computeTextStatistics(text);
  const bucket = READABILITY_BUCKETS.find(([minEase]) => fleschReadingEase >= minEase);
  return bucket ? bucket[1] : 30;
}

export function analyzeStructuredData(html: string): StructuredDataSummary {
  const $ = cheerio.load(html);
  let schemaCount = 0;
  let richnessScore = 0;

  const validJsonLd = extractJsonLdBlocks($).filter((block) => "data" in block).length;
  schemaCount += validJsonLd;
  richnessScore += validJsonLd * 20;

  // Microdata and RDFa items.
  const items = $("[itemtype]").length + $("[typeof]").length;
  schemaCount += items;
  richnessScore += items * 10;

  const metaWithPrefix = (attribute: "property" | "name", prefix: string) =>
    $("meta").filter((_, el) => ($(el).attr(attribute) ?? "").startsWith(prefix)).length;

  richnessScore += Math.min(metaWithPrefix("property", "og:") * 2, 20);
  richnessScore += Math.min(metaWithPrefix("name", "twitter:") * 2, 10);

  return { schemaCount, richnessScore: Math.min(richnessScore, 100) };
}
