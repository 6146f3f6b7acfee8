import * as cheerio from "cheerio";
import type {
  AccessibilityReport,
  AccessibilityTriage,
  CheckResult,
  InsufficientContentData,
  LlmView,
  ReadabilityMetrics,
  StructuredDataRichness,
} from "@shared/audit-types";
import {
  BOILERPLATE_SELECTORS,
  countWords,
  extractJsonLdBlocks,
  extractText,
} from "./extractor";
import { computeTextStatistics } from "./text-stats";

// Schema types that help a model summarize a page, weighted by usefulness.
export const LLM_PRIORITY_TYPES = new Map<string, number>([
  ["Article", 10],
  ["NewsArticle", 10],
  ["BlogPosting", 9],
  ["FAQPage", 10],
  ["QAPage", 10],
  ["HowTo", 9],
  ["Recipe", 8],
  ["Product", 8],
  ["Service", 7],
  ["Organization", 6],
  ["Person", 6],
  ["Event", 7],
  ["Place", 6],
  ["Review", 8],
  ["VideoObject", 7],
  ["ImageObject", 6],
  ["Dataset", 9],
  ["SoftwareApplication", 7],
]);

const RICH_FIELD_BONUSES: Array<{ type: string; field: string; bonus: number }> = [
  { type: "FAQPage", field: "mainEntity", bonus: 5 },
  { type: "Article", field: "articleBody", bonus: 3 },
  { type: "HowTo", field: "step", bonus: 4 },
];

const RICHNESS_DENOMINATOR = 50;
const MIN_TEXT_LENGTH = 100;

type SchemaItem = Record<string, unknown>;

function isSchemaItem(value: unknown): value is SchemaItem {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Top-level objects, members of top-level arrays, and `@graph` members. */
export function flattenSchemaItems(data: unknown): SchemaItem[] {
  if (Array.isArray(data)) {
    return data.flatMap(flattenSchemaItems);
  }
  if (!isSchemaItem(data)) return [];

  const graph = data["@graph"];
  const nested = Array.isArray(graph) ? graph.flatMap(flattenSchemaItems) : [];
  return [data, ...nested];
}

export function schemaTypes(item: SchemaItem): string[] {
  const type = item["@type"];
  if (typeof type === "string") return [type];
  if (Array.isArray(type)) {
    return type.filter((t): t is string => typeof t === "string");
  }
  return [];
}

export function checkStructuredDataRichness(html: string): CheckResult<StructuredDataRichness> {
  const $ = cheerio.load(html);
  const typesFound = new Set<string>();
  const llmFriendlyTypes = new Set<string>();
  let totalSchemas = 0;
  let invalidBlocks = 0;
  let totalScore = 0;

  for (const block of extractJsonLdBlocks($)) {
    if ("error" in block) {
      invalidBlocks++;
      continue;
    }

    for (const item of flattenSchemaItems(block.data)) {
      const types = schemaTypes(item);
      if (types.length === 0) continue;
      totalSchemas++;

      for (const type of types) {
        typesFound.add(type);
        const weight = LLM_PRIORITY_TYPES.get(type);
        if (weight === undefined) continue;

        llmFriendlyTypes.add(type);
        totalScore += weight;
        for (const rich of RICH_FIELD_BONUSES) {
          if (rich.type === type && item[rich.field]) totalScore += rich.bonus;
        }
      }
    }
  }

  const data: StructuredDataRichness = {
    typesFound: Array.from(typesFound),
    llmFriendlyTypes: Array.from(llmFriendlyTypes),
    totalSchemas,
    invalidBlocks,
    richnessScore: Math.min(100, Math.floor((totalScore / RICHNESS_DENOMINATOR) * 100)),
  };

  if (data.llmFriendlyTypes.length > 0) {
    return {
      passed: true,
      message: `Found ${data.llmFriendlyTypes.length} LLM-friendly schema types`,
      data,
    };
  }

  return {
    passed: false,
    message: `Found ${totalSchemas} schemas but none are LLM-optimized`,
    data,
  };
}

type ReadabilityInputs = Omit<ReadabilityMetrics, "readabilityScore" | "gunningFogIndex">;

export function scoreReadability(metrics: ReadabilityInputs): number {
  const ease = metrics.fleschReadingEase;
  const grade = metrics.fleschKincaidGrade;
  const sentenceLength = metrics.avgSentenceLength;
  let score = 0;

  if (ease >= 60 && ease <= 70) score += 30;
  else if ((ease >= 50 && ease < 60) || (ease > 70 && ease <= 80)) score += 25;
  else if (ease >= 40) score += 15;

  if (grade >= 8 && grade <= 12) score += 25;
  else if ((grade >= 6 && grade < 8) || (grade > 12 && grade <= 15)) score += 20;
  else if (grade <= 18) score += 10;

  if (sentenceLength >= 15 && sentenceLength <= 20) score += 25;
  else if ((sentenceLength >= 10 && sentenceLength < 15) || (sentenceLength > 20 && sentenceLength <= 25)) score += 20;
  else if (sentenceLength <= 30) score += 10;

  if (metrics.wordCount >= 300) score += 20;
  else if (metrics.wordCount >= 150) score += 10;

  return Math.min(100, score);
}

export function checkContentReadability(
  html: string
): CheckResult<ReadabilityMetrics | InsufficientContentData> {
  const text = extractText(html, [...BOILERPLATE_SELECTORS, "script", "style"]);

  if (text.length < MIN_TEXT_LENGTH) {
    return {
      passed: false,
      message: "Insufficient content for readability analysis",
      data: { wordCount: countWords(text) },
    };
  }

  const stats = computeTextStatistics(text);
  const wordCount = countWords(text);
  const avgSentenceLength = Math.round((wordCount / stats.sentenceCount) * 10) / 10;

  const data: ReadabilityMetrics = {
    fleschKincaidGrade: stats.fleschKincaidGrade,
    fleschReadingEase: stats.fleschReadingEase,
    gunningFogIndex: stats.gunningFog,
    wordCount,
    sentenceCount: stats.sentenceCount,
    avgSentenceLength,
    readabilityScore: 0,
  };
  data.readabilityScore = scoreReadability({
    ...data,
    avgSentenceLength: wordCount / stats.sentenceCount,
  });

  if (data.readabilityScore >= 70) {
    return { passed: true, message: `Excellent readability for LLMs (score: ${data.readabilityScore})`, data };
  }
  if (data.readabilityScore >= 50) {
    return { passed: true, message: `Good readability for LLMs (score: ${data.readabilityScore})`, data };
  }
  return { passed: false, message: `Poor readability for LLMs (score: ${data.readabilityScore})`, data };
}

function countEventHandlerElements($: cheerio.CheerioAPI): number {
  return $("*").filter((_, el) =>
    Object.keys($(el).attr() ?? {}).some((name) => name.toLowerCase().startsWith("on"))
  ).length;
}

export function triageAccessibility(html: string): AccessibilityTriage {
  const $ = cheerio.load(html);
  const images = $("img");
  const altTextImages = images.filter((_, el) => Boolean($(el).attr("alt"))).length;

  const easilyReadable = {
    headings: $("h1, h2, h3, h4, h5, h6").length,
    paragraphs: $("p").length,
    lists: $("ul, ol").length,
    textContentLength: $.root().text().trim().length,
    altTextImages,
    structuredData: $('script[type="application/ld+json"]').length,
  };

  const challenging = {
    tables: $("table").length,
    forms: $("form").length,
    iframes: $("iframe").length,
    imagesWithoutAlt: images.length - altTextImages,
  };

  const inaccessible = {
    canvasElements: $("canvas").length,
    svgElements: $("svg").length,
    mediaElements: $("audio, video").length,
    javascriptDependent: countEventHandlerElements($),
  };

  const readableScore = Math.min(
    50,
    easilyReadable.headings * 3 +
      easilyReadable.paragraphs * 2 +
      easilyReadable.lists * 2 +
      easilyReadable.altTextImages * 2 +
      easilyReadable.structuredData * 5
  );
  const challengingPenalty = Math.min(
    20,
    challenging.tables * 2 + challenging.forms * 1 + challenging.imagesWithoutAlt * 3
  );
  const inaccessiblePenalty = Math.min(
    30,
    inaccessible.canvasElements * 5 +
      inaccessible.mediaElements * 3 +
      inaccessible.javascriptDependent * 2
  );

  return {
    easilyReadable,
    challenging,
    inaccessible,
    llmReadinessScore: Math.max(0, readableScore - challengingPenalty - inaccessiblePenalty),
  };
}

export function checkLlmContentAnalysis(html: string): CheckResult<AccessibilityTriage> {
  const data = triageAccessibility(html);
  const score = data.llmReadinessScore;

  if (score >= 35) {
    return { passed: true, message: `High LLM content accessibility (score: ${score})`, data };
  }
  if (score >= 20) {
    return { passed: true, message: `Moderate LLM content accessibility (score: ${score})`, data };
  }
  return { passed: false, message: `Low LLM content accessibility (score: ${score})`, data };
}

const lower = (tagName: string | undefined) => (tagName ?? "").toLowerCase();

const truncate = (text: string, max: number) =>
  text.length > max ? `${text.slice(0, max)}...` : text;

export function analyzeLlmAccessibility(html: string): AccessibilityReport {
  const $ = cheerio.load(html);
  const report: AccessibilityReport = {
    accessibleContent: { textElements: [], structuredData: [], semanticElements: [], accessibleMedia: [] },
    challengingContent: { complexStructures: [], interactiveElements: [], partiallyAccessible: [] },
    inaccessibleContent: { visualOnly: [], javascriptDependent: [], multimediaWithoutText: [], embeddedContent: [] },
    recommendations: [],
  };
  const accessible = report.accessibleContent;
  const challenging = report.challengingContent;
  const inaccessible = report.inaccessibleContent;

  const headings = $("h1, h2, h3, h4, h5, h6");
  headings.each((_, el) => {
    const text = $(el).text().trim();
    if (text) {
      accessible.textElements.push({ type: `Heading ${lower($(el).prop("tagName")).toUpperCase()}`, details: truncate(text, 100) });
    }
  });

  $("p")
    .slice(0, 5)
    .each((_, el) => {
      const text = $(el).text().trim();
      if (text.length > 20) {
        accessible.textElements.push({ type: "Paragraph", details: truncate(text, 100) });
      }
    });

  $("ul, ol").each((_, el) => {
    const items = $(el).find("li").length;
    if (items > 0) {
      const type = lower($(el).prop("tagName")) === "ol" ? "Ordered List" : "Unordered List";
      accessible.textElements.push({ type, details: `${items} items` });
    }
  });

  const jsonLdBlocks = extractJsonLdBlocks($);
  for (const block of jsonLdBlocks) {
    if ("error" in block) continue;
    const types = Array.isArray(block.data)
      ? ["Multiple schemas"]
      : isSchemaItem(block.data)
        ? schemaTypes(block.data)
        : [];
    accessible.structuredData.push({
      type: "JSON-LD Schema",
      details: types.length > 0 ? types.join(", ") : "Unknown",
    });
  }

  $("article, section, main, aside").each((_, el) => {
    const textElements = $(el).find("p, h1, h2, h3, h4, h5, h6").length;
    accessible.semanticElements.push({
      type: `Semantic ${lower($(el).prop("tagName"))}`,
      details: `Contains ${textElements} text elements`,
    });
  });

  const imagesWithoutAlt: string[] = [];
  $("img").each((_, el) => {
    const alt = ($(el).attr("alt") ?? "").trim();
    const src = ($(el).attr("src") ?? "No source").slice(0, 50);
    if (alt) {
      accessible.accessibleMedia.push({ type: "Image with alt text", details: `${truncate(alt, 100)} (${src})` });
    } else {
      imagesWithoutAlt.push(src);
      challenging.partiallyAccessible.push({
        type: "Image without alt text",
        details: `Visual content not described: ${src}`,
      });
    }
  });

  const tables = $("table");
  tables.each((_, el) => {
    challenging.complexStructures.push({
      type: "Table",
      details: `${$(el).find("tr").length} rows, may be difficult for LLMs to parse correctly`,
    });
  });

  $("form").each((_, el) => {
    const inputs = $(el).find("input, select, textarea").length;
    challenging.interactiveElements.push({ type: "Form", details: `${inputs} input fields, LLMs cannot interact` });
  });

  $("canvas").each(() => {
    inaccessible.visualOnly.push({
      type: "Canvas element",
      details: "Dynamic visual content, completely inaccessible to LLMs",
    });
  });

  $("svg").each((_, el) => {
    if (!$(el).text().trim()) {
      inaccessible.visualOnly.push({ type: "SVG graphic", details: "Vector graphics without text description" });
    }
  });

  const media = $("audio, video");
  media.each((_, el) => {
    const tag = lower($(el).prop("tagName"));
    inaccessible.multimediaWithoutText.push({
      type: `${tag.charAt(0).toUpperCase()}${tag.slice(1)} element`,
      details: "Audio/visual content, LLMs cannot process media files",
    });
  });

  $("[onclick], [onload]").each((_, el) => {
    inaccessible.javascriptDependent.push({
      type: `${lower($(el).prop("tagName"))} with JavaScript`,
      details: "Requires JavaScript execution, not accessible to LLMs",
    });
  });

  $("iframe").each((_, el) => {
    const src = ($(el).attr("src") ?? "No source").slice(0, 50);
    inaccessible.embeddedContent.push({ type: "iFrame", details: `Embedded content from: ${src}` });
  });

  const recommendations = report.recommendations;
  if (imagesWithoutAlt.length > 0) {
    recommendations.push(`Add alt text to ${imagesWithoutAlt.length} images for LLM accessibility`);
  }
  if (jsonLdBlocks.length === 0) {
    recommendations.push("Add structured data (JSON-LD) to help LLMs understand content context");
  }
  if (headings.length === 0) {
    recommendations.push("Add heading structure (H1-H6) to improve content hierarchy for LLMs");
  }
  if (tables.length > 0) {
    recommendations.push(`Consider converting ${tables.length} tables to simpler list formats for better LLM comprehension`);
  }
  if (media.length > 0) {
    recommendations.push(`Provide text descriptions or transcripts for ${media.length} media elements`);
  }

  return report;
}

export function checkLlmAccessibility(
  html: string,
  view: LlmView
): CheckResult<AccessibilityReport> {
  return {
    passed: true,
    message: `LLM can access ${view.headings.length} headings, ${countWords(view.mainContent)} words of content`,
    data: analyzeLlmAccessibility(html),
  };
}

export function checkLlmContentRichness(view: LlmView): CheckResult<LlmView> {
  return {
    passed: view.richnessScore >= 50,
    message: `Content richness score: ${view.richnessScore}/100`,
    data: view,
  };
}
