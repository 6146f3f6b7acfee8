import pLimit from "p-limit";
import type {
  AccessibilityBreakdown,
  AiInsights,
  CheckName,
  CheckResult,
  ContentAnalysis,
  ContentAnalysisSummary,
  DuplicateContentData,
  LlmReadinessSummary,
  PageChecks,
  PageScoreResult,
  SiteResult,
  TechnicalIssues,
} from "@shared/audit-types";
import type { Fetcher, PageRecord } from "./types";
import {
  checkHasH1Tag,
  checkHasMetaDescription,
  checkImagesHaveAltText,
  checkMetaRobotsAllowsIndexing,
  checkRobotsTxtAllowsCrawling,
  createCheckContext,
  runCheck,
  type CheckContext,
} from "./checks";
import {
  checkContentReadability,
  checkLlmAccessibility,
  checkLlmContentAnalysis,
  checkLlmContentRichness,
  checkStructuredDataRichness,
} from "./llm-checks";
import { analyzeReadabilityBucket, analyzeStructuredData } from "./content-analysis";
import { detectDuplicateContent } from "./duplicates";
import { countFailed, generateRecommendations } from "./recommendations";
import { countWords, extractLlmView } from "./extractor";

const LLM_CHECK_POINTS = 25;
const CHECK_POINTS = 15;
const MAX_SCORE = 100;
const GOOD_READABILITY = 70;

export const CHECK_NAMES: CheckName[] = [
  "llm_content_analysis",
  "llm_accessibility_analysis",
  "llm_content_richness",
  "robots_txt_allows_crawling",
  "meta_robots_allows_indexing",
  "has_h1_tag",
  "has_meta_description",
  "images_have_alt_text",
  "structured_data_richness",
  "content_readability",
];

export function computePageScore(checks: PageChecks): number {
  let score = 0;
  for (const name of CHECK_NAMES) {
    if (!checks[name].passed) continue;
    score += name.startsWith("llm_") ? LLM_CHECK_POINTS : CHECK_POINTS;
  }
  return Math.min(MAX_SCORE, score);
}

function emptyContentAnalysis(): ContentAnalysis {
  return {
    readabilityScore: 0,
    structuredDataRichness: 0,
    structuredSchemasCount: 0,
    llmContentSummary: {
      title: "",
      headingsCount: 0,
      mainContentWords: 0,
      imagesWithAlt: 0,
      structuredSchemas: 0,
      richnessScore: 0,
    },
  };
}

function inaccessiblePage(page: PageRecord): PageScoreResult {
  const failed: CheckResult<never> = {
    passed: false,
    message: `Page not accessible: ${page.error ?? "no content returned"}`,
  };

  return {
    url: page.url,
    accessible: false,
    score: 0,
    checks: {
      llm_content_analysis: failed,
      llm_accessibility_analysis: failed,
      llm_content_richness: failed,
      robots_txt_allows_crawling: failed,
      meta_robots_allows_indexing: failed,
      has_h1_tag: failed,
      has_meta_description: failed,
      images_have_alt_text: failed,
      structured_data_richness: failed,
      content_readability: failed,
    },
    contentAnalysis: emptyContentAnalysis(),
  };
}

export async function scorePage(page: PageRecord, context: CheckContext): Promise<PageScoreResult> {
  const html = page.html;
  if (page.error || html === null) {
    return inaccessiblePage(page);
  }

  const view = extractLlmView(html, page.url);

  const checks: PageChecks = {
    llm_content_analysis: await runCheck("llm_content_analysis", () =>
      checkLlmContentAnalysis(html)
    ),
    llm_accessibility_analysis: await runCheck("llm_accessibility_analysis", () =>
      checkLlmAccessibility(html, view)
    ),
    llm_content_richness: await runCheck("llm_content_richness", () =>
      checkLlmContentRichness(view)
    ),
    robots_txt_allows_crawling: await runCheck("robots_txt_allows_crawling", () =>
      checkRobotsTxtAllowsCrawling(page, context)
    ),
    meta_robots_allows_indexing: await runCheck("meta_robots_allows_indexing", () =>
      checkMetaRobotsAllowsIndexing(html)
    ),
    has_h1_tag: await runCheck("has_h1_tag", () => checkHasH1Tag(html)),
    has_meta_description: await runCheck("has_meta_description", () =>
      checkHasMetaDescription(html)
    ),
    images_have_alt_text: await runCheck("images_have_alt_text", () =>
      checkImagesHaveAltText(html)
    ),
    structured_data_richness: await runCheck("structured_data_richness", () =>
      checkStructuredDataRichness(html)
    ),
    content_readability: await runCheck("content_readability", () =>
      checkContentReadability(html)
    ),
  };

  const structured = analyzeStructuredData(html);

  return {
    url: page.url,
    accessible: true,
    score: computePageScore(checks),
    checks,
    contentAnalysis: {
      readabilityScore: analyzeReadabilityBucket(html),
      structuredDataRichness: structured.richnessScore,
      structuredSchemasCount: structured.schemaCount,
      llmContentSummary: {
        title: view.title,
        headingsCount: view.headings.length,
        mainContentWords: countWords(view.mainContent),
        imagesWithAlt: view.imagesWithContext.length,
        structuredSchemas: view.structuredData.length,
        richnessScore: view.richnessScore,
      },
    },
  };
}

function summarizeAccessibility(results: PageScoreResult[]): AccessibilityBreakdown {
  const breakdown = { high: 0, medium: 0, low: 0 };
  for (const { score } of results) {
    if (score >= 80) breakdown.high++;
    else if (score >= 50) breakdown.medium++;
    else breakdown.low++;
  }
  return breakdown;
}

function summarizeContent(results: PageScoreResult[]): ContentAnalysisSummary {
  const n = results.length;
  const sum = (pick: (analysis: ContentAnalysis) => number) =>
    results.reduce((total, result) => total + pick(result.contentAnalysis), 0);

  return {
    avgReadabilityScore: n > 0 ? Math.round(sum((a) => a.readabilityScore) / n) : 0,
    avgStructuredDataRichness: n > 0 ? Math.round(sum((a) => a.structuredDataRichness) / n) : 0,
    totalStructuredSchemas: sum((a) => a.structuredSchemasCount),
    pagesWithGoodReadability: results.filter(
      (result) => result.contentAnalysis.readabilityScore >= GOOD_READABILITY
    ).length,
  };
}

function summarizeTechnicalIssues(results: PageScoreResult[]): TechnicalIssues {
  const accessible = results.filter((result) => result.accessible);
  return {
    inaccessiblePages: results.length - accessible.length,
    robotsBlocked: countFailed(accessible, "robots_txt_allows_crawling"),
    metaNoindex: countFailed(accessible, "meta_robots_allows_indexing"),
    missingH1: countFailed(accessible, "has_h1_tag"),
    missingMetaDescription: countFailed(accessible, "has_meta_description"),
    missingAltText: countFailed(accessible, "images_have_alt_text"),
    noStructuredData: accessible.filter(
      (result) => result.contentAnalysis.structuredSchemasCount === 0
    ).length,
  };
}

export interface AggregateOptions {
  duplicateContent?: CheckResult<DuplicateContentData>;
  insights?: AiInsights;
}

const NO_DUPLICATES: CheckResult<DuplicateContentData> = {
  passed: true,
  message: "Insufficient content for duplicate analysis",
  data: { duplicateGroups: [], pageUrls: [], totalDuplicates: 0 },
};

/** Folds per-page results into the site summary and recommendations. */
export function aggregateScores(
  results: PageScoreResult[],
  options: AggregateOptions = {}
): SiteResult {
  const duplicateContent = options.duplicateContent ?? NO_DUPLICATES;
  const totalScore = results.reduce((total, result) => total + result.score, 0);

  const llmReadinessSummary: LlmReadinessSummary = {
    accessibilityBreakdown: summarizeAccessibility(results),
    contentAnalysis: summarizeContent(results),
    technicalIssues: summarizeTechnicalIssues(results),
  };

  const recommendations = generateRecommendations({
    pages: results,
    contentAnalysis: llmReadinessSummary.contentAnalysis,
    duplicateGroups: duplicateContent.data?.totalDuplicates ?? 0,
    insights: options.insights,
  });

  return {
    pages: results,
    siteScore: results.length > 0 ? Math.round(totalScore / results.length) : 0,
    recommendations,
    llmReadinessSummary,
    duplicateContent,
    ...(options.insights ? { aiAnalysis: options.insights } : {}),
  };
}

export interface ScoreOptions {
  fetcher: Fetcher;
  concurrency?: number;
  insights?: AiInsights;
}

export async function calculateScores(
  pages: PageRecord[],
  options: ScoreOptions
): Promise<SiteResult> {
  const context = createCheckContext(options.fetcher);
  const limit = pLimit(options.concurrency ?? 4);

  const results = await Promise.all(pages.map((page) => limit(() => scorePage(page, context))));

  return aggregateScores(results, {
    duplicateContent: detectDuplicateContent(pages),
    insights: options.insights,
  });
}
