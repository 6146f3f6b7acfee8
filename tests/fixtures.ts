import type { CheckName, PageChecks, PageScoreResult } from "@shared/audit-types";

export function checksWith(failed: CheckName[]): PageChecks {
  const check = (name: CheckName) =>
    failed.includes(name) ? { passed: false, message: `${name} failed` } : { passed: true, message: "ok" };

  return {
    llm_content_analysis: check("llm_content_analysis"),
    llm_accessibility_analysis: check("llm_accessibility_analysis"),
    llm_content_richness: check("llm_content_richness"),
    robots_txt_allows_crawling: check("robots_txt_allows_crawling"),
    meta_robots_allows_indexing: check("meta_robots_allows_indexing"),
    has_h1_tag: check("has_h1_tag"),
    has_meta_description: check("has_meta_description"),
    images_have_alt_text: check("images_have_alt_text"),
    structured_data_richness: check("structured_data_richness"),
    content_readability: check("content_readability"),
  };
}

export function makeResult(
  url: string,
  score: number,
  failed: CheckName[] = [],
  readabilityScore = 80,
  structuredSchemasCount = 1
): PageScoreResult {
  return {
    url,
    accessible: true,
    score,
    checks: checksWith(failed),
    contentAnalysis: {
      readabilityScore,
      structuredDataRichness: 40,
      structuredSchemasCount,
      llmContentSummary: {
        title: "",
        headingsCount: 0,
        mainContentWords: 0,
        imagesWithAlt: 0,
        structuredSchemas: 0,
        richnessScore: 0,
      },
    },
  };
}
