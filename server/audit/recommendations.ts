import type {
  AiInsights,
  CheckName,
  ContentAnalysisSummary,
  PageScoreResult,
  Recommendations,
} from "@shared/audit-types";
import { getHost } from "./url-utils";

export const AI_INSIGHT_PREFIX = "AI INSIGHT: ";

export interface RecommendationInputs {
  pages: PageScoreResult[];
  contentAnalysis: ContentAnalysisSummary;
  duplicateGroups: number;
  insights?: AiInsights;
}

export function countFailed(pages: PageScoreResult[], check: CheckName): number {
  return pages.filter((page) => !page.checks[check].passed).length;
}

/** AI recommendations fill critical first, then important, then suggested. */
export function distributeAiRecommendations(recommendations: string[]): Recommendations {
  const prefixed = recommendations.map((rec) => `${AI_INSIGHT_PREFIX}${rec}`);
  return {
    critical: prefixed.slice(0, 3),
    important: prefixed.slice(3, 6),
    suggested: prefixed.slice(6),
  };
}

export function generateRecommendations({
  pages,
  contentAnalysis,
  duplicateGroups,
  insights,
}: RecommendationInputs): Recommendations {
  const recommendations: Recommendations =
    insights?.success === true
      ? distributeAiRecommendations(insights.recommendations)
      : { critical: [], important: [], suggested: [] };

  const domain = (pages.length > 0 && getHost(pages[0].url)) || "your website";
  const reachable = pages.filter((page) => page.accessible);

  const robotsIssues = countFailed(reachable, "robots_txt_allows_crawling");
  if (robotsIssues > 0) {
    recommendations.critical.push(
      `URGENT: ${robotsIssues} pages on ${domain} are blocked by robots.txt - AI assistants can't access these pages at all. Check ${domain}/robots.txt and remove 'Disallow: /' rules.`
    );
  }

  const noindexIssues = countFailed(reachable, "meta_robots_allows_indexing");
  if (noindexIssues > 0) {
    recommendations.critical.push(
      `URGENT: Remove 'noindex' tags from ${noindexIssues} pages on ${domain} - these tags tell AI not to read the page. Remove <meta name='robots' content='noindex'> from pages you want AI to see.`
    );
  }

  const h1Issues = countFailed(reachable, "has_h1_tag");
  if (h1Issues > reachable.length * 0.5) {
    recommendations.critical.push(
      `URGENT: Add clear main headings to ${h1Issues} pages on ${domain} - AI needs these to understand what each page is about. Use an H1 like 'Emergency Plumbing Services in Chicago' instead of just 'Services'.`
    );
  }

  const metaDescriptionIssues = countFailed(reachable, "has_meta_description");
  if (metaDescriptionIssues > 0) {
    recommendations.important.push(
      `Add page descriptions to ${metaDescriptionIssues} pages on ${domain} - write 1-2 sentences (120-160 characters) explaining what visitors will find on each page.`
    );
  }

  const altTextIssues = countFailed(reachable, "images_have_alt_text");
  if (altTextIssues > 0) {
    recommendations.important.push(
      `Add descriptions to images on ${altTextIssues} pages of ${domain} - AI can't see pictures, only text descriptions. Use alt text like 'Team photo of the support staff in the office'.`
    );
  }

  const unreachable = pages.length - reachable.length;
  if (unreachable > 0) {
    recommendations.important.push(
      `Fix ${unreachable} pages on ${domain} that could not be loaded - crawlers that hit an error or empty response skip the page entirely.`
    );
  }

  if (contentAnalysis.avgReadabilityScore < 70) {
    recommendations.suggested.push(
      "Simplify your writing for better AI understanding - use shorter sentences (15-20 words), replace jargon with simple terms, and add more headings."
    );
  }

  if (contentAnalysis.totalStructuredSchemas === 0) {
    recommendations.suggested.push(
      `Add structured data to ${domain} so AI can tell what type of content you have - mark articles as 'Article', products as 'Product' and FAQs as 'FAQPage'.`
    );
  }

  if (duplicateGroups > 0) {
    recommendations.suggested.push(
      `Consolidate or differentiate ${duplicateGroups} groups of near-duplicate pages on ${domain} - AI may treat them as the same page.`
    );
  }

  return recommendations;
}
