import * as cheerio from "cheerio";
import type {
  AiInsights,
  SiteResult,
  WebsiteContent,
  WebsitePageSummary,
} from "@shared/audit-types";
import type { PageRecord } from "./types";
import type { TextGenerator } from "./text-generator";
import { collapseWhitespace, findMetaContent } from "./extractor";
import { getHost } from "./url-utils";
import { log, warn } from "./logger";

const PROMPT_PAGE_LIMIT = 3;
const MAX_RECOMMENDATIONS = 8;
const MAIN_CONTENT_CHARS = 1000;
const ACTION_WORDS = ["add", "create", "improve", "change", "include", "should"];

export const NOT_CONFIGURED_ERROR =
  "Text generation is not configured (set OPENAI_API_KEY or pass --openai-key)";

const INSIGHTS_SYSTEM_PROMPT =
  "You are an AI assistant analyzing a website from the perspective of what AI systems can access and understand. Provide specific, actionable insights based on the actual content you can see.";

const REPORT_SYSTEM_PROMPT =
  "You are an expert SEO and LLM optimization consultant. Provide detailed, actionable analysis based on the audit data and page content you are given.";

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function summarizePage(page: PageRecord & { html: string }): WebsitePageSummary {
  const $ = cheerio.load(page.html);
  $("script, style, noscript, iframe").remove();

  const headingTexts = (selector: string) =>
    $(selector)
      .map((_, el) => $(el).text().trim())
      .get()
      .filter((text) => text.length > 0);

  const images = $("img");
  const text = collapseWhitespace($.root().text());

  return {
    url: page.url,
    title: $("title").first().text().trim() || "No title",
    h1Headings: headingTexts("h1"),
    h2Headings: headingTexts("h2").slice(0, 5),
    metaDescription: findMetaContent($, "description")?.trim() ?? "No meta description",
    mainContent:
      text.length > MAIN_CONTENT_CHARS ? `${text.slice(0, MAIN_CONTENT_CHARS)}...` : text,
    imagesCount: images.length,
    imagesWithAlt: images.filter((_, el) => Boolean($(el).attr("alt"))).length,
    contentLength: text.length,
  };
}

export function extractWebsiteContent(pages: PageRecord[]): WebsiteContent {
  const summaries: WebsitePageSummary[] = [];
  let domain = "";

  for (const page of pages) {
    if (!page.html) continue;
    if (!domain) domain = getHost(page.url) ?? "";
    summaries.push(summarizePage({ ...page, html: page.html }));
  }

  return { domain, totalPages: pages.length, pages: summaries };
}

export function buildAnalysisPrompt(content: WebsiteContent): string {
  const lines = [
    `I need you to analyze the website "${content.domain}" from the perspective of what AI systems can actually see and understand.`,
    "",
    "WEBSITE CONTENT ANALYSIS:",
    `Domain: ${content.domain}`,
    `Total Pages: ${content.pages.length}`,
    "",
    "PAGE DETAILS:",
  ];

  content.pages.slice(0, PROMPT_PAGE_LIMIT).forEach((page, i) => {
    lines.push(
      "",
      `Page ${i + 1}: ${page.url}`,
      `- Title: ${page.title}`,
      `- H1 Headings: ${page.h1Headings.length > 0 ? page.h1Headings.join(", ") : "None found"}`,
      `- H2 Headings: ${page.h2Headings.length > 0 ? page.h2Headings.join(", ") : "None found"}`,
      `- Meta Description: ${page.metaDescription}`,
      `- Content Preview: ${page.mainContent.slice(0, 300)}...`,
      `- Images: ${page.imagesCount} total, ${page.imagesWithAlt} with descriptions`
    );
  });

  lines.push(
    "",
    "ANALYSIS REQUIRED:",
    "",
    "1. WHAT AI CAN SEE: Based on the content above, what can AI systems easily understand about this website? Be specific about the business, services, or purpose.",
    "",
    "2. CONTENT GAPS: What important information is missing that would help AI understand this website better?",
    "",
    "3. WEBSITE-SPECIFIC RECOMMENDATIONS: Provide 5 specific, actionable recommendations for THIS website. Reference actual content, headings, or pages you see.",
    "",
    "4. IMMEDIATE FIXES: What are the top 3 most critical issues that prevent AI from understanding this specific website?",
    "",
    "Be specific and reference actual content you can see. Don't give generic SEO advice."
  );

  return lines.join("\n");
}

/**
 * Pulls recommendations out of free text: list items under a RECOMMENDATIONS or
 * FIXES heading, or failing that, sentences that read as actions.
 */
export function parseAiAnalysis(analysis: string): string[] {
  const recommendations: string[] = [];
  let section = "";

  for (const rawLine of analysis.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    const upper = line.toUpperCase();
    if (upper.includes("WHAT AI CAN SEE")) {
      section = "visible";
    } else if (upper.includes("RECOMMENDATIONS") || upper.includes("FIXES")) {
      section = "recommendations";
    } else if (/^[-•*\d]/.test(line) && section === "recommendations") {
      const recommendation = line.replace(/^[-•*\d.\s]+/, "").trim();
      if (recommendation.length > 20) recommendations.push(recommendation);
    }
  }

  if (recommendations.length === 0) {
    for (const sentence of analysis.split(".")) {
      const lowered = sentence.toLowerCase();
      if (!ACTION_WORDS.some((word) => lowered.includes(word))) continue;
      const recommendation = sentence.trim();
      if (recommendation.length > 30 && recommendation.length < 200) {
        recommendations.push(recommendation);
      }
    }
  }

  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

export async function generateAiInsights(
  pages: PageRecord[],
  generator: TextGenerator | null
): Promise<AiInsights> {
  if (!generator) {
    return { success: false, error: NOT_CONFIGURED_ERROR };
  }

  try {
    const contentSummary = extractWebsiteContent(pages);
    log(`Analyzing ${contentSummary.domain || "site"} with text generation`, "ai");
    const analysis = await generator.generate(
      buildAnalysisPrompt(contentSummary),
      INSIGHTS_SYSTEM_PROMPT
    );

    return {
      success: true,
      analysis,
      recommendations: parseAiAnalysis(analysis),
      contentSummary,
    };
  } catch (e) {
    const error = `AI analysis failed: ${errorMessage(e)}`;
    warn(error, "ai");
    return { success: false, error };
  }
}

export function buildReportPrompt(result: SiteResult): string {
  const mainUrl = result.pages[0]?.url ?? "the website";
  return [
    `Please analyze the website: ${mainUrl}`,
    "",
    "TECHNICAL AUDIT CONTEXT:",
    `- Overall Score: ${result.siteScore}/100`,
    `- Pages Analyzed: ${result.pages.length}`,
    `- Critical Issues: ${result.recommendations.critical.length}`,
    `- Important Issues: ${result.recommendations.important.length}`,
    "",
    "PLEASE ANALYZE:",
    "",
    "1. WHAT AI CAN ACTUALLY SEE: what content is visible and accessible to AI systems.",
    "2. CONTENT GAPS FOR AI: what important information is missing.",
    "3. WEBSITE-SPECIFIC RECOMMENDATIONS: 5-8 specific, actionable recommendations for this website.",
    "4. LLM OPTIMIZATION PRIORITIES: the top 3 most critical changes for better AI understanding.",
    "",
    "Please provide concrete, specific recommendations, not generic SEO advice.",
  ].join("\n");
}

export type AiReport = { success: true; report: string } | { success: false; error: string };

export async function generateAiReport(
  result: SiteResult,
  generator: TextGenerator | null
): Promise<AiReport> {
  if (!generator) {
    return { success: false, error: NOT_CONFIGURED_ERROR };
  }

  try {
    const report = await generator.generate(buildReportPrompt(result), REPORT_SYSTEM_PROMPT);
    return { success: true, report };
  } catch (e) {
    const error = `AI report failed: ${errorMessage(e)}`;
    warn(error, "ai");
    return { success: false, error };
  }
}
