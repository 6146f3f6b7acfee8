import type { PageScoreResult, SiteResult } from "@shared/audit-types";
import { CHECK_NAMES } from "./scorer";

const RULE = "=".repeat(80);
const SECTION_RULE = "-".repeat(40);
const TIER_RULE = "-".repeat(50);

export interface ReportOptions {
  aiReport?: string;
  generatedAt?: Date;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function section(title: string, lines: string[]): string[] {
  return [title, SECTION_RULE, ...lines, ""];
}

function whatAiCanSee(pages: PageScoreResult[]): string[] {
  const totals = {
    words: 0,
    richness: 0,
    headings: 0,
    paragraphs: 0,
    lists: 0,
    altImages: 0,
    structuredData: 0,
    tables: 0,
    forms: 0,
    iframes: 0,
    imagesWithoutAlt: 0,
    canvas: 0,
    svg: 0,
    media: 0,
    jsDependent: 0,
  };

  let pagesWithContent = 0;
  for (const page of pages) {
    const summary = page.contentAnalysis.llmContentSummary;
    if (page.accessible) {
      totals.words += summary.mainContentWords;
      totals.richness += summary.richnessScore;
      pagesWithContent++;
    }

    const triage = page.checks.llm_content_analysis.data;
    if (!triage) continue;
    totals.headings += triage.easilyReadable.headings;
    totals.paragraphs += triage.easilyReadable.paragraphs;
    totals.lists += triage.easilyReadable.lists;
    totals.altImages += triage.easilyReadable.altTextImages;
    totals.structuredData += triage.easilyReadable.structuredData;
    totals.tables += triage.challenging.tables;
    totals.forms += triage.challenging.forms;
    totals.iframes += triage.challenging.iframes;
    totals.imagesWithoutAlt += triage.challenging.imagesWithoutAlt;
    totals.canvas += triage.inaccessible.canvasElements;
    totals.svg += triage.inaccessible.svgElements;
    totals.media += triage.inaccessible.mediaElements;
    totals.jsDependent += triage.inaccessible.javascriptDependent;
  }

  const avgRichness = pagesWithContent > 0 ? totals.richness / pagesWithContent : 0;

  return [
    "WHAT AI CAN SEE ON YOUR WEBSITE",
    RULE,
    "",
    "CONTENT AI CAN EASILY ACCESS:",
    TIER_RULE,
    `- Text Content: ${totals.words.toLocaleString("en-US")} words across all pages`,
    `- Headings (H1-H6): ${totals.headings} total`,
    `- Paragraphs: ${totals.paragraphs} total`,
    `- Lists: ${totals.lists} total`,
    `- Images with descriptions: ${totals.altImages} total`,
    `- Structured data schemas: ${totals.structuredData} total`,
    `- Average content richness: ${avgRichness.toFixed(1)}/100`,
    "",
    "CONTENT CHALLENGING FOR AI:",
    TIER_RULE,
    `- Tables: ${totals.tables}`,
    `- Forms: ${totals.forms}`,
    `- Embedded content: ${totals.iframes} iFrames`,
    `- Images without descriptions: ${totals.imagesWithoutAlt}`,
    "",
    "CONTENT AI CANNOT ACCESS:",
    TIER_RULE,
    `- Visual graphics: ${totals.canvas} canvas + ${totals.svg} SVG elements`,
    `- Audio/Video: ${totals.media} multimedia elements`,
    `- JavaScript-dependent: ${totals.jsDependent} dynamic elements`,
    "",
    RULE,
    "",
  ];
}

function pageSection(page: PageScoreResult): string[] {
  const lines = [`PAGE: ${page.url}`, `   Score: ${page.score}/100`];

  const triage = page.checks.llm_content_analysis.data;
  if (triage) {
    lines.push(
      "   LLM CONTENT VISIBILITY:",
      `     Easily accessible: ${triage.easilyReadable.headings} headings, ${triage.easilyReadable.paragraphs} paragraphs, ${triage.easilyReadable.lists} lists, ${triage.easilyReadable.altTextImages} described images`,
      `     Challenging: ${triage.challenging.tables} tables, ${triage.challenging.forms} forms, ${triage.challenging.iframes} iFrames, ${triage.challenging.imagesWithoutAlt} undescribed images`,
      `     Inaccessible: ${triage.inaccessible.canvasElements} canvas, ${triage.inaccessible.svgElements} SVG, ${triage.inaccessible.mediaElements} media, ${triage.inaccessible.javascriptDependent} script-dependent`
    );
  }

  const failed = CHECK_NAMES.filter((name) => !page.checks[name].passed);
  if (failed.length === 0) {
    lines.push("   STATUS: All checks passed");
  } else {
    lines.push("   ISSUES:");
    for (const name of failed) {
      lines.push(`   - ${name}: ${page.checks[name].message}`);
    }
  }

  lines.push("");
  return lines;
}

export function generateUnifiedReport(result: SiteResult, options: ReportOptions = {}): string {
  const { recommendations, llmReadinessSummary: summary, duplicateContent } = result;
  const lines: string[] = [
    RULE,
    "LLM READINESS AUDIT REPORT",
    RULE,
    `Generated: ${formatTimestamp(options.generatedAt ?? new Date())}`,
    `Pages Analyzed: ${result.pages.length}`,
    `Overall Score: ${result.siteScore}/100`,
    "",
    ...whatAiCanSee(result.pages),
    ...section("EXECUTIVE SUMMARY", [
      `- Site Score: ${result.siteScore}/100`,
      `- Critical Issues: ${recommendations.critical.length}`,
      `- Important Issues: ${recommendations.important.length}`,
      `- Suggested Improvements: ${recommendations.suggested.length}`,
    ]),
    ...section("LLM ACCESSIBILITY BREAKDOWN", [
      `- High Accessibility Pages: ${summary.accessibilityBreakdown.high}`,
      `- Medium Accessibility Pages: ${summary.accessibilityBreakdown.medium}`,
      `- Low Accessibility Pages: ${summary.accessibilityBreakdown.low}`,
    ]),
    ...section("CONTENT ANALYSIS", [
      `- Average Readability Score: ${summary.contentAnalysis.avgReadabilityScore}/100`,
      `- Average Structured Data Richness: ${summary.contentAnalysis.avgStructuredDataRichness}/100`,
      `- Total Structured Schemas: ${summary.contentAnalysis.totalStructuredSchemas}`,
      `- Pages with Good Readability: ${summary.contentAnalysis.pagesWithGoodReadability}`,
    ]),
    ...section("TECHNICAL ISSUES SUMMARY", [
      `- Inaccessible Pages: ${summary.technicalIssues.inaccessiblePages} pages`,
      `- Robots Blocked: ${summary.technicalIssues.robotsBlocked} pages`,
      `- Meta Noindex: ${summary.technicalIssues.metaNoindex} pages`,
      `- Missing H1 Tags: ${summary.technicalIssues.missingH1} pages`,
      `- Missing Meta Descriptions: ${summary.technicalIssues.missingMetaDescription} pages`,
      `- Missing Alt Text: ${summary.technicalIssues.missingAltText} pages`,
      `- No Structured Data: ${summary.technicalIssues.noStructuredData} pages`,
    ]),
  ];

  const duplicates = duplicateContent.data;
  if (duplicates && duplicates.totalDuplicates > 0) {
    lines.push(
      ...section("DUPLICATE CONTENT ISSUES", [
        `- ${duplicates.totalDuplicates} groups of duplicate/similar content found`,
        ...duplicates.duplicateGroups.map(
          (group) => `- ${group.urls.join(", ")} (similarity ${group.similarityScore})`
        ),
      ])
    );
  }

  lines.push("PAGE-BY-PAGE ANALYSIS", SECTION_RULE);
  for (const page of result.pages) {
    lines.push(...pageSection(page));
  }

  const tiers: Array<[string, string[]]> = [
    ["CRITICAL ISSUES (Fix Immediately)", recommendations.critical],
    ["IMPORTANT IMPROVEMENTS", recommendations.important],
    ["SUGGESTED ENHANCEMENTS", recommendations.suggested],
  ];
  for (const [title, items] of tiers) {
    if (items.length === 0) continue;
    lines.push(...section(title, items.map((item) => `- ${item}`)));
  }

  if (options.aiReport) {
    lines.push(RULE, "AI-POWERED ANALYSIS & RECOMMENDATIONS", RULE, "", options.aiReport, "");
  }

  lines.push(RULE, "End of Report", RULE);
  return lines.join("\n");
}

export function generateJsonReport(result: SiteResult, aiReport?: string): string {
  return JSON.stringify(aiReport ? { ...result, aiReport } : result, null, 2);
}
