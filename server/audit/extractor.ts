import * as cheerio from "cheerio";
import type {
  ImageWithContext,
  LinkWithContext,
  ListContent,
  LlmView,
  PageHeading,
} from "@shared/audit-types";
import { isHttpUrl, normalizeUrl } from "./url-utils";

// Elements a text-only crawler cannot make use of.
const NON_TEXT_SELECTORS = ["script", "style", "noscript", "iframe", "canvas", "svg"];

export const BOILERPLATE_SELECTORS = ["nav", "footer", "aside", "header"];

const CONTEXT_LIMIT = 200;

export type JsonParseResult = { data: unknown } | { error: string };

export function parseJson(text: string): JsonParseResult {
  try {
    return { data: JSON.parse(text) };
  } catch (e) {
    return { error: e instanceof Error ? e.message : String(e) };
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function extractJsonLdBlocks($: cheerio.CheerioAPI): JsonParseResult[] {
  return $('script[type="application/ld+json"]')
    .map((_, el) => parseJson($(el).text()))
    .get();
}

export function findMetaContent(
  $: cheerio.CheerioAPI,
  name: string
): string | null {
  const wanted = name.toLowerCase();
  const meta = $("meta")
    .filter((_, el) => ($(el).attr("name") ?? "").toLowerCase() === wanted)
    .first();
  if (meta.length === 0) return null;
  return meta.attr("content") ?? "";
}

/**
 * Visible text of the document with the given subtrees removed, whitespace
 * collapsed to single spaces.
 */
export function extractText(html: string, removeSelectors: string[]): string {
  const $ = cheerio.load(html);
  $(removeSelectors.join(", ")).remove();
  return collapseWhitespace($.root().text());
}

/** Absolute http(s) targets of every anchor, fragments stripped, in document order. */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (!href) return;
    const normalized = normalizeUrl(href, pageUrl);
    if (normalized && isHttpUrl(normalized) && !seen.has(normalized)) {
      seen.add(normalized);
      links.push(normalized);
    }
  });

  return links;
}

export function extractHeadings($: cheerio.CheerioAPI): PageHeading[] {
  const headings: PageHeading[] = [];
  $("h1, h2, h3, h4, h5, h6").each((_, el) => {
    const tagName = $(el).prop("tagName");
    const text = $(el).text().trim();
    if (tagName && text) {
      headings.push({ level: parseInt(tagName.charAt(1), 10), text });
    }
  });
  return headings;
}

function resolveHref(href: string, pageUrl: string): string {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return href;
  }
}

export function calculateLlmRichness(view: Omit<LlmView, "richnessScore">): number {
  let score = 0;

  if (view.title) {
    score += 10;
    if (view.title.length > 10) score += 5;
  }

  if (view.headings.length > 0) {
    score += view.headings.length * 3;
    const h1Count = view.headings.filter((h) => h.level === 1).length;
    if (h1Count === 1) score += 10;
  }

  if (view.mainContent) {
    const wordCount = countWords(view.mainContent);
    if (wordCount > 100) score += 15;
    if (wordCount > 500) score += 10;
    if (wordCount > 1000) score += 5;
  }

  score += view.structuredData.length * 15;
  score += view.imagesWithContext.length * 2;
  score += view.listsContent.length * 3;

  if (view.metaDescription) score += 8;

  return Math.min(100, score);
}

/**
 * Extracts the page the way a text-only LLM crawler would see it: no scripts,
 * media or navigation chrome, just titles, headings, prose, lists, tables and
 * described images.
 */
export function extractLlmView(html: string, url: string): LlmView {
  const $ = cheerio.load(html);

  const structuredData = extractJsonLdBlocks($).flatMap((block) =>
    "data" in block ? [block.data] : []
  );

  $(NON_TEXT_SELECTORS.join(", ")).remove();

  const title = $("title").first().text().trim();
  const description = findMetaContent($, "description");
  const metaDescription = description ? description.trim() : null;
  const headings = extractHeadings($);

  $(BOILERPLATE_SELECTORS.join(", ")).remove();

  const paragraphs = $("p")
    .map((_, el) => $(el).text().trim())
    .get()
    .filter((text) => text.length > 20);

  const imagesWithContext: ImageWithContext[] = [];
  $("img").each((_, el) => {
    const altText = ($(el).attr("alt") ?? "").trim();
    if (!altText) return;
    imagesWithContext.push({
      altText,
      src: $(el).attr("src") ?? "",
      context: $(el).parent().text().trim().slice(0, CONTEXT_LIMIT),
    });
  });

  const linksWithContext: LinkWithContext[] = [];
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    const text = $(el).text().trim();
    if (!href || !text) return;
    linksWithContext.push({
      text,
      url: resolveHref(href, url),
      context: $(el).parent().text().trim().slice(0, CONTEXT_LIMIT),
    });
  });

  const tablesContent: string[][][] = [];
  $("table").each((_, table) => {
    const rows: string[][] = [];
    $(table)
      .find("tr")
      .each((_, row) => {
        const cells = $(row)
          .find("td, th")
          .map((_, cell) => $(cell).text().trim())
          .get();
        if (cells.some(Boolean)) rows.push(cells);
      });
    if (rows.length > 0) tablesContent.push(rows);
  });

  const listsContent: ListContent[] = [];
  $("ul, ol").each((_, list) => {
    const items = $(list)
      .find("li")
      .map((_, li) => $(li).text().trim())
      .get()
      .filter(Boolean);
    if (items.length > 0) {
      listsContent.push({
        type: $(list).prop("tagName") === "OL" ? "ordered" : "unordered",
        items,
      });
    }
  });

  const view = {
    title,
    metaDescription,
    headings,
    mainContent: paragraphs.join("\n\n"),
    structuredData,
    imagesWithContext,
    linksWithContext,
    tablesContent,
    listsContent,
  };

  return { ...view, richnessScore: calculateLlmRichness(view) };
}
