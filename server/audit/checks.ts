import * as cheerio from "cheerio";
import type {
  AltTextData,
  CheckResult,
  RobotsCheckData,
} from "@shared/audit-types";
import type { Fetcher, FetchResponse, PageRecord } from "./types";
import { findMetaContent } from "./extractor";
import { blocksAllCrawlers, botSpecificDisallows, parseRobotsTxt } from "./robots";
import { getRobotsUrl } from "./url-utils";

const META_DESCRIPTION_MIN = 120;
const META_DESCRIPTION_MAX = 160;
const NAV_WORDS = ["menu", "navigation", "skip to"];

export interface CheckContext {
  fetcher: Fetcher;
  robotsCache: Map<string, Promise<FetchResponse>>;
}

export function createCheckContext(fetcher: Fetcher): CheckContext {
  return { fetcher, robotsCache: new Map() };
}

/** Runs a check, turning anything it throws into a failed result. */
export async function runCheck<T>(
  name: string,
  check: () => CheckResult<T> | Promise<CheckResult<T>>
): Promise<CheckResult<T>> {
  try {
    return await check();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { passed: false, message: `Error running ${name}: ${message}` };
  }
}

function fetchRobots(context: CheckContext, robotsUrl: string): Promise<FetchResponse> {
  let pending = context.robotsCache.get(robotsUrl);
  if (!pending) {
    pending = context.fetcher.fetch(robotsUrl);
    context.robotsCache.set(robotsUrl, pending);
  }
  return pending;
}

export async function checkRobotsTxtAllowsCrawling(
  page: PageRecord,
  context: CheckContext
): Promise<CheckResult<RobotsCheckData>> {
  const robotsUrl = getRobotsUrl(page.url);
  if (!robotsUrl) {
    return { passed: true, message: "Could not locate robots.txt (allows crawling)" };
  }

  const response = await fetchRobots(context, robotsUrl);
  const data: RobotsCheckData = {
    statusCode: response.statusCode,
    wildcardBlocked: false,
    botSpecificDisallows: [],
  };

  if (response.statusCode === null) {
    return {
      passed: true,
      message: `Could not check robots.txt (allows crawling): ${response.error ?? "no response"}`,
      data,
    };
  }

  if (response.statusCode === 404) {
    return { passed: true, message: "No robots.txt found (allows crawling)", data };
  }

  if (response.statusCode !== 200 || response.html === null) {
    return {
      passed: true,
      message: `robots.txt returned ${response.statusCode} (allows crawling)`,
      data,
    };
  }

  const groups = parseRobotsTxt(response.html);
  data.wildcardBlocked = blocksAllCrawlers(groups);
  data.botSpecificDisallows = botSpecificDisallows(groups);

  if (data.wildcardBlocked) {
    return { passed: false, message: "robots.txt disallows all crawling", data };
  }

  return { passed: true, message: "robots.txt allows crawling", data };
}

export function checkMetaRobotsAllowsIndexing(html: string): CheckResult {
  const $ = cheerio.load(html);
  const content = findMetaContent($, "robots");

  if (content === null) {
    return { passed: true, message: "No meta robots tag (allows indexing)" };
  }

  if (content.toLowerCase().includes("noindex")) {
    return { passed: false, message: "Meta robots contains noindex" };
  }

  return { passed: true, message: "Meta robots allows indexing" };
}

export function checkHasH1Tag(html: string): CheckResult<{ h1Count: number }> {
  const $ = cheerio.load(html);
  const h1Tags = $("h1");
  const data = { h1Count: h1Tags.length };

  if (h1Tags.length > 1) {
    return {
      passed: false,
      message: `Multiple H1 tags found (${h1Tags.length}), should have exactly one`,
      data,
    };
  }

  if (h1Tags.length === 1) {
    const text = h1Tags.first().text().trim();
    if (!text) {
      return { passed: false, message: "H1 tag is empty", data };
    }
    return { passed: true, message: `H1 tag found: "${text.slice(0, 50)}"`, data };
  }

  const candidate = $("h2")
    .map((_, el) => $(el).text().trim())
    .get()
    .find(
      (text) =>
        text.length > 10 && !NAV_WORDS.some((word) => text.toLowerCase().includes(word))
    );

  if (candidate) {
    return {
      passed: false,
      message: `No H1 found, but H2 could be main heading: "${candidate.slice(0, 50)}" - consider changing it to an H1`,
      data,
    };
  }

  return {
    passed: false,
    message: "No H1 tag found - add a clear main heading for better AI understanding",
    data,
  };
}

export function checkHasMetaDescription(html: string): CheckResult<{ length: number }> {
  const $ = cheerio.load(html);
  const raw = findMetaContent($, "description");

  if (raw === null) {
    return { passed: false, message: "No meta description found" };
  }

  const content = raw.trim();
  const data = { length: content.length };

  if (!content) {
    return { passed: false, message: "Meta description is empty", data };
  }

  if (content.length < META_DESCRIPTION_MIN) {
    return {
      passed: false,
      message: `Meta description too short (${content.length} chars, recommend ${META_DESCRIPTION_MIN}-${META_DESCRIPTION_MAX})`,
      data,
    };
  }

  if (content.length > META_DESCRIPTION_MAX) {
    return {
      passed: false,
      message: `Meta description too long (${content.length} chars, recommend ${META_DESCRIPTION_MIN}-${META_DESCRIPTION_MAX})`,
      data,
    };
  }

  return { passed: true, message: `Good meta description (${content.length} chars)`, data };
}

export function checkImagesHaveAltText(html: string): CheckResult<AltTextData> {
  const $ = cheerio.load(html);
  const images = $("img");

  if (images.length === 0) {
    return {
      passed: true,
      message: "No images found",
      data: { totalImages: 0, missingAlt: 0, emptyAlt: 0 },
    };
  }

  let missingAlt = 0;
  let emptyAlt = 0;
  images.each((_, el) => {
    const alt = $(el).attr("alt");
    if (alt === undefined) missingAlt++;
    else if (!alt.trim()) emptyAlt++;
  });

  const data = { totalImages: images.length, missingAlt, emptyAlt };
  const issues = missingAlt + emptyAlt;

  if (issues === 0) {
    return { passed: true, message: `All ${images.length} images have alt text`, data };
  }

  return {
    passed: false,
    message: `${issues}/${images.length} images lack alt text (${missingAlt} missing, ${emptyAlt} empty)`,
    data,
  };
}
