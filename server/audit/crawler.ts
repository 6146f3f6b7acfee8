import pLimit from "p-limit";
import type { AuditConfig, Fetcher, PageRecord } from "./types";
import { createHttpFetcher } from "./fetcher";
import { HostRateLimiter } from "./rate-limiter";
import { extractLinks } from "./extractor";
import { ensureScheme, getHost, isSameHost, normalizeUrl } from "./url-utils";
import { log, warn } from "./logger";

interface QueueItem {
  url: string;
  depth: number;
}

export interface CrawlDependencies {
  fetcher?: Fetcher;
  rateLimiter?: HostRateLimiter;
}

export type CrawlConfig = Pick<
  AuditConfig,
  "url" | "maxDepth" | "maxPages" | "concurrency" | "delayMs" | "timeoutMs" | "userAgent"
>;

/**
 * Breadth-first crawl of a single host. Pages come back in dequeue order,
 * failed fetches included, and never more than `maxPages` of them.
 */
export async function crawlSite(
  config: CrawlConfig,
  deps: CrawlDependencies = {}
): Promise<PageRecord[]> {
  const rootUrl = normalizeUrl(ensureScheme(config.url));
  if (!rootUrl) {
    throw new Error(`Invalid root URL: ${config.url}`);
  }

  const fetcher = deps.fetcher ?? createHttpFetcher(config);
  const rateLimiter = deps.rateLimiter ?? new HostRateLimiter(config.delayMs);
  const limit = pLimit(config.concurrency);

  const visited = new Set<string>();
  const toVisit: QueueItem[] = [{ url: rootUrl, depth: 0 }];
  const pages: PageRecord[] = [];

  const processUrl = async (item: QueueItem): Promise<PageRecord> => {
    await rateLimiter.wait(getHost(item.url) ?? "");
    log(`Crawling: ${item.url} (depth ${item.depth})`, "crawler");

    const result = await fetcher.fetch(item.url);
    if (result.error) {
      warn(`Error crawling ${item.url}: ${result.error}`, "crawler");
    }

    return {
      url: item.url,
      html: result.error ? null : result.html,
      statusCode: result.statusCode,
      error: result.error,
      depth: item.depth,
    };
  };

  while (toVisit.length > 0 && pages.length < config.maxPages) {
    // Take the next batch in FIFO order, skipping what was already seen.
    const remaining = config.maxPages - pages.length;
    const batch: QueueItem[] = [];
    while (toVisit.length > 0 && batch.length < Math.min(config.concurrency, remaining)) {
      const item = toVisit.shift();
      if (!item || visited.has(item.url) || item.depth > config.maxDepth) continue;
      visited.add(item.url);
      batch.push(item);
    }

    const results = await Promise.all(batch.map((item) => limit(() => processUrl(item))));

    for (const page of results) {
      pages.push(page);

      if (page.html === null || page.depth >= config.maxDepth) continue;

      for (const link of extractLinks(page.html, page.url)) {
        if (isSameHost(link, rootUrl) && !visited.has(link)) {
          toVisit.push({ url: link, depth: page.depth + 1 });
        }
      }
    }
  }

  return pages;
}
