import { describe, it, expect } from "vitest";
import { crawlSite, type CrawlConfig } from "../server/audit/crawler";
import { HostRateLimiter } from "../server/audit/rate-limiter";
import type { Fetcher, FetchResponse } from "../server/audit/types";

function page(links: string[]): string {
  return `<html><body>${links.map((href) => `<a href="${href}">link</a>`).join("")}</body></html>`;
}

class FakeFetcher implements Fetcher {
  readonly requested: string[] = [];

  constructor(private readonly site: Record<string, string | FetchResponse>) {}

  async fetch(url: string): Promise<FetchResponse> {
    this.requested.push(url);
    const entry = this.site[url];
    if (entry === undefined) {
      return { url, html: null, statusCode: 404, error: "HTTP 404" };
    }
    if (typeof entry === "string") {
      return { url, html: entry, statusCode: 200, error: null };
    }
    return entry;
  }
}

function config(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
  return {
    url: "https://example.com",
    maxDepth: 1,
    maxPages: 50,
    concurrency: 1,
    delayMs: 0,
    timeoutMs: 1000,
    userAgent: "test-agent",
    ...overrides,
  };
}

async function crawl(site: Record<string, string | FetchResponse>, overrides: Partial<CrawlConfig> = {}) {
  const fetcher = new FakeFetcher(site);
  const pages = await crawlSite(config(overrides), {
    fetcher,
    rateLimiter: new HostRateLimiter(0),
  });
  return { pages, fetcher };
}

describe("crawlSite", () => {
  it("returns a single record for a page without links", async () => {
    const { pages } = await crawl({ "https://example.com/": page([]) });

    expect(pages).toHaveLength(1);
    expect(pages[0]).toMatchObject({
      url: "https://example.com/",
      statusCode: 200,
      error: null,
      depth: 0,
    });
  });

  it("never fetches links on another host", async () => {
    const { pages, fetcher } = await crawl({
      "https://example.com/": page(["https://other.example/", "/about"]),
      "https://example.com/about": page([]),
    });

    expect(pages.map((p) => p.url)).toEqual(["https://example.com/", "https://example.com/about"]);
    expect(fetcher.requested).not.toContain("https://other.example/");
  });

  it("stops at maxDepth", async () => {
    const { pages } = await crawl(
      {
        "https://example.com/": page(["/a"]),
        "https://example.com/a": page(["/b"]),
        "https://example.com/b": page([]),
      },
      { maxDepth: 1 }
    );

    expect(pages.map((p) => p.url)).toEqual(["https://example.com/", "https://example.com/a"]);
  });

  it("crawls only the root at depth 0", async () => {
    const { pages } = await crawl({ "https://example.com/": page(["/a"]) }, { maxDepth: 0 });
    expect(pages).toHaveLength(1);
  });

  it("deduplicates fragment links", async () => {
    const { pages, fetcher } = await crawl({
      "https://example.com/": page(["/page#one", "/page#two", "/page", "#top"]),
      "https://example.com/page": page([]),
    });

    expect(pages.map((p) => p.url)).toEqual(["https://example.com/", "https://example.com/page"]);
    expect(fetcher.requested).toEqual(["https://example.com/", "https://example.com/page"]);
  });

  it("caps the crawl at 50 pages", async () => {
    const links = Array.from({ length: 80 }, (_, i) => `/p${i}`);
    const site: Record<string, string> = { "https://example.com/": page(links) };
    for (const link of links) site[`https://example.com${link}`] = page([]);

    const { pages, fetcher } = await crawl(site, { concurrency: 4 });

    expect(pages).toHaveLength(50);
    expect(fetcher.requested).toHaveLength(50);
  });

  it("respects a smaller maxPages", async () => {
    const { pages } = await crawl(
      {
        "https://example.com/": page(["/a", "/b", "/c"]),
        "https://example.com/a": page([]),
        "https://example.com/b": page([]),
        "https://example.com/c": page([]),
      },
      { maxPages: 2 }
    );
    expect(pages.map((p) => p.url)).toEqual(["https://example.com/", "https://example.com/a"]);
  });

  it("keeps breadth-first order when fetching concurrently", async () => {
    const site = {
      "https://example.com/": page(["/a", "/b"]),
      "https://example.com/a": page(["/a1", "/a2"]),
      "https://example.com/b": page(["/b1"]),
      "https://example.com/a1": page([]),
      "https://example.com/a2": page([]),
      "https://example.com/b1": page([]),
    };
    const expected = [
      "https://example.com/",
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/a1",
      "https://example.com/a2",
      "https://example.com/b1",
    ];

    const sequential = await crawl(site, { maxDepth: 2, concurrency: 1 });
    const concurrent = await crawl(site, { maxDepth: 2, concurrency: 3 });

    expect(sequential.pages.map((p) => p.url)).toEqual(expected);
    expect(concurrent.pages.map((p) => p.url)).toEqual(expected);
  });

  it("includes failed pages with their error and no HTML", async () => {
    const { pages } = await crawl({
      "https://example.com/": page(["/broken"]),
      "https://example.com/broken": {
        url: "https://example.com/broken",
        html: null,
        statusCode: 500,
        error: "HTTP 500",
      },
    });

    expect(pages[1]).toEqual({
      url: "https://example.com/broken",
      html: null,
      statusCode: 500,
      error: "HTTP 500",
      depth: 1,
    });
  });

  it("rejects an invalid root URL", async () => {
    await expect(crawl({}, { url: "http://" })).rejects.toThrow("Invalid root URL");
  });
});
