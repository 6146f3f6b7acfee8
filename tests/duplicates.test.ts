import { describe, it, expect } from "vitest";
import {
  buildTfidfVectors,
  cosineSimilarity,
  detectDuplicateContent,
  tokenize,
} from "../server/audit/duplicates";
import type { PageRecord } from "../server/audit/types";

function record(url: string, body: string | null): PageRecord {
  return {
    url,
    html: body === null ? null : `<html><body><nav>Home About Contact</nav><p>${body}</p></body></html>`,
    statusCode: body === null ? 500 : 200,
    error: body === null ? "HTTP 500" : null,
    depth: 0,
  };
}

const PLUMBING =
  "Licensed plumbers repair leaking pipes, install water heaters and clear blocked drains for homes and businesses across the county.";
const BAKERY =
  "Our bakery makes sourdough loaves, croissants and seasonal fruit tarts every morning using flour milled from local heritage grain.";

describe("tokenize", () => {
  it("lowercases, drops stop words and single characters", () => {
    expect(tokenize("The Quick brown fox is a fox")).toEqual(["quick", "brown", "fox", "fox"]);
  });
});

describe("cosineSimilarity", () => {
  it("is 1 for identical documents and 0 for disjoint ones", () => {
    const [a, b, c] = buildTfidfVectors([PLUMBING, PLUMBING, BAKERY]);
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 6);
    expect(cosineSimilarity(a, c)).toBe(0);
  });
});

describe("detectDuplicateContent", () => {
  it("groups pages whose text matches", () => {
    const result = detectDuplicateContent([
      record("https://example.com/", PLUMBING),
      record("https://example.com/bakery", BAKERY),
      record("https://example.com/copy", PLUMBING),
    ]);

    expect(result.passed).toBe(false);
    expect(result.message).toBe("Found 1 groups of duplicate/similar content");
    expect(result.data).toEqual({
      duplicateGroups: [
        { similarityScore: 1, urls: ["https://example.com/", "https://example.com/copy"] },
      ],
      pageUrls: ["https://example.com/", "https://example.com/bakery", "https://example.com/copy"],
      totalDuplicates: 1,
    });
  });

  it("passes when every page is distinct", () => {
    const result = detectDuplicateContent([
      record("https://example.com/", PLUMBING),
      record("https://example.com/bakery", BAKERY),
    ]);
    expect(result.passed).toBe(true);
    expect(result.message).toBe("No duplicate content detected");
  });

  it("needs at least two pages with enough text", () => {
    const result = detectDuplicateContent([
      record("https://example.com/", PLUMBING),
      record("https://example.com/short", "Too short to compare."),
      record("https://example.com/broken", null),
    ]);
    expect(result).toEqual({
      passed: true,
      message: "Insufficient content for duplicate analysis",
      data: { duplicateGroups: [], pageUrls: ["https://example.com/"], totalDuplicates: 0 },
    });
  });
});
