import { describe, it, expect, vi, type Mock } from "vitest";
import {
  NOT_CONFIGURED_ERROR,
  buildAnalysisPrompt,
  extractWebsiteContent,
  generateAiInsights,
  generateAiReport,
  parseAiAnalysis,
} from "../server/audit/ai-insights";
import { aggregateScores } from "../server/audit/scorer";
import type { TextGenerator } from "../server/audit/text-generator";
import type { PageRecord } from "../server/audit/types";
import { makeResult } from "./fixtures";

const HOME: PageRecord = {
  url: "https://bakery.example/",
  html: `<html><head><title>Corner Bakery</title><meta name="description" content="Fresh bread daily.">
    <script>var tracking = 1;</script></head>
    <body><h1>Corner Bakery</h1><h2>Bread</h2><h2> </h2><p>Sourdough   every morning.</p>
    <img src="loaf.jpg" alt="Sourdough loaf"><img src="logo.png"></body></html>`,
  statusCode: 200,
  error: null,
  depth: 0,
};

const BROKEN: PageRecord = {
  url: "https://bakery.example/missing",
  html: null,
  statusCode: 404,
  error: "HTTP 404",
  depth: 1,
};

type GenerateFn = TextGenerator["generate"];

function fakeGenerator(reply: string | Error): { generate: Mock<GenerateFn> } {
  return {
    generate: vi.fn<GenerateFn>(async () => {
      if (reply instanceof Error) throw reply;
      return reply;
    }),
  };
}

describe("extractWebsiteContent", () => {
  it("summarizes pages that have HTML", () => {
    const content = extractWebsiteContent([HOME, BROKEN]);

    expect(content.domain).toBe("bakery.example");
    expect(content.totalPages).toBe(2);
    expect(content.pages).toHaveLength(1);
    expect(content.pages[0]).toMatchObject({
      url: "https://bakery.example/",
      title: "Corner Bakery",
      h1Headings: ["Corner Bakery"],
      h2Headings: ["Bread"],
      metaDescription: "Fresh bread daily.",
      imagesCount: 2,
      imagesWithAlt: 1,
    });
    expect(content.pages[0].mainContent).not.toContain("tracking");
  });
});

describe("buildAnalysisPrompt", () => {
  it("describes at most three pages", () => {
    const pages = Array.from({ length: 5 }, (_, i) => ({ ...HOME, url: `https://bakery.example/p${i}` }));
    const prompt = buildAnalysisPrompt(extractWebsiteContent(pages));

    expect(prompt).toContain("Page 3: https://bakery.example/p2");
    expect(prompt).not.toContain("Page 4:");
    expect(prompt).toContain("- Images: 2 total, 1 with descriptions");
  });
});

describe("parseAiAnalysis", () => {
  it("takes list items under a recommendations heading", () => {
    const analysis = [
      "1. WHAT AI CAN SEE:",
      "- A bakery with a short homepage",
      "3. WEBSITE-SPECIFIC RECOMMENDATIONS:",
      "1. Add an H1 that names the neighbourhood bakery",
      "2. Too short",
      "- Describe every product photo with its bread type",
      "* Publish opening hours as plain text on the homepage",
    ].join("\n");

    expect(parseAiAnalysis(analysis)).toEqual([
      "Add an H1 that names the neighbourhood bakery",
      "Describe every product photo with its bread type",
      "Publish opening hours as plain text on the homepage",
    ]);
  });

  it("keeps at most eight recommendations", () => {
    const lines = Array.from({ length: 12 }, (_, i) => `- Recommendation number ${i} for this website`);
    expect(parseAiAnalysis(["RECOMMENDATIONS", ...lines].join("\n"))).toHaveLength(8);
  });

  it("falls back to action sentences", () => {
    const analysis =
      "The site looks fine overall. You should add a menu page that lists every loaf and price. Ok.";
    expect(parseAiAnalysis(analysis)).toEqual([
      "You should add a menu page that lists every loaf and price",
    ]);
  });
});

describe("generateAiInsights", () => {
  it("reports a missing generator without calling anything", async () => {
    expect(await generateAiInsights([HOME], null)).toEqual({
      success: false,
      error: NOT_CONFIGURED_ERROR,
    });
  });

  it("returns parsed recommendations on success", async () => {
    const generator = fakeGenerator(
      "RECOMMENDATIONS\n- Add a clear H1 heading naming the bakery and town"
    );

    const insights = await generateAiInsights([HOME], generator);

    expect(insights.success).toBe(true);
    if (insights.success) {
      expect(insights.recommendations).toEqual(["Add a clear H1 heading naming the bakery and town"]);
      expect(insights.contentSummary.domain).toBe("bakery.example");
    }
    expect(generator.generate).toHaveBeenCalledTimes(1);
  });

  it("turns generator errors into a failed result", async () => {
    const insights = await generateAiInsights([HOME], fakeGenerator(new Error("HTTP 401")));
    expect(insights).toEqual({ success: false, error: "AI analysis failed: HTTP 401" });
  });
});

describe("generateAiReport", () => {
  const result = aggregateScores([makeResult("https://bakery.example/", 70)]);

  it("returns the generated report", async () => {
    const generator = fakeGenerator("Consultant report");
    expect(await generateAiReport(result, generator)).toEqual({
      success: true,
      report: "Consultant report",
    });
    const prompt = generator.generate.mock.calls[0][0];
    expect(prompt).toContain("Please analyze the website: https://bakery.example/");
    expect(prompt).toContain("- Overall Score: 70/100");
  });

  it("reports failures", async () => {
    expect(await generateAiReport(result, fakeGenerator(new Error("quota")))).toEqual({
      success: false,
      error: "AI report failed: quota",
    });
  });
});
