import { describe, it, expect } from "vitest";
import { z } from "zod";
import { describeError, parseCliOptions, type RawCliOptions } from "../server/audit/cli-options";

const defaults: RawCliOptions = {
  depth: "1",
  format: "report",
  maxPages: "50",
  concurrency: "4",
  delay: "500",
  timeout: "10000",
};

describe("parseCliOptions", () => {
  it("maps flags onto the audit config", () => {
    const settings = parseCliOptions(
      "example.com",
      { ...defaults, depth: "2", maxPages: "10", format: "json", output: "out.json" },
      {}
    );

    expect(settings.config).toEqual({
      url: "example.com",
      maxDepth: 2,
      maxPages: 10,
      concurrency: 4,
      delayMs: 500,
      timeoutMs: 10000,
      userAgent: "Mozilla/5.0 (compatible; LLM-Ready-Audit/1.0; +bot)",
    });
    expect(settings.format).toBe("json");
    expect(settings.output).toBe("out.json");
    expect(settings.aiReport).toBe(false);
  });

  it("prefers the flag key over the environment", () => {
    const env = { OPENAI_API_KEY: "env-secret" };
    expect(parseCliOptions("example.com", defaults, env).openaiKey).toBe("env-secret");
    expect(
      parseCliOptions("example.com", { ...defaults, openaiKey: "test-secret" }, env).openaiKey
    ).toBe("test-secret");
    expect(parseCliOptions("example.com", defaults, {}).openaiKey).toBeUndefined();
  });

  it("rejects more than 50 pages", () => {
    expect(() => parseCliOptions("example.com", { ...defaults, maxPages: "51" }, {})).toThrow(
      z.ZodError
    );
  });

  it("rejects non-numeric values", () => {
    expect(() => parseCliOptions("example.com", { ...defaults, depth: "deep" }, {})).toThrow();
  });

  it("rejects unknown formats", () => {
    expect(() => parseCliOptions("example.com", { ...defaults, format: "pdf" }, {})).toThrow();
  });
});

describe("describeError", () => {
  it("names the offending field of a validation error", () => {
    try {
      parseCliOptions("example.com", { ...defaults, maxPages: "0" }, {});
      expect.unreachable();
    } catch (error) {
      expect(describeError(error)).toMatch(/^maxPages: /);
    }
  });

  it("uses the message of plain errors", () => {
    expect(describeError(new Error("Invalid root URL: x"))).toBe("Invalid root URL: x");
    expect(describeError("text")).toBe("text");
  });
});
