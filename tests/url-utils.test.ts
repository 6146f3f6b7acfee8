import { describe, it, expect } from "vitest";
import {
  ensureScheme,
  getHost,
  getRobotsUrl,
  isHttpUrl,
  isSameHost,
  normalizeUrl,
} from "../server/audit/url-utils";

describe("ensureScheme", () => {
  it("adds https:// to a bare host", () => {
    expect(ensureScheme("example.com")).toBe("https://example.com");
  });

  it("keeps an existing scheme", () => {
    expect(ensureScheme("http://example.com/a")).toBe("http://example.com/a");
  });

  it("trims surrounding whitespace", () => {
    expect(ensureScheme("  example.com  ")).toBe("https://example.com");
  });
});

describe("normalizeUrl", () => {
  it("drops the fragment", () => {
    expect(normalizeUrl("https://example.com/page#section")).toBe("https://example.com/page");
  });

  it("treats a fragment link and the bare page as the same entry", () => {
    expect(normalizeUrl("https://example.com/page#a")).toBe(
      normalizeUrl("https://example.com/page")
    );
  });

  it("resolves relative links against a base", () => {
    expect(normalizeUrl("../about", "https://example.com/docs/intro")).toBe(
      "https://example.com/about"
    );
  });

  it("keeps query strings", () => {
    expect(normalizeUrl("/search?q=1", "https://example.com/")).toBe(
      "https://example.com/search?q=1"
    );
  });

  it("returns null for unparseable input", () => {
    expect(normalizeUrl("not a url")).toBeNull();
  });
});

describe("host helpers", () => {
  it("only accepts http and https", () => {
    expect(isHttpUrl("https://example.com")).toBe(true);
    expect(isHttpUrl("mailto:team@example.com")).toBe(false);
    expect(isHttpUrl("javascript:void(0)")).toBe(false);
  });

  it("includes the port in the host", () => {
    expect(getHost("http://localhost:3000/x")).toBe("localhost:3000");
  });

  it("compares hosts exactly", () => {
    expect(isSameHost("https://example.com/a", "https://example.com/b")).toBe(true);
    expect(isSameHost("https://example.com/a", "https://blog.example.com/a")).toBe(false);
    expect(isSameHost("nope", "nope")).toBe(false);
  });

  it("builds the robots.txt URL from the origin", () => {
    expect(getRobotsUrl("https://example.com/deep/page?x=1")).toBe(
      "https://example.com/robots.txt"
    );
    expect(getRobotsUrl("garbage")).toBeNull();
  });
});
