import { describe, it, expect, vi, afterEach } from "vitest";
import { createHttpFetcher } from "../server/audit/fetcher";

const options = { timeoutMs: 1000, userAgent: "test-agent/1.0" };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("createHttpFetcher", () => {
  it("returns the body of a successful response", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("<html>ok</html>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await createHttpFetcher(options).fetch("https://example.com/");

    expect(result).toEqual({
      url: "https://example.com/",
      html: "<html>ok</html>",
      statusCode: 200,
      error: null,
    });
    const init = fetchMock.mock.calls[0][1];
    expect(init.headers["User-Agent"]).toBe("test-agent/1.0");
  });

  it("turns a non-2xx status into an error value", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("missing", { status: 404 })));

    const result = await createHttpFetcher(options).fetch("https://example.com/gone");

    expect(result).toEqual({
      url: "https://example.com/gone",
      html: null,
      statusCode: 404,
      error: "HTTP 404",
    });
  });

  it("reports transport failures without throwing", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND")));

    const result = await createHttpFetcher(options).fetch("https://nowhere.invalid/");

    expect(result.statusCode).toBeNull();
    expect(result.html).toBeNull();
    expect(result.error).toBe("getaddrinfo ENOTFOUND");
  });

  it("reports an abort as a timeout", async () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(abort));

    const result = await createHttpFetcher(options).fetch("https://slow.example/");

    expect(result.error).toBe("Request timeout");
  });
});
