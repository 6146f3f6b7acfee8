import type { Fetcher, FetchResponse } from "./types";

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    if (e.name === "AbortError") return "Request timeout";
    return e.message || "Unknown fetch error";
  }
  return String(e);
}

async function fetchWithTimeout(
  url: string,
  { timeoutMs, userAgent }: HttpFetcherOptions
): Promise<FetchResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": userAgent,
        Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8",
      },
      redirect: "follow",
    });

    if (!response.ok) {
      return { url, html: null, statusCode: response.status, error: `HTTP ${response.status}` };
    }

    const html = await response.text();
    return { url, html, statusCode: response.status, error: null };
  } catch (e) {
    return { url, html: null, statusCode: null, error: errorMessage(e) };
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createHttpFetcher(options: HttpFetcherOptions): Fetcher {
  return {
    fetch: (url) => fetchWithTimeout(url, options),
  };
}
