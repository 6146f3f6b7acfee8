const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export function ensureScheme(urlString: string): string {
  const trimmed = urlString.trim();
  return SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Resolves `urlString` against `baseUrl` and drops the fragment. Paths and
 * query strings are kept as-is, so `/a?x=1` and `/a` stay distinct pages.
 */
export function normalizeUrl(urlString: string, baseUrl?: string): string | null {
  try {
    const url = baseUrl ? new URL(urlString, baseUrl) : new URL(urlString);
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

export function isHttpUrl(urlString: string): boolean {
  try {
    const { protocol } = new URL(urlString);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

export function getHost(urlString: string): string | null {
  try {
    return new URL(urlString).host;
  } catch {
    return null;
  }
}

export function isSameHost(url1: string, url2: string): boolean {
  const host1 = getHost(url1);
  return host1 !== null && host1 === getHost(url2);
}

export function getRobotsUrl(pageUrl: string): string | null {
  try {
    const parsed = new URL(pageUrl);
    return `${parsed.protocol}//${parsed.host}/robots.txt`;
  } catch {
    return null;
  }
}
