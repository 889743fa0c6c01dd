const TRACKING_QUERY_KEYS = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "gclid",
  "fbclid"
]);

/**
 * Normalizes a URL into the crawler's de-duplication key: lowercase scheme and
 * host, no default port or fragment, tracking parameters removed, remaining
 * query keys sorted and no trailing slash. Unparseable input is returned trimmed.
 */
export const canonicalizeUrl = (rawUrl: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl.trim());
  } catch {
    return rawUrl.trim();
  }

  // URL parsing already lowercases the scheme and host and drops a default port.
  parsed.hash = "";

  const params = [...parsed.searchParams.entries()]
    .filter(([key]) => !TRACKING_QUERY_KEYS.has(key.toLowerCase()))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  parsed.search = "";
  for (const [key, value] of params) {
    parsed.searchParams.append(key, value);
  }

  if (parsed.pathname.length > 1 && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  }
  if (parsed.pathname === "/") {
    return `${parsed.protocol}//${parsed.host}${parsed.search}`;
  }
  return parsed.toString();
};

export const originOf = (url: string): string | null => {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed.origin : null;
  } catch {
    return null;
  }
};

/** True for http(s) URLs on exactly `origin` (scheme, host and port). */
export const isSameOrigin = (url: string, origin: string): boolean => {
  return originOf(url) === origin;
};
