/**
 * Identity key of a feed URL. The scheme is dropped so that the http and
 * https addresses of a source resolve to the same feed, and the host is
 * lowercased. Path and query keep their case.
 */
export function normalizeFeedUrl(url: string): string {
  const rest = url.trim().replace(/^https?:\/\//i, "");
  const hostEnd = rest.search(/[/?#]/);
  const host = hostEnd === -1 ? rest : rest.slice(0, hostEnd);
  return host.toLowerCase() + rest.slice(host.length);
}

/** True for absolute http(s) URLs, the only kind a feed can be fetched from. */
export function isFetchableUrl(url: string): boolean {
  try {
    const parsed = new URL(url.trim());
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}
