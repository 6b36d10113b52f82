// ---------------------------------------------------------------------------
// URL construction for the catalog's search and detail pages.
// ---------------------------------------------------------------------------

/** `<root>/search?q=<query>`, form-encoded (spaces become `+`). */
export function buildSearchUrl(baseUrl: string, query: string): string {
  const root = baseUrl.replace(/\/+$/, "");
  const params = new URLSearchParams({ q: query });
  return `${root}/search?${params.toString()}`;
}

/**
 * Resolve a detail-page href against the catalog root. Root-relative hrefs
 * keep any path the root carries; absolute hrefs are taken as they are.
 * Returns `null` for blank or unparseable hrefs.
 */
export function resolveDetailUrl(
  baseUrl: string,
  href: string | null,
): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  const root = baseUrl.replace(/\/+$/, "");
  try {
    if (trimmed.startsWith("/") && !trimmed.startsWith("//")) {
      return new URL(`${root}${trimmed}`).toString();
    }
    return new URL(trimmed, `${root}/`).toString();
  } catch {
    return null;
  }
}
