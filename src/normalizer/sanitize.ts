// ---------------------------------------------------------------------------
// Deterministic clean-up of book names into catalog search queries.
// ---------------------------------------------------------------------------

/** Extensions stripped when the caller does not name its own. */
export const DEFAULT_BOOK_EXTENSIONS: readonly string[] = [".epub"];

/** ASCII punctuation removed from queries. Periods and hyphens survive. */
const PUNCTUATION = /[!"#$%&'()*+,/:;<=>?@[\\\]^_`{|}~]/g;

const BRACKETS = /[[\](){}]/g;

/**
 * Turn a (possibly model-cleaned) book name into a search-safe query.
 *
 * Pure: no I/O, no model call.
 */
export function sanitizeQuery(
  text: string,
  extensions: readonly string[] = DEFAULT_BOOK_EXTENSIONS,
): string {
  let query = text.trim();

  const lower = query.toLowerCase();
  const ext = extensions.find((e) => lower.endsWith(e.toLowerCase()));
  if (ext) {
    query = query.slice(0, query.length - ext.length);
  }

  query = query
    .replace(PUNCTUATION, "")
    .replace(BRACKETS, "")
    .replaceAll(" - ", " ")
    .replaceAll("- ", " ");

  return query.replace(/\s+/g, " ").trim();
}
