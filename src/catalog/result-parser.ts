// ---------------------------------------------------------------------------
// Catalog result parser – pulls the first search match, its rating count
// and detail link, and a book page's genre labels out of catalog HTML.
//
// Default selectors follow the Goodreads markup:
//
//   <tr itemscope itemtype="http://schema.org/Book">
//     <a class="bookTitle" href="/book/show/123.Title">Title</a>
//     <span class="greyText smallText uitext">
//       <span class="minirating">4.12 avg rating — 12,345 ratings</span>
//     </span>
//   </tr>
//
//   <span class="BookPageMetadataSection__genreButton">
//     <a><span class="Button__labelItem">Fantasy</span></a>
//   </span>
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";

import type { CatalogSelectors, SearchRecord } from "../core/types.js";
import { CatalogSelectorsSchema } from "../config/config.js";
import { resolveDetailUrl } from "./catalog-urls.js";

export const DEFAULT_SELECTORS: CatalogSelectors = CatalogSelectorsSchema.parse(
  {},
);

/**
 * Return the first book record on a search page, or `null` when the page
 * has none. Later records are never looked at.
 */
export function parseSearchResults(
  html: string,
  selectors: CatalogSelectors = DEFAULT_SELECTORS,
): SearchRecord | null {
  if (!html) return null;

  const $ = cheerio.load(html);
  const $first = $(selectors.searchRecord).first();
  if ($first.length === 0) return null;

  const ratingText = $first.find(selectors.ratingText).first().text().trim();
  const detailHref = $first.find(selectors.detailLink).first().attr("href");

  return {
    ratingText: ratingText || null,
    detailHref: detailHref?.trim() || null,
  };
}

/**
 * Number of ratings for a record.
 *
 * Rating text looks like `4.12 avg rating — 12,345 ratings`: the count is
 * the first token after the last em dash, with thousands separators
 * removed. Anything unparseable counts as 0.
 */
export function extractRatingCount(record: SearchRecord): number {
  if (!record.ratingText) return 0;

  const segment = record.ratingText.split("—").pop() ?? "";
  const token = segment.trim().split(/\s+/)[0] ?? "";
  const digits = token.replace(/,/g, "");

  if (!/^\d+$/.test(digits)) return 0;
  const count = Number.parseInt(digits, 10);
  return Number.isSafeInteger(count) ? count : 0;
}

/** Absolute detail-page URL of a record, or `null`. */
export function extractDetailLink(
  record: SearchRecord,
  catalogBaseUrl: string,
): string | null {
  return resolveDetailUrl(catalogBaseUrl, record.detailHref);
}

/**
 * Genre labels on a book detail page: trimmed, blanks dropped, duplicates
 * collapsed, in page order.
 */
export function parseGenreTags(
  html: string,
  selectors: CatalogSelectors = DEFAULT_SELECTORS,
): string[] {
  if (!html) return [];

  const $ = cheerio.load(html);
  const genres = new Set<string>();

  $(selectors.genreLabel).each((_index, element) => {
    const label = $(element).text().trim();
    if (label) genres.add(label);
  });

  return [...genres];
}
