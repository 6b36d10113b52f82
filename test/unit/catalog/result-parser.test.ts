// ---------------------------------------------------------------------------
// Tests for the catalog result parser.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  DEFAULT_SELECTORS,
  extractDetailLink,
  extractRatingCount,
  parseGenreTags,
  parseSearchResults,
} from "../../../src/catalog/result-parser.js";
import { bookPage, EMPTY_PAGE, ratingText, searchPage } from "../../helpers/catalog-html.js";

const BASE = "https://catalog.test";

describe("parseSearchResults", () => {
  it("returns only the first record", () => {
    const html = searchPage([
      { title: "First", href: "/book/show/1.First", ratingText: ratingText("1,200") },
      { title: "Second", href: "/book/show/2.Second", ratingText: ratingText("90,000") },
    ]);

    expect(parseSearchResults(html)).toEqual({
      ratingText: "4.05 avg rating — 1,200 ratings",
      detailHref: "/book/show/1.First",
    });
  });

  it("returns null when the page has no records", () => {
    expect(parseSearchResults(EMPTY_PAGE)).toBeNull();
    expect(parseSearchResults("")).toBeNull();
  });

  it("reports missing rating text and link as null", () => {
    const html = searchPage([{ title: "Bare" }]);
    expect(parseSearchResults(html)).toEqual({ ratingText: null, detailHref: null });
  });

  it("honours custom selectors", () => {
    const html = `<ul><li class="hit"><em>10 ratings</em><a class="t" href="/b/7">B</a></li></ul>`;
    const record = parseSearchResults(html, {
      ...DEFAULT_SELECTORS,
      searchRecord: "li.hit",
      ratingText: "em",
      detailLink: "a.t",
    });
    expect(record).toEqual({ ratingText: "10 ratings", detailHref: "/b/7" });
  });
});

describe("extractRatingCount", () => {
  it("reads the count after the em dash, without separators", () => {
    expect(extractRatingCount({ ratingText: ratingText("12,345"), detailHref: null })).toBe(
      12345,
    );
  });

  it("treats unparseable or missing text as 0", () => {
    expect(extractRatingCount({ ratingText: "no ratings yet", detailHref: null })).toBe(0);
    expect(extractRatingCount({ ratingText: "4.1 avg — many", detailHref: null })).toBe(0);
    expect(extractRatingCount({ ratingText: null, detailHref: null })).toBe(0);
  });

  it("parses a bare count without a dash", () => {
    expect(extractRatingCount({ ratingText: "499 ratings", detailHref: null })).toBe(499);
  });
});

describe("extractDetailLink", () => {
  it("resolves a root-relative href against the catalog root", () => {
    expect(
      extractDetailLink({ ratingText: null, detailHref: "/book/show/1.First" }, BASE),
    ).toBe("https://catalog.test/book/show/1.First");
  });

  it("keeps absolute hrefs", () => {
    expect(
      extractDetailLink({ ratingText: null, detailHref: "https://other.test/b/1" }, BASE),
    ).toBe("https://other.test/b/1");
  });

  it("keeps the path of the catalog root", () => {
    expect(
      extractDetailLink({ ratingText: null, detailHref: "/book/show/1" }, "https://mirror.test/gr"),
    ).toBe("https://mirror.test/gr/book/show/1");
  });

  it("returns null for a missing href", () => {
    expect(extractDetailLink({ ratingText: null, detailHref: null }, BASE)).toBeNull();
  });
});

describe("parseGenreTags", () => {
  it("returns trimmed labels in page order without duplicates", () => {
    const html = bookPage(["Fantasy", " Classics ", "Fantasy", "Fiction"]);
    expect(parseGenreTags(html)).toEqual(["Fantasy", "Classics", "Fiction"]);
  });

  it("drops blank labels", () => {
    expect(parseGenreTags(bookPage(["  ", "Horror"]))).toEqual(["Horror"]);
  });

  it("returns an empty list when no genres are present", () => {
    expect(parseGenreTags(EMPTY_PAGE)).toEqual([]);
    expect(parseGenreTags("")).toEqual([]);
  });
});
