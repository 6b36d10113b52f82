// ---------------------------------------------------------------------------
// EnrichmentOrchestrator: drives one book from query to persisted outcome.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  CatalogSelectors,
  EnrichmentReport,
  EnrichmentState,
  GenreOutcome,
  NormalizedQuery,
  PageFetcher,
  PageHints,
} from "../core/types.js";
import { outcomeFromGenres, UNKNOWN, UNPOPULAR } from "../core/outcome.js";
import { buildSearchUrl } from "../catalog/catalog-urls.js";
import {
  extractDetailLink,
  extractRatingCount,
  parseGenreTags,
  parseSearchResults,
} from "../catalog/result-parser.js";
import type { MarkerStore } from "../store/marker-store.js";
import type { FetchKind, RunMetrics } from "../metrics/run-metrics.js";

export interface OrchestratorOptions {
  catalogBaseUrl: string;
  /** Books with fewer ratings than this are `unpopular`. */
  popularityThreshold: number;
  selectors: CatalogSelectors;
}

/**
 * Runs the per-book state machine:
 *
 *   queried → search_fetched → no_match                      → unknown
 *                            → rating_checked → below_threshold → unpopular
 *                                             → missing_link    → unknown
 *                                             → detail_fetched  → parse_failed → unknown
 *                                                               → tagged
 *
 * The popularity gate runs before the detail fetch so unpopular books
 * cost a single request. Fetch failures never escape: the step carries on
 * with empty content and the book ends up `unknown`. Each terminal state
 * writes exactly one marker and logs one info line.
 */
export class EnrichmentOrchestrator {
  private readonly logger: pino.Logger;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly store: MarkerStore,
    private readonly options: OrchestratorOptions,
    logger: pino.Logger,
    private readonly metrics?: RunMetrics,
  ) {
    this.logger = logger.child({ module: "orchestrator" });
  }

  async enrich(normalized: NormalizedQuery): Promise<EnrichmentReport> {
    const { book, query } = normalized;
    const { selectors } = this.options;
    const trail: EnrichmentState[] = ["queried"];
    let ratingCount: number | null = null;
    let detailUrl: string | null = null;

    const finish = async (outcome: GenreOutcome): Promise<EnrichmentReport> => {
      const marker = await this.store.writeOutcome(book, outcome);
      this.metrics?.recordOutcome(outcome.kind);
      this.logger.info(
        {
          fileName: book.fileName,
          query,
          outcome: outcome.kind,
          genres: outcome.kind === "tagged" ? outcome.genres : undefined,
          state: trail[trail.length - 1],
          marker,
        },
        "enrichment outcome recorded",
      );
      return { book, query, outcome, trail, ratingCount, detailUrl };
    };

    // 1. Search
    const searchUrl = buildSearchUrl(this.options.catalogBaseUrl, query);
    const searchHtml = await this.fetchPage("search", searchUrl, {
      waitFor: selectors.searchRecord,
    });
    trail.push("search_fetched");

    // 2. First match
    const record = parseSearchResults(searchHtml, selectors);
    if (!record) {
      trail.push("no_match");
      return finish(UNKNOWN);
    }

    // 3. Popularity gate
    ratingCount = extractRatingCount(record);
    trail.push("rating_checked");
    if (ratingCount < this.options.popularityThreshold) {
      trail.push("below_threshold");
      return finish(UNPOPULAR);
    }

    // 4. Detail link
    detailUrl = extractDetailLink(record, this.options.catalogBaseUrl);
    if (!detailUrl) {
      trail.push("missing_link");
      return finish(UNKNOWN);
    }

    // 5. Genres
    const detailHtml = await this.fetchPage("detail", detailUrl, {
      reveal: selectors.revealMore,
      waitFor: selectors.genreLabel,
    });
    trail.push("detail_fetched");

    const outcome = outcomeFromGenres(parseGenreTags(detailHtml, selectors));
    trail.push(outcome.kind === "tagged" ? "tagged" : "parse_failed");
    return finish(outcome);
  }

  /** Fetch a page, degrading any failure to empty content. */
  private async fetchPage(
    kind: FetchKind,
    url: string,
    hints: PageHints,
  ): Promise<string> {
    const start = performance.now();
    try {
      const html = await this.fetcher.fetch(url, hints);
      this.metrics?.recordFetch(kind, "success", Math.round(performance.now() - start));
      return html;
    } catch (err) {
      this.metrics?.recordFetch(kind, "failure", Math.round(performance.now() - start));
      this.logger.warn(
        { kind, url, err },
        "fetch failed; continuing with empty content",
      );
      return "";
    }
  }
}
