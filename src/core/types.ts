// ---------------------------------------------------------------------------
// Core types for the genre-shelf service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Books ───────────────────────────────────────────────────────────────────

/** One managed e-book file, as found by the directory scan. */
export interface BookFile {
  /** Original file name, e.g. `Dune - Frank Herbert.epub`. */
  fileName: string;
  /** File name without its extension. Markers are keyed on this. */
  baseName: string;
  /** Lower-cased extension including the dot. */
  extension: string;
  directory: string;
  path: string;
}

export const QuerySource = {
  MODEL: "model",
  FALLBACK: "fallback",
} as const;
export type QuerySource = (typeof QuerySource)[keyof typeof QuerySource];

/** A search-safe query derived from a book's file name. */
export interface NormalizedQuery {
  book: BookFile;
  query: string;
  source: QuerySource;
}

// ── Outcomes ────────────────────────────────────────────────────────────────

export const OutcomeKind = {
  TAGGED: "tagged",
  UNPOPULAR: "unpopular",
  UNKNOWN: "unknown",
} as const;
export type OutcomeKind = (typeof OutcomeKind)[keyof typeof OutcomeKind];

/**
 * The persisted three-way enrichment result for a book.
 *
 * `tagged` always carries at least one genre; construct outcomes through
 * the helpers in `outcome.ts` rather than by hand.
 */
export type GenreOutcome =
  | { kind: "tagged"; genres: readonly string[] }
  | { kind: "unpopular" }
  | { kind: "unknown" };

// ── Catalog ─────────────────────────────────────────────────────────────────

/** The first matching row of a catalog search page. */
export interface SearchRecord {
  ratingText: string | null;
  detailHref: string | null;
}

/** CSS selectors describing the catalog's markup. */
export interface CatalogSelectors {
  searchRecord: string;
  ratingText: string;
  detailLink: string;
  genreLabel: string;
  revealMore: string;
}

/**
 * Hints for fetchers that can interact with a page. Fetchers that cannot
 * (plain HTTP) ignore them.
 */
export interface PageHints {
  /** Element to wait for, once, before reading the page. */
  waitFor?: string;
  /** Control to click to reveal more content. */
  reveal?: string;
}

/** Retrieves the HTML of a catalog page. */
export interface PageFetcher {
  fetch(url: string, hints?: PageHints): Promise<string>;
  close(): Promise<void>;
}

/** Opaque text clean-up capability: messy filename in, "title author" out. */
export interface TextNormalizer {
  normalize(fileName: string): Promise<string>;
}

// ── Enrichment ──────────────────────────────────────────────────────────────

export const EnrichmentState = {
  QUERIED: "queried",
  SEARCH_FETCHED: "search_fetched",
  NO_MATCH: "no_match",
  RATING_CHECKED: "rating_checked",
  BELOW_THRESHOLD: "below_threshold",
  MISSING_LINK: "missing_link",
  DETAIL_FETCHED: "detail_fetched",
  PARSE_FAILED: "parse_failed",
  TAGGED: "tagged",
} as const;
export type EnrichmentState =
  (typeof EnrichmentState)[keyof typeof EnrichmentState];

export interface EnrichmentReport {
  book: BookFile;
  query: string;
  outcome: GenreOutcome;
  /** Every state the book passed through, in order. */
  trail: EnrichmentState[];
  ratingCount: number | null;
  detailUrl: string | null;
}

export interface ItemError {
  fileName: string;
  stage: "scan" | "normalize" | "enrich";
  message: string;
}

export interface RunSummary {
  directory: string;
  discovered: number;
  skipped: number;
  processed: number;
  batches: number;
  outcomes: Record<OutcomeKind, number>;
  errors: ItemError[];
  durationMs: number;
}

// ── Library operations ──────────────────────────────────────────────────────

export interface GenreEntry {
  genre: string;
  count: number;
  books: string[];
}

export interface MoveResult {
  genre: string;
  targetDirectory: string;
  moved: number;
  errors: string[];
}

export interface DeleteResult {
  genre: string;
  cancelled: boolean;
  deleted: number;
  errors: string[];
}

/** Asks the user to approve a destructive operation. */
export type ConfirmFn = (prompt: string) => boolean | Promise<boolean>;

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  server: ServerConfig;
  catalog: CatalogConfig;
  scheduler: SchedulerConfig;
  fetcher: FetcherConfig;
  normalizer: NormalizerConfig;
  library: LibraryConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  port: number;
}

export interface CatalogConfig {
  baseUrl: string;
  popularityThreshold: number;
  selectors: CatalogSelectors;
}

export interface SchedulerConfig {
  batchSize: number;
}

export interface FetcherConfig {
  kind: "http" | "browser";
  timeoutMs: number;
  revealWaitMs: number;
  userAgent: string;
  headless: boolean;
  executablePath?: string;
}

export interface NormalizerConfig {
  kind: "anthropic" | "none";
  model: string;
  maxTokens: number;
}

export interface LibraryConfig {
  bookExtensions: string[];
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
