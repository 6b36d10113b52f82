// ---------------------------------------------------------------------------
// QueryNormalizer: book file -> catalog search query.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { BookFile, NormalizedQuery, TextNormalizer } from "../core/types.js";
import { NormalizationError } from "../core/errors.js";
import type { RunMetrics } from "../metrics/run-metrics.js";
import { DEFAULT_BOOK_EXTENSIONS, sanitizeQuery } from "./sanitize.js";

export interface QueryNormalizerOptions {
  /** Model-backed clean-up. When `null`, every query comes from the raw name. */
  textNormalizer: TextNormalizer | null;
  extensions?: readonly string[];
  metrics?: RunMetrics;
}

/**
 * Rewrites a book's file name into a search query.
 *
 * The text normalizer is asked first and its answer sanitized. When it is
 * missing, fails or answers with blank text, the raw file name is sanitized
 * instead and the fallback is logged.
 */
export class QueryNormalizer {
  private readonly textNormalizer: TextNormalizer | null;
  private readonly extensions: readonly string[];
  private readonly metrics?: RunMetrics;
  private readonly logger: pino.Logger;

  constructor(options: QueryNormalizerOptions, logger: pino.Logger) {
    this.textNormalizer = options.textNormalizer;
    this.extensions = options.extensions ?? DEFAULT_BOOK_EXTENSIONS;
    this.metrics = options.metrics;
    this.logger = logger.child({ module: "normalizer" });
  }

  async normalize(book: BookFile): Promise<NormalizedQuery> {
    if (this.textNormalizer) {
      try {
        const query = await this.fromModel(this.textNormalizer, book);
        this.metrics?.recordNormalization("model");
        return { book, query, source: "model" };
      } catch (err) {
        this.logger.warn(
          { fileName: book.fileName, err },
          "normalization failed; sanitizing raw file name",
        );
      }
    }

    const query = sanitizeQuery(book.fileName, this.extensions);
    this.metrics?.recordNormalization("fallback");
    this.logger.debug({ fileName: book.fileName, query }, "fallback query");
    return { book, query, source: "fallback" };
  }

  private async fromModel(
    textNormalizer: TextNormalizer,
    book: BookFile,
  ): Promise<string> {
    let cleaned: string;
    try {
      cleaned = await textNormalizer.normalize(book.fileName);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new NormalizationError(book.fileName, reason, { cause: err });
    }

    const query = sanitizeQuery(cleaned, this.extensions);
    if (!query) {
      throw new NormalizationError(book.fileName, "empty response");
    }
    return query;
  }
}
