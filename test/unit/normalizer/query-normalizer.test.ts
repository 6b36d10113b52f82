// ---------------------------------------------------------------------------
// Tests for QueryNormalizer: model first, raw-filename sanitize as fallback.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { QueryNormalizer } from "../../../src/normalizer/query-normalizer.js";
import { toBookFile } from "../../../src/library/book-scanner.js";
import { RunMetrics } from "../../../src/metrics/run-metrics.js";
import type { TextNormalizer } from "../../../src/core/types.js";
import {
  createCapturingLogger,
  createSilentLogger,
  TableNormalizer,
} from "../../helpers/fixtures.js";

const BOOK = toBookFile("/books", "Emma (Penguin Classics) - AUSTEN, JANE.epub");

describe("QueryNormalizer", () => {
  it("uses the model answer, sanitized", async () => {
    const model = new TableNormalizer({ [BOOK.fileName]: "Emma, Jane Austen!" });
    const normalizer = new QueryNormalizer(
      { textNormalizer: model },
      createSilentLogger(),
    );

    const result = await normalizer.normalize(BOOK);

    expect(result).toEqual({ book: BOOK, query: "Emma Jane Austen", source: "model" });
    expect(model.calls).toEqual([BOOK.fileName]);
  });

  it("falls back to the sanitized file name when the model fails", async () => {
    const { logger, lines } = createCapturingLogger();
    const normalizer = new QueryNormalizer(
      { textNormalizer: new TableNormalizer({}) },
      logger,
    );

    const result = await normalizer.normalize(BOOK);

    expect(result.source).toBe("fallback");
    expect(result.query).toBe("Emma Penguin Classics AUSTEN JANE");
    const warning = lines.find(
      (l) => l["msg"] === "normalization failed; sanitizing raw file name",
    );
    expect(warning?.["level"]).toBe(40);
    expect(warning?.["fileName"]).toBe(BOOK.fileName);
  });

  it("falls back when the model answers with nothing usable", async () => {
    const blank: TextNormalizer = { normalize: async () => "  ?!  " };
    const normalizer = new QueryNormalizer(
      { textNormalizer: blank },
      createSilentLogger(),
    );

    const result = await normalizer.normalize(BOOK);

    expect(result.source).toBe("fallback");
    expect(result.query).toBe("Emma Penguin Classics AUSTEN JANE");
  });

  it("sanitizes the raw name without a model", async () => {
    const normalizer = new QueryNormalizer(
      { textNormalizer: null },
      createSilentLogger(),
    );

    const result = await normalizer.normalize(
      toBookFile("/books", "a to Z of Girlfriends, The - Natasha West.epub"),
    );

    expect(result.query).toBe("a to Z of Girlfriends The Natasha West");
    expect(result.source).toBe("fallback");
  });

  it("counts normalizations by source", async () => {
    const metrics = new RunMetrics();
    const normalizer = new QueryNormalizer(
      {
        textNormalizer: new TableNormalizer({ [BOOK.fileName]: "Emma Jane Austen" }),
        metrics,
      },
      createSilentLogger(),
    );

    await normalizer.normalize(BOOK);
    await normalizer.normalize(toBookFile("/books", "Unknown Title.epub"));

    expect(metrics.snapshot().normalizations).toEqual({ model: 1, fallback: 1 });
  });
});
