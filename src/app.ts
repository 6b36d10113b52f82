// ---------------------------------------------------------------------------
// genre-shelf -- Application bootstrap (shared by the CLI and the server).
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig, PageFetcher, TextNormalizer } from "./core/types.js";
import { createLogger } from "./logging/logger.js";
import { RunMetrics } from "./metrics/run-metrics.js";
import { MarkerStore } from "./store/marker-store.js";
import { HttpPageFetcher } from "./fetcher/http-fetcher.js";
import { BrowserPool } from "./fetcher/browser-pool.js";
import { PlaywrightPageFetcher } from "./fetcher/playwright-fetcher.js";
import {
  AnthropicTextNormalizer,
  createAnthropicClient,
} from "./normalizer/anthropic-normalizer.js";
import { QueryNormalizer } from "./normalizer/query-normalizer.js";
import { EnrichmentOrchestrator } from "./orchestrator/enrichment-orchestrator.js";
import { BatchScheduler } from "./orchestrator/batch-scheduler.js";
import { GenreShelf } from "./genre-shelf.js";
import { createApp, type AppEnv } from "./api/server.js";

/** Replacements for the collaborators `buildGenreShelf` would create. */
export interface GenreShelfOverrides {
  logger?: pino.Logger;
  fetcher?: PageFetcher;
  /** `null` forces the raw-filename fallback. */
  textNormalizer?: TextNormalizer | null;
  /** Defaults to `ANTHROPIC_API_KEY` from the environment. */
  anthropicApiKey?: string;
}

// ── Factories ──────────────────────────────────────────────────────────────

function createFetcher(config: AppConfig, logger: pino.Logger): PageFetcher {
  const { fetcher } = config;
  switch (fetcher.kind) {
    case "http":
      return new HttpPageFetcher(
        { timeoutMs: fetcher.timeoutMs, userAgent: fetcher.userAgent },
        logger,
      );
    case "browser": {
      const pool = new BrowserPool({
        maxPages: config.scheduler.batchSize,
        userAgent: fetcher.userAgent,
        executablePath: fetcher.executablePath,
        headless: fetcher.headless,
      });
      return new PlaywrightPageFetcher(
        pool,
        { timeoutMs: fetcher.timeoutMs, revealWaitMs: fetcher.revealWaitMs },
        logger,
      );
    }
  }
}

function createTextNormalizer(
  config: AppConfig,
  apiKey: string | undefined,
  logger: pino.Logger,
): TextNormalizer | null {
  if (config.normalizer.kind === "none") return null;

  if (!apiKey) {
    logger.warn(
      "ANTHROPIC_API_KEY is not set; queries will be built from raw file names",
    );
    return null;
  }
  return new AnthropicTextNormalizer(createAnthropicClient(apiKey), {
    model: config.normalizer.model,
    maxTokens: config.normalizer.maxTokens,
  });
}

// ── Main ───────────────────────────────────────────────────────────────────

/** Wire every component of the pipeline from configuration. */
export function buildGenreShelf(
  config: AppConfig,
  overrides: GenreShelfOverrides = {},
): GenreShelf {
  // 1. Logger and metrics
  const logger = overrides.logger ?? createLogger(config.logging);
  const metrics = new RunMetrics();

  // 2. Collaborators
  const fetcher = overrides.fetcher ?? createFetcher(config, logger);
  const textNormalizer =
    overrides.textNormalizer !== undefined
      ? overrides.textNormalizer
      : createTextNormalizer(
          config,
          overrides.anthropicApiKey ?? process.env["ANTHROPIC_API_KEY"],
          logger,
        );

  // 3. Pipeline
  const store = new MarkerStore();
  const normalizer = new QueryNormalizer(
    { textNormalizer, extensions: config.library.bookExtensions, metrics },
    logger,
  );
  const orchestrator = new EnrichmentOrchestrator(
    fetcher,
    store,
    {
      catalogBaseUrl: config.catalog.baseUrl,
      popularityThreshold: config.catalog.popularityThreshold,
      selectors: config.catalog.selectors,
    },
    logger,
    metrics,
  );
  const scheduler = new BatchScheduler(
    normalizer,
    orchestrator,
    { batchSize: config.scheduler.batchSize },
    logger,
  );

  logger.debug(
    {
      env: config.env,
      fetcher: config.fetcher.kind,
      normalizer: textNormalizer ? config.normalizer.kind : "none",
      batchSize: config.scheduler.batchSize,
      popularityThreshold: config.catalog.popularityThreshold,
    },
    "genre-shelf ready",
  );

  return new GenreShelf({
    store,
    scheduler,
    fetcher,
    metrics,
    extensions: config.library.bookExtensions,
    logger,
  });
}

/** Build the facade and the Hono app serving it. */
export function buildApp(
  config: AppConfig,
  overrides: GenreShelfOverrides = {},
): { app: Hono<AppEnv>; shelf: GenreShelf; logger: pino.Logger } {
  const logger = overrides.logger ?? createLogger(config.logging);
  const shelf = buildGenreShelf(config, { ...overrides, logger });
  const app = createApp({
    shelf,
    logger,
    exposeErrors: config.env !== "production",
  });
  return { app, shelf, logger };
}
