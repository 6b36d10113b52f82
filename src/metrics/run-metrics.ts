// ---------------------------------------------------------------------------
// In-memory metrics for enrichment runs: fetches, normalizations, outcomes.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { OutcomeKind, QuerySource } from "../core/types.js";

/** Which page a fetch was for. */
export type FetchKind = "search" | "detail";

/** Result of a single fetch. */
export type FetchResult = "success" | "failure";

interface FetchMetrics {
  total: number;
  successCount: number;
  failureCount: number;
  totalDurationMs: number;
  maxDurationMs: number;
}

/** Immutable snapshot of all metrics at a point in time. */
export interface RunMetricsSnapshot {
  fetches: Readonly<Record<FetchKind, Readonly<FetchMetrics>>>;
  normalizations: Readonly<Record<QuerySource, number>>;
  outcomes: Readonly<Record<OutcomeKind, number>>;
  collectedAt: string;
}

function emptyFetchMetrics(): FetchMetrics {
  return {
    total: 0,
    successCount: 0,
    failureCount: 0,
    totalDurationMs: 0,
    maxDurationMs: 0,
  };
}

/**
 * Counts what the pipeline did during one run. Shared by the normalizer and
 * the orchestrator; the facade calls {@link RunMetrics.reset} as each run
 * starts.
 */
export class RunMetrics {
  private readonly fetches: Record<FetchKind, FetchMetrics> = {
    search: emptyFetchMetrics(),
    detail: emptyFetchMetrics(),
  };
  private readonly normalizations: Record<QuerySource, number> = {
    model: 0,
    fallback: 0,
  };
  private readonly outcomes: Record<OutcomeKind, number> = {
    tagged: 0,
    unpopular: 0,
    unknown: 0,
  };

  /** Zero every counter. */
  reset(): void {
    this.fetches.search = emptyFetchMetrics();
    this.fetches.detail = emptyFetchMetrics();
    for (const source of Object.values(QuerySource)) {
      this.normalizations[source] = 0;
    }
    for (const kind of Object.values(OutcomeKind)) {
      this.outcomes[kind] = 0;
    }
  }

  recordFetch(kind: FetchKind, result: FetchResult, durationMs: number): void {
    const m = this.fetches[kind];
    m.total++;
    m.totalDurationMs += durationMs;
    if (durationMs > m.maxDurationMs) m.maxDurationMs = durationMs;
    if (result === "success") {
      m.successCount++;
    } else {
      m.failureCount++;
    }
  }

  recordNormalization(source: QuerySource): void {
    this.normalizations[source]++;
  }

  recordOutcome(kind: OutcomeKind): void {
    this.outcomes[kind]++;
  }

  snapshot(): RunMetricsSnapshot {
    return {
      fetches: {
        search: { ...this.fetches.search },
        detail: { ...this.fetches.detail },
      },
      normalizations: { ...this.normalizations },
      outcomes: { ...this.outcomes },
      collectedAt: new Date().toISOString(),
    };
  }

  /** Write the current snapshot as one info line. */
  logReport(logger: pino.Logger): void {
    const snap = this.snapshot();
    logger.info(
      {
        searchFetches: snap.fetches.search.total,
        detailFetches: snap.fetches.detail.total,
        fetchFailures:
          snap.fetches.search.failureCount + snap.fetches.detail.failureCount,
        normalizations: snap.normalizations,
        outcomes: snap.outcomes,
      },
      "run metrics",
    );
  }
}
