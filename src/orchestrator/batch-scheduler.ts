// ---------------------------------------------------------------------------
// BatchScheduler: fixed-size batches with a barrier between them.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  BookFile,
  EnrichmentReport,
  ItemError,
  NormalizedQuery,
  OutcomeKind,
} from "../core/types.js";
import type { QueryNormalizer } from "../normalizer/query-normalizer.js";
import type { EnrichmentOrchestrator } from "./enrichment-orchestrator.js";
import { chunk, settleAll } from "./concurrency.js";

export interface BatchSchedulerOptions {
  /** Books per batch, and the bound on in-flight work within one. */
  batchSize: number;
}

export interface RunHooks {
  /** Called after each batch's writes have all settled. */
  onBatchComplete?: (done: number, total: number) => void;
}

export interface BatchRunResult {
  processed: number;
  batches: number;
  outcomes: Record<OutcomeKind, number>;
  reports: EnrichmentReport[];
  errors: ItemError[];
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Processes books batch by batch. Within a batch every book is normalized,
 * then every normalized book is enriched, each phase bounded by the batch
 * size. Nothing from one batch is still running when the next one starts.
 *
 * One book failing never stops the run; its error is collected and the
 * remaining books carry on.
 */
export class BatchScheduler {
  private readonly logger: pino.Logger;

  constructor(
    private readonly normalizer: QueryNormalizer,
    private readonly orchestrator: EnrichmentOrchestrator,
    private readonly options: BatchSchedulerOptions,
    logger: pino.Logger,
  ) {
    this.logger = logger.child({ module: "scheduler" });
  }

  async run(
    books: readonly BookFile[],
    hooks: RunHooks = {},
  ): Promise<BatchRunResult> {
    const { batchSize } = this.options;
    const batches = chunk(books, batchSize);
    const result: BatchRunResult = {
      processed: 0,
      batches: batches.length,
      outcomes: { tagged: 0, unpopular: 0, unknown: 0 },
      reports: [],
      errors: [],
    };

    let done = 0;
    for (const [i, batch] of batches.entries()) {
      this.logger.debug(
        { batch: i + 1, of: batches.length, size: batch.length },
        "starting batch",
      );

      const queries = await this.normalizeBatch(batch, result.errors);
      const reports = await this.enrichBatch(queries, result.errors);

      for (const report of reports) {
        result.reports.push(report);
        result.outcomes[report.outcome.kind]++;
        result.processed++;
      }

      done += batch.length;
      this.logger.info(
        { batch: i + 1, of: batches.length, done, total: books.length },
        "batch complete",
      );
      hooks.onBatchComplete?.(done, books.length);
    }

    return result;
  }

  // ── Phases ──────────────────────────────────────────────────────────────

  private async normalizeBatch(
    batch: readonly BookFile[],
    errors: ItemError[],
  ): Promise<NormalizedQuery[]> {
    const settled = await settleAll(batch, this.options.batchSize, (book) =>
      this.normalizer.normalize(book),
    );

    const queries: NormalizedQuery[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        queries.push(outcome.value);
      } else {
        this.recordError(errors, batch[i], "normalize", outcome.reason);
      }
    });
    return queries;
  }

  private async enrichBatch(
    queries: readonly NormalizedQuery[],
    errors: ItemError[],
  ): Promise<EnrichmentReport[]> {
    const settled = await settleAll(queries, this.options.batchSize, (q) =>
      this.orchestrator.enrich(q),
    );

    const reports: EnrichmentReport[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        reports.push(outcome.value);
      } else {
        this.recordError(errors, queries[i]?.book, "enrich", outcome.reason);
      }
    });
    return reports;
  }

  private recordError(
    errors: ItemError[],
    book: BookFile | undefined,
    stage: ItemError["stage"],
    reason: unknown,
  ): void {
    const fileName = book?.fileName ?? "<unknown>";
    errors.push({ fileName, stage, message: describe(reason) });
    this.logger.error({ fileName, stage, err: reason }, "book failed");
  }
}
