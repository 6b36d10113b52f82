// ---------------------------------------------------------------------------
// PlaywrightPageFetcher – scripted-browser fetch of catalog pages.
//
// Navigates a real Chromium page so client-rendered content is present,
// optionally clicks a "show more" control, and gives the expected element
// one bounded wait. Missing controls and elements are not failures: the
// page content present at that point is returned.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { PageFetcher, PageHints } from "../core/types.js";
import { FetchConnectionError, FetchTimeoutError } from "../core/errors.js";
import type { BrowserPage, PageProvider } from "./browser-pool.js";

export interface PlaywrightFetcherOptions {
  /** Navigation timeout (ms). */
  timeoutMs: number;
  /** Bound on each reveal/wait step (ms). */
  revealWaitMs: number;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.message.includes("Timeout"))
  );
}

export class PlaywrightPageFetcher implements PageFetcher {
  private readonly logger: pino.Logger;

  constructor(
    private readonly pages: PageProvider,
    private readonly options: PlaywrightFetcherOptions,
    logger: pino.Logger,
  ) {
    this.logger = logger.child({ module: "playwright-fetcher" });
  }

  fetch(url: string, hints: PageHints = {}): Promise<string> {
    const { reveal, waitFor } = hints;

    return this.pages.withPage(async (page) => {
      await this.navigate(page, url);

      if (reveal) {
        await this.tryStep(url, "reveal control not found", () =>
          page.click(reveal, { timeout: this.options.revealWaitMs }),
        );
      }

      if (waitFor) {
        await this.tryStep(url, "expected element not found", () =>
          page.waitForSelector(waitFor, {
            state: "attached",
            timeout: this.options.revealWaitMs,
          }),
        );
      }

      return page.content();
    });
  }

  async close(): Promise<void> {
    await this.pages.shutdown();
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async navigate(page: BrowserPage, url: string): Promise<void> {
    this.logger.debug({ url }, "Navigating to catalog page");
    try {
      await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new FetchTimeoutError(url, this.options.timeoutMs, {
          cause: error,
        });
      }
      throw new FetchConnectionError(
        `Navigation failed for ${url}: ${error instanceof Error ? error.message : "unknown"}`,
        url,
        { cause: error },
      );
    }
  }

  /** Run one bounded interaction. Failing it never fails the fetch. */
  private async tryStep(
    url: string,
    message: string,
    step: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await step();
    } catch (error) {
      if (isTimeout(error)) {
        this.logger.debug(
          { url, waitMs: this.options.revealWaitMs },
          `${message}; proceeding with available content`,
        );
      } else {
        this.logger.warn(
          { url, err: error },
          "page interaction failed; proceeding with available content",
        );
      }
    }
  }
}
