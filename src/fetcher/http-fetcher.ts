// ---------------------------------------------------------------------------
// HttpPageFetcher – direct HTTP GET of catalog pages.
//
// Cannot run scripts or click anything, so page hints are ignored and the
// caller gets whatever HTML the server renders up front.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type { PageFetcher, PageHints } from "../core/types.js";
import {
  FetchConnectionError,
  FetchHttpError,
  FetchTimeoutError,
} from "../core/errors.js";

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly logger: pino.Logger;

  constructor(
    private readonly options: HttpFetcherOptions,
    logger: pino.Logger,
  ) {
    this.logger = logger.child({ module: "http-fetcher" });
  }

  async fetch(url: string, _hints?: PageHints): Promise<string> {
    this.logger.debug({ url }, "Fetching catalog page");

    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
        headers: {
          Accept: "text/html",
          "User-Agent": this.options.userAgent,
        },
      });
    } catch (error: unknown) {
      if (
        error instanceof DOMException &&
        (error.name === "TimeoutError" || error.name === "AbortError")
      ) {
        throw new FetchTimeoutError(url, this.options.timeoutMs, {
          cause: error,
        });
      }
      const msg = error instanceof Error ? error.message : String(error);
      throw new FetchConnectionError(`Network error fetching ${url}: ${msg}`, url, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new FetchHttpError(url, response.status);
    }

    return response.text();
  }

  async close(): Promise<void> {
    // Nothing held open between requests.
  }
}
