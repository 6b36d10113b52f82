// ---------------------------------------------------------------------------
// BrowserPool – shared Chromium instance for the scripted-browser fetcher.
//
// Each page gets its own BrowserContext. The browser is launched lazily on
// first use and the number of open pages is capped; callers beyond the cap
// wait for a slot.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type { Browser, Page } from "playwright-core";

/** The slice of a Playwright page the fetcher drives. */
export type BrowserPage = Pick<
  Page,
  "goto" | "click" | "waitForSelector" | "content"
>;

/** Hands out pages for the duration of a callback. */
export interface PageProvider {
  withPage<T>(fn: (page: BrowserPage) => Promise<T>): Promise<T>;
  shutdown(): Promise<void>;
}

export interface BrowserPoolOptions {
  /** Maximum number of concurrent pages. */
  maxPages: number;
  userAgent: string;
  /** Chromium executable path (optional, uses playwright default). */
  executablePath?: string;
  headless?: boolean;
}

export class BrowserPool implements PageProvider {
  private browser: Browser | null = null;
  private launchPromise: Promise<Browser> | null = null;
  private readonly limiter: ReturnType<typeof pLimit>;

  constructor(private readonly options: BrowserPoolOptions) {
    this.limiter = pLimit(options.maxPages);
  }

  /**
   * Run `fn` with an isolated page (new BrowserContext + Page).
   * The context is closed when `fn` settles.
   */
  withPage<T>(fn: (page: BrowserPage) => Promise<T>): Promise<T> {
    return this.limiter(async () => {
      const browser = await this.ensureBrowser();
      const context = await browser.newContext({
        userAgent: this.options.userAgent,
      });
      try {
        const page = await context.newPage();
        return await fn(page);
      } finally {
        await context.close();
      }
    });
  }

  /** Number of pages currently open. */
  get activePages(): number {
    return this.limiter.activeCount;
  }

  /** Shut down the browser instance. */
  async shutdown(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.launchPromise = null;
    if (browser) {
      await browser.close();
    }
  }

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser;
    }

    // Prevent multiple concurrent launches
    if (!this.launchPromise) {
      this.launchPromise = this.launchBrowser();
    }

    this.browser = await this.launchPromise;
    this.launchPromise = null;
    return this.browser;
  }

  private async launchBrowser(): Promise<Browser> {
    const { chromium } = await import("playwright-core");
    return chromium.launch({
      headless: this.options.headless ?? true,
      executablePath: this.options.executablePath,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-gpu",
      ],
    });
  }
}
