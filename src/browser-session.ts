/**
 * Lazily started, exclusively owned Chrome session.
 *
 * Either launches a local Chrome through playwright-core, or attaches to an
 * already running one over CDP when a connect URL is configured. Nothing is
 * started until the first operation needs a page, and `close()` puts the
 * session back in its initial state so it can be started again.
 *
 * Operations must not be called concurrently on the same session.
 */

import { chromium, type Browser, type Page } from 'playwright-core';
import { findChrome, saveScreenshot } from './browser-utils.js';
import { SessionStartError, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { BrowserBackend } from './types.js';

/** What the session needs from an open page. */
export interface SessionPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  evaluate(script: string): Promise<unknown>;
  title(): Promise<string>;
  screenshot(): Promise<Buffer>;
}

export interface SessionHandle {
  page: SessionPage;
  close(): Promise<void>;
}

export interface OpenOptions {
  headless: boolean;
  chromePath?: string;
  cdpUrl?: string;
  logger: Logger;
}

export type SessionOpener = (options: OpenOptions) => Promise<SessionHandle>;

export interface BrowserSessionOptions {
  headless: boolean;
  chromePath?: string;
  cdpUrl?: string;
  navigationTimeoutMs: number;
  screenshotMaxDimension: number;
  logger?: Logger;
}

const VIEWPORT = { width: 1280, height: 720 };

function wrapPage(page: Page): SessionPage {
  return {
    goto: async (url, timeoutMs) => {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    },
    evaluate: (script) => page.evaluate(script),
    title: () => page.title(),
    screenshot: () => page.screenshot({ type: 'png' }),
  };
}

async function attachOverCdp(cdpUrl: string, logger: Logger): Promise<SessionHandle> {
  logger.info(`Connecting to existing browser at ${cdpUrl}`);
  const browser = await chromium.connectOverCDP(cdpUrl);
  const context = browser.contexts()[0] ?? (await browser.newContext({ viewport: VIEWPORT }));
  const page = context.pages()[0] ?? (await context.newPage());

  return {
    page: wrapPage(page),
    // Disconnects; the browser itself belongs to whoever started it.
    close: () => browser.close(),
  };
}

async function launchLocal(options: OpenOptions): Promise<SessionHandle> {
  const executablePath = findChrome({ configuredPath: options.chromePath });
  if (!executablePath) {
    throw new SessionStartError(
      options.chromePath
        ? `Chrome not found at ${options.chromePath} (QUOTE_SCRAPER_CHROME_PATH)`
        : 'Chrome not found. Install Google Chrome, or set QUOTE_SCRAPER_CHROME_PATH or QUOTE_SCRAPER_CDP_URL.',
    );
  }

  options.logger.info(`Launching Chrome (${options.headless ? 'headless' : 'headed'}) from ${executablePath}`);
  const browser: Browser = await chromium.launch({
    executablePath,
    headless: options.headless,
    args: ['--disable-blink-features=AutomationControlled'],
  });
  const context = await browser.newContext({ viewport: VIEWPORT });
  const page = await context.newPage();

  return {
    page: wrapPage(page),
    close: async () => {
      await context.close();
      await browser.close();
    },
  };
}

export const openChromium: SessionOpener = (options) =>
  options.cdpUrl ? attachOverCdp(options.cdpUrl, options.logger) : launchLocal(options);

export class BrowserSession implements BrowserBackend {
  private handle: SessionHandle | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly options: BrowserSessionOptions,
    private readonly open: SessionOpener = openChromium,
  ) {
    this.logger = options.logger ?? createLogger('browser');
  }

  /**
   * Start the browser on first use; later calls return the same page.
   * Start failures surface as SessionStartError.
   */
  async ensureStarted(): Promise<SessionPage> {
    if (this.handle) {
      return this.handle.page;
    }

    this.logger.info('Initializing browser session');
    try {
      this.handle = await this.open({
        headless: this.options.headless,
        chromePath: this.options.chromePath,
        cdpUrl: this.options.cdpUrl,
        logger: this.logger,
      });
    } catch (err) {
      if (err instanceof SessionStartError) throw err;
      throw new SessionStartError(`Failed to start browser: ${errorMessage(err)}`, { cause: err });
    }
    return this.handle.page;
  }

  async navigate(url: string): Promise<void> {
    const page = await this.ensureStarted();
    this.logger.info(`Navigating to ${url}`);
    await page.goto(url, this.options.navigationTimeoutMs);
  }

  async evaluate(script: string): Promise<unknown> {
    const page = await this.ensureStarted();
    return page.evaluate(script);
  }

  async title(): Promise<string> {
    const page = await this.ensureStarted();
    return page.title();
  }

  async screenshot(path: string): Promise<string> {
    const page = await this.ensureStarted();
    const raw = await page.screenshot();
    const saved = await saveScreenshot(raw, path, this.options.screenshotMaxDimension);
    this.logger.info(`Screenshot saved to ${saved}`);
    return saved;
  }

  /** Idempotent. Errors while closing are logged, not thrown. */
  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;

    this.handle = null;
    this.logger.info('Closing browser session');
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn(`Error while closing browser: ${errorMessage(err)}`);
    }
  }
}
