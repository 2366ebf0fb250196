import { rm } from 'fs/promises';
import { BrowserSession } from './browser-session.js';
import type { ScraperConfig } from './config.js';
import { errorMessage } from './errors.js';
import { extractQuote } from './extractor.js';
import { createLogger, type Logger } from './logger.js';
import { saveSnapshot } from './persistence.js';
import { normalizeSymbol } from './symbol.js';
import type { BrowserBackend, ExtractionResult } from './types.js';

export interface WorkflowOptions {
  symbol: string;
  headless: boolean;
  config: ScraperConfig;
  logger?: Logger;
  /** Defaults to a Playwright-backed BrowserSession built from the config. */
  createBackend?: (headless: boolean, config: ScraperConfig, logger: Logger) => BrowserBackend;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface WorkflowOutcome {
  /** null when nothing could be extracted or persisted. */
  result: ExtractionResult | null;
  jsonPath: string | null;
}

export const createBrowserSession = (
  headless: boolean,
  config: ScraperConfig,
  logger: Logger,
): BrowserBackend =>
  new BrowserSession({
    headless,
    chromePath: config.chromePath,
    cdpUrl: config.cdpUrl,
    navigationTimeoutMs: config.navigationTimeoutMs,
    screenshotMaxDimension: config.screenshotMaxDimension,
    logger,
  });

/** Run `fn` against the backend and close it on every exit path. */
export async function withBrowserSession<T>(
  backend: BrowserBackend,
  fn: (backend: BrowserBackend) => Promise<T>,
): Promise<T> {
  try {
    return await fn(backend);
  } finally {
    await backend.close();
  }
}

/**
 * One full run for one symbol: extract, persist, close. Either both the JSON
 * file and the screenshot are left on disk, or neither is.
 *
 * Only a browser that fails to start (or an invalid symbol) rejects.
 */
export async function runQuoteWorkflow(options: WorkflowOptions): Promise<WorkflowOutcome> {
  const symbol = normalizeSymbol(options.symbol);
  const { config } = options;
  const logger = options.logger ?? createLogger('scraper');
  const backend = (options.createBackend ?? createBrowserSession)(options.headless, config, logger);

  return withBrowserSession(backend, async (session) => {
    const result = await extractQuote(session, symbol, {
      baseUrl: config.baseUrl,
      resultsDir: config.resultsDir,
      renderTimeoutMs: config.renderTimeoutMs,
      consentTimeoutMs: config.consentTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
      logger,
      now: options.now,
      sleep: options.sleep,
    });
    if (!result) {
      return { result: null, jsonPath: null };
    }

    try {
      const jsonPath = await saveSnapshot(result.snapshot, { resultsDir: config.resultsDir, logger });
      return { result, jsonPath };
    } catch (err) {
      logger.error(`Could not save result: ${errorMessage(err)}`);
      await rm(result.screenshotPath, { force: true });
      return { result: null, jsonPath: null };
    }
  });
}
