/**
 * Quote page extraction.
 *
 * navigate -> wait for render -> dismiss consent -> primary probes ->
 * secondary probes -> screenshot. Any failure outside the consent step and
 * the secondary probes loses the whole run: the caller gets `null` and
 * nothing is persisted.
 */

import { join } from 'path';
import { handleConsent } from './consent.js';
import { SessionStartError, WaitTimeoutError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { createPageQuery, probeField, type PageQuery } from './probe.js';
import { buildFieldProbes, pageReadyScript, type FieldProbe } from './selectors.js';
import {
  NOT_AVAILABLE,
  QUOTE_SOURCE,
  type BrowserBackend,
  type ExtractionResult,
  type FieldResult,
  type FieldResults,
  type QuoteField,
  type QuoteSnapshot,
  type SecondaryField,
} from './types.js';
import { waitFor } from './wait.js';

export interface ExtractOptions {
  baseUrl: string;
  resultsDir: string;
  renderTimeoutMs: number;
  consentTimeoutMs: number;
  pollIntervalMs: number;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function quoteUrl(baseUrl: string, symbol: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(symbol)}`;
}

export function screenshotPathFor(resultsDir: string, symbol: string): string {
  return join(resultsDir, `${symbol}_screenshot.png`);
}

const valueOf = (result: FieldResult): string => (result.ok ? result.value : NOT_AVAILABLE);

export function buildSnapshot(symbol: string, fields: FieldResults, timestamp: Date): QuoteSnapshot {
  return {
    symbol,
    price: valueOf(fields.price),
    change: valueOf(fields.change),
    percent_change: valueOf(fields.percent_change),
    previous_close: valueOf(fields.previous_close),
    open: valueOf(fields.open),
    volume: valueOf(fields.volume),
    source: QUOTE_SOURCE,
    timestamp: timestamp.toISOString(),
  };
}

async function waitForRender(
  backend: BrowserBackend,
  readySelectors: readonly string[],
  options: ExtractOptions,
): Promise<void> {
  const script = pageReadyScript(readySelectors);
  try {
    await waitFor(async () => (await backend.evaluate(script)) === true, {
      timeoutMs: options.renderTimeoutMs,
      intervalMs: options.pollIntervalMs,
      description: 'quote page to render',
      sleep: options.sleep,
    });
  } catch (err) {
    if (!(err instanceof WaitTimeoutError)) throw err;
    options.logger.warn(`${err.message}; extracting from the page as it is`);
  }
}

/**
 * Scrape one quote page. Returns null when navigation, a primary probe or the
 * screenshot fails; the error is logged. A browser that cannot be started is
 * not a scraping failure and is rethrown.
 */
export async function extractQuote(
  backend: BrowserBackend,
  symbol: string,
  options: ExtractOptions,
): Promise<ExtractionResult | null> {
  const { logger } = options;
  const url = quoteUrl(options.baseUrl, symbol);
  const probes = buildFieldProbes(symbol);
  const query = createPageQuery(backend);

  logger.info(`Scraping Yahoo Finance data for ${symbol}`);

  try {
    await backend.navigate(url);
    await waitForRender(backend, probes.price.selectors, options);

    const pageTitle = await backend.title();
    logger.info(`Page title: ${pageTitle}`);

    const consent = await handleConsent(backend, pageTitle, {
      timeoutMs: options.consentTimeoutMs,
      intervalMs: options.pollIntervalMs,
      logger,
      sleep: options.sleep,
    });
    // The page behind the interstitial is a fresh load.
    if (consent === 'dismissed') {
      await waitForRender(backend, probes.price.selectors, options);
    }

    logger.info('Extracting stock data');
    const fields: FieldResults = {
      price: await probeField(query, probes.price),
      change: await probeField(query, probes.change),
      percent_change: await probeField(query, probes.percent_change),
      ...(await probeSecondary(query, probes, logger)),
    };

    for (const result of Object.values(fields)) {
      if (!result.ok && result.error.kind === 'not-found') {
        logger.debug(`No match for ${result.error.field} (tried ${result.error.tried.length} selectors)`);
      }
    }

    const screenshotPath = await backend.screenshot(screenshotPathFor(options.resultsDir, symbol));
    const snapshot = buildSnapshot(symbol, fields, (options.now ?? (() => new Date()))());

    return { snapshot, fields, screenshotPath };
  } catch (err) {
    if (err instanceof SessionStartError) throw err;
    logger.error(`Error scraping Yahoo Finance: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Previous close, open and volume are probed in order inside one failure
 * boundary. When a lookup throws, figures already read are kept; the failing
 * field and those after it are reported as failed. The primary figures stand.
 */
async function probeSecondary(
  query: PageQuery,
  probes: Record<QuoteField, FieldProbe>,
  logger: Logger,
): Promise<Pick<FieldResults, SecondaryField>> {
  let failure: string | null = null;

  const next = async (field: SecondaryField): Promise<FieldResult> => {
    let message = failure;
    if (message === null) {
      try {
        return await probeField(query, probes[field]);
      } catch (err) {
        message = errorMessage(err);
        failure = message;
        logger.warn(`Could not extract all additional data: ${message}`);
      }
    }
    return { ok: false, error: { kind: 'script-failed', field, message } };
  };

  return {
    previous_close: await next('previous_close'),
    open: await next('open'),
    volume: await next('volume'),
  };
}
