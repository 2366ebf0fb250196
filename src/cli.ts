#!/usr/bin/env node

/**
 * quote-scraper CLI.
 *
 * Launches Chrome (or attaches to one at QUOTE_SCRAPER_CDP_URL), scrapes one
 * quote page, writes <SYMBOL>_yahoo.json and <SYMBOL>_screenshot.png, prints
 * a summary and closes the browser.
 *
 * Usage:
 *   quote-scraper --symbol MSFT
 *   quote-scraper --symbol ^GSPC --headless
 */

import { loadConfigFromEnv } from './config.js';
import { runCli } from './cli-runner.js';
import { createLogger, setLogLevel } from './logger.js';

async function main() {
  const config = loadConfigFromEnv();
  setLogLevel(config.logLevel);

  const code = await runCli(process.argv.slice(2), {
    config,
    logger: createLogger('scraper'),
  });
  process.exitCode = code;
}

main().catch((err) => {
  console.error('[scraper] Fatal error:', err);
  process.exit(1);
});
