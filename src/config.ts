/**
 * Runtime configuration.
 *
 * Values come from the process environment, after `.env` at the project root
 * has been loaded into it. Everything is optional; defaults target the public
 * Yahoo Finance quote pages and a locally installed Chrome.
 */

import { existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Nearest ancestor holding package.json: src/ under tsx, dist/src/ once built. */
function findProjectRoot(start: string): string {
  let dir = start;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export const PROJECT_ROOT = findProjectRoot(__dirname);

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  QUOTE_SCRAPER_RESULTS_DIR: z.string().min(1).default('stock_results'),
  QUOTE_SCRAPER_BASE_URL: z.string().url().default('https://finance.yahoo.com/quote'),
  QUOTE_SCRAPER_CHROME_PATH: z.string().min(1).optional(),
  QUOTE_SCRAPER_CDP_URL: z.string().url().optional(),
  QUOTE_SCRAPER_NAVIGATION_TIMEOUT_MS: millis(30_000),
  QUOTE_SCRAPER_RENDER_TIMEOUT_MS: millis(10_000),
  QUOTE_SCRAPER_CONSENT_TIMEOUT_MS: millis(5_000),
  QUOTE_SCRAPER_POLL_INTERVAL_MS: millis(250),
  QUOTE_SCRAPER_SCREENSHOT_MAX_DIMENSION: z.coerce.number().int().min(100).default(2000),
  QUOTE_SCRAPER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ScraperConfig {
  resultsDir: string;
  baseUrl: string;
  chromePath?: string;
  cdpUrl?: string;
  navigationTimeoutMs: number;
  renderTimeoutMs: number;
  consentTimeoutMs: number;
  pollIntervalMs: number;
  screenshotMaxDimension: number;
  logLevel: LogLevel;
}

/**
 * Validate an environment map into a config. Empty strings count as unset so
 * that `FOO=` lines in .env fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('QUOTE_SCRAPER_') && value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    resultsDir: e.QUOTE_SCRAPER_RESULTS_DIR,
    baseUrl: e.QUOTE_SCRAPER_BASE_URL.replace(/\/+$/, ''),
    chromePath: e.QUOTE_SCRAPER_CHROME_PATH,
    cdpUrl: e.QUOTE_SCRAPER_CDP_URL,
    navigationTimeoutMs: e.QUOTE_SCRAPER_NAVIGATION_TIMEOUT_MS,
    renderTimeoutMs: e.QUOTE_SCRAPER_RENDER_TIMEOUT_MS,
    consentTimeoutMs: e.QUOTE_SCRAPER_CONSENT_TIMEOUT_MS,
    pollIntervalMs: e.QUOTE_SCRAPER_POLL_INTERVAL_MS,
    screenshotMaxDimension: e.QUOTE_SCRAPER_SCREENSHOT_MAX_DIMENSION,
    logLevel: e.QUOTE_SCRAPER_LOG_LEVEL,
  };
}

/**
 * Load `.env` from the project root into process.env (existing variables win),
 * then validate.
 */
export function loadConfigFromEnv(): ScraperConfig {
  dotenv.config({ path: join(PROJECT_ROOT, '.env') });
  return loadConfig(process.env);
}
