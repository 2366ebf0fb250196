import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { SessionStartError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { runQuoteWorkflow } from '../src/workflow.js';
import {
  CHANGE_SELECTOR,
  FakeBrowser,
  PERCENT_SELECTOR,
  PRICE_SELECTOR,
  makeTempDir,
  noSleep,
  testConfig,
} from './helpers/fake-browser.js';

const FIXED_NOW = new Date('2026-03-02T15:30:00.000Z');

function applePage() {
  return new FakeBrowser({
    title: 'Apple Inc. (AAPL) Stock Price, News, Quote & History',
    elements: {
      [PRICE_SELECTOR]: '$150.25',
      [CHANGE_SELECTOR]: '+1.25',
      [PERCENT_SELECTOR]: '+0.84%',
    },
  });
}

describe('runQuoteWorkflow', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  const run = (browser: FakeBrowser, symbol = 'AAPL') =>
    runQuoteWorkflow({
      symbol,
      headless: true,
      config: testConfig(dir),
      logger: silentLogger,
      createBackend: () => browser,
      sleep: noSleep,
      now: () => FIXED_NOW,
    });

  it('writes the extracted figures to <symbol>_yahoo.json', async () => {
    const browser = applePage();
    const outcome = await run(browser);

    expect(outcome.jsonPath).toBe(join(dir, 'AAPL_yahoo.json'));
    const saved = JSON.parse(await readFile(join(dir, 'AAPL_yahoo.json'), 'utf8'));
    expect(saved).toEqual({
      symbol: 'AAPL',
      price: '$150.25',
      change: '+1.25',
      percent_change: '+0.84%',
      previous_close: 'N/A',
      open: 'N/A',
      volume: 'N/A',
      source: 'Yahoo Finance',
      timestamp: '2026-03-02T15:30:00.000Z',
    });
    expect(Object.keys(saved)).toHaveLength(9);
  });

  it('stamps a valid ISO-8601 timestamp by default', async () => {
    const browser = applePage();
    const outcome = await runQuoteWorkflow({
      symbol: 'AAPL',
      headless: true,
      config: testConfig(dir),
      logger: silentLogger,
      createBackend: () => browser,
      sleep: noSleep,
    });

    const timestamp = outcome.result?.snapshot.timestamp ?? '';
    expect(timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(new Date(timestamp).toISOString()).toBe(timestamp);
  });

  it('leaves exactly one JSON file and one screenshot named after the symbol', async () => {
    await run(applePage(), 'MSFT');

    expect((await readdir(dir)).sort()).toEqual(['MSFT_screenshot.png', 'MSFT_yahoo.json']);
  });

  it('overwrites the previous result for the same symbol', async () => {
    await run(applePage());
    const second = new FakeBrowser({
      title: 'Apple Inc. (AAPL)',
      elements: { [PRICE_SELECTOR]: '$151.00' },
    });
    await run(second);

    const saved = JSON.parse(await readFile(join(dir, 'AAPL_yahoo.json'), 'utf8'));
    expect(saved.price).toBe('$151.00');
    expect(saved.change).toBe('N/A');
    expect((await readdir(dir)).sort()).toEqual(['AAPL_screenshot.png', 'AAPL_yahoo.json']);
  });

  it('clicks the consent button before any data is extracted', async () => {
    const browser = new FakeBrowser({
      title: 'consent.example.com',
      titleAfterConsent: 'Apple Inc. (AAPL)',
      elements: { [PRICE_SELECTOR]: '$150.25' },
    });

    const outcome = await run(browser);

    const kinds = browser.evaluatedKinds.filter((k) => k !== 'ready');
    expect(kinds.filter((k) => k === 'consent')).toHaveLength(1);
    expect(kinds[0]).toBe('consent');
    expect(kinds.indexOf('consent')).toBeLessThan(kinds.indexOf('text'));
    expect(outcome.result?.snapshot.price).toBe('$150.25');
  });

  it('never runs the click script when the title is not a consent page', async () => {
    const browser = applePage();
    await run(browser);

    expect(browser.evaluatedKinds).not.toContain('consent');
  });

  it('writes nothing and closes the browser when navigation fails', async () => {
    const browser = applePage();
    browser.navigateError = new Error('net::ERR_NAME_NOT_RESOLVED');

    const outcome = await run(browser);

    expect(outcome).toEqual({ result: null, jsonPath: null });
    expect(await readdir(dir)).toEqual([]);
    expect(browser.closed).toBe(true);
  });

  it('writes nothing when the screenshot fails', async () => {
    const browser = applePage();
    browser.screenshotError = new Error('Target closed');

    const outcome = await run(browser);

    expect(outcome.result).toBeNull();
    expect(await readdir(dir)).toEqual([]);
    expect(browser.closed).toBe(true);
  });

  it('removes the screenshot again when the JSON cannot be written', async () => {
    // A directory in the way of the JSON file makes the write fail.
    await mkdir(join(dir, 'AAPL_yahoo.json'));
    const browser = applePage();

    const outcome = await run(browser);

    expect(outcome.result).toBeNull();
    expect(await readdir(dir)).toEqual(['AAPL_yahoo.json']);
    expect((await stat(join(dir, 'AAPL_yahoo.json'))).isDirectory()).toBe(true);
  });

  it('rethrows browser start failures after closing', async () => {
    const browser = applePage();
    browser.navigateError = new SessionStartError('Chrome not found');

    await expect(run(browser)).rejects.toBeInstanceOf(SessionStartError);
    expect(browser.closed).toBe(true);
    expect(await readdir(dir)).toEqual([]);
  });

  it('rejects a path-like symbol before touching the browser', async () => {
    const browser = applePage();

    await expect(run(browser, '../etc')).rejects.toThrow('Invalid ticker symbol "../etc"');
    expect(browser.calls).toEqual([]);
  });

  it('keeps an unrelated file in the results directory', async () => {
    await writeFile(join(dir, 'notes.txt'), 'keep');
    await run(applePage());

    expect((await readdir(dir)).sort()).toEqual([
      'AAPL_screenshot.png',
      'AAPL_yahoo.json',
      'notes.txt',
    ]);
  });
});
