import { describe, expect, it, vi } from 'vitest';
import { handleConsent, isConsentPage } from '../src/consent.js';
import { silentLogger, type Logger } from '../src/logger.js';
import { FakeBrowser, noSleep } from './helpers/fake-browser.js';

const options = { timeoutMs: 20, intervalMs: 1, logger: silentLogger, sleep: noSleep };

describe('isConsentPage', () => {
  it('matches "consent" anywhere in the title, ignoring case', () => {
    expect(isConsentPage('consent.example.com')).toBe(true);
    expect(isConsentPage('Before you continue - Cookie CONSENT')).toBe(true);
    expect(isConsentPage('Apple Inc. (AAPL) Stock Price, News, Quote & History')).toBe(false);
    expect(isConsentPage('')).toBe(false);
  });
});

describe('handleConsent', () => {
  it('does nothing on a regular page', async () => {
    const browser = new FakeBrowser({ title: 'Apple Inc. (AAPL)' });

    expect(await handleConsent(browser, 'Apple Inc. (AAPL)', options)).toBe('not-needed');
    expect(browser.calls).toEqual([]);
  });

  it('clicks once and waits for the page to move on', async () => {
    const browser = new FakeBrowser({ title: 'consent.example.com', titleAfterConsent: 'Apple Inc. (AAPL)' });

    expect(await handleConsent(browser, 'consent.example.com', options)).toBe('dismissed');
    expect(browser.calls).toEqual(['evaluate consent', 'title']);
  });

  it('reports a consent page without a matching button', async () => {
    const browser = new FakeBrowser({ title: 'consent.example.com' });
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };

    expect(await handleConsent(browser, 'consent.example.com', { ...options, logger })).toBe('no-button');
    expect(warn).toHaveBeenCalledWith('No consent button found on consent page');
  });

  it('swallows and logs click failures', async () => {
    const browser = new FakeBrowser({ title: 'consent.example.com' });
    browser.failScript = () => new Error('click intercepted');
    const warn = vi.fn();

    const outcome = await handleConsent(browser, 'consent.example.com', {
      ...options,
      logger: { ...silentLogger, warn },
    });

    expect(outcome).toBe('failed');
    expect(warn).toHaveBeenCalledWith('Error handling consent page: click intercepted');
  });

  it('gives up when the consent page does not go away', async () => {
    const browser = new FakeBrowser({ title: 'consent.example.com', titleAfterConsent: 'still consent' });
    const warn = vi.fn();

    const outcome = await handleConsent(browser, 'consent.example.com', {
      ...options,
      logger: { ...silentLogger, warn },
    });

    expect(outcome).toBe('failed');
    expect(warn).toHaveBeenCalledWith(
      'Error handling consent page: Timed out after 20ms waiting for consent page to go away',
    );
  });
});
