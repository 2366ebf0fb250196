import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { CLICK_CONSENT_SCRIPT } from './selectors.js';
import type { BrowserBackend } from './types.js';
import { waitFor } from './wait.js';

export function isConsentPage(title: string): boolean {
  return title.toLowerCase().includes('consent');
}

export interface ConsentOptions {
  timeoutMs: number;
  intervalMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export type ConsentOutcome = 'not-needed' | 'dismissed' | 'no-button' | 'failed';

/**
 * Dismiss a cookie/consent interstitial if the title says we are on one.
 * Best effort: errors are logged and reported as 'failed', never thrown.
 */
export async function handleConsent(
  backend: BrowserBackend,
  title: string,
  options: ConsentOptions,
): Promise<ConsentOutcome> {
  if (!isConsentPage(title)) return 'not-needed';

  const { logger } = options;
  logger.info('Detected consent page, trying to accept');

  try {
    const clicked = await backend.evaluate(CLICK_CONSENT_SCRIPT);
    if (clicked !== true) {
      logger.warn('No consent button found on consent page');
      return 'no-button';
    }

    await waitFor(async () => !isConsentPage(await backend.title()), {
      timeoutMs: options.timeoutMs,
      intervalMs: options.intervalMs,
      description: 'consent page to go away',
      sleep: options.sleep,
    });
    logger.info('Consent accepted');
    return 'dismissed';
  } catch (err) {
    logger.warn(`Error handling consent page: ${errorMessage(err)}`);
    return 'failed';
  }
}
