/**
 * Selector candidates for the Yahoo Finance quote page, and the in-page
 * scripts built from them.
 *
 * Scripts are plain strings rather than serialised functions: tsx/esbuild
 * inject helpers such as `__name` into compiled functions, and those do not
 * exist in the page.
 */

import type { QuoteField } from './types.js';

/** Last-resort price match: a dollar amount with a fractional part. */
export const PRICE_TEXT_PATTERN = /^\$\d+\.\d+$/;

export interface FieldProbe {
  field: QuoteField;
  /** Tried in order; the first selector matching any element wins. */
  selectors: readonly string[];
  /** Scan every element's text for this pattern when no selector matches. */
  fallbackPattern?: RegExp;
}

export function buildFieldProbes(symbol: string): Record<QuoteField, FieldProbe> {
  return {
    price: {
      field: 'price',
      selectors: [
        "[data-test='quote-header-info'] fin-streamer[data-field='regularMarketPrice']",
        "[data-testid='qsp-price']",
        ".quote-header-section span[data-reactid='32']",
        '.Fw\\(b\\).Fz\\(36px\\)',
        `fin-streamer[data-symbol="${symbol}"][data-field="regularMarketPrice"]`,
      ],
      fallbackPattern: PRICE_TEXT_PATTERN,
    },
    change: {
      field: 'change',
      selectors: [
        "[data-test='quote-header-info'] fin-streamer[data-field='regularMarketChange']",
        "[data-testid='qsp-price-change']",
        ".quote-header-section span[data-reactid='33']",
      ],
    },
    percent_change: {
      field: 'percent_change',
      selectors: [
        "[data-test='quote-header-info'] fin-streamer[data-field='regularMarketChangePercent']",
        "[data-testid='qsp-price-change-percent']",
        ".quote-header-section span[data-reactid='34']",
      ],
    },
    previous_close: {
      field: 'previous_close',
      selectors: [
        "td[data-test='PREV_CLOSE-value']",
        "fin-streamer[data-field='regularMarketPreviousClose']",
      ],
    },
    open: {
      field: 'open',
      selectors: ["td[data-test='OPEN-value']", "fin-streamer[data-field='regularMarketOpen']"],
    },
    volume: {
      field: 'volume',
      selectors: [
        "td[data-test='TD_VOLUME-value']",
        "fin-streamer[data-field='regularMarketVolume']",
      ],
    },
  };
}

// ---------- In-page scripts ----------

/** Text content of the first element matching `selector`, or null. */
export function textOfScript(selector: string): string {
  return `(() => {
    var el = document.querySelector(${JSON.stringify(selector)});
    return el ? el.textContent : null;
  })()`;
}

/** Text content of the first element whose whole text matches `pattern`, or null. */
export function findTextScript(pattern: RegExp): string {
  return `(() => {
    var re = new RegExp(${JSON.stringify(pattern.source)}, ${JSON.stringify(pattern.flags)});
    var all = document.querySelectorAll('*');
    for (var i = 0; i < all.length; i++) {
      var text = all[i].textContent;
      if (text && re.test(text)) return text;
    }
    return null;
  })()`;
}

export const CONSENT_BUTTON_WORDS = ['Accept', 'Agree', 'Consent'] as const;

/** Clicks the first button whose text mentions a consent word; returns whether it clicked. */
export const CLICK_CONSENT_SCRIPT = `(() => {
  var words = ${JSON.stringify(CONSENT_BUTTON_WORDS)};
  var buttons = document.querySelectorAll('button');
  for (var i = 0; i < buttons.length; i++) {
    var text = buttons[i].textContent || '';
    for (var j = 0; j < words.length; j++) {
      if (text.indexOf(words[j]) !== -1) {
        buttons[i].click();
        return true;
      }
    }
  }
  return false;
})()`;

/** True once the document has loaded or any of `selectors` is present. */
export function pageReadyScript(selectors: readonly string[]): string {
  return `(() => {
    if (document.readyState === 'complete') return true;
    var selectors = ${JSON.stringify(selectors)};
    for (var i = 0; i < selectors.length; i++) {
      if (document.querySelector(selectors[i])) return true;
    }
    return false;
  })()`;
}
