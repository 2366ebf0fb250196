import { runInNewContext } from 'vm';
import { describe, expect, it } from 'vitest';
import {
  CLICK_CONSENT_SCRIPT,
  PRICE_TEXT_PATTERN,
  findTextScript,
  pageReadyScript,
  textOfScript,
} from '../src/selectors.js';

interface PageNode {
  tag: string;
  /** Selectors this node answers to, besides its tag. */
  selectors: string[];
  textContent: string | null;
  clicks: number;
  click(): void;
}

function node(tag: string, textContent: string | null, selectors: string[] = []): PageNode {
  return {
    tag,
    selectors,
    textContent,
    clicks: 0,
    click() {
      this.clicks++;
    },
  };
}

/**
 * Runs a script against a document holding `nodes` in document order.
 * Selector matching is by exact string, which is all the scripts rely on.
 */
function runInPage(script: string, nodes: PageNode[], readyState = 'loading'): unknown {
  const matches = (n: PageNode, selector: string) => n.tag === selector || n.selectors.includes(selector);
  const document = {
    readyState,
    querySelector: (selector: string) => nodes.find((n) => matches(n, selector)) ?? null,
    querySelectorAll: (selector: string) => (selector === '*' ? nodes : nodes.filter((n) => matches(n, selector))),
  };
  return runInNewContext(script, { document });
}

describe('textOfScript in the page', () => {
  const price = "[data-testid='qsp-price']";

  it('returns the raw text of the first matching element', () => {
    const nodes = [node('span', ' 150.25 ', [price]), node('span', '151.00', [price])];

    expect(runInPage(textOfScript(price), nodes)).toBe(' 150.25 ');
  });

  it('passes selectors with escapes through unchanged', () => {
    const selector = '.Fw\\(b\\).Fz\\(36px\\)';

    expect(runInPage(textOfScript(selector), [node('span', '$9.99', [selector])])).toBe('$9.99');
  });

  it('returns null when nothing matches', () => {
    expect(runInPage(textOfScript(price), [node('span', '150.25', ['.other'])])).toBeNull();
  });
});

describe('findTextScript in the page', () => {
  it('finds an element whose whole text is a dollar amount', () => {
    const nodes = [
      node('body', 'Apple Inc. $123.45'),
      node('span', '123.45'),
      node('span', '$123'),
      node('span', '$123.45'),
      node('span', '$99.10'),
    ];

    expect(runInPage(findTextScript(PRICE_TEXT_PATTERN), nodes)).toBe('$123.45');
  });

  it('finds nothing when no text is a full dollar amount', () => {
    const nodes = [node('span', '123.45'), node('span', '$123'), node('span', null), node('span', 'USD 5.00')];

    expect(runInPage(findTextScript(PRICE_TEXT_PATTERN), nodes)).toBeNull();
  });

  it('keeps the pattern flags', () => {
    expect(runInPage(findTextScript(/^close$/i), [node('td', 'CLOSE')])).toBe('CLOSE');
    expect(runInPage(findTextScript(/^close$/), [node('td', 'CLOSE')])).toBeNull();
  });
});

describe('CLICK_CONSENT_SCRIPT in the page', () => {
  it('clicks only the first button mentioning a consent word', () => {
    const link = node('a', 'Accept all');
    const manage = node('button', 'Manage privacy settings');
    const agree = node('button', 'I Agree');
    const accept = node('button', 'Accept all');

    expect(runInPage(CLICK_CONSENT_SCRIPT, [link, manage, agree, accept])).toBe(true);
    expect([link.clicks, manage.clicks, agree.clicks, accept.clicks]).toEqual([0, 0, 1, 0]);
  });

  it('matches the words case-sensitively and reports when nothing was clicked', () => {
    const reject = node('button', 'Reject all');
    const lower = node('button', 'accept');

    expect(runInPage(CLICK_CONSENT_SCRIPT, [reject, lower])).toBe(false);
    expect(reject.clicks + lower.clicks).toBe(0);
  });
});

describe('pageReadyScript in the page', () => {
  const script = pageReadyScript(["[data-testid='qsp-price']", '.price']);

  it('is ready once the document has loaded', () => {
    expect(runInPage(script, [], 'complete')).toBe(true);
  });

  it('is ready while loading if any selector is present', () => {
    expect(runInPage(script, [node('span', '', ['.price'])], 'interactive')).toBe(true);
  });

  it('is not ready while loading without a price element', () => {
    expect(runInPage(script, [node('span', '$1.00', ['.change'])], 'loading')).toBe(false);
  });
});
