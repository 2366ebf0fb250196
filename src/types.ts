export const NOT_AVAILABLE = 'N/A';
export const QUOTE_SOURCE = 'Yahoo Finance';

/** Fields pulled from the quote page, in extraction order. */
export const QUOTE_FIELDS = [
  'price',
  'change',
  'percent_change',
  'previous_close',
  'open',
  'volume',
] as const;

export type QuoteField = (typeof QUOTE_FIELDS)[number];

export const SECONDARY_FIELDS = ['previous_close', 'open', 'volume'] as const satisfies readonly QuoteField[];

export type SecondaryField = (typeof SECONDARY_FIELDS)[number];

/**
 * One quote as persisted. Every figure is the raw text from the page, or
 * NOT_AVAILABLE when it could not be extracted.
 */
export interface QuoteSnapshot {
  readonly symbol: string;
  readonly price: string;
  readonly change: string;
  readonly percent_change: string;
  readonly previous_close: string;
  readonly open: string;
  readonly volume: string;
  readonly source: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

export type FieldError =
  | { kind: 'not-found'; field: QuoteField; tried: readonly string[] }
  | { kind: 'script-failed'; field: QuoteField; message: string };

export type FieldResult =
  | { ok: true; value: string; selector: string }
  | { ok: false; error: FieldError };

export type FieldResults = Record<QuoteField, FieldResult>;

export interface ExtractionResult {
  snapshot: QuoteSnapshot;
  fields: FieldResults;
  screenshotPath: string;
}

/**
 * The slice of a browser automation backend the scraper consumes. The
 * Playwright-backed BrowserSession implements it; tests substitute a fake.
 */
export interface BrowserBackend {
  navigate(url: string): Promise<void>;
  /** Evaluate a script expression in the page and return its (serialisable) result. */
  evaluate(script: string): Promise<unknown>;
  title(): Promise<string>;
  screenshot(path: string): Promise<string>;
  close(): Promise<void>;
}
