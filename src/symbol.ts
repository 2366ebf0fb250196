import { InvalidSymbolError } from './errors.js';

/** Tickers, indices and FX pairs as the quote pages name them: AAPL, BRK-B, ^GSPC, EURUSD=X. */
export const SYMBOL_PATTERN = /^[A-Za-z0-9.^=-]{1,16}$/;

export const DEFAULT_SYMBOL = 'AAPL';

/** Trim and validate; the symbol ends up in file names, so nothing path-like gets through. */
export function normalizeSymbol(raw: string): string {
  const symbol = raw.trim();
  if (!SYMBOL_PATTERN.test(symbol) || symbol.startsWith('.')) {
    throw new InvalidSymbolError(raw);
  }
  return symbol;
}
