export type QuoteScraperErrorCode =
  | 'SESSION_START'
  | 'WAIT_TIMEOUT'
  | 'INVALID_SYMBOL'
  | 'CLI_USAGE'
  | 'CONFIG';

export class QuoteScraperError extends Error {
  readonly code: QuoteScraperErrorCode;

  constructor(code: QuoteScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The browser could not be found, launched or connected to. */
export class SessionStartError extends QuoteScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SESSION_START', message, options);
  }
}

export class WaitTimeoutError extends QuoteScraperError {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super('WAIT_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${what}`);
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidSymbolError extends QuoteScraperError {
  readonly symbol: string;

  constructor(symbol: string) {
    super(
      'INVALID_SYMBOL',
      `Invalid ticker symbol "${symbol}". Use letters, digits and . ^ = - (e.g. AAPL, BRK-B, ^GSPC).`,
    );
    this.symbol = symbol;
  }
}

export class CliUsageError extends QuoteScraperError {
  constructor(message: string) {
    super('CLI_USAGE', message);
  }
}

export class ConfigError extends QuoteScraperError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
