/**
 * Scoped stderr logger.
 *
 * Everything goes to stderr so that stdout carries only the quote summary,
 * and so the MCP server's stdio channel is never polluted.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let _level: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  _level = level;
}

export function createLogger(
  scope: string,
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string) => {
    if (RANK[level] < RANK[_level]) return;
    const marker = level === 'warn' || level === 'error' ? `${level}: ` : '';
    write(`[${scope}] ${marker}${msg}`);
  };

  return {
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg) => emit('error', msg),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
