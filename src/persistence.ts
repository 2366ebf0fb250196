import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { createLogger, type Logger } from './logger.js';
import type { QuoteSnapshot } from './types.js';

export const QuoteSnapshotSchema = z
  .object({
    symbol: z.string().min(1),
    price: z.string(),
    change: z.string(),
    percent_change: z.string(),
    previous_close: z.string(),
    open: z.string(),
    volume: z.string(),
    source: z.string(),
    timestamp: z.string().datetime({ offset: true }),
  })
  .strict();

export function snapshotFilename(symbol: string): string {
  return `${symbol}_yahoo.json`;
}

/** Fixed key order, whatever order the snapshot object was built in. */
export function serializeSnapshot(snapshot: QuoteSnapshot): string {
  const record = QuoteSnapshotSchema.parse(snapshot);
  const ordered: QuoteSnapshot = {
    symbol: record.symbol,
    price: record.price,
    change: record.change,
    percent_change: record.percent_change,
    previous_close: record.previous_close,
    open: record.open,
    volume: record.volume,
    source: record.source,
    timestamp: record.timestamp,
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

export interface SaveOptions {
  resultsDir: string;
  /** Defaults to `<symbol>_yahoo.json`. */
  filename?: string;
  logger?: Logger;
}

/**
 * Write the snapshot as indented JSON under the results directory, creating
 * it if needed and replacing any previous file. Returns the path written.
 */
export async function saveSnapshot(snapshot: QuoteSnapshot, options: SaveOptions): Promise<string> {
  const logger = options.logger ?? createLogger('persist');
  const filepath = join(options.resultsDir, options.filename ?? snapshotFilename(snapshot.symbol));
  const body = serializeSnapshot(snapshot);

  await mkdir(options.resultsDir, { recursive: true });
  await writeFile(filepath, body, 'utf8');
  logger.info(`Result saved to ${filepath}`);
  return filepath;
}

export async function loadSnapshot(filepath: string): Promise<QuoteSnapshot> {
  const raw: unknown = JSON.parse(await readFile(filepath, 'utf8'));
  return QuoteSnapshotSchema.parse(raw);
}
