// Stdout presentation of a snapshot. No I/O.

import { NOT_AVAILABLE, type QuoteSnapshot } from './types.js';

export const NO_DATA_MESSAGE = 'No data available';

const LABELS: ReadonlyArray<[keyof QuoteSnapshot, string]> = [
  ['symbol', 'Symbol'],
  ['price', 'Price'],
  ['change', 'Change'],
  ['percent_change', 'Percent Change'],
  ['previous_close', 'Previous Close'],
  ['open', 'Open'],
  ['volume', 'Volume'],
  ['source', 'Source'],
  ['timestamp', 'Timestamp'],
];

export function formatSnapshot(snapshot: QuoteSnapshot | null): string {
  if (!snapshot) {
    return NO_DATA_MESSAGE;
  }

  const lines = ['', '=== Stock Data ==='];
  for (const [key, label] of LABELS) {
    lines.push(`${label}: ${snapshot[key].trim() || NOT_AVAILABLE}`);
  }
  return lines.join('\n');
}
