import { findTextScript, textOfScript, type FieldProbe } from './selectors.js';
import type { BrowserBackend, FieldResult } from './types.js';

/** Read-only questions the probes ask of a rendered page. */
export interface PageQuery {
  textOf(selector: string): Promise<string | null>;
  findText(pattern: RegExp): Promise<string | null>;
}

/**
 * Try each candidate selector in order and return the first match's text.
 * Falls back to a whole-page pattern scan when the probe has one. Errors from
 * the query capability propagate; absence is a `not-found` result.
 */
export async function probeField(query: PageQuery, probe: FieldProbe): Promise<FieldResult> {
  for (const selector of probe.selectors) {
    const text = await query.textOf(selector);
    if (text !== null && text !== '') {
      return { ok: true, value: text, selector };
    }
  }

  if (probe.fallbackPattern) {
    const text = await query.findText(probe.fallbackPattern);
    if (text !== null && text !== '') {
      return { ok: true, value: text, selector: `text~${probe.fallbackPattern.source}` };
    }
  }

  return { ok: false, error: { kind: 'not-found', field: probe.field, tried: probe.selectors } };
}

const asText = (value: unknown): string | null =>
  typeof value === 'string' ? value : value === null || value === undefined ? null : String(value);

/** PageQuery over a backend's script evaluation: one script per lookup. */
export function createPageQuery(backend: BrowserBackend): PageQuery {
  return {
    textOf: async (selector) => asText(await backend.evaluate(textOfScript(selector))),
    findText: async (pattern) => asText(await backend.evaluate(findTextScript(pattern))),
  };
}
