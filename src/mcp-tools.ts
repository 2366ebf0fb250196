import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ScraperConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { loadSnapshot } from './persistence.js';
import { SYMBOL_PATTERN } from './symbol.js';
import { runQuoteWorkflow, type WorkflowOptions } from './workflow.js';

// ---------- Helper ----------

type ToolPayload = Record<string, unknown>;

function textResult(payload: ToolPayload, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/** Tool failures become an `isError` result carrying the message, never a protocol error. */
async function runTool(name: string, logger: Logger, fn: () => Promise<ToolPayload>) {
  try {
    return textResult({ success: true, ...(await fn()) });
  } catch (err) {
    const message = errorMessage(err);
    logger.warn(`${name} failed: ${message}`);
    return textResult({ success: false, error: message }, true);
  }
}

export interface QuoteToolDeps {
  config: ScraperConfig;
  logger: Logger;
  workflow?: Partial<Pick<WorkflowOptions, 'createBackend' | 'now' | 'sleep'>>;
}

// ---------- Tools ----------

export function registerQuoteTools(server: McpServer, deps: QuoteToolDeps): void {
  server.registerTool(
    'fetch_quote',
    {
      description:
        'Open the quote page for a stock symbol in Chrome, extract price, change, percent change, previous close, open and volume, and save the JSON result and a screenshot. Figures are the raw page text; "N/A" marks one that could not be found.',
      inputSchema: {
        symbol: z
          .string()
          .trim()
          .regex(SYMBOL_PATTERN, 'Expected a ticker such as AAPL, BRK-B or ^GSPC')
          .describe('Stock ticker symbol (e.g. AAPL, MSFT, ^GSPC)'),
        headless: z
          .boolean()
          .optional()
          .describe('Run Chrome without a window (default: true)'),
      },
    },
    async ({ symbol, headless }) =>
      runTool('fetch_quote', deps.logger, async () => {
        const { result, jsonPath } = await runQuoteWorkflow({
          symbol,
          headless: headless ?? true,
          config: deps.config,
          logger: deps.logger,
          ...deps.workflow,
        });
        if (!result || !jsonPath) {
          throw new Error(`No data available for ${symbol}`);
        }
        // Report what was persisted, not what is still in memory.
        return {
          quote: await loadSnapshot(jsonPath),
          json: jsonPath,
          screenshot: result.screenshotPath,
        };
      }),
  );
}
