#!/usr/bin/env node

/**
 * MCP server exposing the quote scraper as a `fetch_quote` tool over stdio.
 *
 * Every call opens its own browser session and closes it before answering,
 * so there is no browser state to clean up between calls or on exit.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfigFromEnv } from './config.js';
import { createLogger, setLogLevel } from './logger.js';
import { registerQuoteTools } from './mcp-tools.js';

async function main() {
  const config = loadConfigFromEnv();
  setLogLevel(config.logLevel);

  const server = new McpServer({ name: 'quote-scraper', version: '0.1.0' });
  registerQuoteTools(server, { config, logger: createLogger('mcp') });

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});
