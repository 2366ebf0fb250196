import type { ScraperConfig } from './config.js';
import { CliUsageError, errorMessage } from './errors.js';
import { formatSnapshot } from './format.js';
import type { Logger } from './logger.js';
import { DEFAULT_SYMBOL, normalizeSymbol } from './symbol.js';
import { runQuoteWorkflow, type WorkflowOptions } from './workflow.js';

export const USAGE = `Usage: quote-scraper [--symbol <TICKER>] [--headless]

Fetch one quote's headline figures and save <TICKER>_yahoo.json and
<TICKER>_screenshot.png under the results directory.

Options:
  --symbol <TICKER>  Stock symbol to scrape (default: ${DEFAULT_SYMBOL}). Up to 16
                     letters, digits and . ^ = - characters, not starting
                     with a dot; any other symbol exits with status 1
  --headless         Run Chrome without a window
  -h, --help         Show this help`;

export interface CliArgs {
  symbol: string;
  headless: boolean;
  help: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { symbol: DEFAULT_SYMBOL, headless: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--headless') {
      args.headless = true;
    } else if (arg === '-h' || arg === '--help') {
      args.help = true;
    } else if (arg === '--symbol') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError('--symbol requires a value');
      }
      args.symbol = value;
      i++;
    } else if (arg.startsWith('--symbol=')) {
      args.symbol = arg.slice('--symbol='.length);
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!args.help) {
    args.symbol = normalizeSymbol(args.symbol);
  }
  return args;
}

export interface CliDeps {
  config: ScraperConfig;
  logger?: Logger;
  out?: (line: string) => void;
  err?: (line: string) => void;
  workflow?: Partial<Pick<WorkflowOptions, 'createBackend' | 'now' | 'sleep'>>;
}

/**
 * Parse arguments, run the workflow and print the summary. Resolves to the
 * process exit code: 0 for every scraping outcome, 1 only for bad arguments.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    err(`Error: ${errorMessage(e)}`);
    err(USAGE);
    return 1;
  }

  if (args.help) {
    out(USAGE);
    return 0;
  }

  out(`Starting stock data scraper for symbol: ${args.symbol}`);
  out(`Headless mode: ${args.headless}`);

  try {
    const outcome = await runQuoteWorkflow({
      symbol: args.symbol,
      headless: args.headless,
      config: deps.config,
      logger: deps.logger,
      ...deps.workflow,
    });
    out(formatSnapshot(outcome.result?.snapshot ?? null));
    out('\nScraping completed successfully!');
  } catch (e) {
    out(`An error occurred: ${errorMessage(e)}`);
  }

  return 0;
}
