// src/cli/commands/scrape.ts
import { Command } from 'commander';
import { ScrapeOrchestrator, type ScrapeOptions } from '../../core/orchestrator.js';
import { ScrapeError } from '../../core/errors.js';
import type { Scraper } from '../../core/types/index.js';

export type ScraperFactory = (options: ScrapeOptions) => Scraper;

interface ScrapeCommandOptions {
  compact: boolean;
  verbose: boolean;
  headed: boolean;
  timeout?: string;
}

const defaultFactory: ScraperFactory = options => new ScrapeOrchestrator({}, options);

export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new Error(`Invalid timeout: ${value}. Use a positive number of milliseconds`);
  }
  return ms;
}

export function registerScrapeCommand(
  program: Command,
  createScraper: ScraperFactory = defaultFactory
): void {
  program
    .command('scrape <url>')
    .description('Scrape a URL and print the result as JSON')
    .option('--compact', 'Print JSON on a single line', false)
    .option('--verbose', 'Log pipeline decisions to stderr', false)
    .option('--headed', 'Show the browser window when rendering', false)
    .option('--timeout <ms>', 'Timeout for the static fetch and page navigation')
    .action(async (url: string, options: ScrapeCommandOptions) => {
      try {
        const timeout = parseTimeout(options.timeout);
        const scraper = createScraper({
          staticTimeoutMs: timeout,
          navigationTimeoutMs: timeout,
          headless: !options.headed,
          verbose: options.verbose,
        });

        const result = await scraper.scrape(url);
        console.log(JSON.stringify(result, null, options.compact ? undefined : 2));

        if (options.verbose && result.errors.length > 0) {
          for (const error of result.errors) {
            console.error(`[WARN] ${error.phase}: ${error.message}`);
          }
        }
      } catch (error) {
        const suggestion = error instanceof ScrapeError ? error.suggestion : undefined;
        console.error('Error:', error instanceof Error ? error.message : error);
        if (suggestion) {
          console.error('Hint:', suggestion);
        }
        process.exit(1);
      }
    });
}
