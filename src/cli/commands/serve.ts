// src/cli/commands/serve.ts
import { Command } from 'commander';
import { ScrapeOrchestrator } from '../../core/orchestrator.js';
import { startServer } from '../../server/app.js';
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT } from '../../core/config/constants.js';

interface ServeCommandOptions {
  port: string;
  host: string;
  verbose: boolean;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP API (POST /scrape, GET /healthz)')
    .option('--port <port>', 'Port to listen on', process.env.PORT ?? String(DEFAULT_SERVER_PORT))
    .option('--host <host>', 'Interface to bind', DEFAULT_SERVER_HOST)
    .option('--verbose', 'Log pipeline decisions to stderr', false)
    .action(async (options: ServeCommandOptions) => {
      try {
        const port = parsePort(options.port);
        const scraper = new ScrapeOrchestrator({}, { verbose: options.verbose });
        const { address } = await startServer(scraper, port, options.host);
        console.error(`[INFO] Listening on ${address}`);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
