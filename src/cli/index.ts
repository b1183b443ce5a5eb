#!/usr/bin/env node

import { Command } from 'commander';
import { registerScrapeCommand } from './commands/scrape.js';
import { registerServeCommand } from './commands/serve.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pagesift')
    .description('Extract structured sections from any web page')
    .version('0.1.0');

  registerScrapeCommand(program);
  registerServeCommand(program);
  registerInstallBrowsersCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
