// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Download the Chromium build used for rendered scrapes')
    .action(() => {
      try {
        execSync('npx playwright install chromium', {
          stdio: 'inherit',
        });
        console.log('✓ Chromium installed');
      } catch (error) {
        console.error('✗ Failed to install Chromium:', error instanceof Error ? error.message : error);
        console.error('Note: static pages still scrape without a browser.');
        process.exit(1);
      }
    });
}
