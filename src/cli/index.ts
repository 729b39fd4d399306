#!/usr/bin/env node

/**
 * Puffdown CLI
 *
 * Entry point for the puffdown command
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';

import { isPuffdownError } from '../errors.js';
import { initCommand } from './commands/init.js';
import { sessionsCommand } from './commands/sessions.js';
import { startCommand } from './commands/start.js';

// Same relative location from src/cli and dist/cli
const getVersion = (): string => {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return String(pkg.version);
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
};

function reportFailure(error: unknown): void {
  if (isPuffdownError(error)) {
    console.error(`✗ ${error.message}`);
  } else {
    console.error('✗ Unexpected error:', error);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('puffdown')
  .description('Puffdown - Telegram setup wizard for your vaping-reduction plan')
  .version(getVersion(), '-v, --version', 'Print version information');

program
  .command('init')
  .description('Write the default configuration file')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(async (options: { force?: boolean }) => {
    await initCommand({ force: options.force });
  });

program
  .command('start')
  .description('Run the bot in the foreground')
  .action(async () => {
    await startCommand();
  });

program
  .command('sessions')
  .description('List setup wizards waiting on an answer')
  .action(async () => {
    await sessionsCommand();
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  reportFailure(error);
}
