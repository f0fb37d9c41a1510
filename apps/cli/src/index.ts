#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 *
 * Batch HandBrake encoder for PAL DVD rips.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { AutoEncoderError, errorMessage } from '@autoencoder/core';
import { listPresets } from '@autoencoder/processing';
import { runCommand } from './commands/run.js';
import { watchCommand } from './commands/watch.js';
import { planCommand } from './commands/plan.js';
import { checkCommand } from './commands/check.js';
import { ledgerAddCommand, ledgerListCommand } from './commands/ledger.js';
import { printError } from './lib/output.js';

/**
 * Wrap an action so configuration and startup errors end the process cleanly
 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof AutoEncoderError) {
        printError(`${error.message} ${chalk.gray(`[${error.code}]`)}`);
      } else {
        printError(errorMessage(error));
      }
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('autoencoder')
  .description('Batch HandBrake encoder for PAL DVD rips')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Encode every new file in the input directory once')
  .option('--json', 'Output the summary in JSON format')
  .action(action(runCommand));

program
  .command('watch')
  .description('Encode new files as they arrive in the input directory')
  .option('-i, --interval <seconds>', 'Poll interval in seconds')
  .action(action(watchCommand));

program
  .command('plan [file]')
  .description('Show track selection and the HandBrake command without encoding')
  .option('--json', 'Output in JSON format')
  .action(action(planCommand));

const ledger = program
  .command('ledger')
  .description('Inspect the processed-files ledger');

ledger
  .command('list')
  .description('List recorded files')
  .option('--json', 'Output in JSON format')
  .action(action(ledgerListCommand));

ledger
  .command('add <file>')
  .description('Mark a file as processed without encoding it')
  .action(action(ledgerAddCommand));

program
  .command('presets')
  .description('List encoding presets')
  .action(() => {
    for (const name of listPresets()) {
      console.log(name);
    }
  });

program
  .command('check')
  .description('Check that HandBrakeCLI and mediainfo can be started')
  .action(action(checkCommand));

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('autoencoder --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
