/**
 * Check Command
 *
 * Reports where HandBrakeCLI and mediainfo resolve from and whether they start.
 */

import ora from 'ora';
import chalk from 'chalk';
import { getBinariesConfig, getBinaryFolders, isBinaryAvailable } from '@autoencoder/core';
import { getConfig } from '../config/index.js';
import { printError, printHeader, printInfo, printKeyValue, printSuccess } from '../lib/output.js';

export async function checkCommand(): Promise<void> {
  const config = getConfig();
  const binaries = getBinariesConfig(process.env);
  const spinner = ora('Checking external tools...').start();

  const results = await Promise.all(
    [binaries.handbrake, binaries.mediainfo].map(async binary => ({
      binary,
      available: await isBinaryAvailable(binary.resolvedPath),
    }))
  );
  spinner.stop();

  printHeader('External Tools');
  for (const { binary, available } of results) {
    const status = available ? chalk.green('ok') : chalk.red('not found');
    printKeyValue(binary.name, `${binary.resolvedPath} ${chalk.gray(`(${binary.source})`)} ${status}`);
  }

  printHeader('Paths');
  printKeyValue('Input', config.paths.input);
  printKeyValue('Output', config.paths.output);
  printKeyValue('Ledger', config.paths.ledger);
  printKeyValue('Log file', config.logFile ?? 'disabled');
  printKeyValue('Preset', config.encoding.preset);
  console.log();

  if (results.every(result => result.available)) {
    printSuccess('All tools available');
  } else {
    printError('Some tools are missing');
    printInfo(`Set HANDBRAKE_CLI_PATH / MEDIAINFO_PATH or place the binaries in ${getBinaryFolders().os}`);
    process.exitCode = 1;
  }
}
