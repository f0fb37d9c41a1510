/**
 * Ledger Commands
 *
 * Inspect or extend the processed-files ledger.
 */

import { FileLedger, ledgerId } from '@autoencoder/core';
import { getConfig } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printInfo, printJson, printSuccess } from '../lib/output.js';

interface LedgerListOptions {
  json?: boolean;
}

export async function ledgerListCommand(options: LedgerListOptions): Promise<void> {
  const config = getConfig();
  const ledger = new FileLedger(config.paths.ledger, createCliLogger(config));
  const entries = await ledger.entries();

  if (options.json) {
    printJson(entries);
    return;
  }

  if (entries.length === 0) {
    printInfo(`Ledger is empty (${config.paths.ledger})`);
    return;
  }

  for (const entry of entries) {
    console.log(entry);
  }
}

export async function ledgerAddCommand(file: string): Promise<void> {
  const config = getConfig();
  const ledger = new FileLedger(config.paths.ledger, createCliLogger(config));
  const id = ledgerId(file);

  if (await ledger.contains(id)) {
    printInfo(`${id} is already recorded`);
    return;
  }

  await ledger.record(id);
  printSuccess(`Recorded ${id}; it will be skipped from now on`);
}
