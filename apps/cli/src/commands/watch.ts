/**
 * Watch Command
 *
 * Runs a pass immediately, then again whenever a new file settles in the
 * input directory and on a fixed poll interval. Passes never overlap.
 */

import chalk from 'chalk';
import { errorMessage } from '@autoencoder/core';
import { FolderWatcher, SerialTrigger, type WatchEvent } from '@autoencoder/watcher';
import { getConfig } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printInfo } from '../lib/output.js';
import { createPipeline } from '../lib/pipeline.js';
import { runWatchLoop } from '../lib/watchLoop.js';

interface WatchOptions {
  interval?: string;
}

export async function watchCommand(options: WatchOptions): Promise<void> {
  const config = getConfig();
  const log = createCliLogger(config).child({ component: 'watch' });
  const { processor, ledger } = createPipeline(config, log);

  const pollIntervalMs = options.interval
    ? Number.parseInt(options.interval, 10) * 1000
    : config.watch.pollIntervalMs;

  const trigger = new SerialTrigger(
    async () => {
      // Pick up entries added with `ledger add` since the last pass
      ledger.invalidate();
      await processor.runOnce();
    },
    error => log.error({ error: errorMessage(error) }, 'Batch pass failed')
  );

  const watcher = new FolderWatcher({ paths: [config.paths.input] });
  watcher.on('add', (event: WatchEvent) => {
    log.info({ file: event.path, size: event.size }, 'File settled in input directory');
    void trigger.trigger();
  });
  watcher.on('error', ({ path, error }: { path: string; error: unknown }) => {
    log.warn({ path, error: errorMessage(error) }, 'Watcher error, relying on polling');
  });

  printInfo(`Watching ${chalk.cyan(config.paths.input)} (Ctrl+C to stop)`);
  await runWatchLoop({ trigger, watcher, pollIntervalMs, log });
}
