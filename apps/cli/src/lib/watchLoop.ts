/**
 * Watch loop
 *
 * Starts the watcher and poll timer, kicks off the first pass and resolves
 * after SIGINT/SIGTERM once the pass in flight has finished. Signal handlers
 * are installed before anything runs.
 */

import type { SerialTrigger } from '@autoencoder/watcher';
import type { Logger } from '@autoencoder/utils';

type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  once(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface WatchLoopOptions {
  trigger: SerialTrigger;
  watcher: { start(): void; stop(): void };
  pollIntervalMs: number;
  log: Logger;
  signals?: SignalSource;
}

const STOP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function runWatchLoop(options: WatchLoopOptions): Promise<void> {
  const { trigger, watcher, pollIntervalMs, log } = options;
  const signals = options.signals ?? process;

  return new Promise<void>(resolve => {
    let poll: NodeJS.Timeout | null = null;

    const shutdown = (signal: NodeJS.Signals): void => {
      // A second signal falls through to the default handler
      for (const name of STOP_SIGNALS) signals.off(name, shutdown);
      log.info({ signal }, 'Stopping watch mode once the current pass ends');
      if (poll) clearInterval(poll);
      watcher.stop();
      void trigger.idle().then(resolve);
    };
    for (const name of STOP_SIGNALS) signals.once(name, shutdown);

    watcher.start();
    if (Number.isFinite(pollIntervalMs) && pollIntervalMs > 0) {
      poll = setInterval(() => void trigger.trigger(), pollIntervalMs);
    }
    void trigger.trigger();
  });
}
