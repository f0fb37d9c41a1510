/**
 * Run Command
 *
 * One pass over the input directory. Per-file failures are reported in the
 * summary and the log; a completed pass exits 0.
 */

import { getConfig } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printJson, printSummary } from '../lib/output.js';
import { createPipeline } from '../lib/pipeline.js';

interface RunOptions {
  json?: boolean;
}

export async function runCommand(options: RunOptions): Promise<void> {
  const config = getConfig();
  const log = createCliLogger(config);
  const { processor } = createPipeline(config, log);

  const summary = await processor.runOnce();

  if (options.json) {
    printJson({
      encoded: summary.encoded,
      skipped: summary.skipped,
      failed: summary.failed,
      files: summary.files.map(outcome => ({
        file: outcome.file,
        status: outcome.status,
        ...(outcome.status === 'failed' ? { error: outcome.error.message } : {}),
      })),
    });
  } else {
    printSummary(summary);
  }
}
