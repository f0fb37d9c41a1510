/**
 * Plan Command
 *
 * Shows the track selection and HandBrake command for a file without
 * encoding it. With no file, plans every unprocessed file in the input
 * directory.
 */

import ora from 'ora';
import chalk from 'chalk';
import { ledgerId } from '@autoencoder/core';
import type { EncodePlan } from '@autoencoder/processing';
import { formatCommandLine, listFiles } from '@autoencoder/utils';
import { getConfig } from '../config/index.js';
import { createCliLogger } from '../lib/logger.js';
import { printHeader, printInfo, printJson, printKeyValue, printWarning } from '../lib/output.js';
import { createPipeline } from '../lib/pipeline.js';

interface PlanOptions {
  json?: boolean;
}

export async function planCommand(file: string | undefined, options: PlanOptions): Promise<void> {
  const config = getConfig();
  const log = createCliLogger({ ...config, logLevel: 'warn' });
  const { processor, ledger } = createPipeline(config, log);

  const spinner = ora('Reading media metadata...').start();

  let files: string[];
  if (file) {
    files = [file];
  } else {
    const all = await listFiles(config.paths.input);
    files = [];
    for (const candidate of all) {
      if (!(await ledger.contains(ledgerId(candidate)))) {
        files.push(candidate);
      }
    }
  }

  const plans: EncodePlan[] = [];
  for (const candidate of files) {
    spinner.text = `Reading ${ledgerId(candidate)}...`;
    plans.push(await processor.planFile(candidate));
  }
  spinner.stop();

  if (options.json) {
    printJson(plans.map(plan => ({
      input: plan.inputPath,
      output: plan.outputPath,
      metadata: plan.metadata.status,
      audio: plan.audio,
      subtitles: plan.subtitles,
      args: plan.args,
    })));
    return;
  }

  if (plans.length === 0) {
    printInfo('Nothing to encode');
    return;
  }

  for (const plan of plans) {
    printPlan(plan, config.binaries.handbrake);
  }
}

function printPlan(plan: EncodePlan, binary: string): void {
  printHeader(ledgerId(plan.inputPath));
  printKeyValue('Output', plan.outputPath);

  if (plan.metadata.status === 'unavailable') {
    printWarning(`Metadata unavailable: ${plan.metadata.error.message}`);
  }

  const audio = plan.audio.length > 0
    ? plan.audio.map(track => `${chalk.cyan(`#${track.streamIndex}`)} ${track.language}`).join(', ')
    : chalk.gray('none selected');
  printKeyValue('Audio', audio);

  const subtitles = plan.subtitles.length > 0
    ? plan.subtitles
        .map(sub => `${chalk.cyan(`#${sub.streamIndex}`)} ${sub.ruleName}${sub.isDefault ? chalk.yellow(' (forced)') : ''}`)
        .join(', ')
    : chalk.gray('none selected');
  printKeyValue('Subtitles', subtitles);

  console.log();
  console.log(chalk.gray(formatCommandLine(binary, plan.args)));
}
