/**
 * Pipeline wiring
 *
 * Builds the ledger, metadata reader, HandBrake runner and batch processor
 * from the loaded configuration.
 */

import { FileLedger } from '@autoencoder/core';
import { MediaInfoProbe, MetadataReader } from '@autoencoder/media';
import {
  BatchProcessor,
  HandBrakeRunner,
  compileSubtitleRules,
} from '@autoencoder/processing';
import type { Logger } from '@autoencoder/utils';
import { createFileFilter } from '@autoencoder/watcher';
import type { AppConfig } from '../config/index.js';

export interface Pipeline {
  ledger: FileLedger;
  reader: MetadataReader;
  runner: HandBrakeRunner;
  processor: BatchProcessor;
}

export function createPipeline(config: AppConfig, log: Logger): Pipeline {
  const ledger = new FileLedger(config.paths.ledger, log);
  const reader = new MetadataReader(new MediaInfoProbe(config.binaries.mediainfo), log);
  const runner = new HandBrakeRunner({
    binary: config.binaries.handbrake,
    timeoutMs: config.encoding.timeoutMs,
    logger: log,
  });

  const processor = new BatchProcessor(
    {
      inputDir: config.paths.input,
      outputDir: config.paths.output,
      languages: config.encoding.languages,
      audioTrackNames: config.encoding.audioTrackNames,
      subtitleRules: compileSubtitleRules(config.encoding.subtitleRules),
      profile: config.encoding.profile,
      defaultSubtitle: config.encoding.defaultSubtitle,
      fileFilter: createFileFilter(),
      settleMs: config.scan.settleMs,
    },
    { ledger, metadataReader: reader, encoder: runner, logger: log }
  );

  return { ledger, reader, runner, processor };
}
