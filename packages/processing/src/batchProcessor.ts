/**
 * Batch Processor
 *
 * One pass over the input directory:
 * - skip files whose basename is already in the ledger
 * - read metadata, select tracks, assemble the HandBrake command
 * - encode, then record the file in the ledger
 *
 * Files are handled strictly one after another. No single file can abort the
 * batch: every failure is logged and the loop moves on.
 *
 * A directory scan only picks up files the file filter accepts and, when
 * `settleMs` is set, whose size and mtime did not change over that interval.
 * Files still being copied are left for a later pass.
 */

import { basename } from 'node:path';
import {
  EncodeFailedError,
  EncodeToolMissingError,
  LedgerReadError,
  LedgerWriteError,
  errorMessage,
  ledgerId,
  type ProcessedLedger,
} from '@autoencoder/core';
import type { MetadataReadResult } from '@autoencoder/media';
import {
  ensureDir,
  formatDuration,
  listFiles,
  logger,
  partitionSettled,
  withExtensionIn,
  type Logger,
} from '@autoencoder/utils';
import { buildCommand, DEFAULT_AUDIO_TRACK_NAMES, type EncodingProfile } from './commandBuilder.js';
import type { Encoder } from './handbrake.js';
import { DEFAULT_PRESET, getPreset } from './presets.js';
import { DEFAULT_LANGUAGES, selectAudioTracks } from './selection/audio.js';
import { DEFAULT_SUBTITLE_RULES } from './selection/rules.js';
import { selectSubtitles } from './selection/subtitles.js';
import type {
  DefaultSubtitleStrategy,
  SelectedAudioTrack,
  SelectedSubtitle,
  SubtitleRule,
} from './types.js';

export interface BatchProcessorConfig {
  inputDir: string;
  outputDir: string;
  outputExtension?: string;
  languages?: readonly string[];
  audioTrackNames?: Readonly<Record<string, string>>;
  subtitleRules?: readonly SubtitleRule[];
  profile?: EncodingProfile;
  defaultSubtitle?: DefaultSubtitleStrategy;
  // Applied to bare file names found in the input directory
  fileFilter?: (filename: string) => boolean;
  // 0 disables the settle check
  settleMs?: number;
}

/**
 * Anything that can read a file's streams, normally a MetadataReader
 */
export interface MetadataSource {
  read(filePath: string): Promise<MetadataReadResult>;
}

export interface BatchProcessorDeps {
  ledger: ProcessedLedger;
  metadataReader: MetadataSource;
  encoder: Encoder;
  logger?: Logger;
}

export interface EncodePlan {
  inputPath: string;
  outputPath: string;
  metadata: MetadataReadResult;
  audio: SelectedAudioTrack[];
  subtitles: SelectedSubtitle[];
  args: string[];
}

export type FileOutcome =
  | { file: string; status: 'encoded'; outputPath: string; durationMs: number; recorded: boolean }
  | { file: string; status: 'skipped'; reason: 'already-processed' | 'still-writing' }
  | { file: string; status: 'failed'; outputPath: string; error: Error };

export interface BatchSummary {
  encoded: number;
  skipped: number;
  failed: number;
  files: FileOutcome[];
}

export class BatchProcessor {
  private readonly config: Required<BatchProcessorConfig>;
  private readonly ledger: ProcessedLedger;
  private readonly metadataReader: MetadataSource;
  private readonly encoder: Encoder;
  private readonly log: Logger;

  constructor(config: BatchProcessorConfig, deps: BatchProcessorDeps) {
    this.config = {
      inputDir: config.inputDir,
      outputDir: config.outputDir,
      outputExtension: config.outputExtension ?? '.mkv',
      languages: config.languages ?? DEFAULT_LANGUAGES,
      audioTrackNames: config.audioTrackNames ?? DEFAULT_AUDIO_TRACK_NAMES,
      subtitleRules: config.subtitleRules ?? DEFAULT_SUBTITLE_RULES,
      profile: config.profile ?? getPreset(DEFAULT_PRESET),
      defaultSubtitle: config.defaultSubtitle ?? 'first',
      fileFilter: config.fileFilter ?? (() => true),
      settleMs: config.settleMs ?? 0,
    };
    this.ledger = deps.ledger;
    this.metadataReader = deps.metadataReader;
    this.encoder = deps.encoder;
    this.log = (deps.logger ?? logger).child({ component: 'batch' });
  }

  /**
   * Process every new file in the input directory once
   */
  async runOnce(): Promise<BatchSummary> {
    const summary: BatchSummary = { encoded: 0, skipped: 0, failed: 0, files: [] };

    let files: string[];
    try {
      files = await listFiles(this.config.inputDir);
    } catch (error) {
      this.log.error(
        { inputDir: this.config.inputDir, error: errorMessage(error) },
        'Cannot list input directory'
      );
      return summary;
    }

    const accepted = files.filter(file => this.config.fileFilter(basename(file)));
    if (accepted.length < files.length) {
      this.log.debug({ ignored: files.length - accepted.length }, 'Ignoring hidden or partial files');
    }
    this.log.info({ inputDir: this.config.inputDir, files: accepted.length }, 'Scanning input directory');

    const add = (outcome: FileOutcome): void => {
      summary.files.push(outcome);
      summary[outcome.status]++;
    };

    const fresh: string[] = [];
    for (const file of accepted) {
      if (await this.isProcessed(ledgerId(file))) {
        add(this.skipProcessed(file));
      } else {
        fresh.push(file);
      }
    }

    const { settled, changing } = this.config.settleMs > 0
      ? await partitionSettled(fresh, this.config.settleMs)
      : { settled: fresh, changing: [] };

    for (const file of changing) {
      this.log.info({ file: ledgerId(file), path: file }, 'File is still being written, deferring');
      add({ file, status: 'skipped', reason: 'still-writing' });
    }

    for (const file of settled) {
      add(await this.encodeFile(file));
    }

    this.log.info(
      { encoded: summary.encoded, skipped: summary.skipped, failed: summary.failed },
      'Batch finished'
    );
    return summary;
  }

  /**
   * Run a single file through the pipeline
   */
  async processFile(filePath: string): Promise<FileOutcome> {
    if (await this.isProcessed(ledgerId(filePath))) {
      return this.skipProcessed(filePath);
    }
    return this.encodeFile(filePath);
  }

  private skipProcessed(filePath: string): FileOutcome {
    this.log.info({ file: ledgerId(filePath), path: filePath }, 'Already processed, skipping');
    return { file: filePath, status: 'skipped', reason: 'already-processed' };
  }

  private async encodeFile(filePath: string): Promise<FileOutcome> {
    const id = ledgerId(filePath);
    this.log.info({ file: id, path: filePath }, 'New file found');
    const outputPath = this.outputPathFor(filePath);

    try {
      const plan = await this.planFile(filePath);
      await ensureDir(this.config.outputDir);
      const result = await this.encoder.encode(filePath, plan.args);

      const recorded = await this.recordProcessed(id);
      this.log.info(
        { file: id, output: outputPath, duration: formatDuration(result.durationMs) },
        'Successfully encoded'
      );
      return { file: filePath, status: 'encoded', outputPath, durationMs: result.durationMs, recorded };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logFailure(filePath, failure);
      return { file: filePath, status: 'failed', outputPath, error: failure };
    }
  }

  /**
   * Read metadata and assemble the command without encoding
   */
  async planFile(filePath: string): Promise<EncodePlan> {
    const outputPath = this.outputPathFor(filePath);
    const metadata = await this.metadataReader.read(filePath);

    const audio = selectAudioTracks(metadata.audio, this.config.languages);
    const subtitles = selectSubtitles(metadata.subtitles, this.config.subtitleRules);

    this.log.debug({ file: filePath, audio, subtitles }, 'Selected tracks');

    const args = buildCommand({
      inputPath: filePath,
      outputPath,
      audio,
      subtitles,
      profile: this.config.profile,
      audioTrackNames: this.config.audioTrackNames,
      defaultSubtitle: this.config.defaultSubtitle,
    });

    return { inputPath: filePath, outputPath, metadata, audio, subtitles, args };
  }

  outputPathFor(filePath: string): string {
    return withExtensionIn(this.config.outputDir, filePath, this.config.outputExtension);
  }

  private async isProcessed(id: string): Promise<boolean> {
    try {
      return await this.ledger.contains(id);
    } catch (error) {
      const cause = error instanceof LedgerReadError ? errorMessage(error.cause) : undefined;
      this.log.warn(
        { file: id, error: errorMessage(error), cause },
        'Ledger unreadable, treating file as not processed'
      );
      return false;
    }
  }

  private async recordProcessed(id: string): Promise<boolean> {
    try {
      await this.ledger.record(id);
      return true;
    } catch (error) {
      const cause = error instanceof LedgerWriteError ? errorMessage(error.cause) : undefined;
      this.log.error(
        { file: id, error: errorMessage(error), cause },
        'Encoded but could not record in ledger; file will be encoded again next run'
      );
      return false;
    }
  }

  private logFailure(filePath: string, error: Error): void {
    if (error instanceof EncodeToolMissingError) {
      this.log.error({ file: filePath, ...error.details }, 'HandBrakeCLI is not installed or not found');
    } else if (error instanceof EncodeFailedError) {
      this.log.error({ file: filePath, ...error.details }, 'An error occurred while encoding');
    } else {
      this.log.error({ file: filePath, error: error.message }, 'Unexpected error while processing file');
    }
  }
}
