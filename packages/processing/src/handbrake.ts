/**
 * HandBrake Runner
 *
 * Runs one HandBrakeCLI encode to completion. There is no cancellation: an
 * encode ends when the tool exits or the timeout kills it.
 */

import {
  EncodeFailedError,
  EncodeToolMissingError,
} from '@autoencoder/core';
import {
  executeCommand,
  formatCommandLine,
  formatDuration,
  isCommandNotFound,
  logger,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@autoencoder/utils';

export interface EncodeOutcome {
  inputPath: string;
  command: string;
  durationMs: number;
}

/**
 * Anything that can turn an argument list into an encode
 */
export interface Encoder {
  encode(inputPath: string, args: string[]): Promise<EncodeOutcome>;
}

export interface HandBrakeRunnerOptions {
  binary?: string;
  timeoutMs?: number;
  run?: CommandRunner;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 6 * 60 * 60 * 1000;

export class HandBrakeRunner implements Encoder {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly log: Logger;

  constructor(options: HandBrakeRunnerOptions = {}) {
    this.binary = options.binary ?? 'HandBrakeCLI';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.run = options.run ?? executeCommand;
    this.log = (options.logger ?? logger).child({ component: 'handbrake' });
  }

  /**
   * Encode with the given arguments.
   *
   * @throws EncodeToolMissingError when the binary cannot be started
   * @throws EncodeFailedError on a non-zero exit or timeout
   */
  async encode(inputPath: string, args: string[]): Promise<EncodeOutcome> {
    const command = formatCommandLine(this.binary, args);
    this.log.info({ file: inputPath, command }, 'Starting encoding');

    let result: CommandResult;
    try {
      result = await this.run(this.binary, args, {
        timeout: this.timeoutMs,
        // HandBrake prints progress continuously; keep enough for diagnostics
        maxOutputSize: 1024 * 1024,
      });
    } catch (error) {
      if (isCommandNotFound(error)) {
        throw new EncodeToolMissingError(this.binary, error);
      }
      throw error;
    }

    if (result.exitCode !== 0 || result.timedOut) {
      throw new EncodeFailedError(inputPath, result.exitCode, result.stderr, result.timedOut);
    }

    this.log.info(
      { file: inputPath, duration: formatDuration(result.duration) },
      'Encoding finished'
    );

    return { inputPath, command, durationMs: result.duration };
  }
}
