import { describe, it, expect, vi } from 'vitest';
import { EncodeFailedError, EncodeToolMissingError } from '@autoencoder/core';
import type { CommandResult, CommandRunner } from '@autoencoder/utils';
import { HandBrakeRunner } from '../handbrake.js';

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 1500, timedOut: false, ...overrides };
}

describe('HandBrakeRunner', () => {
  it('runs the binary with the given arguments and timeout', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(result());
    const runner = new HandBrakeRunner({ binary: '/opt/HandBrakeCLI', timeoutMs: 1000, run });

    const outcome = await runner.encode('in.mkv', ['--input', 'in.mkv', '--output', 'out dir/out.mkv']);

    expect(run).toHaveBeenCalledWith(
      '/opt/HandBrakeCLI',
      ['--input', 'in.mkv', '--output', 'out dir/out.mkv'],
      { timeout: 1000, maxOutputSize: 1024 * 1024 }
    );
    expect(outcome).toEqual({
      inputPath: 'in.mkv',
      command: '/opt/HandBrakeCLI --input in.mkv --output "out dir/out.mkv"',
      durationMs: 1500,
    });
  });

  it('reports a missing binary as EncodeToolMissingError', async () => {
    const missing = Object.assign(new Error('spawn HandBrakeCLI ENOENT'), { code: 'ENOENT' });
    const runner = new HandBrakeRunner({ run: vi.fn<CommandRunner>().mockRejectedValue(missing) });

    await expect(runner.encode('in.mkv', [])).rejects.toBeInstanceOf(EncodeToolMissingError);
  });

  it('rethrows other spawn errors unchanged', async () => {
    const failure = Object.assign(new Error('spawn EMFILE'), { code: 'EMFILE' });
    const runner = new HandBrakeRunner({ run: vi.fn<CommandRunner>().mockRejectedValue(failure) });

    await expect(runner.encode('in.mkv', [])).rejects.toBe(failure);
  });

  it('reports a non-zero exit as EncodeFailedError with exit code and stderr', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(result({ exitCode: 3, stderr: 'bad input' }));
    const runner = new HandBrakeRunner({ run });

    const error = await runner.encode('in.mkv', []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EncodeFailedError);
    if (error instanceof EncodeFailedError) {
      expect(error.exitCode).toBe(3);
      expect(error.stderr).toBe('bad input');
      expect(error.message).toBe('Encoding failed for in.mkv with exit code 3');
    }
  });

  it('reports a timeout as EncodeFailedError', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(result({ exitCode: 143, timedOut: true }));
    const runner = new HandBrakeRunner({ run });

    await expect(runner.encode('in.mkv', [])).rejects.toThrow('Encoding timed out for in.mkv');
  });
});
