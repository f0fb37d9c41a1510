/**
 * Command Execution Wrapper
 *
 * Wrapper for running external tools (HandBrakeCLI, mediainfo) with:
 * - Optional timeout
 * - Bounded output capture
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, 0 = no limit
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Signature shared by executeCommand and the fakes used in tests
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command without a shell
 *
 * Resolves with the exit status; rejects only when the process could not be
 * spawned (e.g. ENOENT when the binary does not exist).
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;

    let timeoutId: NodeJS.Timeout | null = null;
    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        // Force kill after 10 seconds
        setTimeout(() => child.kill('SIGKILL'), 10000).unref();
      }, timeout);
    }

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // stderr keeps the most recent output; tool errors are printed last
    child.stderr?.on('data', (data: Buffer) => {
      stderr = appendTail(stderr, data.toString(), maxOutputSize);
    });

    child.on('close', (code, exitSignal) => {
      if (timeoutId) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      if (timeoutId) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}

/**
 * Append `chunk`, dropping the oldest characters beyond `maxLength`
 */
export function appendTail(buffer: string, chunk: string, maxLength: number): string {
  const combined = buffer + chunk;
  return combined.length > maxLength ? combined.slice(combined.length - maxLength) : combined;
}

/**
 * True when a spawn error means the binary itself was not found
 */
export function isCommandNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EACCES')
  );
}

/**
 * Render a command line for logs, quoting arguments that contain spaces
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(a => (a === '' || /\s/.test(a) ? `"${a}"` : a))
    .join(' ');
}
