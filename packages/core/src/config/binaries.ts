/**
 * Binary Configuration
 *
 * Centralized configuration for the external tools (HandBrakeCLI, mediainfo).
 * Supports both Windows and Linux binaries with automatic OS detection.
 *
 * Priority order:
 * 1. Environment variables (e.g., HANDBRAKE_CLI_PATH)
 * 2. Custom binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { executeCommand } from '@autoencoder/utils';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  handbrake: BinaryConfig;
  mediainfo: BinaryConfig;
}

/**
 * Resolve binary path with priority:
 * 1. Environment variable
 * 2. Custom binary folder
 * 3. Bare name, resolved through the system PATH at spawn time
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // An env value that does not exist on disk may still be a bare command name
  return {
    name,
    envVar,
    resolvedPath: envPath && envPath.length > 0 ? envPath : name,
    source: 'path',
  };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    handbrake: resolveBinaryPath('HandBrakeCLI', 'HANDBRAKE_CLI_PATH', env),
    mediainfo: resolveBinaryPath('mediainfo', 'MEDIAINFO_PATH', env),
  };
}

/**
 * Check if a binary can be started and answers `--version`
 */
export async function isBinaryAvailable(binaryPath: string): Promise<boolean> {
  try {
    const result = await executeCommand(binaryPath, ['--version'], { timeout: 5000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder()),
  };
}
