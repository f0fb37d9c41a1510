/**
 * CLI Configuration
 *
 * Environment variables (optionally from a `.env` at the repository root)
 * plus an optional JSON file named by AUTOENCODER_CONFIG for the parts that
 * are awkward to express as env strings (subtitle rules, audio track names).
 *
 * Precedence: environment > JSON file > built-in defaults.
 */

import { config as dotenvConfig } from 'dotenv';
import { readFileSync } from 'node:fs';
import { resolve, dirname, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError, getBinariesConfig } from '@autoencoder/core';
import {
  DEFAULT_AUDIO_TRACK_NAMES,
  DEFAULT_LANGUAGES,
  DEFAULT_PRESET,
  DEFAULT_SUBTITLE_RULE_DEFINITIONS,
  getPreset,
  subtitleRuleSetSchema,
  type DefaultSubtitleStrategy,
  type EncodingProfile,
  type SubtitleRuleDefinition,
} from '@autoencoder/processing';

// Get repository root
const __dirname = dirname(fileURLToPath(import.meta.url));
export const REPO_ROOT = resolve(__dirname, '../../../..');

const languageListSchema = z
  .string()
  .transform(value => value.split(',').map(lang => lang.trim().toLowerCase()).filter(Boolean))
  .pipe(z.array(z.string()).min(1, 'at least one language is required'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Paths (relative to repository root)
  AUTOENCODER_INPUT_DIR: z.string().min(1).default('./videos/input'),
  AUTOENCODER_OUTPUT_DIR: z.string().min(1).default('./videos/output'),
  AUTOENCODER_LEDGER_PATH: z.string().min(1).default('./temp/processed_files.txt'),
  AUTOENCODER_LOG_FILE: z.string().default('./temp/logs/encoder.log'),
  AUTOENCODER_CONFIG: z.string().min(1).optional(),

  // Encoding
  AUTOENCODER_PRESET: z.string().min(1).optional(),
  AUTOENCODER_LANGUAGES: languageListSchema.optional(),
  AUTOENCODER_DEFAULT_SUBTITLE: z.enum(['first', 'forced']).optional(),
  AUTOENCODER_ENCODE_TIMEOUT_MS: z.string().default('21600000').transform(Number).pipe(z.number().int().nonnegative()), // 6 hours
  AUTOENCODER_POLL_INTERVAL_MS: z.string().default('60000').transform(Number).pipe(z.number().int().min(1000)),
  AUTOENCODER_SETTLE_MS: z.string().default('5000').transform(Number).pipe(z.number().int().nonnegative()),
});

const fileConfigSchema = z
  .object({
    preset: z.string().min(1).optional(),
    languages: z.array(z.string().min(1).transform(s => s.toLowerCase())).min(1).optional(),
    audioTrackNames: z.record(z.string().min(1)).optional(),
    subtitleRules: subtitleRuleSetSchema.optional(),
    defaultSubtitle: z.enum(['first', 'forced']).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  logFile: string | null;

  paths: {
    input: string;
    output: string;
    ledger: string;
  };

  binaries: {
    handbrake: string;
    mediainfo: string;
  };

  encoding: {
    preset: string;
    profile: EncodingProfile;
    languages: string[];
    audioTrackNames: Record<string, string>;
    subtitleRules: SubtitleRuleDefinition[];
    defaultSubtitle: DefaultSubtitleStrategy;
    timeoutMs: number;
  };

  scan: {
    settleMs: number;
  };

  watch: {
    pollIntervalMs: number;
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build the configuration from an environment and an already-parsed JSON file.
 *
 * @throws ValidationError when a value is missing or malformed
 */
export function parseConfig(
  env: NodeJS.ProcessEnv,
  options: { root?: string; fileConfig?: unknown } = {}
): AppConfig {
  const root = options.root ?? REPO_ROOT;
  const resolvePath = (p: string): string => (isAbsolute(p) ? p : resolve(root, p));

  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new ValidationError('environment', formatIssues(envResult.error));
  }

  const fileResult = fileConfigSchema.safeParse(options.fileConfig ?? {});
  if (!fileResult.success) {
    throw new ValidationError('config file', formatIssues(fileResult.error));
  }

  const e = envResult.data;
  const file = fileResult.data;
  const preset = e.AUTOENCODER_PRESET ?? file.preset ?? DEFAULT_PRESET;
  const binaries = getBinariesConfig(env);

  return {
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    logFile: e.AUTOENCODER_LOG_FILE === '' ? null : resolvePath(e.AUTOENCODER_LOG_FILE),

    paths: {
      input: resolvePath(e.AUTOENCODER_INPUT_DIR),
      output: resolvePath(e.AUTOENCODER_OUTPUT_DIR),
      ledger: resolvePath(e.AUTOENCODER_LEDGER_PATH),
    },

    binaries: {
      handbrake: binaries.handbrake.resolvedPath,
      mediainfo: binaries.mediainfo.resolvedPath,
    },

    encoding: {
      preset,
      profile: getPreset(preset),
      languages: e.AUTOENCODER_LANGUAGES ?? file.languages ?? [...DEFAULT_LANGUAGES],
      audioTrackNames: { ...DEFAULT_AUDIO_TRACK_NAMES, ...file.audioTrackNames },
      subtitleRules: file.subtitleRules ?? [...DEFAULT_SUBTITLE_RULE_DEFINITIONS],
      defaultSubtitle: e.AUTOENCODER_DEFAULT_SUBTITLE ?? file.defaultSubtitle ?? 'first',
      timeoutMs: e.AUTOENCODER_ENCODE_TIMEOUT_MS,
    },

    scan: {
      settleMs: e.AUTOENCODER_SETTLE_MS,
    },

    watch: {
      pollIntervalMs: e.AUTOENCODER_POLL_INTERVAL_MS,
    },
  };
}

/**
 * Read the JSON config file named by AUTOENCODER_CONFIG
 */
export function readConfigFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ValidationError('AUTOENCODER_CONFIG', `cannot read ${filePath}: ${String(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new ValidationError('AUTOENCODER_CONFIG', `${filePath} is not valid JSON`);
  }
}

let config: AppConfig | null = null;

/**
 * Load `.env`, the optional JSON file and validate everything (cached)
 */
export function getConfig(): AppConfig {
  if (!config) {
    dotenvConfig({ path: resolve(REPO_ROOT, '.env') });

    const configPath = process.env['AUTOENCODER_CONFIG'];
    const fileConfig = configPath
      ? readConfigFile(isAbsolute(configPath) ? configPath : resolve(REPO_ROOT, configPath))
      : undefined;

    config = parseConfig(process.env, { fileConfig });
  }
  return config;
}
