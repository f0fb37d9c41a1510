/**
 * CLI Logger
 *
 * Console output (pretty in development, JSON otherwise) plus an optional
 * JSON log file that persists across runs.
 */

import pino from 'pino';
import type { Logger } from '@autoencoder/utils';
import type { AppConfig } from '../config/index.js';

export function createCliLogger(config: Pick<AppConfig, 'nodeEnv' | 'logLevel' | 'logFile'>): Logger {
  const options = {
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'autoencoder',
      env: config.nodeEnv,
    },
  };

  if (config.logLevel === 'silent') {
    return pino(options);
  }

  const consoleTarget = config.nodeEnv === 'development'
    ? { target: 'pino-pretty', level: config.logLevel, options: { colorize: true, ignore: 'pid,hostname' } }
    : { target: 'pino/file', level: config.logLevel, options: { destination: 1 } };

  const fileTargets = config.logFile
    ? [{ target: 'pino/file', level: config.logLevel, options: { destination: config.logFile, mkdir: true } }]
    : [];

  return pino(options, pino.transport<Record<string, unknown>>({ targets: [consoleTarget, ...fileTargets] }));
}
