/**
 * @autoencoder/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path and time helpers
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  appendTail,
  isCommandNotFound,
  formatCommandLine,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  appendLine,
  listFiles,
  partitionSettled,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  getBasename,
  withExtensionIn,
} from './path.js';

// Type guards
export {
  isString,
  isNonEmptyString,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
} from './time.js';

// Logger
export { logger, type Logger } from './logger.js';
