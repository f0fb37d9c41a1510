/**
 * @autoencoder/core
 *
 * Core package containing:
 * - Error taxonomy
 * - External binary resolution
 * - Processed-files ledger
 */

// Errors
export {
  AutoEncoderError,
  ValidationError,
  MetadataUnavailableError,
  EncodeToolMissingError,
  EncodeFailedError,
  LedgerReadError,
  LedgerWriteError,
  errorMessage,
} from './errors/index.js';

// Binaries
export {
  resolveBinaryPath,
  getBinariesConfig,
  isBinaryAvailable,
  getBinaryFolders,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';

// Ledger
export {
  FileLedger,
  MemoryLedger,
  ledgerId,
  parseLedger,
  type ProcessedLedger,
} from './ledger/processedLedger.js';
