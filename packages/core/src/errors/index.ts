/**
 * Custom Error Classes
 *
 * None of these is fatal to a batch: the orchestration loop catches each one,
 * logs it and moves on to the next file.
 */

/**
 * Base error class for all autoencoder errors
 */
export class AutoEncoderError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AutoEncoderError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid configuration or inputs
 */
export class ValidationError extends AutoEncoderError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Media metadata could not be read (missing file, corrupt container, probe failure)
 */
export class MetadataUnavailableError extends AutoEncoderError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(
      `Metadata unavailable for ${filePath}: ${reason}`,
      'METADATA_UNAVAILABLE',
      { filePath, reason },
      { cause }
    );
    this.name = 'MetadataUnavailableError';
  }
}

/**
 * The encoder binary could not be started
 */
export class EncodeToolMissingError extends AutoEncoderError {
  constructor(binary: string, cause?: unknown) {
    super(
      `Encoder binary not found or not executable: ${binary}`,
      'ENCODE_TOOL_MISSING',
      { binary },
      { cause }
    );
    this.name = 'EncodeToolMissingError';
  }
}

/**
 * The encoder ran but exited unsuccessfully
 */
export class EncodeFailedError extends AutoEncoderError {
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(
    inputPath: string,
    exitCode: number,
    stderr: string,
    timedOut: boolean = false
  ) {
    super(
      timedOut
        ? `Encoding timed out for ${inputPath}`
        : `Encoding failed for ${inputPath} with exit code ${exitCode}`,
      'ENCODE_FAILED',
      { inputPath, exitCode, timedOut, stderr: stderr.slice(-1000) }
    );
    this.name = 'EncodeFailedError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * The processed-files ledger exists but could not be read
 */
export class LedgerReadError extends AutoEncoderError {
  constructor(ledgerPath: string, cause?: unknown) {
    super(
      `Failed to read ledger ${ledgerPath}`,
      'LEDGER_READ_FAILURE',
      { ledgerPath },
      { cause }
    );
    this.name = 'LedgerReadError';
  }
}

/**
 * An entry could not be appended to the processed-files ledger
 */
export class LedgerWriteError extends AutoEncoderError {
  constructor(ledgerPath: string, id: string, cause?: unknown) {
    super(
      `Failed to record ${id} in ledger ${ledgerPath}`,
      'LEDGER_WRITE_FAILURE',
      { ledgerPath, id },
      { cause }
    );
    this.name = 'LedgerWriteError';
  }
}

/**
 * Describe an unknown thrown value for log output
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
