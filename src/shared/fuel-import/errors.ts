/**
 * Fuel Import Errors
 *
 * Failures that abort an import call. Row-level problems are never thrown;
 * they are reported as `ImportError` entries in the result.
 *
 * @module shared/fuel-import/errors
 */

/**
 * Storage failed while writing a validated batch. The transaction was rolled
 * back, so nothing from the file was persisted.
 */
export class ImportCommitError extends Error {
  public readonly code = 'COMMIT_FAILED';
  /** Rows the batch attempted to write */
  public readonly rowCount: number;

  constructor(rowCount: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to commit fuel import batch of ${rowCount} row(s): ${detail}`, { cause });
    this.name = 'ImportCommitError';
    this.rowCount = rowCount;
    Object.setPrototypeOf(this, ImportCommitError.prototype);
  }
}

/**
 * Upload exceeds the configured size cap
 */
export class ImportFileTooLargeError extends Error {
  public readonly code = 'FILE_TOO_LARGE';
  public readonly sizeBytes: number;
  public readonly maxBytes: number;

  constructor(sizeBytes: number, maxBytes: number) {
    super(`Import file too large: ${sizeBytes} bytes (max ${maxBytes})`);
    this.name = 'ImportFileTooLargeError';
    this.sizeBytes = sizeBytes;
    this.maxBytes = maxBytes;
    Object.setPrototypeOf(this, ImportFileTooLargeError.prototype);
  }
}
