/**
 * Custom error classes for pbxsync
 *
 * These provide structured error handling with specific error types
 * that can be caught and handled differently based on the error kind.
 * Per-item outcomes of a batch (already present, not found) are not
 * errors: they are collected as values in the reconcile report.
 */

/**
 * Base error class for all pbxsync errors
 */
export class PbxSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PbxSyncError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when the manifest text cannot be parsed into a model
 */
export class MalformedManifestError extends PbxSyncError {
  public readonly manifestPath?: string;
  public readonly line?: number;

  constructor(message: string, options: { manifestPath?: string; line?: number } = {}) {
    super(options.line !== undefined ? `${message} (line ${options.line})` : message);
    this.name = 'MalformedManifestError';
    this.manifestPath = options.manifestPath;
    this.line = options.line;
  }
}

/**
 * Error thrown when committing the manifest to disk fails.
 * The original manifest is untouched when this is thrown.
 */
export class WriteFailureError extends PbxSyncError {
  public readonly manifestPath: string;
  public readonly backupPath?: string;

  constructor(
    message: string,
    options: { manifestPath: string; backupPath?: string; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'WriteFailureError';
    this.manifestPath = options.manifestPath;
    this.backupPath = options.backupPath;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends PbxSyncError {
  public readonly configFile?: string;
  public readonly field?: string;

  constructor(message: string, options: { configFile?: string; field?: string } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.configFile = options.configFile;
    this.field = options.field;
  }
}

/**
 * Error thrown when user cancels an operation
 */
export class UserCancelledError extends PbxSyncError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * Type guard to check if error is a MalformedManifestError
 */
export function isMalformedManifestError(error: unknown): error is MalformedManifestError {
  return error instanceof MalformedManifestError;
}

/**
 * Type guard to check if error is a WriteFailureError
 */
export function isWriteFailureError(error: unknown): error is WriteFailureError {
  return error instanceof WriteFailureError;
}
