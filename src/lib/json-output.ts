/**
 * JSON output utilities for machine-readable CLI output
 *
 * Every command prints one envelope on stdout when --json is given, so
 * scripts and editor integrations can drive pbxsync without parsing text.
 */

import type { DriftReport, ItemIssue } from './reconcile/index.js';

/**
 * Standard error codes for programmatic handling
 */
export enum ErrorCode {
  // Manifest errors
  MALFORMED_MANIFEST = 'MALFORMED_MANIFEST',
  WRITE_FAILURE = 'WRITE_FAILURE',
  OUT_OF_SYNC = 'OUT_OF_SYNC',

  // Config errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // User errors
  USER_CANCELLED = 'USER_CANCELLED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // System errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Error information for structured error responses
 */
export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

/**
 * Standard JSON response schema for all commands
 */
export interface CommandResult<T = Record<string, unknown>> {
  success: boolean;
  command: string;
  timestamp: string;

  /** Command-specific data */
  data?: T;

  /** Error information (present when success is false) */
  error?: ErrorInfo;

  /** Warnings that didn't prevent success */
  warnings?: string[];
}

// ============================================================================
// Mutating commands (add, remove, sync, clean, rebuild)
// ============================================================================

/**
 * Result data shared by every command that may rewrite the manifest
 */
export interface ReconcileResultData {
  manifestPath: string;
  added: string[];
  removed: string[];
  deduplicated: string[];
  orphansRemoved: string[];
  listEntriesRemoved: number;
  issues: ItemIssue[];
  /** False for dry runs and when nothing changed */
  written: boolean;
  dryRun: boolean;
  /** Backup left on disk, if any */
  backupPath?: string;
}

// ============================================================================
// check
// ============================================================================

export interface CheckResultData extends DriftReport {
  manifestPath: string;
  inSync: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Create a successful command result
 */
export function createSuccessResult<T>(
  command: string,
  data: T,
  warnings?: string[]
): CommandResult<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
    warnings: warnings?.length ? warnings : undefined,
  };
}

/**
 * Create a failed command result
 */
export function createErrorResult(
  command: string,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): CommandResult<never> {
  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: {
      code,
      message,
      details,
      suggestion,
    },
  };
}

/**
 * Format result as JSON string for output
 */
export function formatJsonResult<T>(result: CommandResult<T>): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Map error to ErrorCode
 */
export function getErrorCodeFromError(error: unknown): ErrorCode {
  if (error instanceof Error) {
    switch (error.name) {
      case 'MalformedManifestError':
        return ErrorCode.MALFORMED_MANIFEST;
      case 'WriteFailureError':
        return ErrorCode.WRITE_FAILURE;
      case 'ConfigurationError':
        return ErrorCode.INVALID_CONFIG;
      case 'UserCancelledError':
        return ErrorCode.USER_CANCELLED;
      default:
        return ErrorCode.UNKNOWN_ERROR;
    }
  }
  return ErrorCode.UNKNOWN_ERROR;
}

/**
 * Recovery hint for an error code, if there is a useful one
 */
export function getErrorSuggestion(code: ErrorCode): string | undefined {
  switch (code) {
    case ErrorCode.MALFORMED_MANIFEST:
      return 'Open the project in Xcode to repair it, or restore it from version control.';
    case ErrorCode.WRITE_FAILURE:
      return 'Check file permissions; the previous manifest is unchanged.';
    case ErrorCode.INVALID_CONFIG:
      return 'Fix .pbxsyncrc or pass --project with the path to project.pbxproj.';
    case ErrorCode.OUT_OF_SYNC:
      return 'Run `pbxsync sync` to update the project.';
    default:
      return undefined;
  }
}
