/**
 * Structured error display.
 *
 * Centralizes getErrorCodeFromError(err) -> getErrorSuggestion(code) -> format
 * for the top-level catch of every command.
 */

import * as colors from '../colors.js';
import { isMalformedManifestError, isWriteFailureError } from '../errors.js';
import { getErrorCodeFromError, getErrorSuggestion } from '../json-output.js';
import { printErr } from './output.js';

export interface ErrorDisplayOptions {
  title: string;
  detail?: string;
  hint?: string;
}

/**
 * Display a structured error to stderr.
 *
 * Output format:
 * ```
 * ✗ {title}                    <- via colors.error()
 *   {detail}                   <- plain text, only if provided
 *   Hint: {hint}               <- via colors.dim(), only if provided
 * ```
 */
export function printError(options: ErrorDisplayOptions): void {
  printErr(colors.error(options.title));
  if (options.detail) {
    printErr(`  ${options.detail}`);
  }
  if (options.hint) {
    printErr(`  ${colors.dim(`Hint: ${options.hint}`)}`);
  }
}

/**
 * Extract display info from an error object.
 */
export function errorToDisplay(error: unknown): ErrorDisplayOptions {
  const message = error instanceof Error ? error.message : String(error);
  const hint = getErrorSuggestion(getErrorCodeFromError(error));

  let detail: string | undefined;
  if (isMalformedManifestError(error) && error.manifestPath) {
    detail = `In ${error.manifestPath}`;
  } else if (isWriteFailureError(error) && error.backupPath) {
    detail = `Backup: ${error.backupPath}`;
  }

  return { title: message, detail, hint };
}
