/**
 * Status output functions for consistent CLI display.
 */

import * as colors from '../colors.js';
import { print } from './output.js';

export type StatusType = 'success' | 'error' | 'warning' | 'info';

const statusFn: Record<StatusType, (msg: string) => string> = {
  success: colors.success,
  error: colors.error,
  warning: colors.warning,
  info: colors.info,
};

/**
 * Print a status message with the appropriate icon and color.
 *
 * Example: printStatus('success', 'Added 2 files')
 */
export function printStatus(type: StatusType, message: string): void {
  print(statusFn[type](message));
}

/**
 * Print dimmed text with optional indentation.
 */
export function printDim(message: string, indent: number = 0): void {
  const pad = ' '.repeat(indent);
  print(`${pad}${colors.dim(message)}`);
}

/**
 * Print a list of status lines, e.g. a reconcile summary.
 */
export function printStatusLines(lines: ReadonlyArray<{ level: StatusType; message: string }>): void {
  for (const line of lines) {
    printStatus(line.level, line.message);
  }
}
