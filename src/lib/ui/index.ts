/**
 * Shared UI primitives for CLI output.
 */

// Output gating
export { setJsonMode, print, printErr, printJson } from './output.js';

// Status output
export { printStatus, printDim, printStatusLines } from './status.js';
export type { StatusType } from './status.js';

// Error output
export { printError, errorToDisplay } from './error.js';
export type { ErrorDisplayOptions } from './error.js';
