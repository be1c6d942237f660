/**
 * JSON-mode-aware output gate.
 *
 * Human-readable output goes through print() / printErr(), which fall silent
 * once setJsonMode(true) is called; the JSON envelope itself is written with
 * printJson(), which always reaches stdout.
 */

let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

/**
 * Write to stdout, suppressed when JSON mode is active.
 */
export function print(...args: unknown[]): void {
  if (!jsonMode) {
    console.log(...args);
  }
}

/**
 * Write to stderr, suppressed when JSON mode is active.
 */
export function printErr(...args: unknown[]): void {
  if (!jsonMode) {
    console.error(...args);
  }
}

/**
 * Write a serialized JSON envelope to stdout.
 */
export function printJson(text: string): void {
  console.log(text);
}
