/**
 * Helpers for calling command handlers directly
 */

import { vi } from 'vitest';
import type { MockInstance } from 'vitest';

/**
 * Parsed-arguments object as yargs hands it to a handler
 */
export function cliArgs<T extends object>(args: T): T & { _: Array<string | number>; $0: string } {
  return { _: [], $0: 'pbxsync', ...args };
}

export interface CapturedOutput {
  log: MockInstance;
  error: MockInstance;
  exit: MockInstance<Parameters<typeof process.exit>, never>;
  /** First argument of every console.log call */
  lines(): string[];
}

/**
 * Silence console output and process.exit for the current test
 */
export function captureOutput(): CapturedOutput {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  return {
    log,
    error,
    exit,
    lines: () => log.mock.calls.map((call) => String(call[0])),
  };
}
