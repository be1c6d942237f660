/**
 * ANSI color codes for terminal output
 */
export const codes = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
} as const;

/**
 * Check if colors should be enabled based on environment
 */
function shouldUseColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  // Respect FORCE_COLOR environment variable
  if (process.env.FORCE_COLOR !== undefined) {
    return true;
  }

  return process.stdout.isTTY ?? false;
}

let colorEnabled = shouldUseColors();

/**
 * Enable or disable color output at runtime
 * Used by --no-color flag and NO_COLOR env var handling
 */
export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

function colorize(text: string, code: string): string {
  if (!colorEnabled) {
    return text;
  }
  return `${code}${text}${codes.reset}`;
}

export function red(text: string): string {
  return colorize(text, codes.red);
}

export function green(text: string): string {
  return colorize(text, codes.green);
}

export function yellow(text: string): string {
  return colorize(text, codes.yellow);
}

export function blue(text: string): string {
  return colorize(text, codes.blue);
}

export function dim(text: string): string {
  return colorize(text, codes.dim);
}

// Semantic output functions with icons
export function success(text: string): string {
  const icon = colorEnabled ? '✓' : '[OK]';
  return `${green(icon)} ${text}`;
}

export function warning(text: string): string {
  const icon = colorEnabled ? '⚠' : '[WARN]';
  return `${yellow(icon)} ${yellow(text)}`;
}

export function error(text: string): string {
  const icon = colorEnabled ? '✗' : '[ERROR]';
  return `${red(icon)} ${red(text)}`;
}

export function info(text: string): string {
  const icon = colorEnabled ? 'ℹ' : '[INFO]';
  return `${blue(icon)} ${text}`;
}
