/**
 * Logging system for pbxsync
 *
 * Consola-based singleton logger with:
 * - LogFileReporter: optional log file (--log-file) with size-based rotation
 * - ConditionalStderrReporter: verbose/quiet aware stderr output
 *
 * Configuration sources (in order of priority):
 * 1. CLI flags (--verbose, --quiet, --no-color)
 * 2. Environment variable (PBXSYNC_LOG_LEVEL)
 * 3. Default (INFO)
 */

import fs from 'fs';
import path from 'path';
import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { LOG_LEVEL_ENV, LogLevel, MAX_LOG_FILE_SIZE, MAX_LOG_FILES } from './constants.js';
import { setColorEnabled } from './colors.js';

export { LogLevel };

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

/** Whether JSON output mode is active */
let jsonMode = false;

/** Track whether a log file warning has been issued */
let logFileWarned = false;

/** Reference to the active file reporter so it can be closed */
let activeFileReporter: LogFileReporter | null = null;

function warnLogFileOnce(message: string): void {
  if (!logFileWarned) {
    logFileWarned = true;
    process.stderr.write(`[pbxsync] ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// LogFileReporter
// ---------------------------------------------------------------------------

/**
 * Appends log entries to a file, rotating it when it grows past
 * MAX_LOG_FILE_SIZE. Text lines by default; JSONL when json mode is active.
 * Writes are synchronous: every invocation is short-lived and exits with
 * process.exit.
 */
class LogFileReporter implements ConsolaReporter {
  readonly filePath: string;
  private enabled = true;

  constructor(filePath: string) {
    this.filePath = filePath;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      rotateIfNeeded(filePath);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      warnLogFileOnce(`Failed to open log file: ${msg}`);
      this.enabled = false;
    }
  }

  log(logObj: LogObject): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString();
    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);

    const line = jsonMode
      ? JSON.stringify({
          timestamp,
          level: levelName,
          ...(logObj.tag ? { tag: logObj.tag } : {}),
          message,
        })
      : `[${timestamp}] ${levelName}${tag} ${message}`;

    try {
      fs.appendFileSync(this.filePath, line + '\n');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      warnLogFileOnce(`Log file write error: ${msg}`);
      this.enabled = false;
    }
  }

  close(): void {
    this.enabled = false;
  }
}

// ---------------------------------------------------------------------------
// ConditionalStderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes to stderr based on log level and verbose mode.
 * WARN and ERROR always print; DEBUG/INFO/TRACE only print when verbose=true.
 */
class ConditionalStderrReporter implements ConsolaReporter {
  private verbose: boolean;
  private useColors: boolean;

  constructor(verbose: boolean, useColors: boolean) {
    this.verbose = verbose;
    this.useColors = useColors;
  }

  log(logObj: LogObject): void {
    // Level < 2 means warn (1) or error/fatal (0): always print
    // Level >= 2 means info (3), debug (4), trace (5): only if verbose
    if (logObj.level >= 2 && !this.verbose) {
      return;
    }

    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);
    const prefix = this.useColors ? colorizeLevel(levelName, logObj.level) : `[${levelName}]`;

    process.stderr.write(`${prefix}${tag} ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// Rotation logic
// ---------------------------------------------------------------------------

function rotateIfNeeded(filePath: string): void {
  if (!fs.existsSync(filePath)) return;
  const stats = fs.statSync(filePath);
  if (stats.size <= MAX_LOG_FILE_SIZE) return;

  // Shift: pbxsync.log.2 deleted, pbxsync.log.1 -> .2, pbxsync.log -> .1
  for (let i = MAX_LOG_FILES - 1; i >= 1; i--) {
    const older = `${filePath}.${i}`;
    const newer = i === 1 ? filePath : `${filePath}.${i - 1}`;

    if (fs.existsSync(newer)) {
      if (i === MAX_LOG_FILES - 1 && fs.existsSync(older)) {
        fs.unlinkSync(older);
      }
      fs.renameSync(newer, older);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function levelToName(level: number): string {
  if (level <= 0) {
    // 0 = error/fatal, negative = silent (shouldn't log)
    return level === 0 ? 'ERROR' : 'SILENT';
  }
  switch (level) {
    case 1:
      return 'WARN';
    case 2:
      return 'LOG';
    case 3:
      return 'INFO';
    case 4:
      return 'DEBUG';
    default:
      return 'TRACE';
  }
}

function colorizeLevel(name: string, level: number): string {
  // ANSI color codes
  const RED = '\x1b[31m';
  const YELLOW = '\x1b[33m';
  const CYAN = '\x1b[36m';
  const GRAY = '\x1b[90m';
  const RESET = '\x1b[0m';

  switch (true) {
    case level <= 0:
      return `${RED}[${name}]${RESET}`;
    case level === 1:
      return `${YELLOW}[${name}]${RESET}`;
    case level <= 3:
      return `${CYAN}[${name}]${RESET}`;
    default:
      return `${GRAY}[${name}]${RESET}`;
  }
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => (typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a)))
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with empty reporters; call initializeLogger() to configure.
 */
export const logger = createConsola({
  level: LogLevel.INFO,
  reporters: [],
});

// ---------------------------------------------------------------------------
// initializeLogger
// ---------------------------------------------------------------------------

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  json?: boolean;
  logFile?: string;
}

/**
 * Configure the logger with CLI flags, env vars, and reporters.
 * Must be called early in CLI startup. Safe to call multiple times
 * (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  let level: number;

  if (options.quiet) {
    level = LogLevel.ERROR;
  } else if (options.verbose) {
    level = LogLevel.DEBUG;
  } else if (process.env[LOG_LEVEL_ENV]) {
    level = parseLogLevel(process.env[LOG_LEVEL_ENV] ?? '') ?? LogLevel.INFO;
  } else {
    level = LogLevel.INFO;
  }

  logger.level = level;

  const useColors = !options.noColor && process.env.NO_COLOR === undefined;
  if (options.noColor) {
    setColorEnabled(false);
  }

  jsonMode = options.json ?? false;

  const reporters: ConsolaReporter[] = [];

  if (activeFileReporter) {
    activeFileReporter.close();
    activeFileReporter = null;
  }
  if (options.logFile) {
    const fileReporter = new LogFileReporter(path.resolve(options.logFile));
    reporters.push(fileReporter);
    activeFileReporter = fileReporter;
  }

  // Verbose stderr also when the env var asks for debug output
  const verbose = (options.verbose ?? false) || (!options.quiet && level >= LogLevel.DEBUG);
  reporters.push(new ConditionalStderrReporter(verbose, useColors));

  logger.setReporters(reporters);
}

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    warning: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
    verbose: LogLevel.DEBUG,
  };
  return mapping[normalized];
}

/**
 * Reset all module-level state for test isolation.
 * Prefixed with _ to signal internal-only use.
 */
export function _resetForTesting(): void {
  jsonMode = false;
  logFileWarned = false;
  if (activeFileReporter) {
    activeFileReporter.close();
  }
  activeFileReporter = null;
  logger.setReporters([]);
  logger.level = LogLevel.INFO;
}
