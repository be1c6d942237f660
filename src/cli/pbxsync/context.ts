/**
 * Shared plumbing for pbxsync commands: load config and manifest, commit the
 * result through the atomic writer, report in text or JSON.
 */

import fs from 'fs';
import path from 'path';
import type { Options } from 'yargs';
import { loadConfig, resolveManifestPath } from '../../lib/config.js';
import type { ResolvedConfig } from '../../lib/config.js';
import { ConfigurationError } from '../../lib/errors.js';
import {
  createErrorResult,
  createSuccessResult,
  formatJsonResult,
  getErrorCodeFromError,
  getErrorSuggestion,
} from '../../lib/json-output.js';
import type { ReconcileResultData } from '../../lib/json-output.js';
import { logger } from '../../lib/logger.js';
import { parseManifest } from '../../lib/manifest/index.js';
import type { ProjectManifest } from '../../lib/manifest/index.js';
import { Reconciler, formatIssue, summarizeReport } from '../../lib/reconcile/index.js';
import type { ReconcileReport } from '../../lib/reconcile/index.js';
import { scanSourceFiles } from '../../lib/scanner/index.js';
import type { ScannedFile } from '../../lib/scanner/index.js';
import {
  errorToDisplay,
  printDim,
  printError,
  printJson,
  printStatusLines,
  setJsonMode,
} from '../../lib/ui/index.js';
import { defaultBackupPath, writeBackup, writeManifestAtomic } from '../../lib/writer/index.js';

/**
 * Options every command accepts (declared globally on the root parser)
 */
export interface GlobalArgs {
  project?: string;
  root?: string;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  logFile?: string;
  color?: boolean;
}

export const globalOptions = {
  project: {
    alias: 'p',
    type: 'string',
    description: 'Path to project.pbxproj or its .xcodeproj bundle',
  },
  root: {
    type: 'string',
    description: 'Repository root (default: current directory)',
  },
  'dry-run': {
    alias: 'n',
    type: 'boolean',
    description: 'Show what would change without writing',
    default: false,
  },
  json: {
    alias: 'j',
    type: 'boolean',
    description: 'Output as JSON',
    default: false,
  },
  verbose: {
    alias: 'v',
    type: 'boolean',
    description: 'Enable debug output',
  },
  quiet: {
    alias: 'q',
    type: 'boolean',
    description: 'Only print errors',
  },
  'log-file': {
    type: 'string',
    description: 'Append logs to a file',
  },
  color: {
    type: 'boolean',
    description: 'Colorize output (use --no-color to disable)',
    default: true,
  },
} satisfies Record<string, Options>;

/**
 * One loaded manifest and the reconciler bound to it
 */
export interface Session {
  repoRoot: string;
  config: ResolvedConfig;
  manifestPath: string;
  originalText: string;
  manifest: ProjectManifest;
  reconciler: Reconciler;
}

function readManifest(manifestPath: string): string {
  if (!fs.existsSync(manifestPath)) {
    throw new ConfigurationError(`Manifest not found: ${manifestPath}`, { field: 'manifestPath' });
  }
  return fs.readFileSync(manifestPath, 'utf8');
}

/**
 * Load configuration and parse the manifest
 */
export function openSession(argv: GlobalArgs): Session {
  const repoRoot = path.resolve(argv.root ?? process.cwd());
  const config = loadConfig(repoRoot);
  const manifestPath = resolveManifestPath(repoRoot, config, argv.project);
  logger.debug(`Manifest: ${manifestPath}`);

  const originalText = readManifest(manifestPath);
  const manifest = parseManifest(originalText, { manifestPath });
  const reconciler = new Reconciler(manifest, config);
  return { repoRoot, config, manifestPath, originalText, manifest, reconciler };
}

export function scanSession(session: Session): ScannedFile[] {
  return scanSourceFiles(session.repoRoot, session.config);
}

export interface CommitOptions {
  dryRun: boolean;
  /** Keep a backup even when nothing changed (rebuild) */
  alwaysBackup?: boolean;
}

/**
 * Serialize the session's manifest and write it if it changed
 */
export function commitSession(
  session: Session,
  report: ReconcileReport,
  options: CommitOptions
): ReconcileResultData {
  const content = session.manifest.serialize();
  const changed = content !== session.originalText;
  const backupPath = defaultBackupPath(session.manifestPath, session.config.backupSuffix);

  const data: ReconcileResultData = {
    manifestPath: session.manifestPath,
    added: report.added,
    removed: report.removed,
    deduplicated: report.deduplicated,
    orphansRemoved: report.orphansRemoved,
    listEntriesRemoved: report.listEntriesRemoved,
    issues: report.issues,
    written: false,
    dryRun: options.dryRun,
  };

  if (options.dryRun) {
    logger.debug(changed ? 'Dry run: manifest would change' : 'Dry run: no changes');
    return data;
  }

  if (changed) {
    const result = writeManifestAtomic(session.manifestPath, content, {
      backupPath,
      keepBackup: session.config.keepBackup || options.alwaysBackup,
    });
    return { ...data, written: true, backupPath: result.backupPath };
  }

  if (options.alwaysBackup) {
    writeBackup(session.manifestPath, backupPath);
    return { ...data, backupPath };
  }
  return data;
}

/**
 * Print the outcome of a mutating command
 */
export function reportResult(
  command: string,
  data: ReconcileResultData,
  report: ReconcileReport,
  json: boolean
): void {
  if (json) {
    printJson(formatJsonResult(createSuccessResult(command, data, report.issues.map(formatIssue))));
    return;
  }

  printStatusLines(summarizeReport(report));
  if (data.dryRun) {
    printDim('Dry run: manifest not written');
  } else if (data.backupPath) {
    printDim(`Backup kept at ${data.backupPath}`);
  }
}

/**
 * Report a fatal error and exit with status 1
 */
export function failCommand(command: string, error: unknown, json: boolean): void {
  logger.debug(`${command} failed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
  if (json) {
    const code = getErrorCodeFromError(error);
    const message = error instanceof Error ? error.message : String(error);
    printJson(formatJsonResult(createErrorResult(command, code, message, undefined, getErrorSuggestion(code))));
  } else {
    printError(errorToDisplay(error));
  }
  process.exit(1);
}

/**
 * Run a mutating command end to end
 */
export function runReconcile(
  command: string,
  argv: GlobalArgs,
  operate: (session: Session) => ReconcileReport,
  commit: Omit<CommitOptions, 'dryRun'> = {}
): void {
  const json = Boolean(argv.json);
  setJsonMode(json);
  try {
    const session = openSession(argv);
    const report = operate(session);
    const data = commitSession(session, report, { dryRun: Boolean(argv.dryRun), ...commit });
    reportResult(command, data, report, json);
  } catch (err) {
    failCommand(command, err, json);
  }
}
