/**
 * pbxsync add - register files with the project
 */

import fs from 'fs';
import path from 'path';
import type { CommandModule } from 'yargs';
import { emptyReport, mergeReports } from '../../lib/reconcile/index.js';
import type { ReconcileReport } from '../../lib/reconcile/index.js';
import { runReconcile } from './context.js';
import type { GlobalArgs, Session } from './context.js';

interface AddArgs extends GlobalArgs {
  paths: string[];
}

function isRegularFile(absolute: string): boolean {
  return fs.statSync(absolute, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Add the paths that are files on disk; report the rest as not found
 */
export function addPaths(session: Session, paths: readonly string[]): ReconcileReport {
  const report = emptyReport();
  const existing: string[] = [];

  for (const input of paths) {
    const absolute = path.resolve(session.repoRoot, input);
    if (!isRegularFile(absolute)) {
      report.issues.push({ kind: 'not_found', name: input });
      continue;
    }
    existing.push(path.relative(session.repoRoot, absolute));
  }

  return mergeReports(report, session.reconciler.add(existing));
}

export const addCommand: CommandModule<object, AddArgs> = {
  command: 'add <paths..>',
  describe: 'Add files to the project',
  builder: (yargs) => {
    return yargs
      .positional('paths', {
        type: 'string',
        array: true,
        demandOption: true,
        description: 'File paths relative to the repository root',
      })
      .example('$0 add Views/ProfileView.swift', 'Add one file to the Views group')
      .example('$0 add Models/*.swift --dry-run', 'Preview adding several files');
  },
  handler: (argv) => {
    runReconcile('add', argv, (session) => addPaths(session, argv.paths));
  },
};
