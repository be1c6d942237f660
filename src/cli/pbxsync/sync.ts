/**
 * pbxsync sync - make the project match the source files on disk
 */

import type { CommandModule } from 'yargs';
import { runReconcile, scanSession } from './context.js';
import type { GlobalArgs } from './context.js';

export const syncCommand: CommandModule<object, GlobalArgs> = {
  command: 'sync',
  describe: 'Add new files and remove deleted ones',
  builder: (yargs) => {
    return yargs
      .example('$0 sync', 'Reconcile the project with the filesystem')
      .example('$0 sync --dry-run --json', 'Report pending changes as JSON');
  },
  handler: (argv) => {
    runReconcile('sync', argv, (session) => session.reconciler.sync(scanSession(session)));
  },
};
