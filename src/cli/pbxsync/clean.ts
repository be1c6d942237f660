/**
 * pbxsync clean - collapse duplicate entries
 */

import type { CommandModule } from 'yargs';
import { runReconcile } from './context.js';
import type { GlobalArgs } from './context.js';

export const cleanCommand: CommandModule<object, GlobalArgs> = {
  command: 'clean',
  describe: 'Remove duplicate and orphaned entries',
  builder: (yargs) => {
    return yargs.example('$0 clean', 'Deduplicate the project');
  },
  handler: (argv) => {
    runReconcile('clean', argv, (session) => session.reconciler.clean());
  },
};
