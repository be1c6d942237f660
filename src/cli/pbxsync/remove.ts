/**
 * pbxsync remove - drop files from the project by name
 */

import type { CommandModule } from 'yargs';
import { runReconcile } from './context.js';
import type { GlobalArgs } from './context.js';

interface RemoveArgs extends GlobalArgs {
  names: string[];
}

export const removeCommand: CommandModule<object, RemoveArgs> = {
  command: ['remove <names..>', 'rm'],
  describe: 'Remove files from the project',
  builder: (yargs) => {
    return yargs
      .positional('names', {
        type: 'string',
        array: true,
        demandOption: true,
        description: 'File names (or paths) as shown in the project',
      })
      .example('$0 remove OldView.swift', 'Remove a file and its build entries')
      .example('$0 rm A.swift B.swift', 'Remove several files');
  },
  handler: (argv) => {
    runReconcile('remove', argv, (session) => session.reconciler.remove(argv.names));
  },
};
