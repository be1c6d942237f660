/**
 * pbxsync rebuild - discard every tracked entry and re-add the scan
 *
 * Destructive: always keeps a backup of the previous manifest.
 */

import type { CommandModule } from 'yargs';
import { UserCancelledError } from '../../lib/errors.js';
import { canPrompt, confirmAction } from '../../lib/prompts.js';
import { setJsonMode } from '../../lib/ui/index.js';
import { failCommand, runReconcile, scanSession } from './context.js';
import type { GlobalArgs } from './context.js';

interface RebuildArgs extends GlobalArgs {
  yes?: boolean;
}

export const rebuildCommand: CommandModule<object, RebuildArgs> = {
  command: 'rebuild',
  describe: 'Recreate all source entries from the filesystem',
  builder: (yargs) => {
    return yargs
      .option('yes', {
        alias: 'y',
        type: 'boolean',
        description: 'Skip the confirmation prompt',
        default: false,
      })
      .example('$0 rebuild', 'Rebuild after confirming')
      .example('$0 rebuild --yes', 'Rebuild without prompting');
  },
  handler: async (argv) => {
    const json = Boolean(argv.json);
    setJsonMode(json);

    if (!argv.yes && !argv.dryRun && !json && canPrompt()) {
      const confirmed = await confirmAction('Rebuild all source entries in the project?');
      if (!confirmed) {
        failCommand('rebuild', new UserCancelledError(), json);
        return;
      }
    }

    runReconcile('rebuild', argv, (session) => session.reconciler.rebuild(scanSession(session)), {
      alwaysBackup: true,
    });
  },
};
