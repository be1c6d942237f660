/**
 * pbxsync check - report drift between the project and the filesystem
 *
 * Read-only; exits 1 when the project is out of sync.
 */

import type { CommandModule } from 'yargs';
import {
  ErrorCode,
  createErrorResult,
  createSuccessResult,
  formatJsonResult,
  getErrorSuggestion,
} from '../../lib/json-output.js';
import type { CheckResultData } from '../../lib/json-output.js';
import { isInSync, summarizeDrift } from '../../lib/reconcile/index.js';
import { printJson, printStatusLines, setJsonMode } from '../../lib/ui/index.js';
import { failCommand, openSession, scanSession } from './context.js';
import type { GlobalArgs } from './context.js';

export const checkCommand: CommandModule<object, GlobalArgs> = {
  command: 'check',
  describe: 'Check whether the project matches the filesystem',
  builder: (yargs) => {
    return yargs
      .example('$0 check', 'List files missing from or stale in the project')
      .example('$0 check --json', 'Drift report as JSON');
  },
  handler: (argv) => {
    const json = Boolean(argv.json);
    setJsonMode(json);

    let data: CheckResultData;
    try {
      const session = openSession(argv);
      const drift = session.reconciler.check(scanSession(session));
      data = { manifestPath: session.manifestPath, inSync: isInSync(drift), ...drift };
    } catch (err) {
      failCommand('check', err, json);
      return;
    }

    if (json) {
      const result = data.inSync
        ? createSuccessResult('check', data)
        : createErrorResult(
            'check',
            ErrorCode.OUT_OF_SYNC,
            'Project is out of sync with the filesystem',
            {
              missing: data.missing,
              stale: data.stale,
              duplicates: data.duplicates,
              orphans: data.orphans,
            },
            getErrorSuggestion(ErrorCode.OUT_OF_SYNC)
          );
      printJson(formatJsonResult(result));
    } else {
      printStatusLines(summarizeDrift(data));
    }

    if (!data.inSync) {
      process.exit(1);
    }
  },
};
