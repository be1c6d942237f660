/**
 * Root parser for the pbxsync command
 */

import yargs from 'yargs';
import type { Argv } from 'yargs';
import { initializeLogger } from '../../lib/logger.js';
import { setJsonMode } from '../../lib/ui/index.js';
import { addCommand } from './add.js';
import { checkCommand } from './check.js';
import { cleanCommand } from './clean.js';
import { globalOptions } from './context.js';
import type { GlobalArgs } from './context.js';
import { rebuildCommand } from './rebuild.js';
import { removeCommand } from './remove.js';
import { syncCommand } from './sync.js';

/**
 * Configure logging and output mode from the parsed global options
 */
export function applyGlobalOptions(argv: GlobalArgs): void {
  const json = Boolean(argv.json);
  setJsonMode(json);
  initializeLogger({
    verbose: Boolean(argv.verbose),
    quiet: Boolean(argv.quiet),
    noColor: argv.color === false,
    json,
    logFile: argv.logFile,
  });
}

export function createProgram(args: string[]): Argv {
  return yargs(args)
    .scriptName('pbxsync')
    .usage('$0 <command> [options]')
    .options(globalOptions)
    .middleware((argv) =>
      applyGlobalOptions({
        json: argv.json,
        verbose: argv.verbose,
        quiet: argv.quiet,
        color: argv.color,
        logFile: argv['log-file'],
      })
    )
    .command(addCommand)
    .command(removeCommand)
    .command(syncCommand)
    .command(cleanCommand)
    .command(rebuildCommand)
    .command(checkCommand)
    .demandCommand(1, 'Specify a command')
    .strict()
    .help()
    .alias('help', 'h')
    .version()
    .epilogue('Configuration: .pbxsyncrc (JSON5) at the repository root');
}
