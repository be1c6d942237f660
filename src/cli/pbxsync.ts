#!/usr/bin/env node
/**
 * pbxsync - keep an Xcode project manifest in sync with the source tree
 *
 * Commands:
 *   pbxsync add <paths..>     Add files to the project
 *   pbxsync remove <names..>  Remove files (alias: rm)
 *   pbxsync sync              Add new files, remove deleted ones
 *   pbxsync clean             Collapse duplicate entries
 *   pbxsync rebuild           Recreate all source entries (destructive)
 *   pbxsync check             Report drift, exit 1 when out of sync
 */

import { hideBin } from 'yargs/helpers';
import { createProgram } from './pbxsync/program.js';

await createProgram(hideBin(process.argv)).parseAsync();
