/**
 * Atomic manifest writer
 *
 * 1. copy the current manifest to the backup path
 * 2. write the new content to a temp file in the same directory
 * 3. rename the temp file over the manifest
 * 4. delete the backup unless asked to keep it
 *
 * A failure at any step leaves the manifest as it was; the backup stays.
 */

import fs from 'fs';
import path from 'path';
import { DEFAULT_BACKUP_SUFFIX } from '../constants.js';
import { WriteFailureError } from '../errors.js';
import { logger } from '../logger.js';

export interface WriteOptions {
  /** Default: `<manifest>.backup` */
  backupPath?: string;
  keepBackup?: boolean;
}

export interface WriteResult {
  manifestPath: string;
  /** Present when the backup was kept */
  backupPath?: string;
  bytesWritten: number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function defaultBackupPath(manifestPath: string, suffix: string = DEFAULT_BACKUP_SUFFIX): string {
  return `${manifestPath}${suffix}`;
}

export function tempPathFor(manifestPath: string): string {
  return path.join(path.dirname(manifestPath), `${path.basename(manifestPath)}.${process.pid}.tmp`);
}

/**
 * Copy the manifest, unmodified, to the backup path
 */
export function writeBackup(manifestPath: string, backupPath: string): void {
  try {
    fs.copyFileSync(manifestPath, backupPath);
  } catch (err) {
    throw new WriteFailureError(`Failed to write backup ${backupPath}: ${describe(err)}`, {
      manifestPath,
      backupPath,
      cause: err,
    });
  }
  logger.debug(`Backup written to ${backupPath}`);
}

function removeTempFile(tempPath: string): void {
  try {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
  } catch (err) {
    logger.warn(`Could not remove temp file ${tempPath}: ${describe(err)}`);
  }
}

/**
 * Replace the manifest with `content` without ever leaving it half written.
 * Throws WriteFailureError; the original file is untouched when it does.
 */
export function writeManifestAtomic(
  manifestPath: string,
  content: string,
  options: WriteOptions = {}
): WriteResult {
  const backupPath = options.backupPath ?? defaultBackupPath(manifestPath);
  writeBackup(manifestPath, backupPath);

  const tempPath = tempPathFor(manifestPath);
  try {
    fs.writeFileSync(tempPath, content, 'utf8');
    fs.renameSync(tempPath, manifestPath);
  } catch (err) {
    removeTempFile(tempPath);
    throw new WriteFailureError(`Failed to write ${manifestPath}: ${describe(err)}`, {
      manifestPath,
      backupPath,
      cause: err,
    });
  }
  logger.debug(`Wrote ${manifestPath}`);

  if (options.keepBackup) {
    return { manifestPath, backupPath, bytesWritten: Buffer.byteLength(content, 'utf8') };
  }

  try {
    fs.unlinkSync(backupPath);
  } catch (err) {
    logger.warn(`Could not remove backup ${backupPath}: ${describe(err)}`);
    return { manifestPath, backupPath, bytesWritten: Buffer.byteLength(content, 'utf8') };
  }
  return { manifestPath, bytesWritten: Buffer.byteLength(content, 'utf8') };
}
