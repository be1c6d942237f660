/**
 * writer library - public API exports
 */

export { writeManifestAtomic, writeBackup, defaultBackupPath, tempPathFor } from './atomic-writer.js';
export type { WriteOptions, WriteResult } from './atomic-writer.js';
