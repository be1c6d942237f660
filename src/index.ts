/**
 * pbxsync - keep an Xcode project manifest in sync with the source files on disk
 *
 * @packageDocumentation
 */

export * as colors from './lib/colors.js';
export * as config from './lib/config.js';

// Manifest model
export {
  parseManifest,
  ProjectManifest,
  IdentifierGenerator,
  randomIdentifierSource,
  sequentialIdentifierSource,
} from './lib/manifest/index.js';
export type {
  FileReference,
  BuildFileEntry,
  Group,
  BuildPhase,
  ManifestObject,
  IdentifierSource,
} from './lib/manifest/index.js';

// Scanning and reconciliation
export { scanSourceFiles } from './lib/scanner/index.js';
export type { ScannedFile, ScanOptions } from './lib/scanner/index.js';
export { Reconciler, isInSync, isReportEmpty } from './lib/reconcile/index.js';
export type { ReconcileReport, DriftReport, ItemIssue, ReconcilerOptions } from './lib/reconcile/index.js';

// Persistence
export { writeManifestAtomic } from './lib/writer/index.js';
export type { WriteOptions, WriteResult } from './lib/writer/index.js';

// Configuration
export type { PbxSyncConfig, ResolvedConfig, GroupRule } from './lib/config.js';

// Errors
export {
  PbxSyncError,
  MalformedManifestError,
  WriteFailureError,
  ConfigurationError,
  UserCancelledError,
} from './lib/errors.js';
