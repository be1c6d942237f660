/**
 * Types for reconciliation results
 */

import type { GroupRule } from '../config.js';
import type { IdentifierGenerator } from '../manifest/index.js';

/**
 * Per-item outcome that does not abort a batch
 */
export interface ItemIssue {
  kind: 'already_present' | 'not_found';
  name: string;
}

/**
 * What one operation changed
 */
export interface ReconcileReport {
  /** Display names added */
  added: string[];
  /** Display names removed */
  removed: string[];
  /** Display names whose duplicate entries were collapsed */
  deduplicated: string[];
  /** Identifiers of build files and list items that pointed at nothing */
  orphansRemoved: string[];
  /** Redundant group or build phase list items dropped */
  listEntriesRemoved: number;
  issues: ItemIssue[];
}

/**
 * Read-only comparison of the manifest with a scan
 */
export interface DriftReport {
  /** Scanned names with no file reference */
  missing: string[];
  /** Tracked names with no file on disk */
  stale: string[];
  /** Names carried by more than one file reference */
  duplicates: string[];
  /** Identifiers referenced but never declared */
  orphans: string[];
}

/**
 * Settings the reconciler needs, taken from the resolved configuration
 */
export interface ReconcilerOptions {
  extensions: readonly string[];
  fileType: string;
  exclude: readonly string[];
  groups: readonly GroupRule[];
  defaultGroup?: string;
  buildPhase: string;
  /** Identifier source for new entries (default: random, avoiding the manifest's ids) */
  ids?: IdentifierGenerator;
}

export function emptyReport(): ReconcileReport {
  return {
    added: [],
    removed: [],
    deduplicated: [],
    orphansRemoved: [],
    listEntriesRemoved: 0,
    issues: [],
  };
}

export function mergeReports(target: ReconcileReport, source: ReconcileReport): ReconcileReport {
  target.added.push(...source.added);
  target.removed.push(...source.removed);
  target.deduplicated.push(...source.deduplicated);
  target.orphansRemoved.push(...source.orphansRemoved);
  target.listEntriesRemoved += source.listEntriesRemoved;
  target.issues.push(...source.issues);
  return target;
}

export function isReportEmpty(report: ReconcileReport): boolean {
  return (
    report.added.length === 0 &&
    report.removed.length === 0 &&
    report.deduplicated.length === 0 &&
    report.orphansRemoved.length === 0 &&
    report.listEntriesRemoved === 0
  );
}

export function isInSync(drift: DriftReport): boolean {
  return (
    drift.missing.length === 0 &&
    drift.stale.length === 0 &&
    drift.duplicates.length === 0 &&
    drift.orphans.length === 0
  );
}
