/**
 * Human-readable summaries of reconcile and drift reports
 */

import type { DriftReport, ItemIssue, ReconcileReport } from './types.js';

export type SummaryLevel = 'success' | 'warning' | 'info';

export interface SummaryLine {
  level: SummaryLevel;
  message: string;
}

function plural(count: number, noun: string, nouns: string = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : nouns}`;
}

function listed(names: readonly string[]): string {
  return names.join(', ');
}

export function formatIssue(issue: ItemIssue): string {
  return issue.kind === 'already_present'
    ? `${issue.name} is already in the project`
    : `${issue.name} is not in the project`;
}

/**
 * One line per kind of change, then one warning per issue
 */
export function summarizeReport(report: ReconcileReport): SummaryLine[] {
  const lines: SummaryLine[] = [];

  if (report.added.length > 0) {
    lines.push({ level: 'success', message: `Added ${plural(report.added.length, 'file')}: ${listed(report.added)}` });
  }
  if (report.removed.length > 0) {
    lines.push({
      level: 'success',
      message: `Removed ${plural(report.removed.length, 'file')}: ${listed(report.removed)}`,
    });
  }
  if (report.deduplicated.length > 0) {
    lines.push({
      level: 'success',
      message: `Collapsed duplicates of ${plural(report.deduplicated.length, 'file')}: ${listed(report.deduplicated)}`,
    });
  }
  if (report.listEntriesRemoved > 0) {
    lines.push({
      level: 'success',
      message: `Dropped ${plural(report.listEntriesRemoved, 'redundant list entry', 'redundant list entries')}`,
    });
  }
  if (report.orphansRemoved.length > 0) {
    lines.push({
      level: 'warning',
      message: `Removed ${plural(report.orphansRemoved.length, 'orphaned reference')}: ${listed(report.orphansRemoved)}`,
    });
  }
  for (const issue of report.issues) {
    lines.push({ level: 'warning', message: formatIssue(issue) });
  }
  if (lines.length === 0) {
    lines.push({ level: 'info', message: 'Project is already up to date' });
  }
  return lines;
}

/**
 * Lines describing how the manifest differs from the scan
 */
export function summarizeDrift(drift: DriftReport): SummaryLine[] {
  const lines: SummaryLine[] = [];
  if (drift.missing.length > 0) {
    lines.push({ level: 'warning', message: `Not in project: ${listed(drift.missing)}` });
  }
  if (drift.stale.length > 0) {
    lines.push({ level: 'warning', message: `Missing on disk: ${listed(drift.stale)}` });
  }
  if (drift.duplicates.length > 0) {
    lines.push({ level: 'warning', message: `Duplicate entries: ${listed(drift.duplicates)}` });
  }
  if (drift.orphans.length > 0) {
    lines.push({ level: 'warning', message: `Orphaned references: ${listed(drift.orphans)}` });
  }
  if (lines.length === 0) {
    lines.push({ level: 'success', message: 'Project is in sync with the filesystem' });
  }
  return lines;
}
