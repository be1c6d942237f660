/**
 * reconcile library - public API exports
 */

export { Reconciler } from './reconciler.js';
export { resolveRoles, groupForPath } from './roles.js';
export type { RoleTable, CategoryRole, RoleOptions } from './roles.js';
export { emptyReport, mergeReports, isReportEmpty, isInSync } from './types.js';
export type { ItemIssue, ReconcileReport, DriftReport, ReconcilerOptions } from './types.js';
export { summarizeReport, summarizeDrift, formatIssue } from './formatters.js';
export type { SummaryLine, SummaryLevel } from './formatters.js';
