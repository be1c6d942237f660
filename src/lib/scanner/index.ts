/**
 * scanner library - public API exports
 */

export { scanSourceFiles } from './scan.js';
export type { ScannedFile, ScanOptions } from './scan.js';
