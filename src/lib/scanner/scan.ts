/**
 * Filesystem scanner - the set of source files the manifest should track
 *
 * Walks each configured source root recursively, then the repository root
 * non-recursively. Output order is deterministic: roots in configured order,
 * directory entries sorted by name within each directory.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger.js';

export interface ScannedFile {
  /** File name, the manifest display name */
  name: string;
  /** POSIX-style path relative to the repository root */
  path: string;
}

export interface ScanOptions {
  sourceRoots: readonly string[];
  extensions: readonly string[];
  exclude: readonly string[];
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function isInside(candidate: string, root: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Resolve a directory entry to 'file' | 'directory', following symlinks only
 * when their target stays inside `boundary`
 */
function entryKind(
  entry: fs.Dirent,
  absolute: string,
  boundary: string
): { kind: 'file' | 'directory'; real: string } | null {
  if (entry.isFile()) return { kind: 'file', real: absolute };
  if (entry.isDirectory()) return { kind: 'directory', real: absolute };
  if (!entry.isSymbolicLink()) return null;

  let real: string;
  try {
    real = fs.realpathSync(absolute);
  } catch (err) {
    logger.debug(`Skipping broken symlink ${absolute}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
  if (!isInside(real, boundary)) {
    logger.debug(`Skipping symlink leaving ${boundary}: ${absolute} -> ${real}`);
    return null;
  }
  const stats = fs.statSync(real);
  if (stats.isFile()) return { kind: 'file', real };
  if (stats.isDirectory()) return { kind: 'directory', real };
  return null;
}

class SourceScanner {
  private readonly results: ScannedFile[] = [];
  private readonly exclude: Set<string>;

  constructor(
    private readonly repoRoot: string,
    private readonly options: ScanOptions
  ) {
    this.exclude = new Set(options.exclude);
  }

  private matches(name: string): boolean {
    return !this.exclude.has(name) && this.options.extensions.some((ext) => name.endsWith(ext));
  }

  private walk(dir: string, relative: string, boundary: string, visited: Set<string>): void {
    const real = fs.realpathSync(dir);
    if (visited.has(real)) return;
    visited.add(real);

    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort(byName);
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const absolute = path.join(dir, entry.name);
      const resolved = entryKind(entry, absolute, boundary);
      if (!resolved) continue;

      const childRelative = `${relative}/${entry.name}`;
      if (resolved.kind === 'directory') {
        this.walk(absolute, childRelative, boundary, visited);
      } else if (this.matches(entry.name)) {
        this.results.push({ name: entry.name, path: childRelative });
      }
    }
  }

  scan(): ScannedFile[] {
    for (const root of this.options.sourceRoots) {
      const absolute = path.join(this.repoRoot, root);
      if (!fs.existsSync(absolute) || !fs.statSync(absolute).isDirectory()) {
        logger.debug(`Source root not found, skipping: ${root}`);
        continue;
      }
      const boundary = fs.realpathSync(absolute);
      this.walk(absolute, toPosix(path.normalize(root)).replace(/\/+$/, ''), boundary, new Set());
    }

    const repoBoundary = fs.realpathSync(this.repoRoot);
    const rootEntries = fs.readdirSync(this.repoRoot, { withFileTypes: true }).sort(byName);
    for (const entry of rootEntries) {
      if (entry.name.startsWith('.')) continue;
      const resolved = entryKind(entry, path.join(this.repoRoot, entry.name), repoBoundary);
      if (resolved?.kind === 'file' && this.matches(entry.name)) {
        this.results.push({ name: entry.name, path: entry.name });
      }
    }

    return this.results;
  }
}

/**
 * Scan the repository for tracked source files.
 * Pure function of the filesystem at call time.
 */
export function scanSourceFiles(repoRoot: string, options: ScanOptions): ScannedFile[] {
  const scanner = new SourceScanner(repoRoot, options);
  const files = scanner.scan();
  logger.debug(`Scanned ${files.length} source files under ${repoRoot}`);
  return files;
}
