/**
 * Reconciler - brings the manifest in line with a scan or an explicit request
 *
 * Every change goes through ProjectManifest's typed mutators, so file
 * references, build files, group children and build phase files stay linked.
 * All operations are idempotent: a second run against the same inputs leaves
 * the manifest unchanged.
 */

import path from 'path';
import { logger } from '../logger.js';
import { IdentifierGenerator } from '../manifest/index.js';
import type { BuildFileEntry, BuildPhase, FileReference, Group, ProjectManifest } from '../manifest/index.js';
import type { ScannedFile } from '../scanner/index.js';
import { groupForPath, resolveRoles } from './roles.js';
import type { RoleTable } from './roles.js';
import { emptyReport, mergeReports } from './types.js';
import type { DriftReport, ReconcileReport, ReconcilerOptions } from './types.js';

/** lastKnownFileType for added files outside the tracked kind */
const OTHER_FILE_TYPE = 'text';

interface ReusableIds {
  fileRef: string;
  buildFile?: string;
}

interface ListDedupeState {
  /** Removed duplicate id to canonical id */
  remap: Map<string, string>;
  /** Ids some list already names directly */
  listed: Set<string>;
  /** Ids kept by a list processed earlier */
  claimed: Set<string>;
}

/**
 * Every id named in the owners' lists that is not a removed duplicate
 */
function listedIds(owners: readonly (Group | BuildPhase)[], remap: Map<string, string>): Set<string> {
  const ids = new Set<string>();
  for (const owner of owners) {
    for (const item of owner.list.items) {
      if (!remap.has(item.id)) {
        ids.add(item.id);
      }
    }
  }
  return ids;
}

function toManifestPath(input: string): string {
  const posix = input.split(path.sep).join('/');
  return path.posix.normalize(posix).replace(/^\.\//, '');
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export class Reconciler {
  private readonly manifest: ProjectManifest;
  private readonly options: ReconcilerOptions;
  private readonly ids: IdentifierGenerator;
  private readonly excluded: Set<string>;
  private roleTable?: RoleTable;

  constructor(manifest: ProjectManifest, options: ReconcilerOptions) {
    this.manifest = manifest;
    this.options = options;
    this.ids = options.ids ?? IdentifierGenerator.forManifest(manifest);
    this.excluded = new Set(options.exclude);
  }

  /**
   * Roles are resolved on first use so that remove and clean work on
   * manifests without the configured build phase
   */
  private roles(): RoleTable {
    if (!this.roleTable) {
      this.roleTable = resolveRoles(this.manifest, this.options);
    }
    return this.roleTable;
  }

  // ---------------------------------------------------------------------------
  // Classification
  // ---------------------------------------------------------------------------

  private hasTrackedExtension(name: string): boolean {
    return this.options.extensions.some((ext) => name.endsWith(ext));
  }

  private isTracked(ref: FileReference): boolean {
    return ref.fileType === this.options.fileType || this.hasTrackedExtension(ref.name);
  }

  private allNames(): Set<string> {
    return new Set(this.manifest.fileReferences().map((ref) => ref.name));
  }

  private trackedNames(): string[] {
    return unique(
      this.manifest
        .fileReferences()
        .filter((ref) => this.isTracked(ref))
        .map((ref) => ref.name)
    );
  }

  // ---------------------------------------------------------------------------
  // Entry-level helpers
  // ---------------------------------------------------------------------------

  private pathInGroup(group: Group, filePath: string): string {
    const groupPath = group.path?.replace(/\/+$/, '');
    if (groupPath && filePath.startsWith(`${groupPath}/`)) {
      return filePath.slice(groupPath.length + 1);
    }
    return filePath;
  }

  private freshId(reuse: string | undefined): string {
    if (reuse !== undefined && !this.manifest.isDeclared(reuse)) {
      return reuse;
    }
    return this.ids.next();
  }

  private insertFile(filePath: string, reuse?: ReusableIds): void {
    const roles = this.roles();
    const name = path.posix.basename(filePath);
    const group = groupForPath(roles, filePath);
    const phase = roles.buildPhase;

    const fileRefId = this.freshId(reuse?.fileRef);
    const buildFileId = this.freshId(reuse?.buildFile);

    this.manifest.insertFileReference({
      id: fileRefId,
      name,
      path: this.pathInGroup(group, filePath),
      fileType: this.hasTrackedExtension(name) ? this.options.fileType : OTHER_FILE_TYPE,
    });
    this.manifest.insertBuildFile({
      id: buildFileId,
      fileRef: fileRefId,
      name,
      phaseName: phase.name,
    });
    this.manifest.appendGroupChild(group, fileRefId, name);
    this.manifest.appendPhaseFile(phase, buildFileId, `${name} in ${phase.name}`);
    logger.debug(`Added ${name} (${fileRefId}) to ${group.name ?? group.id}, build file ${buildFileId}`);
  }

  /**
   * Delete a file reference together with its build files and list items
   */
  private deleteFile(ref: FileReference): void {
    for (const buildFile of this.manifest.buildFiles()) {
      if (buildFile.fileRef === ref.id) {
        this.manifest.deleteBuildFile(buildFile.id);
      }
    }
    this.manifest.deleteFileReference(ref.id);
    logger.debug(`Removed ${ref.name} (${ref.id})`);
  }

  /**
   * Remove build files whose fileRef is undeclared, then group and phase list
   * items that name no declared object
   */
  private pruneOrphans(report: ReconcileReport): void {
    const declared = this.manifest.declaredIds();
    for (const buildFile of this.manifest.buildFiles()) {
      if (buildFile.fileRef !== undefined && !declared.has(buildFile.fileRef)) {
        logger.warn(`Removing build file ${buildFile.id}: file reference ${buildFile.fileRef} does not exist`);
        this.manifest.detachObject(buildFile);
        report.orphansRemoved.push(buildFile.id);
      }
    }

    const remaining = this.manifest.declaredIds();
    const owners: Array<Group | BuildPhase> = [...this.manifest.groups(), ...this.manifest.buildPhases()];
    for (const owner of owners) {
      const dangling = owner.list.items.filter((item) => !remaining.has(item.id)).map((item) => item.id);
      if (dangling.length > 0) {
        logger.warn(`Removing ${dangling.length} dangling entries from ${owner.name ?? owner.id}`);
        this.manifest.removeListItems(owner, (item) => !remaining.has(item.id));
        report.orphansRemoved.push(...dangling);
      }
    }
    report.orphansRemoved = unique(report.orphansRemoved);
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  /**
   * Add repository-relative paths not yet present by display name
   */
  add(paths: readonly string[]): ReconcileReport {
    const report = emptyReport();
    const present = this.allNames();

    for (const input of paths) {
      const filePath = toManifestPath(input);
      const name = path.posix.basename(filePath);
      if (present.has(name)) {
        report.issues.push({ kind: 'already_present', name });
        continue;
      }
      this.insertFile(filePath);
      present.add(name);
      report.added.push(name);
    }
    return report;
  }

  /**
   * Remove files by display name (a path is reduced to its file name)
   */
  remove(names: readonly string[]): ReconcileReport {
    const report = emptyReport();

    for (const input of names) {
      const name = path.posix.basename(toManifestPath(input));
      const refs = this.manifest.fileReferences().filter((ref) => ref.name === name);
      if (refs.length === 0) {
        report.issues.push({ kind: 'not_found', name });
        continue;
      }
      for (const ref of refs) {
        this.deleteFile(ref);
      }
      report.removed.push(name);
    }
    return report;
  }

  /**
   * Make the tracked names equal the scanned names, leaving excluded names alone
   */
  sync(scan: readonly ScannedFile[]): ReconcileReport {
    const report = emptyReport();
    this.pruneOrphans(report);

    const scanned = new Set(scan.map((file) => file.name));
    const toRemove = this.trackedNames().filter((name) => !scanned.has(name) && !this.excluded.has(name));
    mergeReports(report, this.remove(toRemove));

    const present = this.allNames();
    const toAdd = scan
      .filter((file) => !present.has(file.name) && !this.excluded.has(file.name))
      .map((file) => file.path);
    mergeReports(report, this.add(toAdd));

    logger.debug(`sync: ${report.added.length} added, ${report.removed.length} removed`);
    return report;
  }

  /**
   * Collapse duplicates onto the first entry in document order
   */
  clean(): ReconcileReport {
    const report = emptyReport();
    this.pruneOrphans(report);

    const fileRefRemap = this.collapseFileReferences(report);
    const buildFileRemap = this.collapseBuildFiles(fileRefRemap);

    const fileRefIds = new Set(this.manifest.fileReferences().map((ref) => ref.id));
    const nameOf = new Map(this.manifest.fileReferences().map((ref) => [ref.id, ref.name]));

    const groups = this.manifest.groups();
    const listedRefs = listedIds(groups, fileRefRemap);
    const placed = new Set<string>();
    for (const group of groups) {
      report.listEntriesRemoved += this.dedupeList(
        group,
        { remap: fileRefRemap, listed: listedRefs, claimed: placed },
        (id) => fileRefIds.has(id),
        (id) => nameOf.get(id)
      );
    }

    const buildFileIds = new Set(this.manifest.buildFiles().map((file) => file.id));
    const phases = this.manifest.buildPhases();
    const listedBuildFiles = listedIds(phases, buildFileRemap);
    const scheduled = new Set<string>();
    for (const phase of phases) {
      report.listEntriesRemoved += this.dedupeList(
        phase,
        { remap: buildFileRemap, listed: listedBuildFiles, claimed: scheduled },
        (id) => buildFileIds.has(id),
        () => undefined
      );
    }

    if (report.deduplicated.length > 0 || report.listEntriesRemoved > 0) {
      logger.debug(
        `clean: ${report.deduplicated.length} names deduplicated, ${report.listEntriesRemoved} list entries dropped`
      );
    }
    return report;
  }

  private collapseFileReferences(report: ReconcileReport): Map<string, string> {
    const remap = new Map<string, string>();
    const byName = new Map<string, FileReference>();
    const seenIds = new Set<string>();
    const collapsed = new Set<string>();

    for (const ref of this.manifest.fileReferences()) {
      const canonical = byName.get(ref.name);
      if (!canonical && !seenIds.has(ref.id)) {
        byName.set(ref.name, ref);
        seenIds.add(ref.id);
        continue;
      }
      if (canonical && ref.id !== canonical.id && !seenIds.has(ref.id)) {
        remap.set(ref.id, canonical.id);
      }
      this.manifest.detachObject(ref);
      collapsed.add(ref.name);
      logger.debug(`Dropping duplicate file reference ${ref.id} (${ref.name})`);
    }

    report.deduplicated.push(...collapsed);
    return remap;
  }

  private collapseBuildFiles(fileRefRemap: Map<string, string>): Map<string, string> {
    const remap = new Map<string, string>();
    const byTarget = new Map<string, BuildFileEntry>();
    const seenIds = new Set<string>();

    for (const buildFile of this.manifest.buildFiles()) {
      const redirected = buildFile.fileRef !== undefined ? fileRefRemap.get(buildFile.fileRef) : undefined;
      if (redirected !== undefined) {
        this.manifest.retargetBuildFile(buildFile, redirected);
      }

      if (seenIds.has(buildFile.id)) {
        this.manifest.detachObject(buildFile);
        continue;
      }
      if (buildFile.fileRef === undefined) {
        seenIds.add(buildFile.id);
        continue;
      }

      const key = `${buildFile.fileRef}\u0000${buildFile.phaseName ?? ''}`;
      const canonical = byTarget.get(key);
      if (!canonical) {
        byTarget.set(key, buildFile);
        seenIds.add(buildFile.id);
        continue;
      }
      remap.set(buildFile.id, canonical.id);
      this.manifest.detachObject(buildFile);
      logger.debug(`Dropping duplicate build file ${buildFile.id} (${buildFile.name ?? buildFile.fileRef})`);
    }
    return remap;
  }

  /**
   * Rewrite one ordered list. A removed duplicate's entry becomes the
   * canonical id only when no list names the canonical id itself; otherwise
   * it is dropped. Repeats within the list and entries already claimed by an
   * earlier list are dropped too.
   */
  private dedupeList(
    owner: Group | BuildPhase,
    lists: ListDedupeState,
    isManaged: (id: string) => boolean,
    commentFor: (id: string) => string | undefined
  ): number {
    const { remap, listed, claimed } = lists;
    const seen = new Set<string>();
    let dropped = 0;
    let index = 0;

    while (index < owner.list.items.length) {
      const item = owner.list.items[index];
      const target = remap.get(item.id) ?? item.id;
      const displaced = target !== item.id && listed.has(target);

      if (displaced || seen.has(target) || (isManaged(target) && claimed.has(target))) {
        this.manifest.removeListItemAt(owner, index);
        dropped++;
        continue;
      }
      if (target !== item.id) {
        this.manifest.replaceListItem(owner, index, target, commentFor(target) ?? item.comment);
      }
      seen.add(target);
      if (isManaged(target)) {
        claimed.add(target);
      }
      index++;
    }
    return dropped;
  }

  /**
   * Discard every tracked-kind entry and add the scan from scratch.
   * Identifiers of files still on disk are reused.
   */
  rebuild(scan: readonly ScannedFile[]): ReconcileReport {
    const report = emptyReport();
    const phase = this.roles().buildPhase;
    const reusable = new Map<string, ReusableIds>();

    const tracked = this.manifest.fileReferences().filter((ref) => this.isTracked(ref));
    for (const ref of tracked) {
      if (!reusable.has(ref.name)) {
        const buildFile = this.manifest
          .buildFiles()
          .find((file) => file.fileRef === ref.id && phase.list.items.some((item) => item.id === file.id));
        reusable.set(ref.name, { fileRef: ref.id, buildFile: buildFile?.id });
      }
      this.deleteFile(ref);
    }
    report.removed.push(...unique(tracked.map((ref) => ref.name)));

    this.pruneOrphans(report);

    const present = this.allNames();
    for (const file of scan) {
      if (present.has(file.name)) {
        report.issues.push({ kind: 'already_present', name: file.name });
        continue;
      }
      this.insertFile(toManifestPath(file.path), reusable.get(file.name));
      present.add(file.name);
      report.added.push(file.name);
    }

    logger.debug(`rebuild: ${report.removed.length} discarded, ${report.added.length} added`);
    return report;
  }

  /**
   * Compare with a scan without changing anything
   */
  check(scan: readonly ScannedFile[]): DriftReport {
    const present = this.allNames();
    const scanned = new Set(scan.map((file) => file.name));

    const counts = new Map<string, number>();
    for (const ref of this.manifest.fileReferences()) {
      counts.set(ref.name, (counts.get(ref.name) ?? 0) + 1);
    }

    const declared = this.manifest.declaredIds();
    const orphans: string[] = [];
    for (const buildFile of this.manifest.buildFiles()) {
      if (buildFile.fileRef !== undefined && !declared.has(buildFile.fileRef)) {
        orphans.push(buildFile.id);
      }
    }
    const owners: Array<Group | BuildPhase> = [...this.manifest.groups(), ...this.manifest.buildPhases()];
    for (const owner of owners) {
      orphans.push(...owner.list.items.filter((item) => !declared.has(item.id)).map((item) => item.id));
    }

    return {
      missing: unique(scan.filter((file) => !present.has(file.name)).map((file) => file.name)),
      stale: this.trackedNames().filter((name) => !scanned.has(name) && !this.excluded.has(name)),
      duplicates: [...counts].filter(([, count]) => count > 1).map(([name]) => name),
      orphans: unique(orphans),
    };
  }
}
