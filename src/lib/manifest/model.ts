/**
 * ProjectManifest - in-memory model of a pbxproj document
 *
 * Holds the document as raw lines interleaved with parsed sections. Entries
 * that are never touched serialize from their original lines, so an unmutated
 * model reproduces its input byte for byte. Every mutation goes through the
 * methods below, which keep group and build phase lists consistent with the
 * entries they point at.
 */

import { MalformedManifestError } from '../errors.js';
import {
  ENTRY_INDENT,
  formatBuildFileLine,
  formatFileReferenceLine,
  formatListItem,
  listItemIndent,
  renderList,
} from './format.js';
import type {
  BuildFileEntry,
  BuildPhase,
  DocumentPart,
  FileReference,
  Group,
  ManifestObject,
  NewBuildFile,
  NewFileReference,
  Section,
} from './types.js';

const IDENTIFIER_TOKEN = /\b[0-9A-F]{24}\b/g;

type ListOwner = Group | BuildPhase;

function isObject(item: ManifestObject | string): item is ManifestObject {
  return typeof item !== 'string';
}

function leadingWhitespace(line: string): string {
  const match = /^\s*/.exec(line);
  return match ? match[0] : '';
}

export type LineEnding = '\n' | '\r\n';

export interface ManifestOptions {
  rootObjectId?: string;
  mainGroupId?: string;
  lineEnding?: LineEnding;
}

export class ProjectManifest {
  private readonly parts: DocumentPart[];
  readonly rootObjectId?: string;
  readonly mainGroupId?: string;
  /** Line terminator the document was read with */
  readonly lineEnding: LineEnding;

  constructor(parts: DocumentPart[], options: ManifestOptions = {}) {
    this.parts = parts;
    this.rootObjectId = options.rootObjectId;
    this.mainGroupId = options.mainGroupId;
    this.lineEnding = options.lineEnding ?? '\n';
  }

  // ---------------------------------------------------------------------------
  // Sections
  // ---------------------------------------------------------------------------

  sections(): Section[] {
    return this.parts.filter((part): part is Section => typeof part !== 'string');
  }

  section(name: string): Section | undefined {
    return this.sections().find((s) => s.name === name);
  }

  private requireSection(name: string): Section {
    const section = this.section(name);
    if (!section) {
      throw new MalformedManifestError(`Missing ${name} section`);
    }
    return section;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  allObjects(): ManifestObject[] {
    return this.sections().flatMap((s) => s.items.filter(isObject));
  }

  fileReferences(): readonly FileReference[] {
    return this.allObjects().filter((o): o is FileReference => o.kind === 'fileReference');
  }

  buildFiles(): readonly BuildFileEntry[] {
    return this.allObjects().filter((o): o is BuildFileEntry => o.kind === 'buildFile');
  }

  groups(): readonly Group[] {
    return this.allObjects().filter((o): o is Group => o.kind === 'group');
  }

  buildPhases(): readonly BuildPhase[] {
    return this.allObjects().filter((o): o is BuildPhase => o.kind === 'buildPhase');
  }

  findObject(id: string): ManifestObject | undefined {
    return this.allObjects().find((o) => o.id === id);
  }

  /**
   * Identifiers declared by an entry in any section
   */
  declaredIds(): Set<string> {
    return new Set(this.allObjects().map((o) => o.id));
  }

  isDeclared(id: string): boolean {
    return this.allObjects().some((o) => o.id === id);
  }

  /**
   * Every identifier-shaped token in the document, declared or referenced
   */
  identifiers(): Set<string> {
    return new Set(this.serialize().match(IDENTIFIER_TOKEN) ?? []);
  }

  findGroupByName(name: string): Group | undefined {
    return this.groups().find((g) => g.name === name || g.path === name);
  }

  findBuildPhaseByName(name: string, isa: string = 'PBXSourcesBuildPhase'): BuildPhase | undefined {
    return this.buildPhases().find((p) => p.isa === isa && p.name === name);
  }

  /**
   * First group (document order) whose child list holds the identifier
   */
  groupOf(id: string): Group | undefined {
    return this.groups().find((g) => g.list.items.some((item) => item.id === id));
  }

  // ---------------------------------------------------------------------------
  // Entry mutation
  // ---------------------------------------------------------------------------

  private entryIndent(section: Section): string {
    const first = section.items.find(isObject);
    return first ? leadingWhitespace(first.lines[0]) : ENTRY_INDENT;
  }

  insertFileReference(ref: NewFileReference): FileReference {
    const section = this.requireSection('PBXFileReference');
    const entry: FileReference = {
      kind: 'fileReference',
      id: ref.id,
      comment: ref.name,
      isa: 'PBXFileReference',
      attributes: {
        isa: 'PBXFileReference',
        lastKnownFileType: ref.fileType,
        path: ref.path,
        sourceTree: '<group>',
      },
      lines: [formatFileReferenceLine(this.entryIndent(section), ref)],
      line: 0,
      name: ref.name,
      path: ref.path,
      fileType: ref.fileType,
    };
    section.items.push(entry);
    return entry;
  }

  insertBuildFile(file: NewBuildFile): BuildFileEntry {
    const section = this.requireSection('PBXBuildFile');
    const entry: BuildFileEntry = {
      kind: 'buildFile',
      id: file.id,
      comment: `${file.name} in ${file.phaseName}`,
      isa: 'PBXBuildFile',
      attributes: { isa: 'PBXBuildFile', fileRef: file.fileRef },
      lines: [formatBuildFileLine(this.entryIndent(section), file)],
      line: 0,
      fileRef: file.fileRef,
      name: file.name,
      phaseName: file.phaseName,
    };
    section.items.push(entry);
    return entry;
  }

  /**
   * Remove one entry instance, leaving list items untouched
   */
  detachObject(entry: ManifestObject): boolean {
    for (const section of this.sections()) {
      const index = section.items.indexOf(entry);
      if (index !== -1) {
        section.items.splice(index, 1);
        return true;
      }
    }
    return false;
  }

  private removeEntries(sectionName: string, id: string): number {
    const section = this.section(sectionName);
    if (!section) return 0;
    const before = section.items.length;
    section.items = section.items.filter((item) => !isObject(item) || item.id !== id);
    return before - section.items.length;
  }

  /**
   * Delete a file reference and its occurrences in every group list
   */
  deleteFileReference(id: string): number {
    const removed = this.removeEntries('PBXFileReference', id);
    for (const group of this.groups()) {
      this.removeListItems(group, (item) => item.id === id);
    }
    return removed;
  }

  /**
   * Delete a build file and its occurrences in every build phase list
   */
  deleteBuildFile(id: string): number {
    const removed = this.removeEntries('PBXBuildFile', id);
    for (const phase of this.buildPhases()) {
      this.removeListItems(phase, (item) => item.id === id);
    }
    return removed;
  }

  /**
   * Point a build file at another file reference, keeping its other attributes
   */
  retargetBuildFile(entry: BuildFileEntry, fileRef: string): void {
    const previous = entry.fileRef;
    if (previous === undefined || previous === fileRef) return;
    const pattern = new RegExp(`fileRef = ${previous}\\b`);
    entry.lines = entry.lines.map((line) => line.replace(pattern, `fileRef = ${fileRef}`));
    entry.attributes.fileRef = fileRef;
    entry.fileRef = fileRef;
  }

  // ---------------------------------------------------------------------------
  // List mutation
  // ---------------------------------------------------------------------------

  appendGroupChild(group: Group, id: string, comment: string): void {
    group.list.items.push(formatListItem(listItemIndent(group.list), id, comment));
  }

  appendPhaseFile(phase: BuildPhase, id: string, comment: string): void {
    phase.list.items.push(formatListItem(listItemIndent(phase.list), id, comment));
  }

  removeListItemAt(owner: ListOwner, index: number): void {
    owner.list.items.splice(index, 1);
  }

  replaceListItem(owner: ListOwner, index: number, id: string, comment: string | undefined): void {
    owner.list.items[index] = formatListItem(listItemIndent(owner.list), id, comment);
  }

  removeListItems(owner: ListOwner, predicate: (item: { id: string }) => boolean): number {
    const before = owner.list.items.length;
    owner.list.items = owner.list.items.filter((item) => !predicate(item));
    return before - owner.list.items.length;
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  private renderObject(entry: ManifestObject): string[] {
    if (entry.kind === 'group' || entry.kind === 'buildPhase') {
      return renderList(entry.list);
    }
    return entry.lines;
  }

  serialize(): string {
    const lines: string[] = [];
    for (const part of this.parts) {
      if (typeof part === 'string') {
        lines.push(part);
        continue;
      }
      lines.push(part.begin);
      for (const item of part.items) {
        if (typeof item === 'string') {
          lines.push(item);
        } else {
          lines.push(...this.renderObject(item));
        }
      }
      lines.push(part.end);
    }
    return lines.join(this.lineEnding);
  }
}
