/**
 * Manifest model types
 *
 * The manifest is an Xcode `project.pbxproj` file: an ASCII property list whose
 * `objects` dictionary is split into `Begin <isa> section` / `End <isa> section`
 * blocks. Four of those blocks are managed (file references, build files,
 * groups, build phases); every other line is carried through verbatim.
 */

/**
 * Value of an ASCII property list: string, array or dictionary
 */
export type PlistValue = string | PlistValue[] | PlistDict;

export interface PlistDict {
  [key: string]: PlistValue;
}

/**
 * One line of a group's `children` or a build phase's `files` list
 */
export interface ListItem {
  id: string;
  /** Inline comment, e.g. `Foo.swift` or `Foo.swift in Sources` */
  comment?: string;
  /** Original (or generated) line text, emitted verbatim */
  line: string;
}

/**
 * Ordered identifier list inside a group or build phase entry
 */
export interface ObjectList {
  key: 'children' | 'files';
  /** Indentation of the `key = (` line */
  indent: string;
  /** Entry lines before the list opener (inclusive when expanded) */
  head: string[];
  items: ListItem[];
  /** Entry lines after the list closer (inclusive when expanded) */
  tail: string[];
  /** Original `key = ( );` line while the list is still written inline */
  inline?: string;
}

interface EntryBase {
  id: string;
  /** Inline comment after the identifier */
  comment?: string;
  isa: string;
  attributes: PlistDict;
  /** Original lines; regenerated when the entry is rewritten */
  lines: string[];
  /** 1-based line number of the entry in the parsed text (0 for new entries) */
  line: number;
}

export interface FileReference extends EntryBase {
  kind: 'fileReference';
  /** Display name shown in inline comments */
  name: string;
  path?: string;
  fileType?: string;
}

export interface BuildFileEntry extends EntryBase {
  kind: 'buildFile';
  fileRef?: string;
  productRef?: string;
  /** Display name of the referenced file, from `<name> in <phase>` */
  name?: string;
  phaseName?: string;
}

export interface Group extends EntryBase {
  kind: 'group';
  name?: string;
  path?: string;
  list: ObjectList;
}

export interface BuildPhase extends EntryBase {
  kind: 'buildPhase';
  name: string;
  list: ObjectList;
}

/**
 * Entry in a section the model does not manage (PBXProject, PBXNativeTarget, ...)
 */
export interface OpaqueObject extends EntryBase {
  kind: 'opaque';
}

export type ManifestObject = FileReference | BuildFileEntry | Group | BuildPhase | OpaqueObject;

/**
 * A `Begin ... section` / `End ... section` block
 */
export interface Section {
  name: string;
  begin: string;
  end: string;
  /** Entries and any stray blank lines, in document order */
  items: Array<ManifestObject | string>;
}

/**
 * Top-level document: raw lines outside sections interleaved with sections
 */
export type DocumentPart = string | Section;

/**
 * Input for a new file reference
 */
export interface NewFileReference {
  id: string;
  name: string;
  path: string;
  fileType: string;
}

/**
 * Input for a new build file
 */
export interface NewBuildFile {
  id: string;
  fileRef: string;
  name: string;
  phaseName: string;
}
