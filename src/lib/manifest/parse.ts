/**
 * pbxproj parser - text to ProjectManifest
 *
 * Splits the document on its section sentinels, parses every object entry
 * with the property-list parser, and builds typed views for the four managed
 * sections. Group and build phase lists are also read line by line so they
 * can be edited without reformatting the rest of the entry.
 */

import path from 'path';
import { REQUIRED_SECTIONS } from '../constants.js';
import { MalformedManifestError } from '../errors.js';
import { ProjectManifest } from './model.js';
import type { LineEnding } from './model.js';
import { PlistSyntaxError, parseObjectEntry, stringAttribute } from './plist.js';
import type {
  DocumentPart,
  ListItem,
  ManifestObject,
  ObjectList,
  PlistDict,
  Section,
} from './types.js';

const BEGIN_RE = /^\/\* Begin (\w+) section \*\/$/;
const END_RE = /^\/\* End (\w+) section \*\/$/;
const ENTRY_RE = /^(\s*)([0-9A-F]{24})(?: \/\* (.*?) \*\/)? = \{(.*)$/;
const ROOT_OBJECT_RE = /^\s*rootObject = ([0-9A-F]{24})(?: \/\* .*? \*\/)?;\s*$/;
const LIST_ITEM_RE = /^\s*([0-9A-F]{24})(?: \/\* (.*?) \*\/)?,$/;

export interface ParseOptions {
  /** Used in error messages */
  manifestPath?: string;
}

interface ParseContext {
  lines: string[];
  manifestPath?: string;
}

function malformed(ctx: ParseContext, message: string, line?: number): MalformedManifestError {
  return new MalformedManifestError(message, { manifestPath: ctx.manifestPath, line });
}

/**
 * Parse manifest text into a model.
 * Throws MalformedManifestError on structural problems.
 */
export function parseManifest(text: string, options: ParseOptions = {}): ProjectManifest {
  const lineEnding = detectLineEnding(text);
  const ctx: ParseContext = { lines: text.split(lineEnding), manifestPath: options.manifestPath };
  const parts: DocumentPart[] = [];
  const seenSections = new Set<string>();
  let rootObjectId: string | undefined;

  let i = 0;
  while (i < ctx.lines.length) {
    const line = ctx.lines[i];
    const trimmed = line.trim();

    const begin = BEGIN_RE.exec(trimmed);
    if (begin) {
      const name = begin[1];
      if (seenSections.has(name)) {
        throw malformed(ctx, `Duplicate ${name} section`, i + 1);
      }
      seenSections.add(name);
      const { section, next } = parseSection(ctx, i, name);
      parts.push(section);
      i = next;
      continue;
    }

    const end = END_RE.exec(trimmed);
    if (end) {
      throw malformed(ctx, `End ${end[1]} section without matching Begin`, i + 1);
    }

    const root = ROOT_OBJECT_RE.exec(line);
    if (root) {
      rootObjectId = root[1];
    }
    parts.push(line);
    i++;
  }

  for (const name of REQUIRED_SECTIONS) {
    if (!seenSections.has(name)) {
      throw malformed(ctx, `Missing required ${name} section`);
    }
  }

  const draft = new ProjectManifest(parts, { rootObjectId });
  const mainGroupId = resolveMainGroup(ctx, draft, rootObjectId);
  return new ProjectManifest(parts, { rootObjectId, mainGroupId, lineEnding });
}

/**
 * CRLF only when every line break is CRLF; mixed endings parse as LF
 */
function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') && !/(^|[^\r])\n/.test(text) ? '\r\n' : '\n';
}

function parseSection(
  ctx: ParseContext,
  start: number,
  name: string
): { section: Section; next: number } {
  const items: Section['items'] = [];
  let i = start + 1;

  while (i < ctx.lines.length) {
    const line = ctx.lines[i];
    const trimmed = line.trim();

    const end = END_RE.exec(trimmed);
    if (end) {
      if (end[1] !== name) {
        throw malformed(ctx, `Expected End ${name} section, found End ${end[1]} section`, i + 1);
      }
      return {
        section: { name, begin: ctx.lines[start], end: line, items },
        next: i + 1,
      };
    }

    if (BEGIN_RE.test(trimmed)) {
      throw malformed(ctx, `Section begins inside ${name} section`, i + 1);
    }

    if (trimmed === '') {
      items.push(line);
      i++;
      continue;
    }

    const match = ENTRY_RE.exec(line);
    if (!match) {
      throw malformed(ctx, `Unexpected line in ${name} section`, i + 1);
    }
    const [, indent, id, comment, rest] = match;

    let last = i;
    if (!rest.trimEnd().endsWith('};')) {
      last = i + 1;
      while (last < ctx.lines.length && ctx.lines[last] !== `${indent}};`) {
        const inner = ctx.lines[last].trim();
        if (BEGIN_RE.test(inner) || END_RE.test(inner)) {
          last = ctx.lines.length;
          break;
        }
        last++;
      }
      if (last >= ctx.lines.length) {
        throw malformed(ctx, `Unterminated entry ${id}`, i + 1);
      }
    }

    items.push(buildObject(ctx, name, ctx.lines.slice(i, last + 1), i + 1, comment));
    i = last + 1;
  }

  throw malformed(ctx, `Missing End ${name} section`, start + 1);
}

function lineOfOffset(text: string, offset: number): number {
  let count = 0;
  for (let k = 0; k < offset && k < text.length; k++) {
    if (text[k] === '\n') count++;
  }
  return count;
}

function buildObject(
  ctx: ParseContext,
  sectionName: string,
  lines: string[],
  lineNo: number,
  comment: string | undefined
): ManifestObject {
  const text = lines.join('\n');
  let id: string;
  let attributes: PlistDict;
  try {
    ({ id, attributes } = parseObjectEntry(text));
  } catch (err) {
    if (err instanceof PlistSyntaxError) {
      throw malformed(ctx, `Cannot parse entry: ${err.message}`, lineNo + lineOfOffset(text, err.offset));
    }
    throw err;
  }

  const isa = stringAttribute(attributes, 'isa');
  if (isa === undefined) {
    throw malformed(ctx, `Entry ${id} has no isa`, lineNo);
  }

  const base = { id, comment, isa, attributes, lines, line: lineNo };

  if (sectionName === 'PBXFileReference') {
    const filePath = stringAttribute(attributes, 'path');
    return {
      ...base,
      kind: 'fileReference',
      name:
        comment ??
        stringAttribute(attributes, 'name') ??
        (filePath !== undefined ? path.posix.basename(filePath) : id),
      path: filePath,
      fileType:
        stringAttribute(attributes, 'lastKnownFileType') ??
        stringAttribute(attributes, 'explicitFileType'),
    };
  }

  if (sectionName === 'PBXBuildFile') {
    const fileRef = stringAttribute(attributes, 'fileRef');
    const productRef = stringAttribute(attributes, 'productRef');
    if (fileRef === undefined && productRef === undefined) {
      throw malformed(ctx, `Build file ${id} has neither fileRef nor productRef`, lineNo);
    }
    const split = comment !== undefined ? comment.lastIndexOf(' in ') : -1;
    return {
      ...base,
      kind: 'buildFile',
      fileRef,
      productRef,
      name: split === -1 ? comment : comment?.slice(0, split),
      phaseName: split === -1 ? undefined : comment?.slice(split + 4),
    };
  }

  if (sectionName === 'PBXGroup') {
    return {
      ...base,
      kind: 'group',
      name: comment ?? stringAttribute(attributes, 'name') ?? stringAttribute(attributes, 'path'),
      path: stringAttribute(attributes, 'path'),
      list: parseList(ctx, lines, lineNo, 'children', attributes),
    };
  }

  if (sectionName.endsWith('BuildPhase')) {
    return {
      ...base,
      kind: 'buildPhase',
      name: comment ?? stringAttribute(attributes, 'name') ?? isa,
      list: parseList(ctx, lines, lineNo, 'files', attributes),
    };
  }

  return { ...base, kind: 'opaque' };
}

function parseList(
  ctx: ParseContext,
  lines: string[],
  lineNo: number,
  key: 'children' | 'files',
  attributes: PlistDict
): ObjectList {
  const declared = attributes[key];
  if (!Array.isArray(declared)) {
    throw malformed(ctx, `Entry has no ${key} list`, lineNo);
  }

  const openRe = new RegExp(`^(\\s*)${key} = \\($`);
  const inlineRe = new RegExp(`^(\\s*)${key} = \\(\\s*\\);$`);

  const openIdx = lines.findIndex((l) => openRe.test(l));
  if (openIdx === -1) {
    const inlineIdx = lines.findIndex((l) => inlineRe.test(l));
    if (inlineIdx === -1 || declared.length > 0) {
      throw malformed(ctx, `Unsupported ${key} list layout`, lineNo);
    }
    return {
      key,
      indent: /^\s*/.exec(lines[inlineIdx])?.[0] ?? '',
      head: lines.slice(0, inlineIdx),
      items: [],
      tail: lines.slice(inlineIdx + 1),
      inline: lines[inlineIdx],
    };
  }

  const indent = /^\s*/.exec(lines[openIdx])?.[0] ?? '';
  const closeIdx = lines.findIndex((l, idx) => idx > openIdx && l === `${indent});`);
  if (closeIdx === -1) {
    throw malformed(ctx, `Unterminated ${key} list`, lineNo + openIdx);
  }

  const items: ListItem[] = lines.slice(openIdx + 1, closeIdx).map((line, k) => {
    const match = LIST_ITEM_RE.exec(line);
    if (!match) {
      throw malformed(ctx, `Unexpected line in ${key} list`, lineNo + openIdx + 1 + k);
    }
    return { id: match[1], comment: match[2], line };
  });

  if (items.length !== declared.length) {
    throw malformed(ctx, `Unsupported ${key} list layout`, lineNo);
  }

  return {
    key,
    indent,
    head: lines.slice(0, openIdx + 1),
    items,
    tail: lines.slice(closeIdx),
  };
}

/**
 * Follow rootObject to the project's main group. A document without a
 * rootObject line has no main group; a rootObject that does not resolve is
 * malformed.
 */
function resolveMainGroup(
  ctx: ParseContext,
  draft: ProjectManifest,
  rootObjectId: string | undefined
): string | undefined {
  if (rootObjectId === undefined) {
    return undefined;
  }

  const project = draft.findObject(rootObjectId);
  if (!project || project.isa !== 'PBXProject') {
    throw malformed(ctx, `rootObject ${rootObjectId} does not resolve to a PBXProject entry`);
  }

  const mainGroup = stringAttribute(project.attributes, 'mainGroup');
  if (mainGroup === undefined || !draft.groups().some((g) => g.id === mainGroup)) {
    throw malformed(
      ctx,
      `mainGroup ${mainGroup ?? '(missing)'} of project ${rootObjectId} does not resolve to a group`,
      project.line
    );
  }
  return mainGroup;
}
