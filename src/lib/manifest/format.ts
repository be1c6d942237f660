/**
 * Line formatting for entries the model creates or rewrites.
 * Matches the one-line layout Xcode uses for build files and file references.
 */

import { quoteValue } from './plist.js';
import type { ListItem, NewBuildFile, NewFileReference, ObjectList } from './types.js';

export const ENTRY_INDENT = '\t\t';
export const LIST_ITEM_INDENT = '\t\t\t\t';

export function formatFileReferenceLine(indent: string, ref: NewFileReference): string {
  return (
    `${indent}${ref.id} /* ${ref.name} */ = {isa = PBXFileReference; ` +
    `lastKnownFileType = ${quoteValue(ref.fileType)}; path = ${quoteValue(ref.path)}; ` +
    `sourceTree = "<group>"; };`
  );
}

export function formatBuildFileLine(indent: string, file: NewBuildFile): string {
  return (
    `${indent}${file.id} /* ${file.name} in ${file.phaseName} */ = {isa = PBXBuildFile; ` +
    `fileRef = ${file.fileRef} /* ${file.name} */; };`
  );
}

export function formatListItem(indent: string, id: string, comment: string | undefined): ListItem {
  const line = comment ? `${indent}${id} /* ${comment} */,` : `${indent}${id},`;
  return { id, comment, line };
}

/**
 * Indentation for a new list item: that of the existing items, or one tab
 * deeper than the list opener
 */
export function listItemIndent(list: ObjectList): string {
  const first = list.items[0];
  if (first) {
    const match = /^\s*/.exec(first.line);
    return match ? match[0] : LIST_ITEM_INDENT;
  }
  return `${list.indent}\t`;
}

/**
 * Lines of a group or build phase entry
 */
export function renderList(list: ObjectList): string[] {
  if (list.inline !== undefined && list.items.length === 0) {
    return [...list.head, list.inline, ...list.tail];
  }
  if (list.inline !== undefined) {
    return [
      ...list.head,
      `${list.indent}${list.key} = (`,
      ...list.items.map((item) => item.line),
      `${list.indent});`,
      ...list.tail,
    ];
  }
  return [...list.head, ...list.items.map((item) => item.line), ...list.tail];
}
