/**
 * manifest library - public API exports
 */

// Types
export type {
  PlistValue,
  PlistDict,
  ListItem,
  ObjectList,
  FileReference,
  BuildFileEntry,
  Group,
  BuildPhase,
  OpaqueObject,
  ManifestObject,
  Section,
  NewFileReference,
  NewBuildFile,
} from './types.js';

// Model
export { ProjectManifest } from './model.js';
export type { LineEnding, ManifestOptions } from './model.js';
export { parseManifest } from './parse.js';
export type { ParseOptions } from './parse.js';

// Identifiers
export {
  IdentifierGenerator,
  randomIdentifierSource,
  sequentialIdentifierSource,
  IDENTIFIER_PATTERN,
} from './identifiers.js';
export type { IdentifierSource } from './identifiers.js';

// Property-list primitives
export { tokenize, quoteValue, PlistSyntaxError } from './plist.js';
