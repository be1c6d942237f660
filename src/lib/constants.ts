/**
 * Centralized constants and defaults for pbxsync
 */

/**
 * Config file names to look for at the repository root (in order of priority)
 */
export const CONFIG_FILE_NAMES = ['.pbxsyncrc', '.pbxsyncrc.json'];

/**
 * Manifest file name inside an `.xcodeproj` bundle
 */
export const MANIFEST_FILE_NAME = 'project.pbxproj';

/**
 * Directories scanned recursively for source files
 */
export const DEFAULT_SOURCE_ROOTS = ['Views', 'Managers', 'Models', 'Assets'];

/**
 * File extensions of the tracked file kind
 */
export const DEFAULT_EXTENSIONS = ['.swift'];

/**
 * `lastKnownFileType` written for new file references
 */
export const DEFAULT_FILE_TYPE = 'sourcecode.swift';

/**
 * File names never added to the manifest
 */
export const DEFAULT_EXCLUDE = ['GrassIconPreview.swift', 'generate_icon.swift'];

/**
 * Path prefix to group name mapping used to place new files
 */
export const DEFAULT_GROUPS: ReadonlyArray<{ prefix: string; group: string }> = [
  { prefix: 'Managers/', group: 'Managers' },
  { prefix: 'Views/', group: 'Views' },
  { prefix: 'Models/', group: 'Models' },
];

/**
 * Name of the build phase that receives new build files
 */
export const DEFAULT_BUILD_PHASE = 'Sources';

/**
 * Suffix appended to the manifest path for the backup copy
 */
export const DEFAULT_BACKUP_SUFFIX = '.backup';

/**
 * Sections that must be present in every manifest
 */
export const REQUIRED_SECTIONS = [
  'PBXBuildFile',
  'PBXFileReference',
  'PBXGroup',
  'PBXSourcesBuildPhase',
] as const;

/**
 * Environment variable overriding the log level
 */
export const LOG_LEVEL_ENV = 'PBXSYNC_LOG_LEVEL';

/**
 * Log levels (consola numeric levels)
 */
export enum LogLevel {
  SILENT = -999,
  ERROR = 0,
  WARN = 1,
  INFO = 3,
  DEBUG = 4,
  TRACE = 5,
}

/**
 * Log file rotation: maximum size of a single log file in bytes
 */
export const MAX_LOG_FILE_SIZE = 1024 * 1024;

/**
 * Log file rotation: number of files kept (current + rotated)
 */
export const MAX_LOG_FILES = 3;

