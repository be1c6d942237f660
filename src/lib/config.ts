/**
 * Configuration for pbxsync
 *
 * An optional `.pbxsyncrc` (JSON5) at the repository root, validated against
 * schemas/pbxsyncrc.schema.json and merged over the defaults. The resolved
 * value is passed explicitly to the reconciler; nothing reads it from globals.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import JSON5 from 'json5';
import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_BACKUP_SUFFIX,
  DEFAULT_BUILD_PHASE,
  DEFAULT_EXCLUDE,
  DEFAULT_EXTENSIONS,
  DEFAULT_FILE_TYPE,
  DEFAULT_GROUPS,
  DEFAULT_SOURCE_ROOTS,
  MANIFEST_FILE_NAME,
} from './constants.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

const Ajv = AjvModule.default;

/**
 * Maps files whose relative path starts with `prefix` to the group named `group`
 */
export interface GroupRule {
  prefix: string;
  group: string;
}

/**
 * Contents of a .pbxsyncrc file
 */
export interface PbxSyncConfig {
  /** Path to project.pbxproj relative to the repository root (default: auto-detect) */
  manifestPath?: string;
  /** Directories scanned recursively */
  sourceRoots?: string[];
  /** Extensions of the tracked file kind */
  extensions?: string[];
  /** lastKnownFileType for new file references */
  fileType?: string;
  /** File names never added and never removed by sync */
  exclude?: string[];
  /** Category rules, first match wins */
  groups?: GroupRule[];
  /** Group for files matching no rule (default: the project's main group) */
  defaultGroup?: string;
  /** Build phase that receives new build files */
  buildPhase?: string;
  /** Keep the backup after a successful write */
  keepBackup?: boolean;
  /** Suffix appended to the manifest path for the backup copy */
  backupSuffix?: string;
}

/**
 * Configuration with defaults applied
 */
export interface ResolvedConfig {
  manifestPath?: string;
  sourceRoots: string[];
  extensions: string[];
  fileType: string;
  exclude: string[];
  groups: GroupRule[];
  defaultGroup?: string;
  buildPhase: string;
  keepBackup: boolean;
  backupSuffix: string;
  /** File the configuration was loaded from, if any */
  configFile?: string;
}

/**
 * Validation error with path and message
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Result of config validation
 */
export type ValidationResult =
  | { valid: true; config: PbxSyncConfig; errors: [] }
  | { valid: false; errors: ValidationError[] };

/**
 * Get default configuration values
 */
export function getDefaultConfig(): ResolvedConfig {
  return {
    sourceRoots: [...DEFAULT_SOURCE_ROOTS],
    extensions: [...DEFAULT_EXTENSIONS],
    fileType: DEFAULT_FILE_TYPE,
    exclude: [...DEFAULT_EXCLUDE],
    groups: DEFAULT_GROUPS.map((rule) => ({ ...rule })),
    buildPhase: DEFAULT_BUILD_PHASE,
    keepBackup: false,
    backupSuffix: DEFAULT_BACKUP_SUFFIX,
  };
}

/**
 * Location of the JSON schema shipped with the package
 */
export function getSchemaPath(): string {
  return fileURLToPath(new URL('../../schemas/pbxsyncrc.schema.json', import.meta.url));
}

let compiledValidator: ValidateFunction<PbxSyncConfig> | null = null;

function getValidator(): ValidateFunction<PbxSyncConfig> {
  if (!compiledValidator) {
    const schema: object = JSON.parse(fs.readFileSync(getSchemaPath(), 'utf8'));
    const ajv = new Ajv({ allErrors: true });
    compiledValidator = ajv.compile<PbxSyncConfig>(schema);
  }
  return compiledValidator;
}

function toValidationError(error: ErrorObject): ValidationError {
  const location = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
  if (error.keyword === 'additionalProperties' && 'additionalProperty' in error.params) {
    const property = String(error.params.additionalProperty);
    return {
      path: location ? `${location}.${property}` : property,
      message: `Unknown config property: ${property}`,
    };
  }
  return { path: location, message: error.message ?? 'is invalid' };
}

/**
 * Validate a parsed config object against the JSON schema
 */
export function validateConfig(config: unknown): ValidationResult {
  const validate = getValidator();
  if (validate(config)) {
    return { valid: true, config, errors: [] };
  }
  return { valid: false, errors: (validate.errors ?? []).map(toValidationError) };
}

/**
 * Find config file in repository
 */
export function findConfigFile(repoRoot: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = path.join(repoRoot, fileName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Parse and validate one config file.
 * Throws ConfigurationError on syntax or schema errors.
 */
export function loadConfigFile(configPath: string): PbxSyncConfig {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to parse ${configPath}: ${message}`, {
      configFile: configPath,
    });
  }

  const result = validateConfig(parsed);
  if (!result.valid) {
    const details = result.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');
    throw new ConfigurationError(`Invalid configuration in ${configPath}: ${details}`, {
      configFile: configPath,
      field: result.errors[0]?.path,
    });
  }
  return result.config;
}

/**
 * Load configuration from repository
 * Merges with defaults, repo config takes precedence
 */
export function loadConfig(repoRoot: string): ResolvedConfig {
  const defaults = getDefaultConfig();
  const configPath = findConfigFile(repoRoot);

  if (!configPath) {
    logger.debug('No config file found, using defaults');
    return defaults;
  }

  const userConfig = loadConfigFile(configPath);
  logger.debug(`Loaded config from ${configPath}`);

  return {
    ...defaults,
    ...userConfig,
    configFile: configPath,
  };
}

/**
 * Resolve the manifest file: explicit override, then config, then the first
 * `*.xcodeproj` bundle at the repository root
 */
export function resolveManifestPath(
  repoRoot: string,
  config: ResolvedConfig,
  override?: string
): string {
  const explicit = override ?? config.manifestPath;
  if (explicit) {
    const resolved = path.resolve(repoRoot, explicit);
    return resolved.endsWith('.xcodeproj') ? path.join(resolved, MANIFEST_FILE_NAME) : resolved;
  }

  const bundles = fs
    .readdirSync(repoRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && entry.name.endsWith('.xcodeproj'))
    .map((entry) => entry.name)
    .sort();

  for (const bundle of bundles) {
    const candidate = path.join(repoRoot, bundle, MANIFEST_FILE_NAME);
    if (fs.existsSync(candidate)) {
      logger.debug(`Using manifest ${candidate}`);
      return candidate;
    }
  }

  throw new ConfigurationError(
    `No *.xcodeproj/${MANIFEST_FILE_NAME} found in ${repoRoot}; set manifestPath or pass --project`,
    { field: 'manifestPath' }
  );
}
