/**
 * Role table: the groups and build phase new entries are placed in,
 * looked up by name in the loaded manifest instead of by hard-coded identifier.
 */

import type { GroupRule } from '../config.js';
import { MalformedManifestError } from '../errors.js';
import { logger } from '../logger.js';
import type { BuildPhase, Group, ProjectManifest } from '../manifest/index.js';

export interface CategoryRole {
  prefix: string;
  group: Group;
}

export interface RoleTable {
  categories: CategoryRole[];
  defaultGroup: Group;
  buildPhase: BuildPhase;
}

export interface RoleOptions {
  groups: readonly GroupRule[];
  defaultGroup?: string;
  buildPhase: string;
}

function resolveDefaultGroup(manifest: ProjectManifest, name: string | undefined): Group {
  if (name !== undefined) {
    const group = manifest.findGroupByName(name);
    if (!group) {
      throw new MalformedManifestError(`Default group "${name}" not found`);
    }
    return group;
  }

  const main = manifest.mainGroupId !== undefined ? manifest.findObject(manifest.mainGroupId) : undefined;
  if (main?.kind !== 'group') {
    throw new MalformedManifestError('Manifest has no main group and no defaultGroup is configured');
  }
  return main;
}

/**
 * Resolve every role against the manifest.
 * Throws MalformedManifestError when the default group or build phase is missing.
 */
export function resolveRoles(manifest: ProjectManifest, options: RoleOptions): RoleTable {
  const defaultGroup = resolveDefaultGroup(manifest, options.defaultGroup);

  const buildPhase = manifest.findBuildPhaseByName(options.buildPhase);
  if (!buildPhase) {
    throw new MalformedManifestError(`Build phase "${options.buildPhase}" not found`);
  }

  const categories = options.groups.map((rule) => {
    const group = manifest.findGroupByName(rule.group);
    if (!group) {
      logger.warn(`Group "${rule.group}" not found, files under ${rule.prefix} go to the default group`);
    }
    return { prefix: rule.prefix, group: group ?? defaultGroup };
  });

  return { categories, defaultGroup, buildPhase };
}

/**
 * Group for a repository-relative path: first matching prefix, else the default group
 */
export function groupForPath(roles: RoleTable, filePath: string): Group {
  return roles.categories.find((c) => filePath.startsWith(c.prefix))?.group ?? roles.defaultGroup;
}
