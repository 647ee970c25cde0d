/**
 * Role Repository
 *
 * Reads role files from a configuration-management repository and
 * resolves the instance metadata a role declares for an environment.
 *
 * Role files live in `<root>/roles/<name>.json|.yaml|.yml` and follow the
 * Chef role layout. Metadata is read from
 * `default_attributes.instance_metadata` and
 * `override_attributes.instance_metadata`. Roles named in the run list as
 * `role[name]` are expanded first. As in Chef, the default attributes of
 * every role are merged together, then the override attributes on top;
 * within each, a role's values win over the roles it includes, and nested
 * mappings are merged.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

import { parse as parseYAML } from 'yaml';

import { ROLES_DIRECTORY, ROLE_FILE_EXTENSIONS } from '../config/defaults.js';
import { deepMergeLayers } from '../config/merger.js';
import {
  InvalidArgumentError,
  RoleRepositoryError,
  type InstanceMetadata,
  type RoleFile,
  type RoleMetadataProvider,
} from '../types.js';

import { RoleValidator } from './role-validator.js';

const ROLE_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;
const ROLE_ENTRY_PATTERN = /^role\[([^\]]+)\]$/;

interface AttributeLayers {
  defaults: InstanceMetadata[];
  overrides: InstanceMetadata[];
}

/**
 * File-backed role repository. Parsed role files are cached per instance.
 */
export class RoleRepository implements RoleMetadataProvider {
  public readonly root: string;
  private readonly validator = new RoleValidator();
  private readonly cache = new Map<string, RoleFile | undefined>();

  /**
   * @param root - Repository root directory
   */
  constructor(root: string) {
    this.root = root;
  }

  /**
   * Metadata declared for a role in an environment.
   *
   * @param role - Role name
   * @param environment - Environment used to pick `env_run_lists` entries
   * @returns The merged metadata, or undefined when the role file does not
   *   exist or no role in its expansion declares instance metadata
   * @throws RoleRepositoryError if an included role is missing or a file is invalid
   */
  metadataForRole(role: string, environment: string): InstanceMetadata | undefined {
    if (!this.readRole(role)) {
      return undefined;
    }

    const layers: AttributeLayers = { defaults: [], overrides: [] };
    this.collect(role, environment, new Set<string>(), layers);

    if (layers.defaults.length === 0 && layers.overrides.length === 0) {
      return undefined;
    }
    return deepMergeLayers(...layers.defaults, ...layers.overrides);
  }

  /**
   * Names of the roles in the run list of a role for an environment.
   * Recipe entries are skipped.
   */
  includedRoles(role: string, environment: string): string[] {
    const document = this.requireRole(role);
    const envRunLists: Record<string, string[]> = document.env_run_lists ?? {};
    const runList = Object.hasOwn(envRunLists, environment)
      ? envRunLists[environment]
      : document.run_list;

    return (runList ?? []).flatMap((entry) => {
      const match = ROLE_ENTRY_PATTERN.exec(entry.trim());
      return match?.[1] ? [match[1]] : [];
    });
  }

  /**
   * Whether a role file exists for the given name.
   */
  hasRole(role: string): boolean {
    return this.readRole(role) !== undefined;
  }

  /**
   * Depth-first expansion. Each role contributes at most once; included
   * roles are pushed before the including role's own attributes.
   */
  private collect(
    role: string,
    environment: string,
    visited: Set<string>,
    layers: AttributeLayers
  ): void {
    if (visited.has(role)) {
      return;
    }
    visited.add(role);

    for (const included of this.includedRoles(role, environment)) {
      this.requireRole(included, role);
      this.collect(included, environment, visited, layers);
    }

    const document = this.requireRole(role);
    const defaults = document.default_attributes?.instance_metadata;
    const overrides = document.override_attributes?.instance_metadata;

    if (defaults) {
      layers.defaults.push(defaults);
    }
    if (overrides) {
      layers.overrides.push(overrides);
    }
  }

  private requireRole(role: string, includedBy?: string): RoleFile {
    const document = this.readRole(role);
    if (!document) {
      const message = includedBy
        ? `Role "${includedBy}" includes role "${role}", which does not exist in ${this.rolesDirectory()}`
        : `Role "${role}" does not exist in ${this.rolesDirectory()}`;
      throw new RoleRepositoryError(message, role);
    }
    return document;
  }

  /**
   * Read and validate a role file, or return undefined if none exists.
   */
  private readRole(role: string): RoleFile | undefined {
    if (!ROLE_NAME_PATTERN.test(role)) {
      throw new InvalidArgumentError(`Invalid role name: "${role}"`);
    }

    if (this.cache.has(role)) {
      return this.cache.get(role);
    }

    const path = this.findRoleFile(role);
    const document = path ? this.parseRoleFile(role, path) : undefined;
    this.cache.set(role, document);
    return document;
  }

  private findRoleFile(role: string): string | undefined {
    return ROLE_FILE_EXTENSIONS
      .map((extension) => join(this.rolesDirectory(), `${role}${extension}`))
      .find((candidate) => existsSync(candidate));
  }

  private parseRoleFile(role: string, path: string): RoleFile {
    let parsed: unknown;
    try {
      parsed = parseYAML(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new RoleRepositoryError(
        `Failed to load role file ${path}: ${(error as Error).message}`,
        role,
        error as Error
      );
    }

    return this.validator.validate(parsed ?? {}, role, path);
  }

  private rolesDirectory(): string {
    return join(this.root, ROLES_DIRECTORY);
  }
}
