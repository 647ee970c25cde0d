/**
 * Built-in Defaults for instance-metadata
 *
 * The lowest-precedence layer of every expansion, plus the default
 * locations used when the caller does not name them.
 */

import type { InstanceMetadata } from '../types.js';

/**
 * Backing store used when no layer selects one.
 */
export const DEFAULT_BACKING_STORE = 'instance_store';

/**
 * Built-in option table. Every expansion starts from a copy of this table.
 *
 * | option            | default            |
 * |-------------------|--------------------|
 * | git_branch        | "production"       |
 * | count             | 1                  |
 * | backing_store     | "instance_store"   |
 *
 * Site-specific options such as region or instance type have no built-in
 * value; they come from the configuration defaults.
 */
export const DEFAULT_OPTIONS: Readonly<InstanceMetadata> = Object.freeze({
  git_branch: 'production',
  count: 1,
  backing_store: DEFAULT_BACKING_STORE,
});

/**
 * Configuration file name looked up under the repository root.
 */
export const DEFAULT_CONFIG_FILENAME = 'instance-metadata.yaml';

/**
 * Environment used by the CLI when none is given.
 */
export const DEFAULT_ENVIRONMENT = 'production';

/**
 * Directory under the repository root holding role files.
 */
export const ROLES_DIRECTORY = 'roles';

/**
 * Role file extensions, in lookup order.
 */
export const ROLE_FILE_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;
