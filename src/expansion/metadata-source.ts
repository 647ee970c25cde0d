/**
 * Metadata Source
 *
 * Resolves the launch options of a role in an environment from the
 * built-in defaults, the site configuration, the backing store options
 * and the role repository, with caller overrides on top.
 *
 * Precedence, lowest first:
 * 1. DEFAULT_OPTIONS
 * 2. configuration defaults
 * 3. options of the resolved backing store
 * 4. role metadata
 * 5. override options
 *
 * `chef_role`, `chef_environment` and `backing_store` are then set from
 * the call, and `availability_zone` is derived from `region` when unset.
 */

import { join } from 'path';

import { Configuration } from '../config/configuration.js';
import { DEFAULT_BACKING_STORE, DEFAULT_OPTIONS } from '../config/defaults.js';
import { firstPresent, mergeLayers } from '../config/merger.js';
import { logger as defaultLogger, type StructuredLogger } from '../observability/logger.js';
import { RoleRepository } from '../repository/role-repository.js';
import {
  EmptyRoleError,
  InvalidArgumentError,
  type ConfigurationProvider,
  type ExpandOptions,
  type InstanceMetadata,
  type RoleMetadataProvider,
} from '../types.js';

import { deriveAvailabilityZone } from './availability-zone.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for constructing a MetadataSource.
 */
export interface MetadataSourceOptions {
  /** Logger for expansion diagnostics (default: package logger) */
  logger?: StructuredLogger;
  /** Keep ${VAR} placeholders in the configuration file when unset (default: false) */
  allowMissingEnv?: boolean;
  /** Build the configuration provider for a config path (default: file-backed Configuration) */
  createConfiguration?: (configPath: string) => ConfigurationProvider;
  /** Build the role provider for a root (default: file-backed RoleRepository) */
  createRepository?: (root: string) => RoleMetadataProvider;
}

// ============================================================================
// MetadataSource Class
// ============================================================================

/**
 * Expands roles into instance launch options.
 *
 * @example
 * ```ts
 * const source = new MetadataSource('/srv/chef-repo', 'instance-metadata.yaml');
 *
 * const metadata = source.expandRole('web', 'production', { instance_type: 'c5.large' });
 * // metadata.chef_role === 'web'
 * ```
 */
export class MetadataSource {
  public readonly rootPath: string;
  public readonly configFilename: string;
  public readonly config: ConfigurationProvider;
  public readonly repository: RoleMetadataProvider;
  private readonly logger: StructuredLogger;

  /**
   * @param rootPath - Repository root; also the directory of the config file
   * @param configFilename - Configuration file name, relative to rootPath
   * @param options - Logger and provider factories
   * @throws InvalidArgumentError if rootPath or configFilename is missing
   */
  constructor(rootPath: string, configFilename: string, options: MetadataSourceOptions = {}) {
    requireArgument('rootPath', rootPath);
    requireArgument('configFilename', configFilename);

    this.rootPath = rootPath;
    this.configFilename = configFilename;

    const configPath = join(rootPath, configFilename);
    const allowMissingEnv = options.allowMissingEnv ?? false;

    this.config = options.createConfiguration
      ? options.createConfiguration(configPath)
      : new Configuration(configPath, { allowMissingEnv });
    this.repository = options.createRepository
      ? options.createRepository(rootPath)
      : new RoleRepository(rootPath);
    this.logger = (options.logger ?? defaultLogger).child({ component: 'metadata-source' });
  }

  /**
   * Expand a role into its launch options.
   *
   * @param role - Role name
   * @param environment - Environment name
   * @param overrideOptions - Caller options, highest precedence
   * @param expandOptions - Expansion behaviour flags
   * @returns The merged options
   * @throws InvalidArgumentError if role or environment is missing
   * @throws EmptyRoleError if the role declares no metadata and empty roles
   *   are not allowed
   */
  expandRole(
    role: string,
    environment: string,
    overrideOptions: Readonly<InstanceMetadata> = {},
    expandOptions: ExpandOptions = {}
  ): InstanceMetadata {
    requireArgument('role', role);
    requireArgument('environment', environment);

    const roleMetadata = this.roleLayer(role, environment, expandOptions);
    const defaultOptions = this.config.defaultOptions();

    const backingStore =
      firstPresent(
        overrideOptions['backing_store'],
        roleMetadata['backing_store'],
        defaultOptions['backing_store']
      ) ?? DEFAULT_BACKING_STORE;

    const merged = mergeLayers(
      DEFAULT_OPTIONS,
      defaultOptions,
      this.config.optionsForBackingStore(String(backingStore)),
      roleMetadata,
      overrideOptions
    );

    merged['chef_role'] = role;
    merged['chef_environment'] = environment;
    merged['backing_store'] = backingStore;

    const expansion = deriveAvailabilityZone(merged, this.config.availabilityZones());

    this.logger.debug('Expanded role', {
      role,
      environment,
      backingStore,
      roleKeys: Object.keys(roleMetadata).length,
      overrideKeys: Object.keys(overrideOptions).length,
      availabilityZone: expansion['availability_zone'],
    });

    return expansion;
  }

  private roleLayer(
    role: string,
    environment: string,
    expandOptions: ExpandOptions
  ): InstanceMetadata {
    const metadata = this.repository.metadataForRole(role, environment);
    if (metadata !== undefined) {
      return metadata;
    }

    if (!expandOptions.allowEmptyRoles) {
      throw new EmptyRoleError(role, environment);
    }

    this.logger.warn('Role has no instance metadata, expanding defaults only', {
      role,
      environment,
    });
    return {};
  }
}

/**
 * Reject null, undefined and empty values for a required string argument.
 * Callers outside the type system (the CLI, plain JavaScript) can pass them.
 */
function requireArgument(name: string, value: string | null | undefined): void {
  if (value === null || value === undefined || value === '') {
    throw new InvalidArgumentError(`${name} is required`);
  }
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${name} must be a string`);
  }
}
