/**
 * instance-metadata Type Definitions
 *
 * Core types shared by the expansion engine, the configuration file
 * reader and the role repository reader.
 */

// ============================================================================
// Metadata Types
// ============================================================================

/**
 * A single option value. Configuration and role files are YAML/JSON, so any
 * JSON value can appear; most launch options are strings, numbers or null.
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

/**
 * Mapping of option name to value. Used for every layer of an expansion
 * and for the expansion result itself.
 */
export type InstanceMetadata = Record<string, MetadataValue>;

/**
 * Behaviour flags for a single expansion.
 */
export interface ExpandOptions {
  /**
   * Treat a role without declared metadata as an empty layer instead of
   * failing with EmptyRoleError (default: false).
   */
  allowEmptyRoles?: boolean;
}

// ============================================================================
// Provider Interfaces
// ============================================================================

/**
 * Read-only accessor over a loaded site configuration.
 * All methods must return consistent values for the lifetime of the object.
 */
export interface ConfigurationProvider {
  /** Location the configuration was loaded from */
  readonly configPath: string;
  /** Site-wide default options */
  defaultOptions(): InstanceMetadata;
  /** Region name to ordered availability zone names */
  availabilityZones(): Record<string, string[]>;
  /** Options specific to a backing store; empty for unknown names */
  optionsForBackingStore(name: string): InstanceMetadata;
}

/**
 * Read-only accessor over a role metadata repository.
 */
export interface RoleMetadataProvider {
  /** Repository root directory */
  readonly root: string;
  /**
   * Metadata declared for a role in an environment.
   * Returns undefined when nothing is declared, which is distinct from a
   * declared but empty mapping.
   */
  metadataForRole(role: string, environment: string): InstanceMetadata | undefined;
}

// ============================================================================
// File Formats
// ============================================================================

/**
 * Shape of the site configuration file.
 */
export interface ConfigFile {
  /** Site-wide default options */
  defaults?: InstanceMetadata;
  /** Region name to ordered availability zone names */
  availability_zones: Record<string, string[]>;
  /** Backing store name to option bundle */
  backing_store: Record<string, InstanceMetadata>;
}

/**
 * Shape of a role file in the repository (Chef role JSON layout).
 */
export interface RoleFile {
  name?: string;
  description?: string;
  run_list?: string[];
  env_run_lists?: Record<string, string[]>;
  default_attributes?: RoleAttributes;
  override_attributes?: RoleAttributes;
}

/**
 * Role attributes. Only `instance_metadata` is interpreted.
 */
export interface RoleAttributes {
  instance_metadata?: InstanceMetadata;
  [key: string]: MetadataValue | undefined;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Base error class for instance-metadata errors.
 */
export class MetadataError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, cause?: Error) {
    super(message, { cause });
    this.name = 'MetadataError';
    this.code = code;
  }
}

/**
 * Error thrown when a required argument is missing or malformed.
 */
export class InvalidArgumentError extends MetadataError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Error thrown when a role has no declared metadata for an environment
 * and empty roles were not allowed.
 */
export class EmptyRoleError extends MetadataError {
  constructor(
    public readonly role: string,
    public readonly environment: string
  ) {
    super(
      `Role "${role}" has no instance metadata for environment "${environment}"`,
      'EMPTY_ROLE'
    );
    this.name = 'EmptyRoleError';
  }
}

/**
 * Error thrown when the configuration file is missing or invalid.
 */
export class ConfigurationError extends MetadataError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a role file is missing, unreadable or invalid.
 */
export class RoleRepositoryError extends MetadataError {
  constructor(
    message: string,
    public readonly role: string,
    cause?: Error
  ) {
    super(message, 'ROLE_REPOSITORY_ERROR', cause);
    this.name = 'RoleRepositoryError';
  }
}
