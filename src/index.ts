/**
 * instance-metadata - layered launch options for configuration-management roles
 * Public entry point
 */

export { MetadataSource, type MetadataSourceOptions } from './expansion/metadata-source.js';
export { deriveAvailabilityZone } from './expansion/availability-zone.js';
export { Configuration, type ConfigurationOptions } from './config/configuration.js';
export { RoleRepository } from './repository/role-repository.js';
export { mergeLayers, deepMergeLayers, firstPresent } from './config/merger.js';
export { ConfigValidator, validateConfig, configSchema } from './config/validator.js';
export {
  DEFAULT_OPTIONS,
  DEFAULT_BACKING_STORE,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_ENVIRONMENT,
} from './config/defaults.js';
export { Logger, logger, type LogContext, type LogLevel, type StructuredLogger } from './observability/logger.js';
export {
  MetadataError,
  InvalidArgumentError,
  EmptyRoleError,
  ConfigurationError,
  RoleRepositoryError,
  type MetadataValue,
  type InstanceMetadata,
  type ExpandOptions,
  type ConfigurationProvider,
  type RoleMetadataProvider,
  type ConfigFile,
  type RoleFile,
} from './types.js';
