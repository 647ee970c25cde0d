/**
 * Configuration Validator for instance-metadata
 *
 * Validates the site configuration file against a JSON Schema using AJV
 * and turns AJV errors into readable messages. The same formatting is
 * reused for role files.
 */

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import { ConfigurationError, type ConfigFile } from '../types.js';

const Ajv = AjvModule.default;

/**
 * JSON Schema for the site configuration file.
 */
const CONFIG_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['availability_zones', 'backing_store'],
  additionalProperties: false,
  properties: {
    defaults: {
      type: 'object',
      description: 'Site-wide default options',
    },
    availability_zones: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        minItems: 1,
        items: { type: 'string', minLength: 1 },
      },
      description: 'Region name to ordered availability zone names',
    },
    backing_store: {
      type: 'object',
      additionalProperties: { type: 'object' },
      description: 'Backing store name to option bundle',
    },
  },
} as const;

/**
 * Validation result returned by the validator.
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** Array of error messages (empty if valid) */
  errors: string[];
}

/**
 * Create an AJV instance with the options used for every file schema.
 */
export function createAjv(): InstanceType<typeof Ajv> {
  return new Ajv({
    allErrors: true,
    verbose: true,
    strict: true,
  });
}

/**
 * Configuration file validator.
 */
export class ConfigValidator {
  private validateFile: ValidateFunction<ConfigFile>;

  constructor() {
    this.validateFile = createAjv().compile<ConfigFile>(CONFIG_SCHEMA);
  }

  /**
   * Validate a parsed configuration document.
   *
   * @param config - Parsed file content
   * @param source - File path, used in error messages
   * @returns The document typed as ConfigFile
   * @throws ConfigurationError if validation fails
   */
  validate(config: unknown, source: string): ConfigFile {
    if (this.validateFile(config)) {
      return config;
    }

    const errors = formatErrors(this.validateFile.errors ?? []);
    throw new ConfigurationError(
      `Invalid configuration in ${source}:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }

  /**
   * Validate without throwing.
   *
   * @param config - Parsed file content
   */
  validateConfig(config: unknown): ValidationResult {
    if (this.validateFile(config)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: formatErrors(this.validateFile.errors ?? []) };
  }
}

/**
 * Format AJV errors into human-readable messages.
 */
export function formatErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || 'root';
    return `${path}: ${getErrorMessage(error)}`;
  });
}

function getErrorMessage(error: ErrorObject): string {
  const params: Record<string, unknown> = error.params;

  switch (error.keyword) {
    case 'required':
      return `missing required property "${String(params['missingProperty'])}"`;

    case 'additionalProperties':
      return `unexpected property "${String(params['additionalProperty'])}"`;

    case 'type':
      return `expected ${String(params['type'])}, got ${describeType(error.data)}`;

    case 'minItems':
      return `array must have at least ${String(params['limit'])} item(s)`;

    case 'minLength':
      return `string is too short (minimum ${String(params['limit'])} characters)`;

    case 'pattern':
      return `string does not match required pattern "${String(params['pattern'])}"`;

    default:
      return error.message ?? 'validation failed';
  }
}

function describeType(value: unknown): string {
  if (value === null) {return 'null';}
  if (Array.isArray(value)) {return 'array';}
  return typeof value;
}

/**
 * Convenience function to validate a configuration document.
 *
 * @param config - Parsed file content
 * @param source - File path, used in error messages
 */
export function validateConfig(config: unknown, source = 'configuration'): ConfigFile {
  return new ConfigValidator().validate(config, source);
}

/**
 * Export the schema for external use (e.g., editor validation).
 */
export const configSchema = CONFIG_SCHEMA;
