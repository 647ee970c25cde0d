/**
 * Role File Validator
 *
 * JSON Schema for role files in the repository. Only the parts the
 * repository reads are constrained; other attributes pass through.
 */

import type { ValidateFunction } from 'ajv';

import { createAjv, formatErrors } from '../config/validator.js';
import { RoleRepositoryError, type RoleFile } from '../types.js';

const RUN_LIST_SCHEMA = {
  type: 'array',
  items: { type: 'string' },
} as const;

const ATTRIBUTES_SCHEMA = {
  type: 'object',
  properties: {
    instance_metadata: {
      type: 'object',
      description: 'Launch options declared by this role',
    },
  },
} as const;

const ROLE_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  properties: {
    name: { type: 'string' },
    description: { type: 'string' },
    run_list: RUN_LIST_SCHEMA,
    env_run_lists: {
      type: 'object',
      additionalProperties: RUN_LIST_SCHEMA,
    },
    default_attributes: ATTRIBUTES_SCHEMA,
    override_attributes: ATTRIBUTES_SCHEMA,
  },
} as const;

/**
 * Validator for parsed role documents.
 */
export class RoleValidator {
  private validateRole: ValidateFunction<RoleFile>;

  constructor() {
    // Unknown keys (chef_type, json_class, ...) are allowed.
    this.validateRole = createAjv().compile<RoleFile>(ROLE_SCHEMA);
  }

  /**
   * Validate a parsed role document.
   *
   * @param document - Parsed file content
   * @param role - Role name, used in error messages
   * @param source - File path, used in error messages
   * @throws RoleRepositoryError if validation fails
   */
  validate(document: unknown, role: string, source: string): RoleFile {
    if (this.validateRole(document)) {
      return document;
    }

    const errors = formatErrors(this.validateRole.errors ?? []);
    throw new RoleRepositoryError(
      `Invalid role file ${source}:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      role
    );
  }
}
