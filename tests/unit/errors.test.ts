/**
 * Unit tests for the error classes
 */

import { describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  EmptyRoleError,
  InvalidArgumentError,
  MetadataError,
  RoleRepositoryError,
} from '../../src/types.js';

describe('errors', () => {
  it('should name the role and environment of an empty role', () => {
    const error = new EmptyRoleError('web', 'staging');

    expect(error).toBeInstanceOf(MetadataError);
    expect(error.name).toBe('EmptyRoleError');
    expect(error.code).toBe('EMPTY_ROLE');
    expect(error.role).toBe('web');
    expect(error.environment).toBe('staging');
    expect(error.message).toBe('Role "web" has no instance metadata for environment "staging"');
  });

  it('should carry a code for each kind of failure', () => {
    expect(new InvalidArgumentError('role is required').code).toBe('INVALID_ARGUMENT');
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR');
    expect(new RoleRepositoryError('bad', 'web').code).toBe('ROLE_REPOSITORY_ERROR');
  });

  it('should keep the cause', () => {
    const cause = new Error('ENOENT');
    const error = new ConfigurationError('Failed to read configuration', cause);

    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
  });

  it('should name the role of a repository failure', () => {
    expect(new RoleRepositoryError('bad', 'web').role).toBe('web');
  });
});
