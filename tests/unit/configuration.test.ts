/**
 * Unit tests for Configuration
 *
 * Tests loading the site configuration file:
 * - YAML and JSON documents
 * - Accessors and unknown backing stores
 * - Schema violations and unreadable files
 * - Environment variable interpolation
 */

import { fileURLToPath } from 'url';

import { describe, it, expect } from 'vitest';

import { Configuration } from '../../src/config/configuration.js';
import { ConfigurationError } from '../../src/types.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/config/${name}`, import.meta.url));

describe('Configuration', () => {
  describe('with a valid YAML file', () => {
    const configuration = new Configuration(fixture('valid.yaml'));

    it('should expose the config path', () => {
      expect(configuration.configPath).toBe(fixture('valid.yaml'));
    });

    it('should return the default options', () => {
      expect(configuration.defaultOptions()).toEqual({
        instance_type: 'c1.xlarge',
        git_branch: 'from_config',
      });
    });

    it('should return the availability zones in order', () => {
      expect(configuration.availabilityZones()).toEqual({
        'us-east-1': ['us-east-1a', 'us-east-1c'],
        'us-west-2': ['us-west-2b'],
      });
    });

    it('should return the options of a backing store', () => {
      expect(configuration.optionsForBackingStore('ebs')).toEqual({
        image_id: 'ami-ebs0001',
        ebs_optimized: true,
      });
    });

    it('should return an empty mapping for an unknown backing store', () => {
      expect(configuration.optionsForBackingStore('nfs')).toEqual({});
      expect(configuration.optionsForBackingStore('toString')).toEqual({});
    });

    it('should list the backing store names', () => {
      expect(configuration.backingStoreNames()).toEqual(['ebs', 'instance_store']);
    });

    it('should hand out copies of the loaded data', () => {
      const defaults = configuration.defaultOptions();
      defaults['instance_type'] = 'changed';
      configuration.availabilityZones()['us-east-1']?.push('us-east-1z');

      expect(configuration.defaultOptions()['instance_type']).toBe('c1.xlarge');
      expect(configuration.availabilityZones()['us-east-1']).toEqual(['us-east-1a', 'us-east-1c']);
    });

    it('should return the same document on every load', () => {
      expect(configuration.load()).toBe(configuration.load());
    });
  });

  describe('with a valid JSON file', () => {
    const configuration = new Configuration(fixture('valid.json'));

    it('should default to no default options', () => {
      expect(configuration.defaultOptions()).toEqual({});
    });

    it('should read the availability zones', () => {
      expect(configuration.availabilityZones()).toEqual({ 'eu-west-1': ['eu-west-1a'] });
    });

    it('should read the backing stores', () => {
      expect(configuration.optionsForBackingStore('ebs')).toEqual({ image_id: 'ami-json0001' });
    });
  });

  describe('with an invalid file', () => {
    it('should not read the file on construction', () => {
      expect(() => new Configuration(fixture('does-not-exist.yaml'))).not.toThrow();
    });

    it('should fail when the file does not exist', () => {
      const configuration = new Configuration(fixture('does-not-exist.yaml'));

      expect(() => configuration.defaultOptions()).toThrow(ConfigurationError);
      expect(() => configuration.defaultOptions()).toThrow(/Failed to read configuration from/);
    });

    it('should fail when a required key is missing', () => {
      const configuration = new Configuration(fixture('missing-zones.yaml'));

      expect(() => configuration.availabilityZones()).toThrow(ConfigurationError);
      expect(() => configuration.availabilityZones()).toThrow(
        /root: missing required property "availability_zones"/
      );
    });

    it('should fail on unknown top-level keys', () => {
      const configuration = new Configuration(fixture('unknown-key.yaml'));

      expect(() => configuration.load()).toThrow(/root: unexpected property "regions"/);
    });

    it('should fail when a region has no zones', () => {
      const configuration = new Configuration(fixture('empty-zones.yaml'));

      expect(() => configuration.load()).toThrow(
        /\/availability_zones\/us-east-1: array must have at least 1 item\(s\)/
      );
    });

    it('should fail when the file cannot be parsed', () => {
      const configuration = new Configuration(fixture('malformed.yaml'));

      expect(() => configuration.load()).toThrow(/Failed to parse configuration in/);
    });

    it('should fail when the file is empty', () => {
      const configuration = new Configuration(fixture('empty.yaml'));

      expect(() => configuration.load()).toThrow(/is empty/);
    });
  });

  describe('environment interpolation', () => {
    it('should replace ${VAR} with the environment value', () => {
      const configuration = new Configuration(fixture('env.yaml'), {
        env: { TEST_GIT_KEY: 'test-secret' },
      });

      expect(configuration.defaultOptions()).toEqual({ git_key: 'test-secret' });
    });

    it('should fail when a variable is not set', () => {
      const configuration = new Configuration(fixture('env.yaml'), { env: {} });

      expect(() => configuration.load()).toThrow(ConfigurationError);
      expect(() => configuration.load()).toThrow(/Environment variable TEST_GIT_KEY/);
    });

    it('should keep the placeholder when missing variables are allowed', () => {
      const configuration = new Configuration(fixture('env.yaml'), {
        env: {},
        allowMissingEnv: true,
      });

      expect(configuration.defaultOptions()).toEqual({ git_key: '${TEST_GIT_KEY}' });
    });
  });
});
