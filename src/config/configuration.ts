/**
 * Site Configuration for instance-metadata
 *
 * Reads the site configuration file (YAML or JSON), interpolates
 * environment variables, validates it and exposes read-only accessors
 * for default options, availability zones and backing store options.
 */

import { readFileSync } from 'fs';

import { parse as parseYAML } from 'yaml';

import {
  ConfigurationError,
  type ConfigFile,
  type ConfigurationProvider,
  type InstanceMetadata,
} from '../types.js';

import { ConfigValidator } from './validator.js';

/**
 * Options for Configuration.
 */
export interface ConfigurationOptions {
  /** Whether to keep ${VAR} placeholders for unset variables (default: false) */
  allowMissingEnv?: boolean;
  /** Environment used for interpolation (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * File-backed configuration. The file is read on first access and the
 * parsed content is kept for the lifetime of the object.
 */
export class Configuration implements ConfigurationProvider {
  public readonly configPath: string;
  private readonly allowMissingEnv: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private loaded: ConfigFile | undefined;

  /**
   * @param configPath - Path of the configuration file
   * @param options - Loading options
   */
  constructor(configPath: string, options: ConfigurationOptions = {}) {
    this.configPath = configPath;
    this.allowMissingEnv = options.allowMissingEnv ?? false;
    this.env = options.env ?? process.env;
  }

  /**
   * Site-wide default options.
   */
  defaultOptions(): InstanceMetadata {
    return structuredClone(this.load().defaults ?? {});
  }

  /**
   * Region name to ordered availability zone names.
   */
  availabilityZones(): Record<string, string[]> {
    return structuredClone(this.load().availability_zones);
  }

  /**
   * Options for a named backing store, or an empty mapping when the
   * configuration does not know the name.
   */
  optionsForBackingStore(name: string): InstanceMetadata {
    const stores = this.load().backing_store;
    if (!Object.hasOwn(stores, name)) {
      return {};
    }
    return structuredClone(stores[name] ?? {});
  }

  /**
   * Names of the backing stores declared in the file.
   */
  backingStoreNames(): string[] {
    return Object.keys(this.load().backing_store);
  }

  /**
   * Read, interpolate and validate the file once.
   *
   * @throws ConfigurationError if the file cannot be read, parsed or validated
   */
  load(): ConfigFile {
    if (this.loaded) {
      return this.loaded;
    }

    let content: string;
    try {
      content = readFileSync(this.configPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read configuration from ${this.configPath}: ${(error as Error).message}`,
        error as Error
      );
    }

    let parsed: unknown;
    try {
      parsed = parseYAML(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse configuration in ${this.configPath}: ${(error as Error).message}`,
        error as Error
      );
    }

    if (parsed === null || parsed === undefined) {
      throw new ConfigurationError(`Configuration file ${this.configPath} is empty`);
    }

    const interpolated = this.interpolateEnv(parsed);
    this.loaded = new ConfigValidator().validate(interpolated, this.configPath);
    return this.loaded;
  }

  /**
   * Replace ${VAR_NAME} patterns in string values with the corresponding
   * environment value.
   *
   * @throws ConfigurationError if a variable is unset and missing ones are not allowed
   */
  private interpolateEnv(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return obj.replace(/\$\{([^}]+)\}/g, (match, envVar: string) => {
        const value = this.env[envVar];

        if (value === undefined) {
          if (this.allowMissingEnv) {
            return match;
          }
          throw new ConfigurationError(
            `Environment variable ${envVar} referenced in ${this.configPath} is not set`
          );
        }

        return value;
      });
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.interpolateEnv(item));
    }

    if (typeof obj === 'object' && obj !== null) {
      return Object.fromEntries(
        Object.entries(obj).map(([key, value]) => [key, this.interpolateEnv(value)])
      );
    }

    return obj;
  }
}
