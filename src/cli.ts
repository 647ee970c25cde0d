/**
 * instance-metadata CLI
 *
 * Command-line interface for expanding roles into launch options and
 * checking the site configuration file.
 */

import { join } from 'path';

import { parse as parseYAML, stringify as stringifyYAML } from 'yaml';

import { Configuration } from './config/configuration.js';
import {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_ENVIRONMENT,
} from './config/defaults.js';
import { MetadataSource } from './expansion/metadata-source.js';
import { logger } from './observability/logger.js';
import { InvalidArgumentError, type InstanceMetadata, type MetadataValue } from './types.js';

export const VERSION = '0.1.0';

// ============================================================================
// Types
// ============================================================================

/**
 * Supported CLI commands.
 */
export type Command = 'expand' | 'validate' | 'version' | 'help';

/**
 * Output formats for the expand command.
 */
export type OutputFormat = 'json' | 'yaml';

/**
 * Parsed CLI options.
 */
export interface CLIOptions {
  /** The command to execute */
  command: Command;
  /** Role to expand (for 'expand') */
  role?: string;
  /** Repository root (--root, -r) */
  root: string;
  /** Configuration file name relative to root (--config, -c) */
  configFilename: string;
  /** Environment (--environment, -e) */
  environment: string;
  /** Override options (--set, -s key=value) */
  overrides: InstanceMetadata;
  /** Expand roles without metadata (--allow-empty-role) */
  allowEmptyRole: boolean;
  /** Output format (--format, -f) */
  format: OutputFormat;
  /** Enable verbose logging (--verbose, -v) */
  verbose: boolean;
  /** Show help (--help, -h) */
  help: boolean;
}

/**
 * Where command output goes. Defaults to the console.
 */
export interface CLIOutput {
  log(message: string): void;
  error(message: string): void;
}

// ============================================================================
// Constants
// ============================================================================

const HELP_TEXT = `
instance-metadata - resolve launch options for configuration-management roles

Usage:
  instance-metadata <command> [options]

Commands:
  expand <role>  Print the launch options of a role
  validate       Validate the configuration file
  version        Show version
  help           Show this help message

Options:
  --root, -r <dir>         Repository root (default: current directory)
  --config, -c <file>      Configuration file under the root (default: ${DEFAULT_CONFIG_FILENAME})
  --environment, -e <env>  Environment (default: ${DEFAULT_ENVIRONMENT})
  --set, -s <key=value>    Override an option; repeatable
  --allow-empty-role       Expand roles that declare no metadata
  --format, -f <json|yaml> Output format (default: json)
  --verbose, -v            Enable debug logging
  --help, -h               Show help

Examples:
  instance-metadata expand web
  instance-metadata expand web -e staging -s instance_type=c5.large
  instance-metadata expand worker -s backing_store=ebs -s availability_zone=null
  instance-metadata validate -r /srv/chef-repo
`.trim();

const COMMANDS: readonly Command[] = ['expand', 'validate', 'version', 'help'];
const FORMATS: readonly OutputFormat[] = ['json', 'yaml'];

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 * Parse command line arguments into CLIOptions.
 *
 * @param argv - Array of command line arguments (process.argv.slice(2))
 * @param cwd - Default repository root
 * @throws InvalidArgumentError on unknown commands, flags or missing values
 */
export function parseArgs(argv: string[], cwd: string = process.cwd()): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    root: cwd,
    configFilename: DEFAULT_CONFIG_FILENAME,
    environment: DEFAULT_ENVIRONMENT,
    overrides: {},
    allowEmptyRole: false,
    format: 'json',
    verbose: false,
    help: false,
  };

  let commandSeen = false;
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      i++;
      continue;
    }

    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
      i++;
      continue;
    }

    if (arg === '--allow-empty-role') {
      options.allowEmptyRole = true;
      i++;
      continue;
    }

    if (arg === '--root' || arg === '-r') {
      options.root = requireValue(argv, i, '--root', 'a directory');
      i += 2;
      continue;
    }

    if (arg === '--config' || arg === '-c') {
      options.configFilename = requireValue(argv, i, '--config', 'a file name');
      i += 2;
      continue;
    }

    if (arg === '--environment' || arg === '-e') {
      options.environment = requireValue(argv, i, '--environment', 'a name');
      i += 2;
      continue;
    }

    if (arg === '--format' || arg === '-f') {
      const format = requireValue(argv, i, '--format', 'json or yaml');
      if (!isOutputFormat(format)) {
        throw new InvalidArgumentError(`Unknown format: ${format} (expected json or yaml)`);
      }
      options.format = format;
      i += 2;
      continue;
    }

    if (arg === '--set' || arg === '-s') {
      const [key, value] = parseOverride(requireValue(argv, i, '--set', 'key=value'));
      options.overrides[key] = value;
      i += 2;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new InvalidArgumentError(
        `Unknown option: ${arg}\nRun "instance-metadata --help" for usage information.`
      );
    }

    if (!commandSeen) {
      const command = arg.toLowerCase();
      if (!isValidCommand(command)) {
        throw new InvalidArgumentError(
          `Unknown command: ${arg}\nRun "instance-metadata --help" for usage information.`
        );
      }
      options.command = command;
      commandSeen = true;
    } else if (options.command === 'expand' && options.role === undefined) {
      options.role = arg;
    } else {
      throw new InvalidArgumentError(`Unexpected argument: ${arg}`);
    }

    i++;
  }

  if (options.help) {
    options.command = 'help';
  } else if (options.command === 'expand' && options.role === undefined) {
    throw new InvalidArgumentError('expand requires a role name\nUsage: instance-metadata expand <role>');
  }

  return options;
}

function requireValue(argv: string[], index: number, flag: string, what: string): string {
  const next = argv[index + 1];
  if (next === undefined || next.startsWith('-')) {
    throw new InvalidArgumentError(`${flag} requires ${what}`);
  }
  return next;
}

/**
 * Split `key=value`. The value is read as a YAML scalar, so `null`,
 * numbers and booleans keep their type; anything else stays a string.
 */
export function parseOverride(assignment: string): [string, MetadataValue] {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`--set expects key=value, got "${assignment}"`);
  }

  const key = assignment.slice(0, separator);
  const raw = assignment.slice(separator + 1);
  if (raw === '') {
    return [key, ''];
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(raw);
  } catch {
    return [key, raw];
  }

  if (
    parsed === null ||
    typeof parsed === 'string' ||
    typeof parsed === 'number' ||
    typeof parsed === 'boolean'
  ) {
    return [key, parsed];
  }
  return [key, raw];
}

function isValidCommand(cmd: string): cmd is Command {
  return COMMANDS.some((command) => command === cmd);
}

function isOutputFormat(format: string): format is OutputFormat {
  return FORMATS.some((candidate) => candidate === format);
}

// ============================================================================
// Command Implementations
// ============================================================================

/**
 * Expand a role and print the result.
 */
function cmdExpand(options: CLIOptions, out: CLIOutput): void {
  const source = new MetadataSource(options.root, options.configFilename);
  const expansion = source.expandRole(
    options.role ?? '',
    options.environment,
    options.overrides,
    { allowEmptyRoles: options.allowEmptyRole }
  );

  if (options.format === 'yaml') {
    out.log(stringifyYAML(expansion, { indent: 2, lineWidth: 100 }).trimEnd());
  } else {
    out.log(JSON.stringify(expansion, null, 2));
  }
}

/**
 * Load and validate the configuration file, then print a summary.
 */
function cmdValidate(options: CLIOptions, out: CLIOutput): void {
  const configuration = new Configuration(join(options.root, options.configFilename), {
    allowMissingEnv: true,
  });
  configuration.load();

  const regions = Object.entries(configuration.availabilityZones());
  const stores = configuration.backingStoreNames();
  const defaults = Object.keys(configuration.defaultOptions());

  out.log(`Configuration file: ${configuration.configPath}`);
  out.log('');
  out.log('Configuration summary:');
  out.log(`  Default options: ${defaults.length}`);
  out.log(`  Backing stores:  ${stores.length > 0 ? stores.join(', ') : '(none)'}`);
  out.log(`  Regions:         ${regions.length}`);
  for (const [region, zones] of regions) {
    out.log(`    ${region}: ${zones.join(', ')}`);
  }
  out.log('');
  out.log('Configuration is valid.');
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Run the CLI with the given options.
 *
 * @param options - Parsed CLI options
 * @param out - Output sink (default: console)
 */
export function runCLI(options: CLIOptions, out: CLIOutput = console): void {
  if (options.verbose) {
    logger.level = 'debug';
  }

  switch (options.command) {
    case 'expand':
      cmdExpand(options, out);
      break;
    case 'validate':
      cmdValidate(options, out);
      break;
    case 'version':
      out.log(`instance-metadata ${VERSION}`);
      break;
    case 'help':
      out.log(HELP_TEXT);
      break;
    default: {
      const _exhaustive: never = options.command;
      throw new InvalidArgumentError(`Unknown command: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Main entry point for the CLI.
 * Parses arguments, runs the command and sets the exit code.
 *
 * @returns The process exit code
 */
export function main(argv: string[] = process.argv.slice(2), out: CLIOutput = console): number {
  try {
    runCLI(parseArgs(argv), out);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    out.error(`Error: ${message}`);
    if (error instanceof Error) {
      logger.debug('Command failed', { error: error.name, argv });
    }
    return 1;
  }
}
