/**
 * CLI Commands
 *
 * Each handler prints its output and returns a process exit code.
 */

import { resolve } from 'node:path';
import { ZodError } from 'zod';
import {
  detectStandard,
  isKnownStandard,
  isStandardVersion,
  toStdFlag,
  toStdName,
} from '../detect/index.js';
import type { DetectorOptions } from '../detect/index.js';
import { ClangdConfigError, writeClangdConfig } from '../clangd/index.js';
import { resolveBufferSettings, resolveServerForFile } from '../languages/index.js';
import { getDefaultStandard, isVerbose, parseBooleanEnv } from '../config/env.js';
import {
  loadConfig,
  saveConfig,
  deleteConfigValue,
  getConfigLocation,
  type ConfigKey,
} from '../config/store.js';
import { parseArgs, type CliOptions } from './options.js';

/**
 * Print usage information
 */
export function printUsage(stream: 'stdout' | 'stderr' = 'stdout'): void {
  const text = `
Usage: stdscout <command> [options]

Commands:
  detect [dir]        Print the C++ standard detected for a project
  flag [dir]          Print the compiler flag for the detected standard
  clangd [dir]        Write a .clangd configuration for the project
  profile <file>      Print editor settings resolved for a file (JSON)
  root <file>         Print the language server project root for a file
  config              Manage configuration (default standard, verbosity)

Options:
  --json              Print detection results as JSON (detect)
  --verbose           Log each detection step
  --fallback=<N>      Standard used when no build evidence is found
  --stop-at=<dir>     Do not search above this directory
  --force             Overwrite an existing .clangd (clangd)

Detection order:
  1. compile_commands.json  first entry's -std=c++N flag
  2. CMakeLists.txt         CMAKE_CXX_STANDARD N, then c++_std_N / cxx_std_N
  3. Fallback               config / STDSCOUT_DEFAULT_STD / built-in default

Examples:
  stdscout detect
  stdscout detect ./engine --json
  stdscout clangd . --force
  stdscout config set default-std 17
`;
  if (stream === 'stderr') {
    console.error(text);
  } else {
    console.log(text);
  }
}

/**
 * Print config command usage
 */
export function printConfigUsage(stream: 'stdout' | 'stderr' = 'stdout'): void {
  const text = `
Usage: stdscout config <subcommand> [options]

Subcommands:
  set <key> <value>    Set a configuration value
  get <key>            Get a configuration value
  list                 List all configuration
  delete <key>         Delete a configuration value
  path                 Show config file location

Keys:
  default-std   Standard used when a project has no build evidence (e.g. 17)
  verbose       Log detection steps (true/false)

Note:
  Config is stored in ~/.stdscout/config.json
  Environment variables take precedence over config file values.
`;
  if (stream === 'stderr') {
    console.error(text);
  } else {
    console.log(text);
  }
}

function detectorOptionsFrom(options: CliOptions): DetectorOptions {
  const config = loadConfig();

  let fallback = options.fallback;
  if (fallback !== undefined && !isStandardVersion(fallback)) {
    console.error(`Warning: Ignoring invalid --fallback "${fallback}"`);
    fallback = undefined;
  }

  return {
    fallback: fallback ?? getDefaultStandard(config),
    stopAt: options.stopAt,
    verbose: options.verbose || isVerbose(config),
  };
}

/**
 * Handle detect command
 */
export function runDetectCommand(args: string[]): number {
  const { positionals, options } = parseArgs(args);
  const dir = resolve(positionals[0] ?? process.cwd());
  const result = detectStandard(dir, detectorOptionsFrom(options));

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return 0;
  }

  console.log(toStdName(result.standard));
  if (!isKnownStandard(result.standard)) {
    console.error(`Warning: c++${result.standard} is not a recognised C++ standard`);
  }
  return 0;
}

/**
 * Handle flag command
 */
export function runFlagCommand(args: string[]): number {
  const { positionals, options } = parseArgs(args);
  const dir = resolve(positionals[0] ?? process.cwd());
  const result = detectStandard(dir, detectorOptionsFrom(options));
  console.log(toStdFlag(result.standard));
  return 0;
}

/**
 * Handle clangd command
 */
export function runClangdCommand(args: string[]): number {
  const { positionals, options } = parseArgs(args);
  const dir = resolve(positionals[0] ?? process.cwd());

  try {
    const result = writeClangdConfig(dir, { ...detectorOptionsFrom(options), force: options.force });
    if (result.written) {
      console.log(`Created .clangd configuration with ${toStdName(result.standard)}`);
    } else {
      console.log(`${result.path} already exists (use --force to overwrite)`);
    }
    return 0;
  } catch (error) {
    if (error instanceof ClangdConfigError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

/**
 * Handle profile command
 */
export function runProfileCommand(args: string[]): number {
  const { positionals, options } = parseArgs(args);
  const file = positionals[0];

  if (!file) {
    console.error('Error: profile requires <file>\n');
    printUsage('stderr');
    return 1;
  }

  const settings = resolveBufferSettings(resolve(file), detectorOptionsFrom(options));
  console.log(JSON.stringify(settings, null, 2));
  return 0;
}

/**
 * Handle root command
 */
export function runRootCommand(args: string[]): number {
  const { positionals, options } = parseArgs(args);
  const file = positionals[0];

  if (!file) {
    console.error('Error: root requires <file>\n');
    printUsage('stderr');
    return 1;
  }

  const resolved = resolveServerForFile(resolve(file), { stopAt: options.stopAt });
  if (!resolved) {
    console.error(`Error: No language server handles ${file}`);
    return 1;
  }
  if (!resolved.root) {
    console.error(`Error: No ${resolved.server.name} project root found for ${file}`);
    return 1;
  }

  console.log(resolved.root);
  return 0;
}

// Map CLI key names to config keys
const CONFIG_KEY_MAP: Record<string, ConfigKey> = {
  'default-std': 'defaultStandard',
  defaultstandard: 'defaultStandard',
  std: 'defaultStandard',
  verbose: 'verbose',
};

function resolveConfigKey(key: string | undefined, action: string): ConfigKey | null {
  if (!key) {
    console.error(`Error: config ${action} requires <key>\n`);
    printConfigUsage('stderr');
    return null;
  }

  const normalized = key.toLowerCase();
  const configKey = Object.hasOwn(CONFIG_KEY_MAP, normalized) ? CONFIG_KEY_MAP[normalized] : undefined;
  if (!configKey) {
    console.error(`Error: Unknown config key "${key}"`);
    console.error('Valid keys: default-std, verbose');
    return null;
  }
  return configKey;
}

/**
 * Handle config command
 */
export function runConfigCommand(args: string[]): number {
  const subcommand = args[0];

  if (!subcommand || subcommand === 'help' || subcommand === '--help') {
    printConfigUsage();
    return 0;
  }

  switch (subcommand) {
    case 'set': {
      const configKey = resolveConfigKey(args[1], 'set');
      if (!configKey) return 1;

      const value = args[2];
      if (!value) {
        console.error('Error: config set requires <key> and <value>\n');
        printConfigUsage('stderr');
        return 1;
      }

      try {
        if (configKey === 'verbose') {
          const flag = parseBooleanEnv(value);
          if (flag === undefined) {
            console.error(`Error: verbose must be true or false, got "${value}"`);
            return 1;
          }
          saveConfig({ verbose: flag });
        } else {
          saveConfig({ defaultStandard: value });
        }
      } catch (error) {
        const message =
          error instanceof ZodError
            ? (error.issues[0]?.message ?? error.message)
            : error instanceof Error
              ? error.message
              : String(error);
        console.error(`Error: ${message}`);
        return 1;
      }

      console.log(`Set ${args[1]} = ${value}`);
      return 0;
    }

    case 'get': {
      const configKey = resolveConfigKey(args[1], 'get');
      if (!configKey) return 1;

      const value = loadConfig()[configKey];
      console.log(value === undefined ? '(not set)' : String(value));
      return 0;
    }

    case 'list': {
      const config = loadConfig();

      console.log('Current configuration:');
      console.log('=================================');

      if (Object.keys(config).length === 0) {
        console.log('(no configuration set)');
      } else {
        if (config.defaultStandard !== undefined) {
          console.log(`default-std: ${config.defaultStandard}`);
        }
        if (config.verbose !== undefined) {
          console.log(`verbose:     ${config.verbose}`);
        }
      }

      console.log('=================================');
      console.log(`Config file: ${getConfigLocation()}`);
      return 0;
    }

    case 'delete': {
      const configKey = resolveConfigKey(args[1], 'delete');
      if (!configKey) return 1;

      deleteConfigValue(configKey);
      console.log(`Deleted ${args[1]}`);
      return 0;
    }

    case 'path': {
      console.log(getConfigLocation());
      return 0;
    }

    default:
      console.error(`Error: Unknown config subcommand "${subcommand}"\n`);
      printConfigUsage('stderr');
      return 1;
  }
}

/**
 * Dispatch a command line (without the node and script arguments)
 */
export function runCli(args: string[]): number {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  const [command, ...rest] = args;

  switch (command) {
    case 'detect':
      return runDetectCommand(rest);
    case 'flag':
      return runFlagCommand(rest);
    case 'clangd':
      return runClangdCommand(rest);
    case 'profile':
      return runProfileCommand(rest);
    case 'root':
      return runRootCommand(rest);
    case 'config':
      return runConfigCommand(rest);
    default:
      console.error(`Error: Unknown command "${command}"\n`);
      printUsage('stderr');
      return 1;
  }
}
