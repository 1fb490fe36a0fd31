/**
 * Environment configuration for stdscout
 *
 * Priority order (highest to lowest):
 * 1. Environment variables (STDSCOUT_DEFAULT_STD, STDSCOUT_VERBOSE)
 * 2. Config file (~/.stdscout/config.json)
 * 3. Built-in defaults
 */

import { DEFAULT_STANDARD, isStandardVersion } from '../detect/index.js';
import type { StandardVersion } from '../detect/index.js';
import { loadConfig, type StdscoutConfig } from './store.js';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['0', 'false', 'no', 'off']);

/**
 * Parse a boolean environment flag, undefined when unset or unrecognised
 */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return undefined;
}

/**
 * Get the fallback standard
 * Priority: env var > config file > built-in default
 */
export function getDefaultStandard(config: StdscoutConfig = loadConfig()): StandardVersion {
  const fromEnv = process.env.STDSCOUT_DEFAULT_STD?.trim();
  if (fromEnv) {
    if (isStandardVersion(fromEnv)) {
      return fromEnv;
    }
    console.error(`Warning: Ignoring invalid STDSCOUT_DEFAULT_STD "${fromEnv}"`);
  }

  return config.defaultStandard ?? DEFAULT_STANDARD;
}

/**
 * Whether verbose logging is enabled
 * Priority: env var > config file > off
 */
export function isVerbose(config: StdscoutConfig = loadConfig()): boolean {
  return parseBooleanEnv(process.env.STDSCOUT_VERBOSE) ?? config.verbose ?? false;
}
