/**
 * Configuration Store
 *
 * Manages persistent configuration stored in user's home directory.
 * Config file: ~/.stdscout/config.json (directory overridable with STDSCOUT_HOME)
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

/**
 * Configuration structure
 */
export const StdscoutConfigSchema = z.object({
  /** Standard used when a project has no build evidence */
  defaultStandard: z
    .string()
    .regex(/^\d+$/, 'Standard must be a digit token such as 17 or 20')
    .optional(),
  /** Log detection steps */
  verbose: z.boolean().optional(),
});

export type StdscoutConfig = z.infer<typeof StdscoutConfigSchema>;

export type ConfigKey = keyof StdscoutConfig;

/**
 * Get config directory path
 */
function getConfigDir(): string {
  return process.env.STDSCOUT_HOME || join(homedir(), '.stdscout');
}

/**
 * Get config file path
 */
function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Ensure config directory exists
 */
function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function writeConfigFile(config: StdscoutConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Load configuration from file
 */
export function loadConfig(): StdscoutConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed = StdscoutConfigSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      console.error(`Warning: Invalid config file at ${configPath}: ${parsed.error.issues[0]?.message}`);
      return {};
    }
    return parsed.data;
  } catch {
    console.error(`Warning: Failed to parse config file at ${configPath}`);
    return {};
  }
}

/**
 * Save configuration to file
 *
 * @throws ZodError if the merged configuration is invalid
 */
export function saveConfig(config: StdscoutConfig): void {
  // Merge with existing config
  const merged = StdscoutConfigSchema.parse({ ...loadConfig(), ...config });

  // Remove undefined values
  const cleaned = Object.fromEntries(Object.entries(merged).filter(([, v]) => v !== undefined));

  writeConfigFile(cleaned);
}

/**
 * Get a specific config value
 */
export function getConfigValue<K extends ConfigKey>(key: K): StdscoutConfig[K] {
  const config = loadConfig();
  return config[key];
}

/**
 * Set a specific config value
 */
export function setConfigValue<K extends ConfigKey>(key: K, value: StdscoutConfig[K]): void {
  const update: StdscoutConfig = {};
  update[key] = value;
  saveConfig(update);
}

/**
 * Delete a specific config value
 */
export function deleteConfigValue(key: ConfigKey): void {
  const config = loadConfig();
  delete config[key];
  writeConfigFile(config);
}

/**
 * Clear all configuration
 */
export function clearConfig(): void {
  writeConfigFile({});
}

/**
 * Get config file location (for display purposes)
 */
export function getConfigLocation(): string {
  return getConfigPath();
}
