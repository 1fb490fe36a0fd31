import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, writeFile, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  loadConfig,
  saveConfig,
  getConfigValue,
  setConfigValue,
  deleteConfigValue,
  clearConfig,
  getConfigLocation,
} from '../../src/config/store.js';
import { getDefaultStandard, isVerbose, parseBooleanEnv } from '../../src/config/env.js';

describe('Configuration', () => {
  let homeDir: string;
  const savedEnv = { ...process.env };

  beforeEach(async () => {
    homeDir = await mkdtemp(join(tmpdir(), 'stdscout-config-'));
    process.env.STDSCOUT_HOME = join(homeDir, '.stdscout');
    delete process.env.STDSCOUT_DEFAULT_STD;
    delete process.env.STDSCOUT_VERBOSE;
  });

  afterEach(async () => {
    process.env = { ...savedEnv };
    vi.restoreAllMocks();
    await rm(homeDir, { recursive: true, force: true });
  });

  describe('store', () => {
    it('should locate the config file under STDSCOUT_HOME', () => {
      expect(getConfigLocation()).toBe(join(homeDir, '.stdscout', 'config.json'));
    });

    it('should return an empty config when no file exists', () => {
      expect(loadConfig()).toEqual({});
    });

    it('should merge saved values', () => {
      saveConfig({ defaultStandard: '17' });
      saveConfig({ verbose: true });
      expect(loadConfig()).toEqual({ defaultStandard: '17', verbose: true });
    });

    it('should write formatted JSON', async () => {
      setConfigValue('defaultStandard', '23');
      expect(await readFile(getConfigLocation(), 'utf-8')).toBe('{\n  "defaultStandard": "23"\n}\n');
      expect(getConfigValue('defaultStandard')).toBe('23');
    });

    it('should reject a non-numeric standard', () => {
      expect(() => saveConfig({ defaultStandard: 'latest' })).toThrow(
        'Standard must be a digit token such as 17 or 20'
      );
      expect(loadConfig()).toEqual({});
    });

    it('should delete and clear values', () => {
      saveConfig({ defaultStandard: '17', verbose: false });
      deleteConfigValue('verbose');
      expect(loadConfig()).toEqual({ defaultStandard: '17' });
      clearConfig();
      expect(loadConfig()).toEqual({});
    });

    it('should warn and ignore an unparseable file', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      clearConfig();
      await writeFile(getConfigLocation(), '{ broken');

      expect(loadConfig()).toEqual({});
      expect(error).toHaveBeenCalledWith(`Warning: Failed to parse config file at ${getConfigLocation()}`);
    });

    it('should warn and ignore an invalid file', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      clearConfig();
      await writeFile(getConfigLocation(), '{"verbose": "yes"}');

      expect(loadConfig()).toEqual({});
      expect(error).toHaveBeenCalledTimes(1);
    });
  });

  describe('env', () => {
    it('should parse boolean flags', () => {
      expect(parseBooleanEnv('1')).toBe(true);
      expect(parseBooleanEnv(' TRUE ')).toBe(true);
      expect(parseBooleanEnv('off')).toBe(false);
      expect(parseBooleanEnv('maybe')).toBeUndefined();
      expect(parseBooleanEnv(undefined)).toBeUndefined();
    });

    it('should use the built-in default standard', () => {
      expect(getDefaultStandard()).toBe('20');
    });

    it('should prefer the config file over the built-in default', () => {
      saveConfig({ defaultStandard: '17' });
      expect(getDefaultStandard()).toBe('17');
    });

    it('should prefer the environment over the config file', () => {
      saveConfig({ defaultStandard: '17' });
      process.env.STDSCOUT_DEFAULT_STD = '14';
      expect(getDefaultStandard()).toBe('14');
    });

    it('should warn about an invalid environment standard', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      process.env.STDSCOUT_DEFAULT_STD = 'c++17';

      expect(getDefaultStandard()).toBe('20');
      expect(error).toHaveBeenCalledWith('Warning: Ignoring invalid STDSCOUT_DEFAULT_STD "c++17"');
    });

    it('should use a config passed in instead of reading the file', () => {
      saveConfig({ defaultStandard: '17', verbose: false });
      expect(getDefaultStandard({ defaultStandard: '11' })).toBe('11');
      expect(isVerbose({ verbose: true })).toBe(true);
    });

    it('should resolve verbosity from env, then config', () => {
      expect(isVerbose()).toBe(false);
      saveConfig({ verbose: true });
      expect(isVerbose()).toBe(true);
      process.env.STDSCOUT_VERBOSE = '0';
      expect(isVerbose()).toBe(false);
    });
  });
});
