/**
 * stdscout library entry
 */

export * from './detect/index.js';
export * from './clangd/index.js';
export * from './languages/index.js';
export { getDefaultStandard, isVerbose } from './config/env.js';
export {
  loadConfig,
  saveConfig,
  getConfigValue,
  setConfigValue,
  deleteConfigValue,
  clearConfig,
  getConfigLocation,
  StdscoutConfigSchema,
  type StdscoutConfig,
  type ConfigKey,
} from './config/store.js';
