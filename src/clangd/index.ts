/**
 * clangd Module
 */

export {
  buildClangdConfig,
  renderClangdConfig,
  writeClangdConfig,
  ClangdConfigError,
  CLANGD_CONFIG_FILE,
  WARNING_FLAGS,
  type ClangdConfig,
  type IncludeDiagnosticsLevel,
  type WriteClangdConfigOptions,
  type WriteClangdConfigResult,
} from './config.js';
