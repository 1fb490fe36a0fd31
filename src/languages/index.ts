/**
 * Languages Module
 *
 * Editor settings and language server definitions built on the detector.
 */

export {
  profileForFile,
  shouldFormatOnSave,
  resolveBufferSettings,
  DEFAULT_SETTINGS,
  LANGUAGE_PROFILES,
  FORMAT_ON_SAVE_PATTERNS,
  type LanguageId,
  type IndentSettings,
  type LanguageProfile,
  type BufferSettings,
} from './profiles.js';

export {
  filetypeOf,
  serverForFiletype,
  findProjectRoot,
  resolveServerForFile,
  CLANGD_SERVER,
  GOPLS_SERVER,
  LANGUAGE_SERVERS,
  type LanguageServer,
} from './servers.js';
