/**
 * Language Server Definitions
 *
 * Command lines, filetypes and root markers for clangd and gopls.
 */

import { dirname, resolve } from 'node:path';
import { findUpDirectory } from '../detect/index.js';

export interface LanguageServer {
  name: string;
  cmd: readonly string[];
  filetypes: readonly string[];
  /** Files or directories marking a project root, in priority order */
  rootMarkers: readonly string[];
  settings?: Record<string, unknown>;
}

export const CLANGD_SERVER: LanguageServer = {
  name: 'clangd',
  cmd: [
    'clangd',
    '--background-index',
    '--clang-tidy',
    '--header-insertion=iwyu',
    '--completion-style=detailed',
    '--function-arg-placeholders',
    '--fallback-style=llvm',
    '--enable-config',
  ],
  filetypes: ['c', 'cpp', 'objc', 'objcpp', 'cuda'],
  rootMarkers: [
    'compile_commands.json',
    'compile_flags.txt',
    '.clangd',
    '.git',
    'CMakeLists.txt',
    'Makefile',
  ],
};

export const GOPLS_SERVER: LanguageServer = {
  name: 'gopls',
  cmd: ['gopls'],
  filetypes: ['go', 'gomod', 'gowork', 'gotmpl'],
  rootMarkers: ['go.work', 'go.mod', '.git'],
  settings: {
    gopls: {
      analyses: {
        unusedparams: true,
        shadow: true,
      },
      staticcheck: true,
      gofumpt: true,
      usePlaceholders: true,
      completeUnimported: true,
      hints: {
        assignVariableTypes: true,
        compositeLiteralFields: true,
        compositeLiteralTypes: true,
        constantValues: true,
        functionTypeParameters: true,
        parameterNames: true,
        rangeVariableTypes: true,
      },
    },
  },
};

export const LANGUAGE_SERVERS: readonly LanguageServer[] = [CLANGD_SERVER, GOPLS_SERVER];

/**
 * Map of file extensions to the filetype names servers use
 */
const EXTENSION_FILETYPES: Record<string, string> = {
  c: 'c',
  h: 'cpp',
  cc: 'cpp',
  cpp: 'cpp',
  cxx: 'cpp',
  hh: 'cpp',
  hpp: 'cpp',
  m: 'objc',
  mm: 'objcpp',
  cu: 'cuda',
  go: 'go',
  tmpl: 'gotmpl',
};

const FILENAME_FILETYPES: Record<string, string> = {
  'go.mod': 'gomod',
  'go.work': 'gowork',
};

export function filetypeOf(filePath: string): string | null {
  const name = filePath.split(/[\\/]/).pop() ?? '';
  const byName = FILENAME_FILETYPES[name];
  if (byName) return byName;

  const dot = name.lastIndexOf('.');
  if (dot <= 0) return null;
  return EXTENSION_FILETYPES[name.slice(dot + 1).toLowerCase()] ?? null;
}

export function serverForFiletype(filetype: string): LanguageServer | null {
  return LANGUAGE_SERVERS.find((server) => server.filetypes.includes(filetype)) ?? null;
}

/**
 * Find the project root for a file: the nearest ancestor holding any marker
 */
export function findProjectRoot(
  filePath: string,
  markers: readonly string[],
  options: { stopAt?: string } = {}
): string | null {
  return findUpDirectory(markers, dirname(resolve(filePath)), options);
}

/**
 * Resolve the server and project root for a file
 */
export function resolveServerForFile(
  filePath: string,
  options: { stopAt?: string } = {}
): { server: LanguageServer; root: string | null } | null {
  const filetype = filetypeOf(filePath);
  if (!filetype) return null;

  const server = serverForFiletype(filetype);
  if (!server) return null;

  return { server, root: findProjectRoot(filePath, server.rootMarkers, options) };
}
