/**
 * Language Profiles
 *
 * Per-language editor settings for C/C++ and Go buffers.
 */

import { dirname, extname } from 'node:path';
import { minimatch } from 'minimatch';
import { detect, toStdName } from '../detect/index.js';
import type { DetectorOptions } from '../detect/index.js';

export type LanguageId = 'cpp' | 'go';

/**
 * Indentation and display settings
 */
export interface IndentSettings {
  shiftwidth: number;
  tabstop: number;
  softtabstop: number;
  expandtab: boolean;
  /** Ruler column */
  colorcolumn?: string;
  /** Line comment template, `%s` is the commented text */
  commentstring?: string;
}

export interface LanguageProfile {
  id: LanguageId;
  /** File extensions (without dot) handled by this profile */
  extensions: readonly string[];
  settings: Partial<IndentSettings>;
}

/**
 * Settings resolved for one buffer
 */
export interface BufferSettings extends IndentSettings {
  language: LanguageId | null;
  formatOnSave: boolean;
  /** Detected standard name for C/C++ buffers, e.g. "c++20" */
  cppStd?: string;
}

export const DEFAULT_SETTINGS: IndentSettings = {
  shiftwidth: 2,
  tabstop: 2,
  softtabstop: 2,
  expandtab: true,
};

export const LANGUAGE_PROFILES: readonly LanguageProfile[] = [
  {
    id: 'cpp',
    extensions: ['c', 'cpp', 'h', 'hpp', 'cc', 'hh'],
    settings: {
      shiftwidth: 2,
      tabstop: 2,
      softtabstop: 2,
      expandtab: true,
      colorcolumn: '120',
      commentstring: '// %s',
    },
  },
  {
    // Go uses tabs
    id: 'go',
    extensions: ['go'],
    settings: {
      expandtab: false,
      shiftwidth: 8,
      tabstop: 8,
      colorcolumn: '120',
    },
  },
];

export const FORMAT_ON_SAVE_PATTERNS = ['*.c', '*.h', '*.cpp', '*.hpp', '*.cc', '*.hh', '*.go'] as const;

export function profileForFile(filePath: string): LanguageProfile | null {
  const ext = extname(filePath).slice(1).toLowerCase();
  if (!ext) return null;
  return LANGUAGE_PROFILES.find((profile) => profile.extensions.includes(ext)) ?? null;
}

export function shouldFormatOnSave(filePath: string): boolean {
  return FORMAT_ON_SAVE_PATTERNS.some((pattern) => minimatch(filePath, pattern, { matchBase: true }));
}

/**
 * Resolve the settings for a file, detecting the C++ standard for C/C++ files
 */
export function resolveBufferSettings(filePath: string, options: DetectorOptions = {}): BufferSettings {
  const profile = profileForFile(filePath);

  const settings: BufferSettings = {
    ...DEFAULT_SETTINGS,
    ...profile?.settings,
    language: profile?.id ?? null,
    formatOnSave: shouldFormatOnSave(filePath),
  };

  if (profile?.id === 'cpp') {
    settings.cppStd = toStdName(detect(dirname(filePath), options));
  }

  return settings;
}
