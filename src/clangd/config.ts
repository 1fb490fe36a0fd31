/**
 * clangd Configuration Writer
 *
 * Generates a project-level .clangd file that pins the detected C++ standard
 * and enables a strict warning and include-diagnostics profile.
 */

import { existsSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import { detectStandard, toStdFlag, toStdName } from '../detect/index.js';
import type { DetectionSource, DetectorOptions, StandardVersion } from '../detect/index.js';

export const CLANGD_CONFIG_FILE = '.clangd';

/**
 * Warning flags added after the standard flag
 */
export const WARNING_FLAGS = ['-Wall', '-Wextra', '-Wpedantic'] as const;

export type IncludeDiagnosticsLevel = 'Strict' | 'None';

/**
 * Subset of the clangd config schema this tool writes
 */
export interface ClangdConfig {
  CompileFlags: {
    Add: string[];
    CompilationDatabase: string;
  };
  Diagnostics: {
    UnusedIncludes: IncludeDiagnosticsLevel;
    MissingIncludes: IncludeDiagnosticsLevel;
  };
}

export interface WriteClangdConfigOptions extends DetectorOptions {
  /** Overwrite an existing .clangd file */
  force?: boolean;
}

export interface WriteClangdConfigResult {
  /** Path of the .clangd file */
  path: string;
  standard: StandardVersion;
  source: DetectionSource;
  /** False when an existing file was left in place */
  written: boolean;
}

export class ClangdConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'ClangdConfigError';
  }
}

export function buildClangdConfig(standard: StandardVersion): ClangdConfig {
  return {
    CompileFlags: {
      Add: [toStdFlag(standard), ...WARNING_FLAGS],
      CompilationDatabase: '.',
    },
    Diagnostics: {
      UnusedIncludes: 'Strict',
      MissingIncludes: 'Strict',
    },
  };
}

export function renderClangdConfig(config: ClangdConfig): string {
  return stringifyYaml(config);
}

/**
 * Detect the project standard and write `<projectDir>/.clangd`
 *
 * @throws ClangdConfigError if the file cannot be written
 */
export function writeClangdConfig(
  projectDir: string,
  options: WriteClangdConfigOptions = {}
): WriteClangdConfigResult {
  const dir = resolve(projectDir);
  const path = join(dir, CLANGD_CONFIG_FILE);
  const { force, ...detectorOptions } = options;
  const detection = detectStandard(dir, detectorOptions);

  if (!force && existsSync(path)) {
    if (options.verbose) {
      console.log(`[Clangd] ${path} already exists, skipping`);
    }
    return { path, standard: detection.standard, source: detection.source, written: false };
  }

  const content = renderClangdConfig(buildClangdConfig(detection.standard));

  try {
    writeFileSync(path, content, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ClangdConfigError(`Failed to write ${path}: ${message}`, path);
  }

  if (options.verbose) {
    console.log(`[Clangd] Wrote ${path} with ${toStdName(detection.standard)}`);
  }

  return { path, standard: detection.standard, source: detection.source, written: true };
}
