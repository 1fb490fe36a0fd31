/**
 * Build Standard Detector
 *
 * Infers the C++ standard of a project from its build artifacts.
 * Evidence is checked in priority order:
 * 1. compile_commands.json (first entry's -std flag)
 * 2. CMakeLists.txt (CMAKE_CXX_STANDARD, then compile features)
 * 3. Fallback standard
 *
 * Unreadable or malformed evidence counts as missing; detection never throws.
 */

import type { DetectionResult, DetectorOptions, KnownStandard, StandardVersion } from './types.js';
import { DEFAULT_STANDARD, KNOWN_STANDARDS } from './types.js';
import { parseCompileCommands, parseCMakeLists } from './parsers/index.js';

const STANDARD_TOKEN = /^\d+$/;

/**
 * Check that a value is a digit token usable as a standard
 */
export function isStandardVersion(value: string): boolean {
  return STANDARD_TOKEN.test(value);
}

/**
 * Check that a standard is one of the recognised revisions
 */
export function isKnownStandard(value: string): value is KnownStandard {
  return KNOWN_STANDARDS.some((known) => known === value);
}

function resolveFallback(options: DetectorOptions): StandardVersion {
  const fallback = options.fallback;
  if (fallback !== undefined && isStandardVersion(fallback)) {
    return fallback;
  }
  if (fallback !== undefined && options.verbose) {
    console.log(`[Detector] Ignoring invalid fallback "${fallback}", using ${DEFAULT_STANDARD}`);
  }
  return DEFAULT_STANDARD;
}

/**
 * Detect the standard for a working directory, with the evidence used
 */
export function detectStandard(workingDirectory: string, options: DetectorOptions = {}): DetectionResult {
  const search = { stopAt: options.stopAt };

  const commands = parseCompileCommands(workingDirectory, search);
  if (commands.data) {
    if (options.verbose) {
      console.log(`[Detector] c++${commands.data.standard} from ${commands.source}`);
    }
    return {
      standard: commands.data.standard,
      source: 'compile-commands',
      file: commands.source,
      pattern: commands.data.pattern,
    };
  }
  if (commands.source && options.verbose) {
    console.log(
      `[Detector] No standard in ${commands.source}${commands.error ? ` (${commands.error})` : ''}`
    );
  }

  const cmake = parseCMakeLists(workingDirectory, search);
  if (cmake.data) {
    if (options.verbose) {
      console.log(`[Detector] c++${cmake.data.standard} from ${cmake.source}`);
    }
    return {
      standard: cmake.data.standard,
      source: 'cmake',
      file: cmake.source,
      pattern: cmake.data.pattern,
    };
  }
  if (cmake.source && options.verbose) {
    console.log(`[Detector] No standard in ${cmake.source}${cmake.error ? ` (${cmake.error})` : ''}`);
  }

  const standard = resolveFallback(options);
  if (options.verbose) {
    console.log(`[Detector] No build evidence, defaulting to c++${standard}`);
  }
  return { standard, source: 'default', file: null, pattern: null };
}

/**
 * Detect the standard for a working directory
 */
export function detect(workingDirectory: string, options: DetectorOptions = {}): StandardVersion {
  return detectStandard(workingDirectory, options).standard;
}

/**
 * Standard name as used by compilers, e.g. "c++20"
 */
export function toStdName(standard: StandardVersion): string {
  return `c++${standard}`;
}

/**
 * Compiler flag selecting the standard, e.g. "-std=c++20"
 */
export function toStdFlag(standard: StandardVersion): string {
  return `-std=${toStdName(standard)}`;
}
