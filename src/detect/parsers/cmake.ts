/**
 * CMake Project Parser
 *
 * Scrapes CMakeLists.txt for a C++ standard. The file is searched with
 * regular expressions, not evaluated.
 */

import { readFileSync } from 'node:fs';
import type { SearchOptions, ParserResult, PatternMatch } from '../types.js';
import { CMAKE_FEATURE_PATTERNS, CMAKE_LISTS_FILE, CMAKE_VARIABLE_PATTERN } from '../types.js';
import { findUp } from '../find-up.js';

/**
 * Find the nearest CMakeLists.txt at or above the given directory
 */
export function findCMakeLists(startDir: string, options: SearchOptions = {}): string | null {
  return findUp(CMAKE_LISTS_FILE, startDir, { stopAt: options.stopAt });
}

/**
 * Match a standard in CMake source text
 *
 * CMAKE_CXX_STANDARD wins over compile features; within each, the first
 * occurrence in the text is used.
 */
export function matchCMakeStandard(content: string): PatternMatch | null {
  for (const { name, regex } of [CMAKE_VARIABLE_PATTERN, ...CMAKE_FEATURE_PATTERNS]) {
    const match = regex.exec(content);
    if (match?.[1]) {
      return { standard: match[1], pattern: name };
    }
  }
  return null;
}

/**
 * Parse the nearest CMakeLists.txt for a standard
 */
export function parseCMakeLists(
  startDir: string,
  options: SearchOptions = {}
): ParserResult<PatternMatch> {
  const filePath = findCMakeLists(startDir, options);

  if (!filePath) {
    return { data: null, source: null };
  }

  try {
    const content = readFileSync(filePath, 'utf-8');
    return { data: matchCMakeStandard(content), source: filePath };
  } catch (error) {
    return {
      data: null,
      source: filePath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
