/**
 * Detector Module Types
 */

import { z } from 'zod';

/**
 * Language-standard revision as a digit token, e.g. "17" for C++17
 */
export type StandardVersion = string;

/**
 * Where a detected standard came from
 */
export type DetectionSource = 'compile-commands' | 'cmake' | 'default';

/**
 * Detection result with the evidence behind it
 */
export interface DetectionResult {
  /** Detected standard digits */
  standard: StandardVersion;
  /** Evidence source that produced the standard */
  source: DetectionSource;
  /** Evidence file path (null for the default) */
  file: string | null;
  /** Name of the pattern that matched (null for the default) */
  pattern: string | null;
}

/**
 * A standard version captured by one of the flag or build-file patterns
 */
export interface PatternMatch {
  standard: StandardVersion;
  pattern: string;
}

/**
 * Detector options
 */
export interface DetectorOptions {
  /** Standard returned when no evidence is found */
  fallback?: StandardVersion;
  /** Last directory the upward search may visit */
  stopAt?: string;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Upward-search options shared by the evidence parsers
 */
export type SearchOptions = Pick<DetectorOptions, 'stopAt'>;

/**
 * Fallback standard when neither build artifact names one
 */
export const DEFAULT_STANDARD: StandardVersion = '20';

/**
 * Standard revisions the tooling knows about
 */
export const KNOWN_STANDARDS = ['98', '03', '11', '14', '17', '20', '23', '26'] as const;

export type KnownStandard = (typeof KNOWN_STANDARDS)[number];

/**
 * File names of the evidence sources, in priority order
 */
export const COMPILE_COMMANDS_FILE = 'compile_commands.json';
export const CMAKE_LISTS_FILE = 'CMakeLists.txt';

/**
 * Standard flag patterns for a compiler command line, tried in order
 *
 * Digits must end on a word boundary so draft names such as c++2a do not
 * read as c++2.
 */
export const COMMAND_STD_PATTERNS: ReadonlyArray<{ name: string; regex: RegExp }> = [
  { name: '-std=c++', regex: /-std=c\+\+(\d+)\b/ },
  { name: '-std=gnu++', regex: /-std=gnu\+\+(\d+)\b/ },
  { name: '/std:c++', regex: /\/std:c\+\+(\d+)\b/ },
];

/**
 * Direct variable assignment in a CMake project file
 */
export const CMAKE_VARIABLE_PATTERN = { name: 'CMAKE_CXX_STANDARD', regex: /CMAKE_CXX_STANDARD\s+(\d+)\b/ };

/**
 * Compile-feature expressions in a CMake project file, tried in order
 */
export const CMAKE_FEATURE_PATTERNS: ReadonlyArray<{ name: string; regex: RegExp }> = [
  { name: 'c++_std_', regex: /c\+\+_std_(\d+)\b/ },
  { name: 'cxx_std_', regex: /cxx_std_(\d+)\b/ },
];

/**
 * One record of a JSON compilation database
 */
export const CompileCommandSchema = z
  .object({
    directory: z.string().optional(),
    file: z.string().optional(),
    command: z.string().optional(),
    arguments: z.array(z.string()).optional(),
    output: z.string().optional(),
  })
  .passthrough();

/**
 * A compilation database is only checked to be an array; records are
 * validated one at a time
 */
export const CompileCommandsSchema = z.array(z.unknown());

export type CompileCommand = z.infer<typeof CompileCommandSchema>;

/**
 * Parser result with source file
 */
export interface ParserResult<T> {
  /** Parsed data */
  data: T | null;
  /** Source file path */
  source: string | null;
  /** Error message if reading or parsing failed */
  error?: string;
}
