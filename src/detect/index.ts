/**
 * Detect Module
 *
 * Infers a project's C++ standard from its build artifacts.
 */

export {
  detect,
  detectStandard,
  isKnownStandard,
  isStandardVersion,
  toStdFlag,
  toStdName,
} from './detector.js';

export { findUp, findUpDirectory, ancestorsOf, type FindUpOptions } from './find-up.js';

export type {
  StandardVersion,
  KnownStandard,
  DetectionSource,
  DetectionResult,
  DetectorOptions,
  SearchOptions,
  PatternMatch,
  ParserResult,
  CompileCommand,
} from './types.js';

export {
  DEFAULT_STANDARD,
  KNOWN_STANDARDS,
  COMPILE_COMMANDS_FILE,
  CMAKE_LISTS_FILE,
  COMMAND_STD_PATTERNS,
  CMAKE_VARIABLE_PATTERN,
  CMAKE_FEATURE_PATTERNS,
  CompileCommandSchema,
  CompileCommandsSchema,
} from './types.js';

// Re-export parsers for advanced usage
export * from './parsers/index.js';
