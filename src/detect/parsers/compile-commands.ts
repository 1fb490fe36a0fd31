/**
 * Compilation Database Parser
 *
 * Reads compile_commands.json and extracts the -std flag of its first entry
 */

import { readFileSync } from 'node:fs';
import type { CompileCommand, SearchOptions, ParserResult, PatternMatch } from '../types.js';
import {
  COMMAND_STD_PATTERNS,
  COMPILE_COMMANDS_FILE,
  CompileCommandSchema,
  CompileCommandsSchema,
} from '../types.js';
import { findUp } from '../find-up.js';

/**
 * Find the nearest compilation database at or above the given directory
 */
export function findCompileCommands(startDir: string, options: SearchOptions = {}): string | null {
  return findUp(COMPILE_COMMANDS_FILE, startDir, { stopAt: options.stopAt });
}

/**
 * Read a compilation database
 *
 * @returns The raw records, or null if the file cannot be read or is not a JSON array
 */
export function readCompileCommands(filePath: string): unknown[] | null {
  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed = CompileCommandsSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Validate the first record of a database; later records are never inspected
 */
export function firstCompileCommand(records: unknown[]): CompileCommand | null {
  if (records.length === 0) return null;
  const parsed = CompileCommandSchema.safeParse(records[0]);
  return parsed.success ? parsed.data : null;
}

/**
 * Command line of a record: `command`, or `arguments` joined with spaces
 */
export function commandLineOf(record: CompileCommand): string | null {
  if (record.command !== undefined) {
    return record.command;
  }
  if (record.arguments !== undefined) {
    return record.arguments.join(' ');
  }
  return null;
}

/**
 * Match a standard flag in a compiler command line
 */
export function matchStandardFlag(commandLine: string): PatternMatch | null {
  for (const { name, regex } of COMMAND_STD_PATTERNS) {
    const match = regex.exec(commandLine);
    if (match?.[1]) {
      return { standard: match[1], pattern: name };
    }
  }
  return null;
}

/**
 * Parse the nearest compilation database for a standard flag
 *
 * Only the first record is inspected.
 */
export function parseCompileCommands(
  startDir: string,
  options: SearchOptions = {}
): ParserResult<PatternMatch> {
  const filePath = findCompileCommands(startDir, options);

  if (!filePath) {
    return { data: null, source: null };
  }

  const records = readCompileCommands(filePath);
  if (!records) {
    return { data: null, source: filePath, error: 'Not a valid compilation database' };
  }

  const first = firstCompileCommand(records);
  const commandLine = first ? commandLineOf(first) : null;
  if (commandLine === null) {
    return { data: null, source: filePath, error: 'First entry has no command' };
  }

  return { data: matchStandardFlag(commandLine), source: filePath };
}
