/**
 * Evidence Parsers
 */

export {
  parseCompileCommands,
  findCompileCommands,
  readCompileCommands,
  firstCompileCommand,
  commandLineOf,
  matchStandardFlag,
} from './compile-commands.js';

export { parseCMakeLists, findCMakeLists, matchCMakeStandard } from './cmake.js';
