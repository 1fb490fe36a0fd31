/**
 * CLI Module
 */

export {
  runCli,
  runDetectCommand,
  runFlagCommand,
  runClangdCommand,
  runProfileCommand,
  runRootCommand,
  runConfigCommand,
  printUsage,
  printConfigUsage,
} from './commands.js';

export { parseArgs, type CliOptions } from './options.js';
