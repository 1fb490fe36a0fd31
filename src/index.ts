#!/usr/bin/env node
/**
 * stdscout - C++ standard detection CLI
 * Main Entry Point
 */

// Global error handlers - must be set up first to catch any errors during startup
process.on('uncaughtException', (error, origin) => {
  console.error(`[stdscout] Fatal: Uncaught exception from ${origin}:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[stdscout] Fatal: Unhandled promise rejection:', reason);
  process.exit(1);
});

import 'dotenv/config';
import { runCli } from './cli/index.js';

/**
 * Main CLI function
 */
export function main(): number {
  // process.argv[2+] = user arguments
  const args = process.argv.slice(2);

  try {
    return runCli(args);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}`);
      if (args.includes('--verbose') || process.env.DEBUG) {
        console.error('\nStack trace:');
        console.error(error.stack);
      } else {
        console.error('(Run with --verbose or DEBUG=1 to see stack trace)');
      }
    } else {
      console.error('\n❌ Unexpected error:', error);
    }
    return 1;
  }
}

// Run CLI
process.exit(main());
