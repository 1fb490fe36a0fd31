/**
 * CLI option parsing
 */

export interface CliOptions {
  json: boolean;
  verbose: boolean;
  force: boolean;
  fallback?: string;
  stopAt?: string;
}

/**
 * Split arguments into positionals and parsed `--` options
 */
export function parseArgs(args: string[]): { positionals: string[]; options: CliOptions } {
  const options: CliOptions = {
    json: false,
    verbose: false,
    force: false,
  };
  const positionals: string[] = [];

  for (const arg of args) {
    if (!arg.startsWith('--')) {
      positionals.push(arg);
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg === '--force') {
      options.force = true;
    } else if (arg.startsWith('--fallback=')) {
      const value = arg.slice('--fallback='.length);
      if (value) {
        options.fallback = value;
      }
    } else if (arg.startsWith('--stop-at=')) {
      const value = arg.slice('--stop-at='.length);
      if (value) {
        options.stopAt = value;
      }
    }
  }

  return { positionals, options };
}
