/**
 * Command-line handling for the watchdog binary.
 */

import type { Logger } from './observability/index.js';
import { ConsoleLogger, parseLogLevel } from './observability/index.js';
import { loadConfig } from './config.js';
import type { WatchdogConfig } from './config.js';
import { createContext } from './context.js';
import { ConfigurationError } from './errors/index.js';
import { EXIT_INVALID_CONFIG, EXIT_OK, runWatchdog } from './watchdog.js';
import type { WatchdogDependencies } from './watchdog.js';

export interface CliArgs {
  command: 'run' | 'help';
  flags: {
    config?: string;
  };
  unknown: string[];
}

export const USAGE = `Usage: watchdog [--config <path>]

Options:
  -c, --config <path>  Configuration file (default: ./watchdog.config.json)
  -h, --help           Show this help`;

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: 'run',
    flags: {},
    unknown: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.command = 'help';
      continue;
    }

    if (arg === '--config' || arg === '-c') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        // Flag without a value
        result.unknown.push(arg);
        continue;
      }
      result.flags.config = value;
      i++;
      continue;
    }

    if (arg.startsWith('--config=')) {
      const value = arg.slice('--config='.length);
      if (value.length === 0) {
        result.unknown.push(arg);
        continue;
      }
      result.flags.config = value;
      continue;
    }

    result.unknown.push(arg);
  }

  return result;
}

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Builds the run logger from the loaded configuration */
  createLogger?: (config: WatchdogConfig) => Logger;
  deps?: WatchdogDependencies;
}

function consoleLoggerFor(config: WatchdogConfig): Logger {
  return new ConsoleLogger({
    level: parseLogLevel(config.logLevel),
    format: config.logFormat,
    filePath: config.activityLogPath ?? undefined,
  });
}

/**
 * Run the watchdog for the given arguments and return the exit status
 */
export async function main(args: string[], options: MainOptions = {}): Promise<number> {
  const parsed = parseArgs(args);

  if (parsed.command === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }

  if (parsed.unknown.length > 0) {
    console.error(`Unknown arguments: ${parsed.unknown.join(' ')}`);
    console.error(USAGE);
    return EXIT_INVALID_CONFIG;
  }

  let config: WatchdogConfig;
  try {
    config = loadConfig({ configPath: parsed.flags.config, env: options.env, cwd: options.cwd });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return EXIT_INVALID_CONFIG;
    }
    throw error;
  }

  const logger = (options.createLogger ?? consoleLoggerFor)(config);
  const ctx = createContext({ logger });
  const run = await runWatchdog(config, ctx, options.deps);
  return run.exitCode;
}
