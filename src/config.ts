/**
 * Configuration for the transcode watchdog.
 *
 * Read once at startup from a JSON file, then overridden from the
 * environment. Relative paths are resolved against the directory holding
 * the configuration file and a leading `~` expands to the home directory.
 * @module config
 */

import { existsSync, readFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors/index.js';

/**
 * Default configuration file name, looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'watchdog.config.json';

/**
 * Default recognized video extensions.
 */
export const DEFAULT_VIDEO_EXTENSIONS = ['.mkv', '.mp4', '.avi', '.mov', '.webm'];

/**
 * How the candidate is published at the original's path.
 * - `two-step`: original → `.old`, `.tmp` → original, delete `.old`
 * - `rename-over`: `.tmp` → original in one rename replacing the target
 * - `auto`: `rename-over` where rename replaces atomically (POSIX), else `two-step`
 */
export type ReplaceStrategy = 'auto' | 'rename-over' | 'two-step';

const toolsSchema = z.object({
  ffprobe: z.string().min(1).default('ffprobe'),
  handbrake: z.string().min(1).default('HandBrakeCLI'),
  rsync: z.string().min(1).default('rsync'),
});

/**
 * Zod schema for configuration validation.
 */
export const configSchema = z.object({
  mediaDirectories: z.array(z.string().min(1)).default([]),
  stagingDirectory: z.string().min(1).default('/tmp/transcoding'),
  presetFile: z.string().min(1).default('AV1_MKV_Stereo.json'),
  presetName: z.string().min(1).default('AV1_MKV_Stereo'),
  inspectedLogPath: z.string().min(1).default('inspected_files.log'),
  maxSizeGB: z.number().positive().default(0.005),
  targetCodec: z.string().min(1).default('av1'),
  videoExtensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'extension must look like ".mkv"'))
    .min(1)
    .default(DEFAULT_VIDEO_EXTENSIONS),
  replaceStrategy: z.enum(['auto', 'rename-over', 'two-step']).default('auto'),
  activityLogPath: z.string().min(1).nullable().default('activity.log'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  logFormat: z.enum(['pretty', 'json']).default('pretty'),
  tools: toolsSchema.default({}),
});

export type WatchdogConfig = z.infer<typeof configSchema>;
export type ToolPaths = WatchdogConfig['tools'];

export interface LoadConfigOptions {
  /** Explicit configuration file; must exist when given */
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory used when no file is given (defaults to process.cwd()) */
  cwd?: string;
}

/**
 * Expand `~` and resolve relative paths against `baseDir`
 */
export function resolvePath(baseDir: string, value: string): string {
  let expanded = value;
  if (value === '~') {
    expanded = os.homedir();
  } else if (value.startsWith('~/')) {
    expanded = path.join(os.homedir(), value.slice(2));
  }
  return path.isAbsolute(expanded) ? path.normalize(expanded) : path.resolve(baseDir, expanded);
}

/**
 * Collect overrides from WATCHDOG_* environment variables
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.WATCHDOG_MEDIA_DIRECTORIES) {
    overrides.mediaDirectories = env.WATCHDOG_MEDIA_DIRECTORIES.split(path.delimiter).filter(
      (dir) => dir.length > 0
    );
  }
  if (env.WATCHDOG_STAGING_DIRECTORY) {
    overrides.stagingDirectory = env.WATCHDOG_STAGING_DIRECTORY;
  }
  if (env.WATCHDOG_MAX_SIZE_GB) {
    overrides.maxSizeGB = Number(env.WATCHDOG_MAX_SIZE_GB);
  }
  if (env.WATCHDOG_TARGET_CODEC) {
    overrides.targetCodec = env.WATCHDOG_TARGET_CODEC;
  }
  if (env.WATCHDOG_LOG_LEVEL) {
    overrides.logLevel = env.WATCHDOG_LOG_LEVEL;
  }

  return overrides;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${filePath}`,
      { filePath },
      error instanceof Error ? error : undefined
    );
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`Configuration file ${filePath} must contain a JSON object`, {
      filePath,
    });
  }
  return { ...raw };
}

/**
 * Validate raw configuration values and resolve every path
 */
export function parseConfig(raw: unknown, baseDir: string): WatchdogConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const config = result.data;
  return {
    ...config,
    mediaDirectories: config.mediaDirectories.map((dir) => resolvePath(baseDir, dir)),
    stagingDirectory: resolvePath(baseDir, config.stagingDirectory),
    presetFile: resolvePath(baseDir, config.presetFile),
    inspectedLogPath: resolvePath(baseDir, config.inspectedLogPath),
    activityLogPath:
      config.activityLogPath === null ? null : resolvePath(baseDir, config.activityLogPath),
    videoExtensions: config.videoExtensions.map((ext) => ext.toLowerCase()),
  };
}

/**
 * Load configuration from file and environment.
 *
 * Without an explicit path, `watchdog.config.json` in the working directory
 * is used when present; otherwise defaults and environment apply.
 */
export function loadConfig(options: LoadConfigOptions = {}): WatchdogConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicitPath = options.configPath ?? env.WATCHDOG_CONFIG;

  let fileValues: Record<string, unknown> = {};
  let baseDir = cwd;

  if (explicitPath) {
    const filePath = path.resolve(cwd, explicitPath);
    if (!existsSync(filePath)) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`, { filePath });
    }
    fileValues = readConfigFile(filePath);
    baseDir = path.dirname(filePath);
  } else {
    const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      fileValues = readConfigFile(defaultPath);
    }
  }

  return parseConfig({ ...fileValues, ...readEnvOverrides(env) }, baseDir);
}
