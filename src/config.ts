import fs from 'fs';
import path from 'path';
import { isLogLevel } from './logging.js';
import { LogLevel } from './types.js';

export const DEFAULT_LOG_PATH = 'renaming.log';

export interface CliOptions {
  dryRun?: boolean;
  /** `true` when the flag is given without names */
  ignoreDirs?: string[] | boolean;
  log?: string;
  logLevel?: string;
  quiet?: boolean;
}

export interface RunConfig {
  root: string;
  dryRun: boolean;
  ignoredDirs: ReadonlySet<string>;
  logPath: string;
  logLevel: LogLevel;
  quiet: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function resolveLogLevel(fromCli: string | undefined, env: NodeJS.ProcessEnv): LogLevel {
  const raw = (fromCli || env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(raw)) throw new ConfigError(`invalid log level '${raw}' (expected debug, info, warn or error)`);
  return raw;
}

export function resolveRunConfig(directory: string, opts: CliOptions, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const root = path.resolve(directory);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ConfigError(`not a directory: ${root}`);
  }
  // basenames, taken verbatim: commas and edge spaces are legal in them
  const ignoredDirs: ReadonlySet<string> = new Set(Array.isArray(opts.ignoreDirs) ? opts.ignoreDirs : []);
  return {
    root,
    dryRun: !!opts.dryRun,
    ignoredDirs,
    logPath: path.resolve(opts.log || DEFAULT_LOG_PATH),
    logLevel: resolveLogLevel(opts.logLevel, env),
    quiet: !!opts.quiet,
  };
}
