/**
 * Options shared by every radvctl command, and the client built from them.
 *
 * Precedence: command line, then environment (including .env files),
 * then defaults.
 */

import * as os from 'os';
import * as path from 'path';
import { ControlClient, MAX_TIMEOUT_MS, createLogger, type Logger } from '@radvctl/core';
import { getEnv } from './env.js';

export const DEFAULT_HOST = 'localhost:8888';
export const DEFAULT_LOG_FILE = path.join(os.homedir(), '.radvctl', 'logs', 'radvctl.log');

export interface GlobalOptions {
  host: string;
  timeoutMs?: number;
  verbose: boolean;
  logFile: string;
}

export interface ParsedArgs {
  global: GlobalOptions;
  /** Arguments left once global options are removed */
  rest: string[];
}

export function parseTimeout(value: string, source: string): number {
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new Error(
      `Invalid ${source}: "${value}" (expected a positive number of milliseconds, at most ${MAX_TIMEOUT_MS})`,
    );
  }
  return timeoutMs;
}

/**
 * Pulls global options out of argv, wherever they appear.
 */
export function parseGlobalOptions(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  let host = getEnv(['RADVCTL_HOST'], env) ?? DEFAULT_HOST;
  const envTimeout = getEnv(['RADVCTL_TIMEOUT_MS'], env);
  let timeoutMs = envTimeout ? parseTimeout(envTimeout, 'RADVCTL_TIMEOUT_MS') : undefined;
  let verbose = false;
  const rest: string[] = [];

  const valueOf = (flag: string, i: number): string => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`Option ${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    if (arg === '--host' || arg === '-H') {
      host = valueOf(arg, i);
      i += 1;
    } else if (arg.startsWith('--host=')) {
      host = arg.slice('--host='.length);
    } else if (arg === '--timeout') {
      timeoutMs = parseTimeout(valueOf(arg, i), '--timeout');
      i += 1;
    } else if (arg.startsWith('--timeout=')) {
      timeoutMs = parseTimeout(arg.slice('--timeout='.length), '--timeout');
    } else if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else {
      rest.push(arg);
    }
  }

  return {
    global: {
      host,
      timeoutMs,
      verbose,
      logFile: getEnv(['RADVCTL_LOG_FILE'], env) ?? DEFAULT_LOG_FILE,
    },
    rest,
  };
}

export function createCliLogger(options: GlobalOptions): Logger {
  return createLogger({
    level: options.verbose ? 'debug' : 'info',
    file: options.logFile,
    console: options.verbose,
  });
}

export function createClient(options: GlobalOptions, logger: Logger = createCliLogger(options)): ControlClient {
  return new ControlClient(options.host, { logger });
}
