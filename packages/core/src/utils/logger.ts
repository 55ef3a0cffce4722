/**
 * Client Logger
 *
 * Appends `[timestamp] [LEVEL] message {meta}` lines to a log file and,
 * optionally, echoes them to stderr. Logging never fails the caller: if the
 * file cannot be written the file sink is switched off and the reason is
 * reported once on stderr.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { getLocalTimestamp } from './timestamp.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): Promise<void>;
  info(message: string, meta?: LogMeta): Promise<void>;
  warn(message: string, meta?: LogMeta): Promise<void>;
  error(message: string, meta?: LogMeta): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Append log lines to this file (parent directories are created) */
  file?: string;
  /** Echo log lines to stderr */
  console?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  meta?: LogMeta,
  timestamp: string = getLocalTimestamp(),
): string {
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;
}

class ClientLogger implements Logger {
  private readonly threshold: number;
  private file: string | null;
  private readonly echo: boolean;
  private dirReady = false;

  constructor(options: LoggerOptions) {
    this.threshold = LEVEL_ORDER[options.level ?? 'info'];
    this.file = options.file ?? null;
    this.echo = options.console ?? false;
  }

  debug(message: string, meta?: LogMeta): Promise<void> {
    return this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): Promise<void> {
    return this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): Promise<void> {
    return this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): Promise<void> {
    return this.write('error', message, meta);
  }

  private async write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): Promise<void> {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const line = formatLogLine(level, message, meta);

    if (this.echo) {
      process.stderr.write(`${line}\n`);
    }

    if (!this.file) return;

    const file = this.file;
    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(file), { recursive: true });
        this.dirReady = true;
      }
      await fs.appendFile(file, `${line}\n`);
    } catch (err) {
      this.file = null;
      const reason = err instanceof Error ? err.message : String(err);
      process.stderr.write(`radvctl: file logging disabled (${file}): ${reason}\n`);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ClientLogger(options);
}

/** Logger that drops everything; the ControlClient default */
export const silentLogger: Logger = createLogger({ level: 'silent' });
