/**
 * Module Logger
 *
 * Leveled, structured logging for batch runs. Every component gets its own
 * module logger; the CLI sets the level from execution_settings.log_level and
 * attaches an append-only file sink for the run.
 *
 * Usage:
 *   const log = createModuleLogger('batch');
 *   log.info({ index, total }, 'Processing combination');
 *   log.warn({ param }, 'Parameter not found in model, skipping');
 */

import { createWriteStream } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  level: EntryLevel;
  module: string;
  timestamp: string;
  message: string;
  context: Record<string, unknown>;
}

export type LogListener = (entry: LogEntry) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: Number.POSITIVE_INFINITY,
};

const LEVEL_COLORS: Record<EntryLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info';
}

// Error instances serialize to {} under JSON.stringify
function normalizeContext(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
}

// =============================================================================
// LOGGER
// =============================================================================

export class Logger {
  private static globalLevel: LogLevel = initialLevel();
  private static consoleEnabled = true;
  private static listeners: LogListener[] = [];

  private readonly module: string;

  constructor(module: string) {
    this.module = module;
  }

  static setGlobalLevel(level: LogLevel): void {
    Logger.globalLevel = level;
  }

  static getGlobalLevel(): LogLevel {
    return Logger.globalLevel;
  }

  static setConsoleOutput(enabled: boolean): void {
    Logger.consoleEnabled = enabled;
  }

  static addListener(fn: LogListener): () => void {
    Logger.listeners.push(fn);
    return () => {
      Logger.listeners = Logger.listeners.filter(l => l !== fn);
    };
  }

  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`);
  }

  debug(data: Record<string, unknown> | string, message?: string): void {
    this.log('debug', data, message);
  }

  info(data: Record<string, unknown> | string, message?: string): void {
    this.log('info', data, message);
  }

  warn(data: Record<string, unknown> | string, message?: string): void {
    this.log('warn', data, message);
  }

  error(data: Record<string, unknown> | string, message?: string): void {
    this.log('error', data, message);
  }

  private log(level: EntryLevel, data: Record<string, unknown> | string, message?: string): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[Logger.globalLevel]) return;

    const entry: LogEntry = {
      level,
      module: this.module,
      timestamp: new Date().toISOString(),
      message: typeof data === 'string' ? data : message ?? '',
      context: typeof data === 'string' ? {} : normalizeContext(data),
    };

    for (const listener of Logger.listeners) {
      try {
        listener(entry);
      } catch (err) {
        process.stderr.write(`log listener failed: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }

    if (Logger.consoleEnabled) {
      const color = LEVEL_COLORS[level];
      const time = entry.timestamp.slice(11, 23);
      const output = level === 'error' ? process.stderr : process.stdout;
      output.write(`${color}${time} ${level.toUpperCase().padEnd(5)}${RESET} [${this.module}] ${formatLine(entry)}\n`);
    }
  }
}

function formatLine(entry: LogEntry): string {
  const keys = Object.keys(entry.context);
  return keys.length > 0 ? `${entry.message} ${JSON.stringify(entry.context)}` : entry.message;
}

// =============================================================================
// FILE SINK
// =============================================================================

/**
 * Append every entry to `path` as one line. Returns a function that detaches
 * the sink and resolves once the stream is flushed.
 */
export function attachFileSink(path: string): () => Promise<void> {
  const stream = createWriteStream(path, { flags: 'a', encoding: 'utf-8' });
  stream.on('error', err => {
    process.stderr.write(`log file ${path} unavailable: ${err.message}\n`);
  });

  const detach = Logger.addListener(entry => {
    stream.write(`${entry.timestamp} - ${entry.level.toUpperCase()} - [${entry.module}] ${formatLine(entry)}\n`);
  });

  return () => {
    detach();
    return new Promise(resolve => {
      stream.end(() => resolve());
    });
  };
}

// =============================================================================
// API
// =============================================================================

export function createModuleLogger(module: string): Logger {
  return new Logger(module);
}

export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

export function addLogListener(fn: LogListener): () => void {
  return Logger.addListener(fn);
}
