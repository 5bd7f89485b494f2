/**
 * Structured JSON-lines logger for the top-up runner.
 *
 * Entries are buffered in memory, optionally appended to a log file, and
 * echoed to stderr in JSON mode or for errors. `data` payloads are
 * redacted before they are stored anywhere.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redactRecord } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  /** Return all entries collected so far. */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  json?: boolean;
  /** Echo target; stderr unless overridden. */
  write?: (line: string) => void;
  now?: () => Date;
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];
  const write = opts.write ?? ((line: string): void => { process.stderr.write(line); });
  const now = opts.now ?? ((): Date => new Date());

  if (opts.filePath) {
    mkdirSync(dirname(opts.filePath), { recursive: true });
  }

  function emit(level: LogLevel, action: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: LogEntry = {
      timestamp: now().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(data && { data: redactRecord(data) }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry) + '\n';

    if (opts.filePath) {
      appendFileSync(opts.filePath, line, 'utf-8');
    }

    if (opts.json || level === 'error' || level === 'fatal') {
      write(line);
    }
  }

  return {
    debug: (action, message, data) => emit('debug', action, message, data),
    info: (action, message, data) => emit('info', action, message, data),
    warn: (action, message, data) => emit('warn', action, message, data),
    error: (action, message, data) => emit('error', action, message, data),
    fatal: (action, message, data) => emit('fatal', action, message, data),
    entries: (): readonly LogEntry[] => buffer,
  };
}
