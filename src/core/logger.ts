/**
 * Logger - structured logging for CLI and library use
 *
 * Components receive a Logger handle; nothing logs through a global.
 * Text mode renders through @clack/prompts, json mode prints one object per line.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import * as p from '@clack/prompts';
import chalk from 'chalk';
import { LogLevel } from '../types.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// ─────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────

class SinkLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly sinks: LogSink[],
    private readonly bindings: LogFields = {}
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  child(bindings: LogFields): Logger {
    return new SinkLogger(this.minLevel, this.sinks, { ...this.bindings, ...bindings });
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      ...this.bindings,
      ...fields,
      ts: new Date().toISOString(),
      level,
      msg: message,
    };
    for (const sink of this.sinks) {
      sink(entry);
    }
  }
}

export function createLogger(level: LogLevel, sinks: LogSink[]): Logger {
  return new SinkLogger(level, sinks);
}

export function createSilentLogger(): Logger {
  return new SinkLogger('error', []);
}

/**
 * Collects entries in memory. Used by tests to assert on log output.
 */
export function createMemoryLogger(level: LogLevel = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: new SinkLogger(level, [(entry) => entries.push(entry)]), entries };
}

// ─────────────────────────────────────────────────────────────
// Sinks
// ─────────────────────────────────────────────────────────────

function formatFields(entry: LogEntry): string {
  const { ts: _ts, level: _level, msg: _msg, ...rest } = entry;
  const parts = Object.entries(rest).map(([key, value]) =>
    `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
  );
  return parts.length > 0 ? ' ' + chalk.dim(parts.join(' ')) : '';
}

export const textSink: LogSink = (entry) => {
  const line = entry.msg + formatFields(entry);
  switch (entry.level) {
    case 'debug':
      p.log.message(chalk.dim(line));
      break;
    case 'info':
      p.log.info(line);
      break;
    case 'warn':
      p.log.warn(chalk.yellow(line));
      break;
    case 'error':
      p.log.error(chalk.red(line));
      break;
  }
};

export const jsonSink: LogSink = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

function dateStamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

/**
 * Appends JSONL entries to `<dir>/bountygate-YYYYMMDD.log`.
 * A failed write is reported once on stderr and then ignored.
 */
export function createFileSink(dir: string, now: () => Date = () => new Date()): LogSink {
  let warned = false;
  return (entry) => {
    try {
      mkdirSync(dir, { recursive: true });
      appendFileSync(join(dir, `bountygate-${dateStamp(now())}.log`), JSON.stringify(entry) + '\n');
    } catch (error) {
      if (!warned) {
        warned = true;
        process.stderr.write(`Log file write failed: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }
  };
}

export interface CliLoggerOptions {
  level: LogLevel;
  format: 'text' | 'json';
  file: boolean;
  dir: string;
}

export function createCliLogger(options: CliLoggerOptions): Logger {
  const sinks: LogSink[] = [options.format === 'json' ? jsonSink : textSink];
  if (options.file) {
    sinks.push(createFileSink(options.dir));
  }
  return createLogger(options.level, sinks);
}
