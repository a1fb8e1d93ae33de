/**
 * Scoped, levelled logging.
 *
 * Progress lines (`info`) go to stdout; warnings and errors go to stderr.
 */

import { inspect } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

type Sink = (entry: LogEntry) => void;

export function levelAtOrAbove(desired: LogLevel, candidate: LogLevel): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export function formatEntry(entry: LogEntry): string {
  const scopeText = entry.scope ? `[${entry.scope}] ` : '';
  const metaText = entry.meta ? ` ${serializeMeta(entry.meta)}` : '';
  return `${scopeText}${entry.message}${metaText}`;
}

const consoleSink: Sink = (entry) => {
  const line = formatEntry(entry);
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
};

export class StructuredLogger implements Logger {
  protected readonly sink: Sink;
  protected readonly minLevel: LogLevel;
  protected readonly scope?: string;

  constructor(opts: { sink: Sink; minLevel?: LogLevel; scope?: string }) {
    this.sink = opts.sink;
    this.minLevel = opts.minLevel ?? 'info';
    this.scope = opts.scope;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      scope: this.scope ? `${this.scope}.${scope}` : scope,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink({
      ts: Date.now(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.minLevel, level);
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = 'info') {
    super({ sink: consoleSink, minLevel });
  }
}

/**
 * Collects entries in memory. Children share the parent's entry list.
 */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(minLevel: LogLevel = 'debug', entries: LogEntry[] = []) {
    super({ sink: (entry) => entries.push(entry), minLevel });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => level === undefined || e.level === level)
      .map((e) => e.message);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
