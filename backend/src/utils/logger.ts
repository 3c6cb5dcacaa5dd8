/** Structured logging: JSONL for machine consumption, .log for humans, console for devs. */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export type LogData = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  event: string;
  data?: LogData;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** When set, entries are also appended to app.jsonl and app.log in this directory. */
  logDir?: string;
}

interface LoggerSink {
  threshold: number;
  jsonlPath: string | null;
  textPath: string | null;
}

export class Logger {
  private constructor(
    private readonly sink: LoggerSink,
    readonly scope: string,
  ) {}

  static create(options: LoggerOptions = {}): Logger {
    let jsonlPath: string | null = null;
    let textPath: string | null = null;
    if (options.logDir) {
      try {
        fs.mkdirSync(options.logDir, { recursive: true });
        jsonlPath = path.join(options.logDir, 'app.jsonl');
        textPath = path.join(options.logDir, 'app.log');
      } catch (err) {
        console.warn(`[inference-desk] Log directory unavailable: ${errorMessage(err)}`);
      }
    }
    return new Logger(
      { threshold: LEVEL_ORDER[options.level ?? 'info'], jsonlPath, textPath },
      'app',
    );
  }

  /** A logger writing to the same sink under another scope name. */
  child(scope: string): Logger {
    return new Logger(this.sink, scope);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.sink.threshold;
  }

  log(level: LogLevel, event: string, data?: LogData): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const entry: LogEntry = {
      timestamp,
      level,
      scope: this.scope,
      event,
      ...(data !== undefined ? { data } : {}),
    };
    const dataStr = data ? ' ' + formatData(data) : '';

    if (this.sink.jsonlPath) {
      try {
        fs.appendFileSync(this.sink.jsonlPath, JSON.stringify(entry) + '\n');
      } catch { /* best-effort */ }
    }
    if (this.sink.textPath) {
      const textLine = `[${timestamp}] [${level.toUpperCase()}] [${this.scope}] ${event}${dataStr}\n`;
      try {
        fs.appendFileSync(this.sink.textPath, textLine);
      } catch { /* best-effort */ }
    }

    const consoleMsg = `[inference-desk] [${this.scope}] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else if (level === 'info') {
      console.log(consoleMsg);
    } else {
      console.debug(consoleMsg);
    }
  }

  trace(event: string, data?: LogData): void {
    this.log('trace', event, data);
  }

  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }

  /** Log the start of a timed operation. Returns a function that logs the elapsed time at debug. */
  time(event: string, data?: LogData): () => void {
    const start = Date.now();
    return () => {
      this.debug(`${event} took ${Date.now() - start}ms`, data);
    };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Format data object for human-readable log line. */
function formatData(data: LogData): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && value.length > 200) {
      parts.push(`${key}=[${value.length} chars]`);
    } else if (value instanceof Error) {
      parts.push(`${key}=${value.name}: ${value.message}`);
    } else if (typeof value === 'object' && value !== null) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(', ');
}
