/**
 * Run logging.
 *
 * Console lines keep the '[Tag] message' shape used across the codebase;
 * the run log file gets the full '{ISO time} [Tag] LEVEL: message' line.
 */

import { LogFile } from './log-file.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  tag: string;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sinks, different tag */
  child(tag: string): Logger;
  /** Flush buffered file output */
  close(): Promise<void>;
}

export interface LoggerOptions {
  tag?: string;
  level?: LogLevel;
  /** Write to the console (default true) */
  console?: boolean;
  /** Truncated and appended to for the run */
  logFile?: string;
}

interface Sinks {
  level: LogLevel;
  console: boolean;
  file: LogFile | null;
  memory: LogEntry[] | null;
}

export function formatLogLine(entry: LogEntry): string {
  return `${entry.timestamp.toISOString()} [${entry.tag}] ${entry.level.toUpperCase()}: ${entry.message}`;
}

function isEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

class BinderLogger implements Logger {
  constructor(private readonly sinks: Sinks, private readonly tag: string) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  child(tag: string): Logger {
    return new BinderLogger(this.sinks, tag);
  }

  async close(): Promise<void> {
    if (this.sinks.file) {
      await this.sinks.file.flush();
    }
  }

  private write(level: LogLevel, message: string): void {
    if (!isEnabled(this.sinks.level, level)) return;

    const entry: LogEntry = { timestamp: new Date(), level, tag: this.tag, message };

    if (this.sinks.console) {
      const line = `[${this.tag}] ${message}`;
      if (level === 'error') {
        console.error(line);
      } else if (level === 'warn') {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
    this.sinks.file?.append(formatLogLine(entry));
    this.sinks.memory?.push(entry);
  }
}

/**
 * Create the run logger. With logFile set, the file is truncated first.
 */
export async function createLogger(options: LoggerOptions = {}): Promise<Logger> {
  let file: LogFile | null = null;
  if (options.logFile) {
    file = new LogFile(options.logFile);
    await file.create();
  }
  return new BinderLogger(
    {
      level: options.level ?? 'info',
      console: options.console ?? true,
      file,
      memory: null
    },
    options.tag ?? 'Binder'
  );
}

export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
  /** Messages logged at the given level, any tag */
  messages(level: LogLevel): string[];
}

/**
 * Logger that only records entries (all levels). Used by tests.
 */
export function createMemoryLogger(tag = 'Binder'): MemoryLogger {
  const entries: LogEntry[] = [];
  const logger = new BinderLogger({ level: 'debug', console: false, file: null, memory: entries }, tag);
  return Object.assign(logger, {
    entries,
    messages(level: LogLevel): string[] {
      return entries.filter(e => e.level === level).map(e => e.message);
    }
  });
}
