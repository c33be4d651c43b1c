// =============================================================================
// Logger
// =============================================================================
// Engine messages start with a `[Component]` tag. Entries carry it as their own
// `component` field: one JSON line per entry in the log file, one readable line
// on the console.

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { errorMessage } from './errors.js';
import { resolveLogPath } from './relayq-home.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const COMPONENT_TAG = /^\[([^\]]+)\]\s*/;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component?: string;
  message: string;
  data?: unknown;
}

/** The subset of the logger that engine components depend on. */
export interface LoggerLike {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export interface LoggerOptions {
  /** JSONL sink. Defaults to resolveLogPath(); null logs to the console only. */
  filePath?: string | null;
  console?: boolean;
  /** Lowest level written. Without it, debug entries appear only while DEBUG is set. */
  minLevel?: LogLevel;
  now?: () => Date;
}

export function toLogEntry(level: LogLevel, message: string, data: unknown, at: Date): LogEntry {
  const tag = COMPONENT_TAG.exec(message);
  return {
    timestamp: at.toISOString(),
    level,
    ...(tag ? { component: tag[1] } : {}),
    message: tag ? message.slice(tag[0].length) : message,
    ...(data === undefined ? {} : { data: data instanceof Error ? { name: data.name, message: data.message } : data }),
  };
}

export function formatConsoleLine(entry: LogEntry): string {
  const component = entry.component ? `[${entry.component}] ` : '';
  const data = entry.data === undefined ? '' : ` ${JSON.stringify(entry.data)}`;
  return `${entry.timestamp} ${entry.level.toUpperCase()} ${component}${entry.message}${data}`;
}

export class Logger implements LoggerLike {
  readonly filePath: string | null;
  private readonly consoleEnabled: boolean;
  private readonly minLevel: LogLevel | undefined;
  private readonly now: () => Date;
  private sinkReady = false;
  private sinkFailed = false;

  constructor(options: LoggerOptions = {}) {
    this.filePath = options.filePath === undefined ? resolveLogPath() : options.filePath;
    this.consoleEnabled = options.console ?? true;
    this.minLevel = options.minLevel;
    this.now = options.now ?? (() => new Date());
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    const threshold = this.minLevel ?? (process.env.DEBUG ? 'debug' : 'info');
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }

    const entry = toLogEntry(level, message, data, this.now());
    if (this.consoleEnabled) {
      console[level](formatConsoleLine(entry));
    }
    this.appendToFile(entry);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /** A failing sink is switched off after a single console warning. */
  private appendToFile(entry: LogEntry): void {
    if (!this.filePath || this.sinkFailed) {
      return;
    }

    try {
      if (!this.sinkReady) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.sinkReady = true;
      }
      appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (err) {
      this.sinkFailed = true;
      const warning = toLogEntry(
        'warn',
        '[Logger] File sink disabled; logging to the console only',
        { filePath: this.filePath, error: errorMessage(err) },
        this.now(),
      );
      console.warn(formatConsoleLine(warning));
    }
  }
}

export const logger = new Logger();
