/**
 * Logging utilities for hookline services
 *
 * Two output shapes: a coloured single-line format for terminals and one JSON
 * object per line (`LOG_FORMAT=json`) for log shippers.
 */

import type { LogLevel } from './types.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type LogFormat = 'pretty' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  colors?: boolean;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly useColors: boolean;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'pretty';
    this.useColors = (options.colors ?? true) && this.format === 'pretty' && Boolean(process.stdout.isTTY);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private colorize(text: string, color: keyof typeof COLORS): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private render(label: string, color: keyof typeof COLORS, message: string, meta?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({ time: timestamp, level: label.trim().toLowerCase(), logger: this.name, msg: message, ...meta });
    }

    let output = `${this.colorize(timestamp, 'gray')} ${this.colorize(label, color)} ${this.colorize(`[${this.name}]`, 'cyan')} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      output += ` ${this.colorize(JSON.stringify(meta), 'gray')}`;
    }
    return output;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.render('DEBUG', 'gray', message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.render('INFO ', 'blue', message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.render('WARN ', 'yellow', message, meta));
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.render('ERROR', 'red', message, meta));
    }
  }

  success(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.render('OK   ', 'green', message, meta));
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, {
      level: this.level,
      format: this.format,
      colors: this.useColors,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function createLogger(name: string, level?: LogLevel): Logger {
  const envLevel = process.env.LOG_LEVEL;
  return new Logger(name, {
    level: level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
    format: process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  });
}
