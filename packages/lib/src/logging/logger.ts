/**
 * Structured logger
 * Provides structured console output with context injection and timing helpers
 */

import { hostname } from 'os';
import { validateEnv, type GridEnv } from '../config/env-validation';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  SILENT = 6
}

export interface LogContext {
  evaluationId?: string;
  cell?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  service: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  performance?: {
    uptime: number;
    memory?: {
      used: number;
      total: number;
    };
  };
  metadata?: Record<string, unknown>;
  hostname: string;
  pid: number;
  version?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: 'json' | 'pretty';
  enablePerformance: boolean;
  enableContext: boolean;
  sanitize: boolean;
  service: string;
  version?: string;
}

const LEVEL_NAMES = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'];

const SENSITIVE_KEYS = [
  'password', 'token', 'secret', 'api_key', 'apikey',
  'authorization', 'cookie', 'credential'
];

export function parseLogLevel(level: string): LogLevel {
  const levels: Record<string, LogLevel> = {
    trace: LogLevel.TRACE,
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    fatal: LogLevel.FATAL,
    silent: LogLevel.SILENT
  };
  return levels[level.toLowerCase()] ?? LogLevel.INFO;
}

const configFromEnv = (env: GridEnv): Partial<LoggerConfig> => ({
  level: parseLogLevel(env.LOG_LEVEL),
  format: env.LOG_FORMAT ?? (env.NODE_ENV === 'production' ? 'json' : 'pretty'),
  sanitize: env.LOG_SANITIZE,
});

/**
 * Reads logger settings from the environment. An invalid environment falls
 * back to the defaults and the problem is reported on stderr.
 */
export function loadLoggerConfig(env: Record<string, string | undefined> = process.env): Partial<LoggerConfig> {
  try {
    return configFromEnv(validateEnv(env));
  } catch (error) {
    console.warn('[Logger] Falling back to default configuration:', error instanceof Error ? error.message : error);
    return {};
  }
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly context: LogContext;
  private readonly startTime: number = Date.now();

  constructor(config: Partial<LoggerConfig> = {}, context: LogContext = {}) {
    this.config = {
      level: LogLevel.INFO,
      format: 'pretty',
      enablePerformance: false,
      enableContext: true,
      sanitize: true,
      service: 'gridcalc',
      version: process.env.npm_package_version,
      ...config
    };
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.config.level && this.config.level !== LogLevel.SILENT;
  }

  private formatLevel(level: LogLevel): string {
    return LEVEL_NAMES[level] ?? 'INFO';
  }

  private sanitizeValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitizeValue(item));
    }
    if (typeof value === 'object' && value !== null) {
      return this.sanitizeRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
  }

  private sanitizeRecord(data: Record<string, unknown>): Record<string, unknown> {
    if (!this.config.sanitize) return data;

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      sanitized[key] = SENSITIVE_KEYS.some((s) => lowerKey.includes(s))
        ? '[REDACTED]'
        : this.sanitizeValue(value);
    }
    return sanitized;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: this.formatLevel(level),
      message,
      service: this.config.service,
      hostname: hostname(),
      pid: process.pid,
      version: this.config.version
    };

    if (this.config.enableContext && Object.keys(this.context).length > 0) {
      entry.context = this.sanitizeRecord({ ...this.context });
    }

    if (metadata) {
      entry.metadata = this.sanitizeRecord(metadata);
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: error.stack
      };
    }

    if (this.config.enablePerformance) {
      const memUsage = process.memoryUsage();
      entry.performance = {
        uptime: Date.now() - this.startTime,
        memory: {
          used: Math.round(memUsage.heapUsed / 1024 / 1024),
          total: Math.round(memUsage.heapTotal / 1024 / 1024)
        }
      };
    }

    return entry;
  }

  formatOutput(entry: LogEntry): string {
    if (this.config.format === 'json') {
      return JSON.stringify(entry);
    }

    const { timestamp, level, message, context, error, metadata } = entry;
    const time = new Date(timestamp).toLocaleTimeString();

    let output = `${time} ${this.color(level)}[${level}]${this.resetColor()} ${message}`;

    if (context && Object.keys(context).length > 0) {
      output += ` ${this.dim()}${JSON.stringify(context)}${this.resetColor()}`;
    }

    if (metadata) {
      output += `\n  ${this.dim()}Metadata: ${JSON.stringify(metadata, null, 2)}${this.resetColor()}`;
    }

    if (error) {
      output += `\n  ${this.color('ERROR')}Error: ${error.name}: ${error.message}${this.resetColor()}`;
      if (error.stack) {
        output += `\n  ${this.dim()}${error.stack}${this.resetColor()}`;
      }
    }

    return output;
  }

  private color(level: string): string {
    if (process.env.NO_COLOR) return '';

    const colors: Record<string, string> = {
      TRACE: '\x1b[90m',  // Gray
      DEBUG: '\x1b[36m',  // Cyan
      INFO: '\x1b[32m',   // Green
      WARN: '\x1b[33m',   // Yellow
      ERROR: '\x1b[31m',  // Red
      FATAL: '\x1b[35m'   // Magenta
    };
    return colors[level] ?? '';
  }

  private dim(): string {
    return process.env.NO_COLOR ? '' : '\x1b[2m';
  }

  private resetColor(): string {
    return process.env.NO_COLOR ? '' : '\x1b[0m';
  }

  private write(entry: LogEntry): void {
    const output = this.formatOutput(entry);

    if (entry.level === 'ERROR' || entry.level === 'FATAL') {
      console.error(output);
    } else if (entry.level === 'WARN') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return;
    this.write(this.createLogEntry(level, message, metadata, error));
  }

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error | Record<string, unknown>, metadata?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log(LogLevel.ERROR, message, metadata, error);
    } else {
      this.log(LogLevel.ERROR, message, { ...error, ...metadata });
    }
  }

  fatal(message: string, error?: Error | Record<string, unknown>, metadata?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log(LogLevel.FATAL, message, metadata, error);
    } else {
      this.log(LogLevel.FATAL, message, { ...error, ...metadata });
    }
  }

  child(context: LogContext): Logger {
    return new Logger(this.config, { ...this.context, ...context });
  }

  /** Returns a stop function that logs the elapsed time at debug level. */
  startTimer(label: string): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer [${label}]`, { duration, label });
      return duration;
    };
  }

  getLevel(): string {
    return this.formatLevel(this.config.level);
  }

  isLevelEnabled(level: LogLevel | string): boolean {
    const checkLevel = typeof level === 'string' ? parseLogLevel(level) : level;
    return this.shouldLog(checkLevel);
  }
}

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger =>
  new Logger({ ...loadLoggerConfig(), ...config });

export const logger = createLogger();
