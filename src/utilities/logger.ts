import { LOG_LEVELS } from '../configuration/constants.js';
import { environment, isProduction, isTest } from '../configuration/environment.js';

export type LogLevel = keyof typeof LOG_LEVELS;
type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Suppress all output; defaults to on under test unless debug logging is enabled */
  silent?: boolean;
  /** Write every level to stderr, leaving stdout to report output */
  useStderr?: boolean;
}

export class Logger {
  private level: number;
  private readonly silent: boolean;
  private readonly useStderr: boolean;

  constructor(options: LoggerOptions = {}) {
    const defaultLevel: LogLevel = environment.ENABLE_DEBUG_LOGGING ? 'DEBUG' : 'INFO';
    this.level = LOG_LEVELS[options.level ?? defaultLevel];
    this.silent = options.silent ?? (isTest() && !environment.ENABLE_DEBUG_LOGGING);
    this.useStderr = options.useStderr ?? false;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.silent) {
      return false;
    }
    return LOG_LEVELS[level] <= this.level;
  }

  private formatLog(entry: LogEntry): string {
    const { timestamp, level, message, context } = entry;
    const base = `[${timestamp}] ${level}: ${message}`;

    if (!context || Object.keys(context).length === 0) {
      return base;
    }

    if (isProduction()) {
      return `${base} ${JSON.stringify(context)}`;
    }

    return `${base}\n${JSON.stringify(context, null, 2)}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context }),
    };

    const formattedLog = this.formatLog(entry);

    if (this.useStderr) {
      console.error(formattedLog);
      return;
    }

    switch (level) {
      case 'ERROR':
        console.error(formattedLog);
        break;
      case 'WARN':
        console.warn(formattedLog);
        break;
      default:
        console.log(formattedLog);
    }
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  setLevel(level: LogLevel): void {
    this.level = LOG_LEVELS[level];
  }
}

export const log = new Logger();

/** Logger for runs whose stdout must stay a single machine-readable document */
export const stderrLog = new Logger({ useStderr: true });
