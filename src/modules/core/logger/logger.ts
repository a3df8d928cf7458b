import { appendFileSync } from 'fs';
import {
  LoggerInterface,
  LoggerOptions,
  LogLevel,
} from './interfaces/logger.interface';

export class Logger implements LoggerInterface {
  private static instance: Logger;
  private level: LogLevel;
  private context?: string;
  private filePath?: string;
  private droppedLines = 0;

  private constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.level = options.level ?? this.getLogLevelFromEnv();
    this.filePath = options.filePath ?? process.env.LOG_FILE;
  }

  public static getInstance(options?: LoggerOptions): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(options);
    }
    return Logger.instance;
  }

  /** Only for tests and one-off tools that need an isolated logger. */
  public static create(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /** Lines lost because a sink threw while writing. */
  public getDroppedLines(): number {
    return this.droppedLines;
  }

  private getLogLevelFromEnv(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    switch (envLevel) {
      case 'ERROR':
        return LogLevel.ERROR;
      case 'WARN':
        return LogLevel.WARN;
      case 'INFO':
        return LogLevel.INFO;
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'VERBOSE':
        return LogLevel.VERBOSE;
      default:
        return LogLevel.INFO;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  public formatMessage(
    level: string,
    message: string,
    context?: string,
    timestamp: Date = new Date(),
  ): string {
    const contextStr = context || this.context || '';
    const contextPrefix = contextStr ? `[${contextStr}]` : '';
    return `${timestamp.toISOString()} [${level}]${contextPrefix} ${message}`;
  }

  private write(level: LogLevel, line: string, args: unknown[]): void {
    try {
      if (level === LogLevel.ERROR) {
        console.error(line, ...args);
      } else if (level === LogLevel.WARN) {
        console.warn(line, ...args);
      } else {
        console.log(line, ...args);
      }
      if (this.filePath) {
        const extra = args.length
          ? ` ${args.map((arg) => stringifyArg(arg)).join(' ')}`
          : '';
        appendFileSync(this.filePath, `${line}${extra}\n`);
      }
    } catch {
      // a broken sink must never reach the caller
      this.droppedLines += 1;
    }
  }

  private log(
    level: LogLevel,
    levelName: string,
    message: string,
    context?: string,
    ...args: unknown[]
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.write(level, this.formatMessage(levelName, message, context), args);
  }

  public error(message: string, context?: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, 'ERROR', message, context, ...args);
  }

  public warn(message: string, context?: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, 'WARN', message, context, ...args);
  }

  public info(message: string, context?: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, 'INFO', message, context, ...args);
  }

  public debug(message: string, context?: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, 'DEBUG', message, context, ...args);
  }

  public verbose(message: string, context?: string, ...args: unknown[]): void {
    this.log(LogLevel.VERBOSE, 'VERBOSE', message, context, ...args);
  }

  /**
   * Emits one machine-readable record whatever the configured level:
   * `<timestamp> [INFO][context] <event> {"key":"value",...}`.
   */
  public structured(
    event: string,
    fields: Record<string, unknown>,
    context?: string,
  ): void {
    let payload: string;
    try {
      payload = JSON.stringify({ timestamp: new Date().toISOString(), ...fields });
    } catch (error) {
      payload = JSON.stringify({
        unserializable: error instanceof Error ? error.message : String(error),
      });
    }
    this.write(
      LogLevel.INFO,
      this.formatMessage('INFO', `${event} ${payload}`, context),
      [],
    );
  }
}

function stringifyArg(arg: unknown): string {
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.message;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export const logger = Logger.getInstance();
