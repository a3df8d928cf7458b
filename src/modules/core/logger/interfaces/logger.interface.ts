export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4,
}

export interface LoggerInterface {
  error(message: string, context?: string, ...args: unknown[]): void;
  warn(message: string, context?: string, ...args: unknown[]): void;
  info(message: string, context?: string, ...args: unknown[]): void;
  debug(message: string, context?: string, ...args: unknown[]): void;
  verbose(message: string, context?: string, ...args: unknown[]): void;
  structured(
    event: string,
    fields: Record<string, unknown>,
    context?: string,
  ): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  filePath?: string;
}
