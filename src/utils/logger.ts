/**
 * @file logger.ts
 * @description Simple logging utility
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

/**
 * @function parseLogLevel
 * @description Maps a LOG_LEVEL string onto a LogLevel, defaulting to INFO
 */
export function parseLogLevel(value: string): LogLevel {
  switch (value.trim().toLowerCase()) {
    case "error":
      return LogLevel.ERROR;
    case "warn":
      return LogLevel.WARN;
    case "debug":
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

/**
 * @class Logger
 * @description Provides logging functionality with different levels
 */
export class Logger {
  private static readonly LOG_LEVELS = {
    ERROR: "ERROR",
    WARN: "WARN",
    INFO: "INFO",
    DEBUG: "DEBUG",
    SUCCESS: "SUCCESS",
  };

  private static level: LogLevel = LogLevel.INFO;

  /**
   * @method setLevel
   * @description Sets the most verbose level that still gets printed
   */
  public static setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * @method error
   * @description Log error messages
   */
  public static error(message: string, ...args: unknown[]): void {
    console.error(`[${this.LOG_LEVELS.ERROR}] ${message}`, ...args);
  }

  /**
   * @method warn
   * @description Log warning messages
   */
  public static warn(message: string, ...args: unknown[]): void {
    if (this.level < LogLevel.WARN) return;
    console.warn(`[${this.LOG_LEVELS.WARN}] ${message}`, ...args);
  }

  /**
   * @method info
   * @description Log info messages
   */
  public static info(message: string, ...args: unknown[]): void {
    if (this.level < LogLevel.INFO) return;
    console.info(`[${this.LOG_LEVELS.INFO}] ${message}`, ...args);
  }

  /**
   * @method success
   * @description Log a completed user-facing action
   */
  public static success(message: string, ...args: unknown[]): void {
    if (this.level < LogLevel.INFO) return;
    console.info(`[${this.LOG_LEVELS.SUCCESS}] ${message}`, ...args);
  }

  /**
   * @method debug
   * @description Log debug messages
   */
  public static debug(message: string, ...args: unknown[]): void {
    if (this.level < LogLevel.DEBUG) return;
    console.debug(`[${this.LOG_LEVELS.DEBUG}] ${message}`, ...args);
  }
}
