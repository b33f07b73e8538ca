/**
 * @file logger.ts
 * @description Level-filtered logging utility
 */

/**
 * @type LogLevel
 * @description Supported log levels, most severe first
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

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

  private static threshold: LogLevel = "info";

  /**
   * @method setLevel
   * @description Set the most verbose level that is still written
   */
  public static setLevel(level: string): void {
    if (Logger.isLogLevel(level)) {
      this.threshold = level;
    } else {
      this.warn(`Unknown log level "${level}", keeping "${this.threshold}"`);
    }
  }

  public static isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.threshold];
  }

  /**
   * @method error
   * @description Log error messages
   */
  public static error(message: string, ...args: unknown[]): void {
    if (!this.enabled("error")) return;
    console.error(`[${this.LOG_LEVELS.ERROR}] ${message}`, ...args);
  }

  /**
   * @method warn
   * @description Log warning messages
   */
  public static warn(message: string, ...args: unknown[]): void {
    if (!this.enabled("warn")) return;
    console.warn(`[${this.LOG_LEVELS.WARN}] ${message}`, ...args);
  }

  /**
   * @method info
   * @description Log info messages
   */
  public static info(message: string, ...args: unknown[]): void {
    if (!this.enabled("info")) return;
    console.info(`[${this.LOG_LEVELS.INFO}] ${message}`, ...args);
  }

  /**
   * @method success
   * @description Log a successful milestone (info level)
   */
  public static success(message: string, ...args: unknown[]): void {
    if (!this.enabled("info")) return;
    console.info(`[${this.LOG_LEVELS.SUCCESS}] ${message}`, ...args);
  }

  /**
   * @method debug
   * @description Log debug messages
   */
  public static debug(message: string, ...args: unknown[]): void {
    if (!this.enabled("debug")) return;
    console.debug(`[${this.LOG_LEVELS.DEBUG}] ${message}`, ...args);
  }
}
