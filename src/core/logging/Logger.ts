import { LogLevel } from "./LogLevel";

/**
 * Logger interface used throughout the catalog.
 * Provides leveled logging with a hierarchical context.
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;

  /**
   * Log a debug message (verbose).
   */
  debug(message: string, ...args: unknown[]): void;

  /**
   * Log a trace message (most verbose).
   */
  trace(message: string, ...args: unknown[]): void;

  /**
   * Check if a log level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Create a child logger with additional context.
   * Contexts are joined with dots, e.g. "Catalog.Dataset".
   */
  createChild(context: string): Logger;
}
