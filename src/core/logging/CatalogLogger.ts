import { LogLevel, getDefaultLogLevel, logLevelName } from "./LogLevel";
import type { Logger } from "./Logger";

/**
 * Console-backed {@link Logger}.
 *
 * Every line is prefixed with `[LEVEL]` and, when set, `[context]`.
 * DEBUG and TRACE both go to `console.debug`.
 */
export class CatalogLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: string;

  constructor(level: LogLevel = getDefaultLogLevel(), context: string = "") {
    this.level = level;
    this.context = context;
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.log(LogLevel.TRACE, message, args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  createChild(context: string): Logger {
    return new CatalogLogger(
      this.level,
      `${this.context}${this.context ? "." : ""}${context}`
    );
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const prefix = `[${logLevelName(level)}]${this.context ? `[${this.context}]` : ""}`;

    switch (level) {
      case LogLevel.ERROR:
        console.error(prefix, message, ...args);
        break;
      case LogLevel.WARN:
        console.warn(prefix, message, ...args);
        break;
      case LogLevel.INFO:
        console.info(prefix, message, ...args);
        break;
      case LogLevel.DEBUG:
      case LogLevel.TRACE:
        console.debug(prefix, message, ...args);
        break;
    }
  }
}
