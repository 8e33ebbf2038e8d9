/** Severity of a log line; a logger emits every level up to its own. */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

export const DEFAULT_LOG_LEVEL = LogLevel.INFO;

/** Environment variable holding the default log level. */
export const LOG_LEVEL_ENV_VAR = "CATALOG_LOG_LEVEL";

const LEVELS_BY_SEVERITY: readonly LogLevel[] = [
  LogLevel.ERROR,
  LogLevel.WARN,
  LogLevel.INFO,
  LogLevel.DEBUG,
  LogLevel.TRACE,
];

const LEVELS_BY_NAME: ReadonlyMap<string, LogLevel> = new Map([
  ["error", LogLevel.ERROR],
  ["warn", LogLevel.WARN],
  ["warning", LogLevel.WARN],
  ["info", LogLevel.INFO],
  ["debug", LogLevel.DEBUG],
  ["trace", LogLevel.TRACE],
]);

/**
 * Read a level name (`error` … `trace`, `warning` as an alias) or its number
 * (`0` … `4`). Case and surrounding whitespace are ignored.
 *
 * @returns the level, or `undefined` when `text` names none
 */
export function parseLogLevel(text: string): LogLevel | undefined {
  const key = text.trim().toLowerCase();
  if (/^[0-4]$/.test(key)) {
    return LEVELS_BY_SEVERITY[Number(key)];
  }
  return LEVELS_BY_NAME.get(key);
}

/** Upper-case name used in log prefixes, e.g. `WARN`. */
export function logLevelName(level: LogLevel): string {
  return LogLevel[level];
}

/**
 * Level from `CATALOG_LOG_LEVEL` in `env`; {@link DEFAULT_LOG_LEVEL} when the
 * variable is unset, empty or unreadable.
 */
export function getDefaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env[LOG_LEVEL_ENV_VAR];
  return (fromEnv === undefined ? undefined : parseLogLevel(fromEnv)) ?? DEFAULT_LOG_LEVEL;
}
