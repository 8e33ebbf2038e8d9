export {
  LogLevel,
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV_VAR,
  parseLogLevel,
  logLevelName,
  getDefaultLogLevel,
} from "./LogLevel";
export type { Logger } from "./Logger";
export { CatalogLogger } from "./CatalogLogger";
