// Core platform-agnostic exports

// Types
export * from "./types";

// Errors
export {
  NotFoundError,
  ConflictError,
  ValidationError,
  MetadataFieldCollisionError,
  hasErrorCode,
} from "./errors";

// Logging
export {
  LogLevel,
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV_VAR,
  parseLogLevel,
  logLevelName,
  getDefaultLogLevel,
  CatalogLogger,
} from "./logging";
export type { Logger } from "./logging";

// Metadata documents
export * from "./meta";

// Tables
export { Table, type ColumnInput } from "./tables/Table";
