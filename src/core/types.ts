import type { Logger } from "./logging/Logger";

/**
 * On-disk storage formats for a table.
 * Feather is the Arrow IPC file format; CSV is the row-oriented fallback.
 */
export type TableFormat = "feather" | "csv";

/** All supported formats, in lookup priority order. */
export const SUPPORTED_TABLE_FORMATS: readonly TableFormat[] = ["feather", "csv"];

export const DEFAULT_TABLE_FORMAT: TableFormat = "feather";

export function isTableFormat(value: string): value is TableFormat {
  return (SUPPORTED_TABLE_FORMATS as readonly string[]).includes(value);
}

/** A single cell. Missing values are `null`. */
export type CellValue = string | number | boolean | null;

/** Column element types a table can hold. */
export const COLUMN_TYPES = ["string", "number", "boolean"] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

/**
 * One named column of a {@link Table}.
 */
export interface Column {
  name: string;
  type: ColumnType;
  values: CellValue[];
}

/** Name of the metadata index inside every dataset directory. */
export const INDEX_FILE_NAME = "index.json";

/** Suffix of the per-table metadata sidecar, replacing the data file extension. */
export const SIDECAR_SUFFIX = ".meta.json";

/** Chunk size for streaming file digests (1 MiB). */
export const DEFAULT_CHECKSUM_CHUNK_SIZE = 2 ** 20;

/**
 * Options for opening or creating a {@link Dataset}.
 */
export interface DatasetOptions {
  /**
   * Logger to use. A `Dataset` child context is created from it.
   * Defaults to a {@link CatalogLogger} at the environment's log level.
   */
  logger?: Logger;

  /** Read size used when hashing files. Defaults to {@link DEFAULT_CHECKSUM_CHUNK_SIZE}. */
  checksumChunkSize?: number;
}
