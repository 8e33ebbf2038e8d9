/**
 * Directory-backed dataset store.
 *
 * ### On-disk layout
 *
 * ```
 * <dataset-dir>/
 *   index.json              dataset metadata (DatasetMeta)
 *   <table>.feather         Arrow IPC table data (preferred)
 *   <table>.csv             CSV table data (fallback)
 *   <table>.meta.json       per-table metadata sidecar
 * ```
 *
 * A directory is a dataset iff it holds `index.json`. Directories without
 * one are never adopted or removed.
 *
 * @module Dataset
 */

import { mkdir, readdir, rm, stat } from "fs/promises";
import type { Stats } from "fs";
import * as path from "path";
import { ConflictError, NotFoundError, ValidationError, hasErrorCode } from "../../core/errors";
import { CatalogLogger, type Logger } from "../../core/logging";
import { DATASET_META_FIELDS, DatasetMeta, type DatasetMetaFields } from "../../core/meta/DatasetMeta";
import { isValidTableName } from "../../core/meta/TableMeta";
import type { Table } from "../../core/tables/Table";
import {
  DEFAULT_CHECKSUM_CHUNK_SIZE,
  DEFAULT_TABLE_FORMAT,
  INDEX_FILE_NAME,
  SUPPORTED_TABLE_FORMATS,
  isTableFormat,
  type DatasetOptions,
} from "../../core/types";
import { md5OfFileDigests } from "../io/checksum";
import { fileExists } from "../io/fileExists";
import { TABLE_FORMATS, codecForFile, codecForFormat } from "../tables/formats";
import { sidecarPathFor } from "../tables/sidecar";
import type { TableCodec } from "../tables/TableCodec";
import { loadDatasetMeta, saveDatasetMeta } from "./indexFile";
import { installMetadataAccessors } from "./metadataAccessors";

/** Instance fields of {@link Dataset}; metadata fields must not reuse them. */
const DATASET_INSTANCE_FIELDS = ["path", "metadata", "logger", "checksumChunkSize"] as const;

interface DataFile {
  path: string;
  codec: TableCodec;
}

async function isLinkToFile(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (e) {
    if (hasErrorCode(e, "ENOENT") || hasErrorCode(e, "ENOTDIR")) {
      return false;
    }
    throw e;
  }
}

/**
 * Expose every {@link DatasetMeta} field as a property of `Dataset`.
 *
 * Runs once per process; later calls do nothing. `Dataset` calls it when the
 * first instance is created, so calling it at startup only moves a
 * {@link MetadataFieldCollisionError} earlier.
 */
export function installDatasetMetadataAccessors(): void {
  installMetadataAccessors(Dataset.prototype, DATASET_META_FIELDS, DATASET_INSTANCE_FIELDS);
}

// Metadata fields are forwarded to `this.metadata` by accessors installed on
// the prototype; this declaration gives them their types.
export interface Dataset extends DatasetMetaFields {}

/**
 * A folder of data tables with metadata at `index.json`.
 *
 * Not safe for concurrent writers; callers serialise access to a directory.
 */
export class Dataset {
  /** Directory of the dataset, as given by the caller. */
  readonly path: string;

  /** Metadata loaded from `index.json`; persisted by {@link save}. */
  metadata: DatasetMeta;

  private readonly logger: Logger;
  private readonly checksumChunkSize: number;

  private constructor(datasetPath: string, metadata: DatasetMeta, options: DatasetOptions) {
    installDatasetMetadataAccessors();
    this.path = datasetPath;
    this.metadata = metadata;
    this.logger = (options.logger ?? new CatalogLogger()).createChild("Dataset");
    this.checksumChunkSize = options.checksumChunkSize ?? DEFAULT_CHECKSUM_CHUNK_SIZE;
  }

  /**
   * Open an existing dataset.
   * @throws NotFoundError if `datasetPath` has no `index.json`
   */
  static async open(datasetPath: string, options: DatasetOptions = {}): Promise<Dataset> {
    const indexPath = path.join(datasetPath, INDEX_FILE_NAME);
    let metadata: DatasetMeta;
    try {
      metadata = await loadDatasetMeta(indexPath);
    } catch (e) {
      if (hasErrorCode(e, "ENOENT") || hasErrorCode(e, "ENOTDIR")) {
        throw new NotFoundError(indexPath, `No dataset index at ${indexPath}`);
      }
      throw e;
    }
    const dataset = new Dataset(datasetPath, metadata, options);
    dataset.logger.debug(`Opened dataset at ${datasetPath}`);
    return dataset;
  }

  /**
   * Create an empty dataset at `datasetPath` and open it.
   *
   * An existing dataset there is removed first. Any other existing directory
   * or file is left alone and a {@link ConflictError} is thrown.
   */
  static async createEmpty(
    datasetPath: string,
    metadata: DatasetMeta = new DatasetMeta(),
    options: DatasetOptions = {}
  ): Promise<Dataset> {
    const indexPath = path.join(datasetPath, INDEX_FILE_NAME);

    let existing: Stats | undefined;
    try {
      existing = await stat(datasetPath);
    } catch (e) {
      if (!hasErrorCode(e, "ENOENT")) {
        throw e;
      }
    }

    if (existing !== undefined) {
      if (!existing.isDirectory() || !(await fileExists(indexPath))) {
        throw new ConflictError(datasetPath, `Refusing to overwrite non-dataset path: ${datasetPath}`);
      }
      await rm(datasetPath, { recursive: true, force: true });
    }

    await mkdir(datasetPath, { recursive: true });
    await saveDatasetMeta(metadata, indexPath);
    return Dataset.open(datasetPath, options);
  }

  get indexFile(): string {
    return path.join(this.path, INDEX_FILE_NAME);
  }

  /** Write the in-memory metadata to `index.json`. */
  async save(): Promise<void> {
    await saveDatasetMeta(this.metadata, this.indexFile);
    this.logger.debug(`Saved index ${this.indexFile}`);
  }

  /**
   * Save `table` as `<name>.<format>` plus its sidecar, where the name is the
   * table's checked short name. Any copy of the same table in another format
   * is removed, so each name has a single data file.
   *
   * @param format "feather" (default) or "csv"
   * @throws ValidationError for any other format or an invalid table name
   */
  async add(table: Table, format: string = DEFAULT_TABLE_FORMAT): Promise<void> {
    if (!isTableFormat(format)) {
      throw new ValidationError(
        `format '${format}' is not supported (expected one of ${SUPPORTED_TABLE_FORMATS.join(", ")})`
      );
    }
    const name = table.metadata.checkedName;
    const codec = codecForFormat(format);
    const dataPath = this.dataPathFor(name, codec);

    await codec.write(table, dataPath);
    for (const other of TABLE_FORMATS) {
      if (other !== codec) {
        await rm(this.dataPathFor(name, other), { force: true });
      }
    }
    this.logger.debug(`Added table ${name} (${format}, ${table.numRows} rows)`);
  }

  /**
   * Load a table by name, preferring Feather over CSV.
   * @throws NotFoundError if no data file exists for `name`
   */
  async get(name: string): Promise<Table> {
    const found = await this.findDataFile(name);
    if (found === undefined) {
      throw new NotFoundError(name, `Table not found: ${name}`);
    }
    return found.codec.read(found.path);
  }

  /** Whether a data file exists for `name`. Does not read it. */
  async contains(name: string): Promise<boolean> {
    return (await this.findDataFile(name)) !== undefined;
  }

  /** Number of data files; none are decoded. */
  async count(): Promise<number> {
    return (await this.dataFiles()).length;
  }

  /** Base names of the data files, sorted by file name. */
  async tableNames(): Promise<string[]> {
    return (await this.dataFiles()).map((file) => path.basename(file.path, file.codec.extension));
  }

  /**
   * Decode every data file, in file name order, one at a time.
   * Each call lists the directory afresh.
   */
  async *tables(): AsyncGenerator<Table, void, undefined> {
    for (const file of await this.dataFiles()) {
      yield await file.codec.read(file.path);
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<Table, void, undefined> {
    return this.tables();
  }

  /**
   * MD5 checksum of all data and metadata in the dataset, as lowercase hex.
   *
   * The digest is MD5 over the concatenated raw MD5 digests of `index.json`
   * followed by, for each data file in file name order, the data file and
   * its `.meta.json` sidecar. A missing sidecar rejects with ENOENT.
   */
  async checksum(): Promise<string> {
    const files = [this.indexFile];
    for (const file of await this.dataFiles()) {
      files.push(file.path, sidecarPathFor(file.path));
    }
    const digest = await md5OfFileDigests(files, this.checksumChunkSize);
    this.logger.debug(`Checksum over ${files.length} files: ${digest}`);
    return digest;
  }

  private dataPathFor(name: string, codec: TableCodec): string {
    return path.join(this.path, `${name}${codec.extension}`);
  }

  private async findDataFile(name: string): Promise<DataFile | undefined> {
    if (!isValidTableName(name)) {
      return undefined;
    }
    for (const codec of TABLE_FORMATS) {
      const dataPath = this.dataPathFor(name, codec);
      if (await fileExists(dataPath)) {
        return { path: dataPath, codec };
      }
    }
    return undefined;
  }

  /**
   * Data files of every format, sorted by file name. Symlinks count when
   * they resolve to a regular file, as they do for {@link contains}.
   */
  private async dataFiles(): Promise<DataFile[]> {
    const entries = await readdir(this.path, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const files: DataFile[] = [];
    for (const entry of entries) {
      const codec = codecForFile(entry.name);
      if (codec === undefined) {
        continue;
      }
      const dataPath = path.join(this.path, entry.name);
      if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(dataPath)))) {
        files.push({ path: dataPath, codec });
      }
    }
    return files;
  }
}
