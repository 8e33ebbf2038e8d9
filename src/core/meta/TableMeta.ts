import { ValidationError } from "../errors";
import type { Column, ColumnType } from "../types";
import {
  TableMetaJson,
  TableMetaJsonSchema,
  VariableMetaJson,
  parseJsonText,
  parseWithSchema,
} from "./schemas";
import { VariableMeta } from "./VariableMeta";

/**
 * Table names double as file base names inside a dataset directory, so they
 * are restricted to lowercase snake_case.
 */
export const TABLE_NAME_PATTERN = /^[a-z0-9_]+$/;

export function isValidTableName(name: string): boolean {
  return TABLE_NAME_PATTERN.test(name);
}

export interface TableMetaInit {
  shortName?: string;
  title?: string;
  description?: string;
  primaryKey?: string[];
  fields?: Map<string, VariableMeta> | Record<string, VariableMeta>;
}

const EMPTY_VARIABLE_META = new VariableMeta();

/**
 * Metadata of one table: its identity (`shortName`), descriptive text, the
 * primary key columns and per-column {@link VariableMeta}.
 */
export class TableMeta {
  shortName?: string;
  title?: string;
  description?: string;
  primaryKey: string[];
  fields: Map<string, VariableMeta>;

  constructor(init: TableMetaInit = {}) {
    this.shortName = init.shortName;
    this.title = init.title;
    this.description = init.description;
    this.primaryKey = [...(init.primaryKey ?? [])];
    this.fields =
      init.fields instanceof Map
        ? new Map(init.fields)
        : new Map(Object.entries(init.fields ?? {}));
  }

  /**
   * The table name, validated for use as a file base name.
   * @throws ValidationError if the name is missing or not snake_case
   */
  get checkedName(): string {
    if (this.shortName === undefined || this.shortName === "") {
      throw new ValidationError("table has no short name");
    }
    if (!isValidTableName(this.shortName)) {
      throw new ValidationError(
        `table name "${this.shortName}" must match ${TABLE_NAME_PATTERN.source}`
      );
    }
    return this.shortName;
  }

  static fromJSON(raw: unknown): TableMeta {
    return parseTableSidecar(raw).metadata;
  }

  static parse(text: string): TableMeta {
    return TableMeta.fromJSON(parseJsonText(text, "table metadata"));
  }

  toJSON(): TableMetaJson {
    const fields: Record<string, VariableMetaJson> = {};
    for (const [column, meta] of this.fields) {
      fields[column] = meta.toJSON();
    }
    return {
      short_name: this.shortName,
      title: this.title,
      description: this.description,
      primary_key: [...this.primaryKey],
      fields,
    };
  }

  /**
   * Field metadata equal to {@link VariableMeta} defaults counts as absent,
   * so a table read back from disk equals the one that was written.
   */
  equals(other: TableMeta): boolean {
    if (
      this.shortName !== other.shortName ||
      this.title !== other.title ||
      this.description !== other.description ||
      this.primaryKey.length !== other.primaryKey.length ||
      this.primaryKey.some((column, i) => column !== other.primaryKey[i])
    ) {
      return false;
    }
    const columns = new Set([...this.fields.keys(), ...other.fields.keys()]);
    for (const column of columns) {
      const mine = this.fields.get(column) ?? EMPTY_VARIABLE_META;
      const theirs = other.fields.get(column) ?? EMPTY_VARIABLE_META;
      if (!mine.equals(theirs)) {
        return false;
      }
    }
    return true;
  }

  clone(): TableMeta {
    return new TableMeta({
      shortName: this.shortName,
      title: this.title,
      description: this.description,
      primaryKey: this.primaryKey,
      fields: new Map(
        [...this.fields].map(([column, meta]) => [column, new VariableMeta(meta)])
      ),
    });
  }
}

/**
 * Contents of a `<table>.meta.json` sidecar: the table metadata plus the
 * storage type of each column, which row-oriented formats cannot carry.
 */
export interface TableSidecar {
  metadata: TableMeta;
  columnTypes: Map<string, ColumnType>;
}

export function parseTableSidecar(raw: unknown): TableSidecar {
  const json = parseWithSchema(TableMetaJsonSchema, raw, "table metadata");
  const fields = new Map<string, VariableMeta>();
  const columnTypes = new Map<string, ColumnType>();

  for (const [column, fieldJson] of Object.entries(json.fields)) {
    const meta = VariableMeta.fromJSON(fieldJson);
    if (!meta.isEmpty()) {
      fields.set(column, meta);
    }
    if (fieldJson.dtype !== undefined) {
      columnTypes.set(column, fieldJson.dtype);
    }
  }

  return {
    metadata: new TableMeta({
      shortName: json.short_name ?? undefined,
      title: json.title ?? undefined,
      description: json.description ?? undefined,
      primaryKey: json.primary_key,
      fields,
    }),
    columnTypes,
  };
}

/**
 * Build the sidecar document for a table: one `fields` entry per column,
 * in column order, each carrying its `dtype`.
 */
export function buildTableSidecar(metadata: TableMeta, columns: readonly Column[]): TableMetaJson {
  const fields: Record<string, VariableMetaJson> = {};
  for (const column of columns) {
    const meta = metadata.fields.get(column.name) ?? EMPTY_VARIABLE_META;
    fields[column.name] = { ...meta.toJSON(), dtype: column.type };
  }
  return { ...metadata.toJSON(), fields };
}
