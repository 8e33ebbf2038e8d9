import { ValidationError } from "../errors";
import { TableMeta, type TableMetaInit } from "../meta/TableMeta";
import type { CellValue, Column, ColumnType } from "../types";

/**
 * Column as passed to the {@link Table} constructor. When `type` is omitted
 * it is inferred from the first non-null value; an all-null column is a
 * string column.
 */
export interface ColumnInput {
  name: string;
  values: readonly CellValue[];
  type?: ColumnType;
}

function cellType(value: Exclude<CellValue, null>): ColumnType {
  if (typeof value === "string") {
    return "string";
  }
  return typeof value === "number" ? "number" : "boolean";
}

/** Cell equality: NaN matches NaN and -0 matches 0. */
function sameCell(a: CellValue, b: CellValue): boolean {
  return a === b || (typeof a === "number" && typeof b === "number" && Number.isNaN(a) && Number.isNaN(b));
}

function toColumn(input: ColumnInput): Column {
  let type = input.type;
  for (const [row, value] of input.values.entries()) {
    if (value === null) {
      continue;
    }
    const actual = cellType(value);
    if (type === undefined) {
      type = actual;
    } else if (actual !== type) {
      throw new ValidationError(
        `column "${input.name}" is of type ${type} but row ${row} holds a ${actual}`
      );
    }
  }
  return { name: input.name, type: type ?? "string", values: [...input.values] };
}

/**
 * An in-memory, column-oriented table with its metadata.
 *
 * The table's identity inside a dataset is `metadata.shortName`; see
 * {@link TableMeta.checkedName}.
 */
export class Table {
  readonly columns: readonly Column[];
  readonly metadata: TableMeta;
  readonly numRows: number;

  /**
   * @throws ValidationError on duplicate column names, columns of unequal
   * length, mixed value types in a column, or metadata naming unknown columns
   */
  constructor(columns: readonly ColumnInput[], metadata: TableMeta | TableMetaInit = {}) {
    const built = columns.map(toColumn);
    const names = new Set<string>();
    for (const column of built) {
      if (names.has(column.name)) {
        throw new ValidationError(`duplicate column "${column.name}"`);
      }
      names.add(column.name);
    }

    const numRows = built.length > 0 ? built[0].values.length : 0;
    for (const column of built) {
      if (column.values.length !== numRows) {
        throw new ValidationError(
          `column "${column.name}" has ${column.values.length} rows, expected ${numRows}`
        );
      }
    }

    const meta = metadata instanceof TableMeta ? metadata.clone() : new TableMeta(metadata);
    for (const key of meta.primaryKey) {
      if (!names.has(key)) {
        throw new ValidationError(`primary key column "${key}" is not in the table`);
      }
    }
    for (const field of meta.fields.keys()) {
      if (!names.has(field)) {
        throw new ValidationError(`metadata describes unknown column "${field}"`);
      }
    }

    this.columns = built;
    this.metadata = meta;
    this.numRows = numRows;
  }

  /**
   * Build a table from row records. Column order follows `columnNames`, or
   * the keys of the first record when omitted; missing keys become `null`.
   */
  static fromRecords(
    records: readonly Record<string, CellValue>[],
    metadata: TableMeta | TableMetaInit = {},
    columnNames?: readonly string[]
  ): Table {
    const names = columnNames ?? (records.length > 0 ? Object.keys(records[0]) : []);
    return new Table(
      names.map((name) => ({ name, values: records.map((record) => record[name] ?? null) })),
      metadata
    );
  }

  get name(): string | undefined {
    return this.metadata.shortName;
  }

  get columnNames(): string[] {
    return this.columns.map((column) => column.name);
  }

  column(name: string): Column | undefined {
    return this.columns.find((column) => column.name === name);
  }

  /** Rows as records keyed by column name. */
  records(): Record<string, CellValue>[] {
    const rows: Record<string, CellValue>[] = [];
    for (let i = 0; i < this.numRows; i++) {
      const row: Record<string, CellValue> = {};
      for (const column of this.columns) {
        row[column.name] = column.values[i];
      }
      rows.push(row);
    }
    return rows;
  }

  /**
   * Content equality: same columns in the same order, same types, same
   * values compared with `===` except that NaN equals NaN, and equal metadata.
   */
  equals(other: Table): boolean {
    if (this.numRows !== other.numRows || this.columns.length !== other.columns.length) {
      return false;
    }
    for (const [i, column] of this.columns.entries()) {
      const theirs = other.columns[i];
      if (column.name !== theirs.name || column.type !== theirs.type) {
        return false;
      }
      if (column.values.some((value, row) => !sameCell(value, theirs.values[row]))) {
        return false;
      }
    }
    return this.metadata.equals(other.metadata);
  }
}
