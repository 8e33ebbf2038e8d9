import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { ValidationError } from "../../core/errors";
import { Table, type ColumnInput } from "../../core/tables/Table";
import type { CellValue, ColumnType } from "../../core/types";
import { writeFileAtomic } from "../io/atomicWrite";
import { readSidecar, writeSidecar } from "./sidecar";
import type { TableCodec } from "./TableCodec";

function isRowList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

function isNumericText(text: string): boolean {
  return text.trim() !== "" && !Number.isNaN(Number(text));
}

/**
 * Guess a column type from its non-empty cells: all `true`/`false` is
 * boolean, all numeric is number, anything else is string.
 */
export function inferColumnType(cells: readonly string[]): ColumnType {
  const present = cells.filter((cell) => cell !== "");
  if (present.length === 0) {
    return "string";
  }
  if (present.every((cell) => cell === "true" || cell === "false")) {
    return "boolean";
  }
  if (present.every(isNumericText)) {
    return "number";
  }
  return "string";
}

function toCell(text: string, type: ColumnType): CellValue {
  if (text === "") {
    return null;
  }
  switch (type) {
    case "number":
      return Number(text);
    case "boolean":
      return text === "true";
    case "string":
      return text;
  }
}

/**
 * CSV codec. The first line is the header; empty cells read back as `null`,
 * so an empty string in a string column does not survive a round trip. A
 * table without columns is an empty file.
 * Column types come from the sidecar's `dtype` entries, or are inferred.
 */
export class CsvCodec implements TableCodec {
  readonly format = "csv" as const;
  readonly extension = ".csv";

  encode(table: Table): string {
    // A bare header line would read back as one unnamed column.
    if (table.columns.length === 0) {
      return "";
    }
    return stringify(table.records(), {
      header: true,
      columns: table.columnNames,
      cast: { boolean: (value: boolean) => (value ? "true" : "false") },
    });
  }

  decode(text: string, columnTypes: ReadonlyMap<string, ColumnType> = new Map()): ColumnInput[] {
    const rows: unknown = parse(text, { relax_column_count: false });
    if (!isRowList(rows)) {
      throw new ValidationError("CSV did not parse into rows of text cells");
    }
    if (rows.length === 0) {
      return [];
    }
    const [header, ...body] = rows;
    return header.map((name, index) => {
      const cells = body.map((row) => row[index]);
      const type = columnTypes.get(name) ?? inferColumnType(cells);
      return { name, type, values: cells.map((cell) => toCell(cell, type)) };
    });
  }

  async write(table: Table, dataPath: string): Promise<void> {
    await writeFileAtomic(dataPath, this.encode(table));
    await writeSidecar(table, dataPath);
  }

  async read(dataPath: string): Promise<Table> {
    const text = await readFile(dataPath, "utf8");
    const { metadata, columnTypes } = await readSidecar(dataPath);
    return new Table(this.decode(text, columnTypes), metadata);
  }
}
