import { readFile } from "fs/promises";
import {
  Bool,
  DataType,
  Float64,
  Table as ArrowTable,
  Type,
  Utf8,
  tableFromIPC,
  tableToIPC,
  vectorFromArray,
  type Vector,
} from "apache-arrow";
import { ValidationError } from "../../core/errors";
import { Table, type ColumnInput } from "../../core/tables/Table";
import type { CellValue, Column, ColumnType } from "../../core/types";
import { writeFileAtomic } from "../io/atomicWrite";
import { readSidecar, writeSidecar } from "./sidecar";
import type { TableCodec } from "./TableCodec";

function toVector(column: Column): Vector {
  switch (column.type) {
    case "number":
      return vectorFromArray(
        column.values.map((v) => (typeof v === "number" ? v : null)),
        new Float64()
      );
    case "boolean":
      return vectorFromArray(
        column.values.map((v) => (typeof v === "boolean" ? v : null)),
        new Bool()
      );
    case "string":
      return vectorFromArray(
        column.values.map((v) => (typeof v === "string" ? v : null)),
        new Utf8()
      );
  }
}

function columnTypeOf(name: string, type: DataType): ColumnType {
  switch (type.typeId) {
    case Type.Utf8:
    case Type.Dictionary:
      return "string";
    case Type.Float:
    case Type.Int:
      return "number";
    case Type.Bool:
      return "boolean";
    default:
      throw new ValidationError(`column "${name}" has unsupported Arrow type ${type.toString()}`);
  }
}

function toCell(raw: unknown): CellValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === "bigint") {
    return Number(raw);
  }
  if (typeof raw === "number" || typeof raw === "string" || typeof raw === "boolean") {
    return raw;
  }
  return String(raw);
}

/**
 * Feather (Arrow IPC file format, a.k.a. Feather v2) codec.
 * Columns are stored as Utf8, Float64 or Bool; on read, integer columns and
 * dictionary-encoded strings written by other tools are accepted too.
 */
export class FeatherCodec implements TableCodec {
  readonly format = "feather" as const;
  readonly extension = ".feather";

  encode(table: Table): Uint8Array {
    const vectors: Record<string, Vector> = {};
    for (const column of table.columns) {
      vectors[column.name] = toVector(column);
    }
    return tableToIPC(new ArrowTable(vectors), "file");
  }

  decode(data: Uint8Array): ColumnInput[] {
    const arrow = tableFromIPC(data);
    return arrow.schema.fields.map((field, index) => {
      const vector = arrow.getChildAt(index);
      const values: CellValue[] = [];
      if (vector !== null) {
        for (let row = 0; row < vector.length; row++) {
          values.push(toCell(vector.get(row)));
        }
      }
      return { name: field.name, type: columnTypeOf(field.name, field.type), values };
    });
  }

  async write(table: Table, dataPath: string): Promise<void> {
    await writeFileAtomic(dataPath, this.encode(table));
    await writeSidecar(table, dataPath);
  }

  async read(dataPath: string): Promise<Table> {
    const columns = this.decode(await readFile(dataPath));
    const { metadata } = await readSidecar(dataPath);
    return new Table(columns, metadata);
  }
}
