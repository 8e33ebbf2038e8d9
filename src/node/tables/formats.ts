import * as path from "path";
import type { TableFormat } from "../../core/types";
import { CsvCodec } from "./CsvCodec";
import { FeatherCodec } from "./FeatherCodec";
import type { TableCodec } from "./TableCodec";

/**
 * Table formats in lookup priority order. When a table exists in more than
 * one format, the first entry wins for `get` and `contains`.
 */
export const TABLE_FORMATS: readonly TableCodec[] = [new FeatherCodec(), new CsvCodec()];

export function codecForFormat(format: TableFormat): TableCodec {
  const codec = TABLE_FORMATS.find((c) => c.format === format);
  if (codec === undefined) {
    throw new Error(`No codec registered for format ${format}`);
  }
  return codec;
}

/** Codec whose extension matches `fileName`, if any. */
export function codecForFile(fileName: string): TableCodec | undefined {
  const extension = path.extname(fileName);
  return TABLE_FORMATS.find((c) => c.extension === extension);
}
