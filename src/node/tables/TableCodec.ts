import type { Table } from "../../core/tables/Table";
import type { TableFormat } from "../../core/types";

/**
 * Reads and writes a {@link Table} in one on-disk format. Both directions
 * also handle the table's `<base>.meta.json` sidecar.
 */
export interface TableCodec {
  readonly format: TableFormat;
  /** File extension including the leading dot, e.g. ".feather". */
  readonly extension: string;

  /** Write the data file at `dataPath` and its sidecar beside it. */
  write(table: Table, dataPath: string): Promise<void>;

  /**
   * Read the data file at `dataPath`. Metadata comes from the sidecar when
   * present; otherwise the table is named after the file.
   */
  read(dataPath: string): Promise<Table>;
}
