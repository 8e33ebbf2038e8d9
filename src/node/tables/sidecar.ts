import { readFile } from "fs/promises";
import * as path from "path";
import { hasErrorCode } from "../../core/errors";
import { TableMeta, buildTableSidecar, parseTableSidecar, type TableSidecar } from "../../core/meta/TableMeta";
import { parseJsonText } from "../../core/meta/schemas";
import type { Table } from "../../core/tables/Table";
import { SIDECAR_SUFFIX } from "../../core/types";
import { writeFileAtomic } from "../io/atomicWrite";

/** Base name of a data file: its file name without the last extension. */
export function tableBaseName(dataPath: string): string {
  return path.basename(dataPath, path.extname(dataPath));
}

/**
 * Sidecar path for a data file: the last extension is replaced, so
 * `dir/dog.feather` maps to `dir/dog.meta.json`.
 */
export function sidecarPathFor(dataPath: string): string {
  return path.join(path.dirname(dataPath), `${tableBaseName(dataPath)}${SIDECAR_SUFFIX}`);
}

export async function writeSidecar(table: Table, dataPath: string): Promise<void> {
  const json = buildTableSidecar(table.metadata, table.columns);
  await writeFileAtomic(sidecarPathFor(dataPath), `${JSON.stringify(json, null, 2)}\n`);
}

/**
 * Read the sidecar of `dataPath`. A missing sidecar yields metadata named
 * after the data file and no column types.
 */
export async function readSidecar(dataPath: string): Promise<TableSidecar> {
  const sidecarPath = sidecarPathFor(dataPath);
  let text: string;
  try {
    text = await readFile(sidecarPath, "utf8");
  } catch (e) {
    if (hasErrorCode(e, "ENOENT")) {
      return {
        metadata: new TableMeta({ shortName: tableBaseName(dataPath) }),
        columnTypes: new Map(),
      };
    }
    throw e;
  }
  return parseTableSidecar(parseJsonText(text, sidecarPath));
}
