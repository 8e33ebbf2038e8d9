import { readFile } from "fs/promises";
import { DatasetMeta } from "../../core/meta/DatasetMeta";
import { writeFileAtomic } from "../io/atomicWrite";

/**
 * Load a dataset metadata index. I/O errors (including ENOENT) propagate
 * unchanged; a malformed document raises `ValidationError`.
 */
export async function loadDatasetMeta(indexPath: string): Promise<DatasetMeta> {
  return DatasetMeta.parse(await readFile(indexPath, "utf8"));
}

/** Overwrite the index at `indexPath`. Last writer wins. */
export async function saveDatasetMeta(metadata: DatasetMeta, indexPath: string): Promise<void> {
  await writeFileAtomic(indexPath, metadata.stringify());
}
