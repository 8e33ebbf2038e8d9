import { open, rename, rm } from "fs/promises";
import { v7 as uuidv7 } from "uuid";

/**
 * Temp path beside `finalPath`. The suffix never ends in a table or index
 * extension, so a leftover temp file is invisible to dataset listings.
 */
export function tempPathFor(finalPath: string): string {
  return `${finalPath}.tmp-${process.pid}-${uuidv7()}`;
}

/**
 * Write `data` to `finalPath` via temp file + fsync + rename, so readers see
 * either the old or the new content. The temp file is removed if the write fails.
 */
export async function writeFileAtomic(finalPath: string, data: string | Uint8Array): Promise<void> {
  const tmpPath = tempPathFor(finalPath);
  try {
    const handle = await open(tmpPath, "w");
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, finalPath);
  } catch (e) {
    await rm(tmpPath, { force: true });
    throw e;
  }
}
