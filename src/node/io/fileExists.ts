import { access } from "fs/promises";
import { constants as fsConstants } from "fs";
import { hasErrorCode } from "../../core/errors";

/** True if `filePath` exists. Errors other than ENOENT/ENOTDIR propagate. */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, fsConstants.F_OK);
    return true;
  } catch (e) {
    if (hasErrorCode(e, "ENOENT") || hasErrorCode(e, "ENOTDIR")) {
      return false;
    }
    throw e;
  }
}
