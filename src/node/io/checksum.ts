import { createHash, type Hash } from "crypto";
import { createReadStream } from "fs";
import { DEFAULT_CHECKSUM_CHUNK_SIZE } from "../../core/types";

/**
 * Stream `filePath` through an MD5 hash in chunks of `chunkSize` bytes.
 * Returns the un-finalised hash so callers can take the raw digest.
 * Rejects with the underlying I/O error (e.g. ENOENT) if the file cannot be read.
 */
export async function md5File(
  filePath: string,
  chunkSize: number = DEFAULT_CHECKSUM_CHUNK_SIZE
): Promise<Hash> {
  const hash = createHash("md5");
  const stream = createReadStream(filePath, { highWaterMark: chunkSize });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash;
}

/**
 * MD5 over the concatenated raw MD5 digests of `filePaths`, in the given
 * order, as lowercase hex. All-or-nothing: the first unreadable file rejects.
 */
export async function md5OfFileDigests(
  filePaths: readonly string[],
  chunkSize: number = DEFAULT_CHECKSUM_CHUNK_SIZE
): Promise<string> {
  const outer = createHash("md5");
  for (const filePath of filePaths) {
    const inner = await md5File(filePath, chunkSize);
    outer.update(inner.digest());
  }
  return outer.digest("hex");
}
