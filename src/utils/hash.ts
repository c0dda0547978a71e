import { createHash } from "node:crypto";

/** Hex MD5 of the raw bytes. Used as the document key. */
export function contentHash(data: Buffer | string): string {
  return createHash("md5").update(data).digest("hex");
}

export function shortHash(hash: string): string {
  return hash.slice(0, 12);
}
