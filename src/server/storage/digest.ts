import { createHash, type Hash } from "node:crypto";
import type { TextSource } from "./text-source";

/** SHA-256, 32 bytes. */
export const DIGEST_SIZE = 32;

export function createDigest(): Hash {
  return createHash("sha256");
}

/** Digest of the whole source file, streamed in scan-sized chunks. */
export function digestFile(source: TextSource): Buffer {
  const hash = createDigest();
  source.scan(chunk => hash.update(chunk));
  return hash.digest();
}

export function digestsEqual(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a.buffer, a.byteOffset, a.byteLength)
    .equals(Buffer.from(b.buffer, b.byteOffset, b.byteLength));
}

export function toHex(digest: Uint8Array): string {
  return Buffer.from(digest.buffer, digest.byteOffset, digest.byteLength).toString("hex");
}
