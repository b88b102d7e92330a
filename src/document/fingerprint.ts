/**
 * Document Fingerprinting
 */

import { createHash } from "crypto";
import { readFile } from "fs/promises";
import { IOError } from "../errors.js";

export interface FingerprintedFile {
  bytes: Buffer;
  fingerprint: string;
}

/**
 * SHA-256 hex digest of raw document bytes
 */
export function fingerprint(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Read a file and fingerprint its bytes
 *
 * @throws {IOError} if the file cannot be read
 */
export async function fingerprintFile(path: string): Promise<FingerprintedFile> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new IOError(`Cannot read document at ${path}`, { cause: error });
  }
  return { bytes, fingerprint: fingerprint(bytes) };
}
