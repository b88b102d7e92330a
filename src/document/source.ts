/**
 * Document Source
 *
 * Reads the reference document, fingerprints it and extracts its text.
 * The file is read and hashed on every load; text is only extracted again
 * when the bytes changed.
 */

import { extname } from "path";
import mammoth from "mammoth";
import { IOError } from "../errors.js";
import type { SourceDocument } from "../types.js";
import { fingerprintFile } from "./fingerprint.js";

export class DocumentSource {
  private current: SourceDocument | null = null;

  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  /**
   * Return the current document, re-extracting it if the file changed
   *
   * @throws {IOError} if the file cannot be read or its text extracted
   */
  async load(): Promise<SourceDocument> {
    const { bytes, fingerprint } = await fingerprintFile(this.path);
    if (this.current && this.current.fingerprint === fingerprint) {
      return this.current;
    }

    const document: SourceDocument = {
      path: this.path,
      bytes,
      text: await extractText(this.path, bytes),
      fingerprint,
    };
    this.current = document;
    return document;
  }
}

/**
 * Plain text of a document: Word files through mammoth, anything else as UTF-8
 */
export async function extractText(path: string, bytes: Buffer): Promise<string> {
  if (extname(path).toLowerCase() !== ".docx") {
    return bytes.toString("utf8");
  }

  try {
    const result = await mammoth.extractRawText({ buffer: bytes });
    return result.value;
  } catch (error) {
    throw new IOError(`Cannot extract text from ${path}`, { cause: error });
  }
}
