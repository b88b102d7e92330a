/**
 * Embedding Cache Store
 *
 * Persists the embedding cache as one JSON file. Vectors are stored as
 * base64-encoded little-endian 32-bit floats. Writes go to a temporary file
 * in the same directory which is then renamed over the previous cache, so
 * readers see either the old cache or the new one, never a partial file.
 */

import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { nanoid } from "nanoid";
import { z } from "zod";
import { CacheCorruptionError } from "../errors.js";
import type { EmbeddingCache } from "../types.js";
import { blobToVector, vectorToBlob } from "../vector.js";

const CACHE_FORMAT_VERSION = 1;

const CacheFileSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  meta: z.object({
    fingerprint: z.string().min(1),
    model: z.string().min(1),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    dimension: z.number().int().positive(),
    createdAt: z.number(),
    embEncoding: z.literal("f32-base64"),
  }),
  passages: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        text: z.string(),
        emb: z.string(),
      })
    )
    .min(1),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

export class EmbeddingCacheStore {
  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  /**
   * Read the persisted cache
   *
   * @returns the cache, or null when no cache file exists
   * @throws {CacheCorruptionError} if the file exists but cannot be used
   */
  async load(): Promise<EmbeddingCache | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CacheCorruptionError(`Cannot read embedding cache at ${this.path}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptionError(`Embedding cache at ${this.path} is not valid JSON`, { cause: error });
    }

    const parsed = CacheFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheCorruptionError(
        `Embedding cache at ${this.path} is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
        { cause: parsed.error }
      );
    }

    return this.decode(parsed.data);
  }

  /**
   * Atomically replace the persisted cache
   */
  async save(cache: EmbeddingCache): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });

    const tempPath = join(dir, `.${basename(this.path)}.${nanoid(8)}.tmp`);
    try {
      await writeFile(tempPath, JSON.stringify(this.encode(cache)));
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private encode(cache: EmbeddingCache): CacheFile {
    return {
      version: CACHE_FORMAT_VERSION,
      meta: {
        fingerprint: cache.fingerprint,
        model: cache.model,
        chunkSize: cache.chunkSize,
        chunkOverlap: cache.chunkOverlap,
        dimension: cache.dimension,
        createdAt: cache.createdAt,
        embEncoding: "f32-base64",
      },
      passages: cache.entries.map((entry) => ({
        index: entry.passage.index,
        text: entry.passage.text,
        emb: vectorToBlob(entry.vector).toString("base64"),
      })),
    };
  }

  private decode(file: CacheFile): EmbeddingCache {
    const { meta } = file;
    const entries = file.passages.map((item, position) => {
      if (item.index !== position) {
        throw new CacheCorruptionError(
          `Embedding cache at ${this.path} has passage index ${item.index} at position ${position}`
        );
      }
      const blob = Buffer.from(item.emb, "base64");
      if (blob.byteLength !== meta.dimension * 4) {
        throw new CacheCorruptionError(
          `Embedding cache at ${this.path} has a vector of ${blob.byteLength} bytes for passage ${item.index}, expected ${meta.dimension * 4}`
        );
      }
      return { passage: { index: item.index, text: item.text }, vector: blobToVector(blob) };
    });

    return {
      fingerprint: meta.fingerprint,
      model: meta.model,
      chunkSize: meta.chunkSize,
      chunkOverlap: meta.chunkOverlap,
      dimension: meta.dimension,
      createdAt: meta.createdAt,
      entries,
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
