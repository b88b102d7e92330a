/**
 * Embedding Cache Manager
 *
 * Keeps the (passage, vector) cache of the reference document in sync with
 * the document. A cache is reused only while the document fingerprint, the
 * embedding model and the chunking parameters all match; otherwise it is
 * rebuilt in full and persisted before it is used.
 */

import { chunkText, type ChunkOptions } from "../document/chunker.js";
import type { Embedder } from "../embeddings/types.js";
import { CacheCorruptionError, EmbeddingProviderError, EmptyDocumentError } from "../errors.js";
import type { CacheEntry, EmbeddingCache, SourceDocument } from "../types.js";
import type { EmbeddingCacheStore } from "./cache-store.js";

export interface CacheManagerOptions {
  store: EmbeddingCacheStore;
  embedder: Embedder;
  chunking: ChunkOptions;
  /** Maximum passages per embedding request */
  batchSize: number;
}

export class EmbeddingCacheManager {
  private readonly store: EmbeddingCacheStore;
  private readonly embedder: Embedder;
  private readonly chunking: ChunkOptions;
  private readonly batchSize: number;
  private current: EmbeddingCache | null = null;

  constructor(options: CacheManagerOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    this.store = options.store;
    this.embedder = options.embedder;
    this.chunking = options.chunking;
    this.batchSize = options.batchSize;
  }

  /**
   * Return a cache valid for the document, building it if needed
   *
   * @throws {EmptyDocumentError} if the document has no text to chunk
   * @throws {EmbeddingProviderError} if embedding fails; the previous cache is kept
   */
  async ensureCache(document: SourceDocument): Promise<EmbeddingCache> {
    if (this.current && this.isValidFor(this.current, document)) {
      return this.current;
    }

    const stored = await this.loadStored();
    if (stored && this.isValidFor(stored, document)) {
      console.error(`✓ Loaded cached embeddings from ${this.store.getPath()} (${stored.entries.length} passages)`);
      this.current = stored;
      return stored;
    }

    const cache = await this.build(document);
    await this.store.save(cache);
    console.error(`✓ Saved embeddings cache to ${this.store.getPath()}`);
    this.current = cache;
    return cache;
  }

  private isValidFor(cache: EmbeddingCache, document: SourceDocument): boolean {
    return (
      cache.fingerprint === document.fingerprint &&
      cache.model === this.embedder.getModelName() &&
      cache.chunkSize === this.chunking.maxChars &&
      cache.chunkOverlap === this.chunking.overlap
    );
  }

  private async loadStored(): Promise<EmbeddingCache | null> {
    try {
      return await this.store.load();
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      console.error(`ℹ️  ${error.message}; rebuilding`);
      return null;
    }
  }

  private async build(document: SourceDocument): Promise<EmbeddingCache> {
    const passages = chunkText(document.text, this.chunking);
    if (passages.length === 0) {
      throw new EmptyDocumentError(`Document at ${document.path} has no text to index`);
    }

    console.error(`⏳ Building embeddings for ${passages.length} passages of ${document.path}`);
    const startTime = Date.now();

    const vectors: number[][] = [];
    for (let i = 0; i < passages.length; i += this.batchSize) {
      const batch = passages.slice(i, i + this.batchSize);
      const embeddings = await this.embedBatch(batch.map((p) => p.text));
      if (embeddings.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Embedding provider returned ${embeddings.length} vectors for ${batch.length} passages`
        );
      }
      vectors.push(...embeddings);

      if (passages.length > this.batchSize) {
        console.error(`  Progress: ${vectors.length}/${passages.length} passages embedded`);
      }
    }

    const dimension = vectors[0].length;
    if (dimension === 0 || vectors.some((vector) => vector.length !== dimension)) {
      throw new EmbeddingProviderError("Embedding provider returned vectors of inconsistent dimension");
    }

    const entries: CacheEntry[] = passages.map((passage, i) => ({ passage, vector: vectors[i] }));
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.error(`✓ Embedded ${entries.length} passages in ${elapsed}s`);

    return {
      fingerprint: document.fingerprint,
      model: this.embedder.getModelName(),
      chunkSize: this.chunking.maxChars,
      chunkOverlap: this.chunking.overlap,
      dimension,
      createdAt: Date.now(),
      entries,
    };
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    try {
      return await this.embedder.embedBatch(texts);
    } catch (error) {
      if (error instanceof EmbeddingProviderError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new EmbeddingProviderError(`Embedding provider failed: ${reason}`, { cause: error });
    }
  }
}
