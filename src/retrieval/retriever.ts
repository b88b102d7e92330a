/**
 * Retriever
 *
 * Ties the document source, the embedding cache and the embedder together:
 * re-reads the document when it changes, keeps the cache current and ranks
 * passages for a question.
 */

import type { DocumentSource } from "../document/source.js";
import type { Embedder } from "../embeddings/types.js";
import { EmbeddingProviderError } from "../errors.js";
import type { EmbeddingCache, ScoredPassage } from "../types.js";
import type { EmbeddingCacheManager } from "./cache-manager.js";
import { searchPassages } from "./search.js";

export interface RetrieverOptions {
  source: DocumentSource;
  cacheManager: EmbeddingCacheManager;
  embedder: Embedder;
  topK: number;
}

export class Retriever {
  constructor(private readonly options: RetrieverOptions) {}

  /** Load the document and make sure its cache is current */
  async ensureReady(): Promise<EmbeddingCache> {
    const document = await this.options.source.load();
    return this.options.cacheManager.ensureCache(document);
  }

  /**
   * Build the cache at start-up. Failures are logged, not thrown: questions
   * keep failing with the same error until the cause is fixed.
   */
  async warmUp(): Promise<boolean> {
    try {
      const cache = await this.ensureReady();
      console.error(`✓ Retrieval ready: ${cache.entries.length} passages`);
      return true;
    } catch (error) {
      console.error(`❌ Could not prepare ${this.options.source.getPath()} for retrieval:`, error);
      return false;
    }
  }

  /**
   * Passages most relevant to a question (already in the retrieval language)
   */
  async retrieve(question: string, k: number = this.options.topK): Promise<ScoredPassage[]> {
    const cache = await this.ensureReady();

    let queryVector: number[];
    try {
      queryVector = await this.options.embedder.embedText(question);
    } catch (error) {
      if (error instanceof EmbeddingProviderError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new EmbeddingProviderError(`Query embedding failed: ${reason}`, { cause: error });
    }

    return searchPassages(queryVector, cache, k);
  }
}
