/**
 * Embedding System Types
 */

export interface Embedder {
  /** Embed a single text */
  embedText(text: string): Promise<number[]>;

  /** Embed multiple texts in one call, one vector per text in input order */
  embedBatch(texts: string[]): Promise<number[][]>;

  /** Get embedding dimension, or null while it is not known yet */
  getDimension(): number | null;

  /** Model identifier stored with the cache so a model change forces a rebuild */
  getModelName(): string;
}
