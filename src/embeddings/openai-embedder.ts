/**
 * OpenAI Embedder
 *
 * Uses OpenAI API for embeddings (text-embedding-3-large by default)
 */

import type OpenAI from "openai";
import { EmbeddingProviderError } from "../errors.js";
import { describeOpenAIError } from "../openai.js";
import { normalize } from "../vector.js";
import type { Embedder } from "./types.js";

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;
  private dimension: number | null = null;

  constructor(client: OpenAI, model: string = "text-embedding-3-large") {
    this.client = client;
    this.model = model;
  }

  async embedText(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let data: Array<{ embedding: number[]; index: number }>;
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
      });
      data = response.data;
    } catch (error) {
      throw new EmbeddingProviderError(`OpenAI embedding request failed: ${describeOpenAIError(error)}`, {
        cause: error,
      });
    }

    if (data.length !== texts.length) {
      throw new EmbeddingProviderError(
        `OpenAI returned ${data.length} embeddings for ${texts.length} inputs`
      );
    }

    // Items carry their input index; order by it rather than trusting response order
    const embeddings = [...data].sort((a, b) => a.index - b.index).map((item) => normalize(item.embedding));
    this.dimension = embeddings[0].length;
    return embeddings;
  }

  getDimension(): number | null {
    return this.dimension;
  }

  getModelName(): string {
    return this.model;
  }
}
