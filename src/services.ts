/**
 * Services
 *
 * Everything the bot handlers need, built once at start-up and passed
 * explicitly. The database handle and the cache file are owned here.
 */

import { Assistant } from "./assistant.js";
import type { Config } from "./config.js";
import { initDatabase, type DB } from "./database.js";
import { DocumentSource } from "./document/source.js";
import { OpenAIEmbedder } from "./embeddings/openai-embedder.js";
import { createOpenAIClient, OpenAIChatCompleter } from "./openai.js";
import { QAEngine } from "./qa.js";
import { EmbeddingCacheManager } from "./retrieval/cache-manager.js";
import { EmbeddingCacheStore } from "./retrieval/cache-store.js";
import { Retriever } from "./retrieval/retriever.js";
import { Translator } from "./translation.js";

export interface Services {
  config: Config;
  db: DB;
  retriever: Retriever;
  assistant: Assistant;
}

export function createServices(config: Config): Services {
  const client = createOpenAIClient({
    apiKey: config.openai.apiKey,
    timeoutMs: config.openai.timeoutMs,
    maxRetries: config.openai.maxRetries,
  });
  const completer = new OpenAIChatCompleter(client);
  const embedder = new OpenAIEmbedder(client, config.embedding.model);
  console.error(`✓ Using OpenAI embeddings (${config.embedding.model})`);

  const retriever = new Retriever({
    source: new DocumentSource(config.docPath),
    cacheManager: new EmbeddingCacheManager({
      store: new EmbeddingCacheStore(config.embeddingsCachePath),
      embedder,
      chunking: { maxChars: config.chunkSize, overlap: config.chunkOverlap },
      batchSize: config.embedding.batchSize,
    }),
    embedder,
    topK: config.topK,
  });

  const translator = new Translator({
    completer,
    model: config.openai.translationModel,
    retrievalLanguage: config.retrievalLanguage,
  });

  const qa = new QAEngine({
    retriever,
    completer,
    model: config.openai.qaModel,
    language: config.retrievalLanguage,
    topic: config.topic,
  });

  const db = initDatabase(config.sqlitePath);

  return {
    config,
    db,
    retriever,
    assistant: new Assistant({ db, translator, qa }),
  };
}
