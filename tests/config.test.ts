import { describe, it, expect } from "vitest";
import { resolve } from "path";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const REQUIRED = { OPENAI_API_KEY: "test-key", TELEGRAM_BOT_TOKEN: "test-token" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ ...REQUIRED });

    expect(config.topK).toBe(4);
    expect(config.chunkSize).toBe(1500);
    expect(config.chunkOverlap).toBe(150);
    expect(config.retrievalLanguage).toBe("uz");
    expect(config.adminChatId).toBeNull();
    expect(config.embedding).toEqual({ model: "text-embedding-3-large", batchSize: 100 });
    expect(config.openai).toEqual({
      apiKey: "test-key",
      qaModel: "gpt-4o",
      translationModel: "gpt-4o-mini",
      timeoutMs: 30000,
      maxRetries: 2,
    });
    expect(config.docPath).toBe(resolve("document.docx"));
    expect(config.topic).toBe("document");
    expect(config.sqlitePath).toBe(resolve("data/bot.db"));
    expect(config.embeddingsCachePath).toBe(resolve("data/embeddings.json"));
    expect(config.statsExportPath).toBe(resolve("data/stats.xlsx"));
  });

  it("names missing required variables", () => {
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-token" })).toThrow(ConfigError);
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-token" })).toThrow(/OPENAI_API_KEY/);
  });

  it("parses the admin chat id", () => {
    expect(loadConfig({ ...REQUIRED, ADMIN_CHAT_ID: "12345" }).adminChatId).toBe(12345);
    expect(loadConfig({ ...REQUIRED, ADMIN_CHAT_ID: "" }).adminChatId).toBeNull();
    expect(() => loadConfig({ ...REQUIRED, ADMIN_CHAT_ID: "abc" })).toThrow(/ADMIN_CHAT_ID/);
  });

  it("derives the topic from the document name", () => {
    const config = loadConfig({ ...REQUIRED, DOC_PATH: "docs/Orchard Guide.docx" });

    expect(config.docPath).toBe(resolve("docs/Orchard Guide.docx"));
    expect(config.topic).toBe("Orchard Guide");
    expect(loadConfig({ ...REQUIRED, ASSISTANT_TOPIC: "the orchard" }).topic).toBe("the orchard");
  });

  it("rejects an overlap not smaller than the passage size", () => {
    expect(() => loadConfig({ ...REQUIRED, CHUNK_OVERLAP: "2000" })).toThrow(/CHUNK_OVERLAP/);
  });

  it("rejects unsupported values", () => {
    expect(() => loadConfig({ ...REQUIRED, RETRIEVAL_LANGUAGE: "de" })).toThrow(/RETRIEVAL_LANGUAGE/);
    expect(() => loadConfig({ ...REQUIRED, TOP_K: "0" })).toThrow(/TOP_K/);
    expect(() => loadConfig({ ...REQUIRED, EMBEDDING_BATCH_SIZE: "-5" })).toThrow(/EMBEDDING_BATCH_SIZE/);
  });
});
