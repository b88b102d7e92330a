/**
 * Configuration Management
 */

import { basename, extname, resolve } from "path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LANGUAGES, type Language } from "./language.js";

// Load .env file if it exists
loadEnv();

export interface Config {
  telegramBotToken: string;
  /** Telegram user allowed to run /stat; null disables the command */
  adminChatId: number | null;
  docPath: string;
  /** Subject named in the answer prompt */
  topic: string;
  openai: {
    apiKey: string;
    qaModel: string;
    translationModel: string;
    timeoutMs: number;
    maxRetries: number;
  };
  embedding: {
    model: string;
    batchSize: number;
  };
  retrievalLanguage: Language;
  topK: number;
  chunkSize: number;
  chunkOverlap: number;
  sqlitePath: string;
  embeddingsCachePath: string;
  statsExportPath: string;
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, "OPENAI_API_KEY is required"),
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, "TELEGRAM_BOT_TOKEN is required"),
  ADMIN_CHAT_ID: optionalString.pipe(z.coerce.number().int().optional()),
  DOC_PATH: optionalString,
  ASSISTANT_TOPIC: optionalString,
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_BATCH_SIZE: positiveInt(100),
  QA_MODEL: z.string().trim().min(1).default("gpt-4o"),
  TRANSLATION_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  RETRIEVAL_LANGUAGE: z.enum(LANGUAGES).default("uz"),
  TOP_K: positiveInt(4),
  MAX_CONTEXT_CHARS: positiveInt(1500),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(150),
  DB_PATH: z.string().trim().min(1).default("data/bot.db"),
  EMBEDDINGS_CACHE: z.string().trim().min(1).default("data/embeddings.json"),
  STATS_EXPORT_PATH: z.string().trim().min(1).default("data/stats.xlsx"),
  OPENAI_TIMEOUT_MS: positiveInt(30_000),
  OPENAI_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
});

const DEFAULT_DOC_PATH = "document.docx";
const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-large";

/**
 * Build the configuration from environment variables.
 *
 * @throws {ConfigError} listing every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  const vars = parsed.data;

  if (vars.CHUNK_OVERLAP >= vars.MAX_CONTEXT_CHARS) {
    throw new ConfigError(
      `Invalid configuration:\n  CHUNK_OVERLAP (${vars.CHUNK_OVERLAP}) must be smaller than MAX_CONTEXT_CHARS (${vars.MAX_CONTEXT_CHARS})`
    );
  }

  const docPath = resolve(vars.DOC_PATH ?? DEFAULT_DOC_PATH);

  return {
    telegramBotToken: vars.TELEGRAM_BOT_TOKEN,
    adminChatId: vars.ADMIN_CHAT_ID ?? null,
    docPath,
    topic: vars.ASSISTANT_TOPIC ?? basename(docPath, extname(docPath)),
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      qaModel: vars.QA_MODEL,
      translationModel: vars.TRANSLATION_MODEL,
      timeoutMs: vars.OPENAI_TIMEOUT_MS,
      maxRetries: vars.OPENAI_MAX_RETRIES,
    },
    embedding: {
      model: vars.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODEL,
      batchSize: vars.EMBEDDING_BATCH_SIZE,
    },
    retrievalLanguage: vars.RETRIEVAL_LANGUAGE,
    topK: vars.TOP_K,
    chunkSize: vars.MAX_CONTEXT_CHARS,
    chunkOverlap: vars.CHUNK_OVERLAP,
    sqlitePath: resolve(vars.DB_PATH),
    embeddingsCachePath: resolve(vars.EMBEDDINGS_CACHE),
    statsExportPath: resolve(vars.STATS_EXPORT_PATH),
  };
}
