/**
 * Error Types
 *
 * Every failure the assistant reports to a user or an operator is one of these.
 */

export class AssistantError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The reference document could not be read or its text extracted. */
export class IOError extends AssistantError {}

/** An embedding call failed (timeout, rate limit, auth, malformed response). */
export class EmbeddingProviderError extends AssistantError {}

/** The persisted embedding cache is unreadable or malformed. */
export class CacheCorruptionError extends AssistantError {}

/** Chunking produced no passages: the configured document has no text. */
export class EmptyDocumentError extends AssistantError {}

/** A chat completion (answer or translation) failed. */
export class CompletionProviderError extends AssistantError {}

export class ConfigError extends AssistantError {}
