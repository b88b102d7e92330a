/**
 * OpenAI Operations
 *
 * Client construction, chat completions and error mapping shared by the
 * embedder, the answerer and the translator.
 */

import OpenAI, { APIConnectionTimeoutError } from "openai";
import { CompletionProviderError } from "./errors.js";

export interface OpenAIClientOptions {
  apiKey: string;
  timeoutMs: number;
  /** Retries with exponential backoff, performed by the SDK */
  maxRetries: number;
}

export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries,
  });
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface CompletionOptions {
  model: string;
  temperature: number;
}

/** Produces the assistant reply for a list of chat messages */
export interface ChatCompleter {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

export class OpenAIChatCompleter implements ChatCompleter {
  constructor(private readonly client: OpenAI) {}

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: options.model,
        messages,
        temperature: options.temperature,
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      throw new CompletionProviderError(`Chat completion failed: ${describeOpenAIError(error)}`, {
        cause: error,
      });
    }

    if (typeof content !== "string" || content.trim() === "") {
      throw new CompletionProviderError(`Chat completion returned no content (model ${options.model})`);
    }
    return content.trim();
  }
}

function getStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
}

/**
 * Human-readable cause of a failed OpenAI call
 */
export function describeOpenAIError(error: unknown): string {
  if (error instanceof APIConnectionTimeoutError) {
    return "request timed out";
  }

  switch (getStatus(error)) {
    case 401:
      return "authentication failed, check OPENAI_API_KEY";
    case 402:
      return "payment required on the OpenAI account";
    case 429:
      return "rate limit or quota exceeded";
    case 500:
    case 502:
    case 503:
      return "OpenAI service error";
  }

  return error instanceof Error ? error.message : String(error);
}
