/**
 * Translation
 *
 * LLM-backed translation between the supported languages.
 */

import { LANGUAGE_SETTINGS, type Language } from "./language.js";
import type { ChatCompleter, ChatMessage } from "./openai.js";

export interface TranslatorOptions {
  completer: ChatCompleter;
  model: string;
  retrievalLanguage: Language;
}

export class Translator {
  constructor(private readonly options: TranslatorOptions) {}

  /**
   * Translate text to the target language. Blank text, or text already in
   * the target language, is returned unchanged without a model call.
   */
  async translate(text: string, target: Language, source?: Language): Promise<string> {
    if (!text.trim()) return text;
    if (source === target) return text;

    const messages: ChatMessage[] = [
      {
        role: "system",
        content:
          `You are a precise translator. Translate the user message to ${LANGUAGE_SETTINGS[target].label}. ` +
          "Return only the translation without extra commentary.",
      },
    ];
    if (source) {
      messages.push({ role: "system", content: `The source language is ${LANGUAGE_SETTINGS[source].label}.` });
    }
    messages.push({ role: "user", content: text.trim() });

    return this.options.completer.complete(messages, { model: this.options.model, temperature: 0 });
  }

  /** Translate a user question to the language the document is searched in */
  async toRetrievalLanguage(text: string, source: Language): Promise<string> {
    return this.translate(text, this.options.retrievalLanguage, source);
  }

  /** Translate an answer from the retrieval language back to the user's language */
  async fromRetrievalLanguage(text: string, target: Language): Promise<string> {
    return this.translate(text, target, this.options.retrievalLanguage);
  }
}
