/**
 * Question Answering
 *
 * Retrieval-augmented answers: the top passages of the document become the
 * context of a chat completion written in the retrieval language.
 */

import { shorten } from "./format.js";
import { LANGUAGE_SETTINGS, type Language } from "./language.js";
import type { ChatCompleter, ChatMessage } from "./openai.js";
import type { Retriever } from "./retrieval/retriever.js";
import type { ScoredPassage } from "./types.js";

export interface QAEngineOptions {
  retriever: Pick<Retriever, "retrieve">;
  completer: ChatCompleter;
  model: string;
  /** Language of the document, the questions and the answers handled here */
  language: Language;
  /** Subject named in the system prompt */
  topic: string;
  temperature?: number;
}

export class QAEngine {
  constructor(private readonly options: QAEngineOptions) {}

  /**
   * Answer a question already translated to the retrieval language
   */
  async answer(question: string): Promise<string> {
    const passages = await this.options.retriever.retrieve(question);
    const messages = buildAnswerMessages(question, passages, this.options.language, this.options.topic);

    const answer = await this.options.completer.complete(messages, {
      model: this.options.model,
      temperature: this.options.temperature ?? 0.2,
    });
    console.error(`ℹ️  Answered question: ${shorten(question, 120)}`);
    return answer;
  }
}

/**
 * Chat messages for an answer: system prompt, then the numbered context
 * passages with their scores followed by the question
 */
export function buildAnswerMessages(
  question: string,
  passages: ScoredPassage[],
  language: Language,
  topic: string
): ChatMessage[] {
  const prompts = LANGUAGE_SETTINGS[language].prompts;

  const contextText =
    passages
      .map(({ passage, score }, i) => `${prompts.passageLabel(i + 1, score)}:\n${passage.text}`)
      .join("\n\n") || prompts.noContext;

  return [
    { role: "system", content: prompts.system(topic) },
    {
      role: "user",
      content:
        `${prompts.contextLabel}:\n${contextText}\n\n` +
        `${prompts.questionLabel}: ${question}\n\n` +
        prompts.instruction,
    },
  ];
}
