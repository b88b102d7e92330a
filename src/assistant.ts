/**
 * Assistant
 *
 * The question flow behind a chat message: translate the question to the
 * retrieval language, answer it from the document, translate the answer
 * back and log the exchange.
 */

import type { DB } from "./database.js";
import { EmptyDocumentError, IOError } from "./errors.js";
import { LANGUAGE_SETTINGS, type Language } from "./language.js";
import { incrementQuestionCount, recordQuestion, upsertUser, type UserProfile } from "./operations.js";
import type { QAEngine } from "./qa.js";
import type { Translator } from "./translation.js";

export interface AssistantOptions {
  db: DB;
  translator: Pick<Translator, "toRetrievalLanguage" | "fromRetrievalLanguage">;
  qa: Pick<QAEngine, "answer">;
}

export class Assistant {
  constructor(private readonly options: AssistantOptions) {}

  /**
   * Answer a question in the user's language and record it
   */
  async ask(user: UserProfile, question: string, language: Language): Promise<string> {
    const { db, translator, qa } = this.options;

    const normalized = await translator.toRetrievalLanguage(question, language);
    const retrievalAnswer = await qa.answer(normalized);
    const answer = await translator.fromRetrievalLanguage(retrievalAnswer, language);

    const log = db.transaction(() => {
      upsertUser(db, user, language);
      incrementQuestionCount(db, user.chatId);
      recordQuestion(db, user.chatId, question, answer);
    });
    log();

    return answer;
  }
}

/**
 * Message shown to the user when answering failed. Document problems are
 * reported as "unavailable", everything else as "try again".
 */
export function failureMessage(error: unknown, language: Language): string {
  const settings = LANGUAGE_SETTINGS[language];
  if (error instanceof IOError || error instanceof EmptyDocumentError) {
    return settings.unavailable;
  }
  return settings.failure;
}
