import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Assistant, failureMessage } from "../src/assistant.js";
import { initDatabase, type DB } from "../src/database.js";
import { CompletionProviderError, EmbeddingProviderError, EmptyDocumentError, IOError } from "../src/errors.js";
import type { Language } from "../src/language.js";
import { getUser, listQuestions } from "../src/operations.js";

describe("Assistant", () => {
  let db: DB;

  beforeEach(() => {
    db = initDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  function makeAssistant(answer: (question: string) => Promise<string>) {
    const translator = {
      toRetrievalLanguage: vi.fn(async (text: string, _source: Language) => `[uz] ${text}`),
      fromRetrievalLanguage: vi.fn(async (text: string, target: Language) => `[${target}] ${text}`),
    };
    const qa = { answer: vi.fn(answer) };
    return { assistant: new Assistant({ db, translator, qa }), translator, qa };
  }

  it("translates, answers, translates back and logs the exchange", async () => {
    const { assistant, translator, qa } = makeAssistant(async (question) => `answer to ${question}`);

    const reply = await assistant.ask({ chatId: 42, username: "alice" }, "What grows here?", "en");

    expect(reply).toBe("[en] answer to [uz] What grows here?");
    expect(translator.toRetrievalLanguage).toHaveBeenCalledWith("What grows here?", "en");
    expect(qa.answer).toHaveBeenCalledWith("[uz] What grows here?");
    expect(translator.fromRetrievalLanguage).toHaveBeenCalledWith("answer to [uz] What grows here?", "en");

    const user = getUser(db, 42);
    expect(user?.language).toBe("en");
    expect(user?.questionCount).toBe(1);
    expect(listQuestions(db).map(({ question, answer }) => ({ question, answer }))).toEqual([
      { question: "What grows here?", answer: "[en] answer to [uz] What grows here?" },
    ]);
  });

  it("counts every question of the same user", async () => {
    const { assistant } = makeAssistant(async () => "ok");

    await assistant.ask({ chatId: 42 }, "One?", "ru");
    await assistant.ask({ chatId: 42 }, "Two?", "ru");

    expect(getUser(db, 42)?.questionCount).toBe(2);
    expect(listQuestions(db).map((q) => q.id)).toEqual([1, 2]);
  });

  it("records nothing when answering fails", async () => {
    const { assistant, translator } = makeAssistant(async () => {
      throw new CompletionProviderError("Chat completion failed: request timed out");
    });

    await expect(assistant.ask({ chatId: 42 }, "What grows here?", "en")).rejects.toThrow(
      "Chat completion failed: request timed out"
    );
    expect(translator.fromRetrievalLanguage).not.toHaveBeenCalled();
    expect(getUser(db, 42)).toBeNull();
    expect(listQuestions(db)).toEqual([]);
  });
});

describe("failureMessage", () => {
  it("reports document problems as unavailable", () => {
    expect(failureMessage(new IOError("Document not found at /x"), "en")).toBe(
      "Sorry, I cannot process requests right now."
    );
    expect(failureMessage(new EmptyDocumentError("empty"), "en")).toBe("Sorry, I cannot process requests right now.");
  });

  it("asks to try again for provider failures", () => {
    expect(failureMessage(new EmbeddingProviderError("down"), "en")).toBe(
      "Sorry, I could not answer right now. Please try again."
    );
    expect(failureMessage(new Error("boom"), "uz")).toBe("Uzr, hozircha javob bera olmadim. Qayta urinib ko'ring.");
  });
});
