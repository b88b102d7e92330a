import { describe, it, expect, vi } from "vitest";
import type { ChatMessage, CompletionOptions } from "../src/openai.js";
import { Translator } from "../src/translation.js";

function makeTranslator() {
  const complete = vi.fn(async (_messages: ChatMessage[], _options: CompletionOptions) => "translated");
  const translator = new Translator({ completer: { complete }, model: "translate-model", retrievalLanguage: "uz" });
  return { translator, complete };
}

describe("Translator", () => {
  it("returns blank text unchanged without a model call", async () => {
    const { translator, complete } = makeTranslator();

    expect(await translator.translate("   ", "en", "ru")).toBe("   ");
    expect(complete).not.toHaveBeenCalled();
  });

  it("returns text already in the target language unchanged", async () => {
    const { translator, complete } = makeTranslator();

    expect(await translator.translate("Salom", "uz", "uz")).toBe("Salom");
    expect(complete).not.toHaveBeenCalled();
  });

  it("asks the model for a translation naming both languages", async () => {
    const { translator, complete } = makeTranslator();

    expect(await translator.translate("  Salom  ", "en", "uz")).toBe("translated");
    expect(complete).toHaveBeenCalledWith(
      [
        {
          role: "system",
          content:
            "You are a precise translator. Translate the user message to English. " +
            "Return only the translation without extra commentary.",
        },
        { role: "system", content: "The source language is O'zbek." },
        { role: "user", content: "Salom" },
      ],
      { model: "translate-model", temperature: 0 }
    );
  });

  it("omits the source language when it is unknown", async () => {
    const { translator, complete } = makeTranslator();

    await translator.translate("Привет", "en");

    const [messages] = complete.mock.calls[0];
    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
  });

  it("translates to and from the retrieval language", async () => {
    const { translator, complete } = makeTranslator();

    await translator.toRetrievalLanguage("Какой урожай?", "ru");
    await translator.fromRetrievalLanguage("Hosil yaxshi.", "ru");
    expect(await translator.fromRetrievalLanguage("Hosil yaxshi.", "uz")).toBe("Hosil yaxshi.");

    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[0][0][0].content).toContain("Translate the user message to O'zbek.");
    expect(complete.mock.calls[1][0][0].content).toContain("Translate the user message to Русский.");
  });
});
