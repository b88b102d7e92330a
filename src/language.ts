/**
 * Languages
 *
 * The three languages users can talk to the assistant in, with the UI and
 * prompt strings for each one.
 */

export const LANGUAGES = ["uz", "ru", "en"] as const;

export type Language = (typeof LANGUAGES)[number];

export interface LanguageSettings {
  label: string;
  /** Inline keyboard button text */
  button: string;
  askMore: string;
  selected: string;
  /** Shown when the question flow failed for a transient reason */
  failure: string;
  /** Shown when the document cannot be used at all (unreadable, empty) */
  unavailable: string;
  notAllowed: string;
  help: string;
  prompts: PromptSettings;
}

/** Strings used when this language is the retrieval language */
export interface PromptSettings {
  system: (topic: string) => string;
  contextLabel: string;
  questionLabel: string;
  instruction: string;
  passageLabel: (index: number, score: number) => string;
  noContext: string;
}

export const LANGUAGE_SETTINGS: Record<Language, LanguageSettings> = {
  uz: {
    label: "O'zbek",
    button: "O'zbek 🇺🇿",
    askMore: "Yana savollaringiz bormi?",
    selected: "Siz O'zbek tilini tanladingiz. Savolingizni yozing.",
    failure: "Uzr, hozircha javob bera olmadim. Qayta urinib ko'ring.",
    unavailable: "Uzr, hozircha so'rovlarni qayta ishlay olmayman.",
    notAllowed: "Sizga ruxsat berilmagan.",
    help: "Boshlash uchun /start buyrug'ini bosing va tilni tanlang.",
    prompts: {
      system: (topic) =>
        `Siz ${topic} bo'yicha savollarga javob beruvchi yordamchisiz. ` +
        "Faqat berilgan kontekstdan foydalaning va javobni o'zbek tilida aniq hamda batafsil yozing. " +
        "Agar kontekstda ma'lumot bo'lmasa, rostini ayting va to'qimang.",
      contextLabel: "Kontekst",
      questionLabel: "Savol",
      instruction: "Ko'rsatilgan kontekstga tayanib javob bering.",
      passageLabel: (index, score) => `Bo'lak ${index} (score ${score.toFixed(3)})`,
      noContext: "Hujjatdan mos keladigan ma'lumot topilmadi.",
    },
  },
  ru: {
    label: "Русский",
    button: "Русский 🇷🇺",
    askMore: "Есть ли у вас другие вопросы?",
    selected: "Вы выбрали русский язык. Задайте ваш вопрос о проекте.",
    failure: "Извините, сейчас не удалось ответить. Попробуйте ещё раз.",
    unavailable: "Извините, сейчас я не могу обрабатывать запросы.",
    notAllowed: "У вас нет доступа.",
    help: "Нажмите /start и выберите язык, чтобы начать.",
    prompts: {
      system: (topic) =>
        `Вы помощник, отвечающий на вопросы о ${topic}. ` +
        "Используйте только предоставленный контекст и отвечайте на русском языке точно и подробно. " +
        "Если в контексте нет информации, честно скажите об этом и ничего не выдумывайте.",
      contextLabel: "Контекст",
      questionLabel: "Вопрос",
      instruction: "Ответьте, опираясь на приведённый контекст.",
      passageLabel: (index, score) => `Фрагмент ${index} (score ${score.toFixed(3)})`,
      noContext: "В документе не найдено подходящей информации.",
    },
  },
  en: {
    label: "English",
    button: "English 🇬🇧",
    askMore: "Do you have any other questions?",
    selected: "You selected English. Ask your question about the project.",
    failure: "Sorry, I could not answer right now. Please try again.",
    unavailable: "Sorry, I cannot process requests right now.",
    notAllowed: "You are not allowed to do this.",
    help: "Press /start and choose a language to begin.",
    prompts: {
      system: (topic) =>
        `You are an assistant answering questions about ${topic}. ` +
        "Use only the given context and answer in English, precisely and in detail. " +
        "If the context has no information, say so honestly and do not make anything up.",
      contextLabel: "Context",
      questionLabel: "Question",
      instruction: "Answer based on the context above.",
      passageLabel: (index, score) => `Passage ${index} (score ${score.toFixed(3)})`,
      noContext: "No matching information was found in the document.",
    },
  },
};

/** Prompt shown together with the language keyboard, in all three languages */
export const CHOOSE_LANGUAGE_PROMPT = "Tilni tanlang / Выберите язык / Choose language:";

export const PLEASE_CHOOSE_LANGUAGE_PROMPT =
  "Iltimos, tilni tanlang / Пожалуйста, выберите язык / Please choose a language:";

export function isLanguage(value: unknown): value is Language {
  return typeof value === "string" && LANGUAGES.some((language) => language === value);
}

/**
 * Parse a stored or user-supplied language code, returning null for
 * anything outside the supported set
 */
export function parseLanguage(value: string | null | undefined): Language | null {
  if (!value) return null;
  const code = value.trim().toLowerCase();
  return isLanguage(code) ? code : null;
}
