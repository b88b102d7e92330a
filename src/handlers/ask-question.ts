/**
 * Handler: plain text message
 *
 * Answer the question in the user's language, or ask for a language first
 */

import { failureMessage } from "../assistant.js";
import { splitMessage } from "../format.js";
import { LANGUAGE_SETTINGS, PLEASE_CHOOSE_LANGUAGE_PROMPT, parseLanguage } from "../language.js";
import { getUserLanguage } from "../operations.js";
import type { Services } from "../services.js";
import { type ChatContext, languageKeyboard, profileOf } from "./common.js";

export async function handleAskQuestion(ctx: ChatContext, services: Pick<Services, "db" | "assistant">): Promise<void> {
  const question = ctx.message?.text;
  const profile = profileOf(ctx);
  // Commands without a handler are ignored
  if (!question || question.startsWith("/") || !profile) return;

  const language = parseLanguage(getUserLanguage(services.db, profile.chatId));
  if (!language) {
    await ctx.reply(PLEASE_CHOOSE_LANGUAGE_PROMPT, { reply_markup: languageKeyboard() });
    return;
  }

  let answer: string;
  try {
    answer = await services.assistant.ask(profile, question, language);
  } catch (error) {
    console.error(`❌ Failed to answer question from ${profile.chatId}:`, error);
    await ctx.reply(failureMessage(error, language));
    return;
  }

  for (const part of splitMessage(answer)) {
    await ctx.reply(part);
  }
  await ctx.reply(LANGUAGE_SETTINGS[language].askMore);
}
