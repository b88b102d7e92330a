/**
 * Shared handler helpers
 */

import { InlineKeyboard, type InputFile } from "grammy";
import { LANGUAGES, LANGUAGE_SETTINGS } from "../language.js";
import type { UserProfile } from "../operations.js";

export const LANGUAGE_CALLBACK_PREFIX = "lang_";

/**
 * The part of grammY's `Context` the handlers use. Every grammY context
 * satisfies it.
 */
export interface ChatContext {
  from?: { id: number; username?: string; first_name: string; last_name?: string };
  message?: { text?: string };
  callbackQuery?: { data?: string };
  reply(text: string, other?: { reply_markup?: InlineKeyboard }): Promise<unknown>;
  replyWithDocument(document: InputFile): Promise<unknown>;
  answerCallbackQuery(): Promise<unknown>;
  editMessageText(text: string): Promise<unknown>;
}

/** One row with a button per language, carrying `lang_<code>` callback data */
export function languageKeyboard(): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  for (const language of LANGUAGES) {
    keyboard.text(LANGUAGE_SETTINGS[language].button, `${LANGUAGE_CALLBACK_PREFIX}${language}`);
  }
  return keyboard;
}

export function profileOf(ctx: ChatContext): UserProfile | null {
  if (!ctx.from) return null;
  return {
    chatId: ctx.from.id,
    username: ctx.from.username ?? null,
    firstName: ctx.from.first_name,
    lastName: ctx.from.last_name ?? null,
  };
}
