/**
 * Handler: /start
 *
 * Register the user and offer the language keyboard
 */

import { CHOOSE_LANGUAGE_PROMPT } from "../language.js";
import { upsertUser } from "../operations.js";
import type { Services } from "../services.js";
import { type ChatContext, languageKeyboard, profileOf } from "./common.js";

export async function handleStart(ctx: ChatContext, services: Pick<Services, "db">): Promise<void> {
  const profile = profileOf(ctx);
  if (profile) {
    upsertUser(services.db, profile, null);
  }
  await ctx.reply(CHOOSE_LANGUAGE_PROMPT, { reply_markup: languageKeyboard() });
}
