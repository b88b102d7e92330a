/**
 * Handler: language keyboard callback
 *
 * Persist the chosen language and confirm in it
 */

import { LANGUAGE_SETTINGS, parseLanguage } from "../language.js";
import { upsertUser } from "../operations.js";
import type { Services } from "../services.js";
import { type ChatContext, LANGUAGE_CALLBACK_PREFIX, profileOf } from "./common.js";

export async function handleSelectLanguage(ctx: ChatContext, services: Pick<Services, "db">): Promise<void> {
  await ctx.answerCallbackQuery();

  const data = ctx.callbackQuery?.data ?? "";
  const language = parseLanguage(data.slice(LANGUAGE_CALLBACK_PREFIX.length));
  const profile = profileOf(ctx);
  if (!language || !profile) return;

  upsertUser(services.db, profile, language);
  await ctx.editMessageText(LANGUAGE_SETTINGS[language].selected);
}
