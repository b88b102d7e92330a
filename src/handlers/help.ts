/**
 * Handler: /help
 */

import { LANGUAGE_SETTINGS, parseLanguage } from "../language.js";
import { getUserLanguage } from "../operations.js";
import type { Services } from "../services.js";
import type { ChatContext } from "./common.js";

export async function handleHelp(ctx: ChatContext, services: Pick<Services, "db">): Promise<void> {
  const language = ctx.from ? parseLanguage(getUserLanguage(services.db, ctx.from.id)) : null;
  await ctx.reply(LANGUAGE_SETTINGS[language ?? "uz"].help);
}
