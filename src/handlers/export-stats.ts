/**
 * Handler: /stat
 *
 * Admin only: send the statistics workbook
 */

import { InputFile } from "grammy";
import { exportStats } from "../export.js";
import { LANGUAGE_SETTINGS, parseLanguage } from "../language.js";
import { getUserLanguage } from "../operations.js";
import type { Services } from "../services.js";
import type { ChatContext } from "./common.js";

export async function handleExportStats(ctx: ChatContext, services: Pick<Services, "config" | "db">): Promise<void> {
  const { config, db } = services;
  const userId = ctx.from?.id;
  const language = userId === undefined ? null : parseLanguage(getUserLanguage(db, userId));
  const settings = LANGUAGE_SETTINGS[language ?? "uz"];

  if (userId === undefined || config.adminChatId === null || userId !== config.adminChatId) {
    await ctx.reply(settings.notAllowed);
    return;
  }

  try {
    const path = await exportStats(db, config.statsExportPath);
    console.error(`✓ Exported statistics to ${path}`);
    await ctx.replyWithDocument(new InputFile(path, "stats.xlsx"));
  } catch (error) {
    console.error("❌ Failed to export statistics:", error);
    await ctx.reply(settings.failure);
  }
}
