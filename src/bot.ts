/**
 * Telegram Bot
 *
 * Command and message routing on top of grammY
 */

import { Bot, GrammyError, HttpError } from "grammy";
import { handleAskQuestion } from "./handlers/ask-question.js";
import { LANGUAGE_CALLBACK_PREFIX } from "./handlers/common.js";
import { handleExportStats } from "./handlers/export-stats.js";
import { handleHelp } from "./handlers/help.js";
import { handleSelectLanguage } from "./handlers/select-language.js";
import { handleStart } from "./handlers/start.js";
import type { Services } from "./services.js";

export function createBot(services: Services): Bot {
  const bot = new Bot(services.config.telegramBotToken);

  bot.command("start", (ctx) => handleStart(ctx, services));
  bot.command("help", (ctx) => handleHelp(ctx, services));
  bot.command("stat", (ctx) => handleExportStats(ctx, services));
  bot.callbackQuery(new RegExp(`^${LANGUAGE_CALLBACK_PREFIX}`), (ctx) => handleSelectLanguage(ctx, services));
  bot.on("message:text", (ctx) => handleAskQuestion(ctx, services));

  bot.catch((err) => {
    const { error, ctx } = err;
    if (error instanceof GrammyError) {
      console.error(`❌ Telegram API error for update ${ctx.update.update_id}: ${error.description}`);
    } else if (error instanceof HttpError) {
      console.error(`❌ Could not contact Telegram for update ${ctx.update.update_id}:`, error);
    } else {
      console.error(`❌ Update ${ctx.update.update_id} caused error:`, error);
    }
  });

  return bot;
}
