/**
 * Document Q&A Telegram Bot
 *
 * Answers questions about one reference document in Uzbek, Russian and
 * English using embedding retrieval and an OpenAI chat model.
 */

import { createBot } from "./bot.js";
import { loadConfig } from "./config.js";
import { createServices } from "./services.js";

const config = loadConfig();
const services = createServices(config);

console.error(`ℹ️  Loading embeddings for ${config.docPath}`);
await services.retriever.warmUp();

const bot = createBot(services);

const shutdown = (signal: string) => {
  console.error(`ℹ️  Received ${signal}, stopping bot`);
  bot.stop().catch((error) => console.error("❌ Failed to stop bot:", error));
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

try {
  await bot.start({
    onStart: (info) => console.error(`✓ Bot @${info.username} is polling for updates`),
  });
} finally {
  services.db.close();
}
