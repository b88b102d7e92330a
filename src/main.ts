#!/usr/bin/env node

/**
 * Entry point for the document Q&A bot
 *
 * Configuration comes from environment variables or a .env file
 */

import("./index.js").catch((err) => {
  console.error("Error starting bot:", err);
  process.exit(1);
});
