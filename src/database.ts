/**
 * Database Setup and Schema
 *
 * Statistics store: who uses the bot and what they ask.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export type DB = Database.Database;

/**
 * Initialize database connection and schema. Pass ":memory:" for a
 * throwaway database.
 */
export function initDatabase(sqlitePath: string): DB {
  if (sqlitePath !== ":memory:") {
    // Ensure DB directory exists
    const dbDir = dirname(sqlitePath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(sqlitePath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      chat_id INTEGER PRIMARY KEY,
      username TEXT,
      first_name TEXT,
      last_name TEXT,
      language TEXT,
      question_count INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS questions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      chat_id INTEGER NOT NULL,
      question TEXT NOT NULL,
      answer TEXT NOT NULL,
      asked_at INTEGER NOT NULL,
      FOREIGN KEY (chat_id) REFERENCES users(chat_id)
    );

    CREATE INDEX IF NOT EXISTS idx_questions_chat_id ON questions(chat_id);
    CREATE INDEX IF NOT EXISTS idx_users_updated_at ON users(updated_at);
  `);

  return db;
}
