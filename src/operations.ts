/**
 * Database Operations
 *
 * Users and the append-only question log
 */

import type { DB } from "./database.js";
import type { QuestionRecord, UserRecord } from "./types.js";

export interface UserProfile {
  chatId: number;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
}

interface UserRow {
  chat_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  language: string | null;
  question_count: number;
  created_at: number;
  updated_at: number;
}

interface QuestionRow {
  id: number;
  chat_id: number;
  question: string;
  answer: string;
  asked_at: number;
}

function toUserRecord(row: UserRow): UserRecord {
  return {
    chatId: row.chat_id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    language: row.language,
    questionCount: row.question_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Insert or refresh a user. A null language keeps the one already stored.
 */
export function upsertUser(db: DB, profile: UserProfile, language: string | null, now: number = Date.now()): void {
  db.prepare(
    `
    INSERT INTO users (chat_id, username, first_name, last_name, language, question_count, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, 0, ?, ?)
    ON CONFLICT(chat_id) DO UPDATE SET
      username = excluded.username,
      first_name = excluded.first_name,
      last_name = excluded.last_name,
      language = COALESCE(excluded.language, users.language),
      updated_at = excluded.updated_at
  `
  ).run(
    profile.chatId,
    profile.username ?? null,
    profile.firstName ?? null,
    profile.lastName ?? null,
    language,
    now,
    now
  );
}

/**
 * Get a user by chat ID
 */
export function getUser(db: DB, chatId: number): UserRecord | null {
  const row = db
    .prepare<[number], UserRow>(
      `
    SELECT chat_id, username, first_name, last_name, language, question_count, created_at, updated_at
    FROM users WHERE chat_id = ?
  `
    )
    .get(chatId);
  return row ? toUserRecord(row) : null;
}

/**
 * Stored language code of a user, or null if none was chosen yet
 */
export function getUserLanguage(db: DB, chatId: number): string | null {
  const row = db
    .prepare<[number], { language: string | null }>(`SELECT language FROM users WHERE chat_id = ?`)
    .get(chatId);
  return row?.language ?? null;
}

export function incrementQuestionCount(db: DB, chatId: number, now: number = Date.now()): void {
  db.prepare(
    `
    UPDATE users
    SET question_count = question_count + 1,
        updated_at = ?
    WHERE chat_id = ?
  `
  ).run(now, chatId);
}

/**
 * Append a question and the answer that was sent
 */
export function recordQuestion(
  db: DB,
  chatId: number,
  question: string,
  answer: string,
  now: number = Date.now()
): number {
  const result = db
    .prepare(
      `
    INSERT INTO questions (chat_id, question, answer, asked_at)
    VALUES (?, ?, ?, ?)
  `
    )
    .run(chatId, question, answer, now);
  return Number(result.lastInsertRowid);
}

/**
 * All users, most recently active first
 */
export function listUsers(db: DB): UserRecord[] {
  const rows = db
    .prepare<[], UserRow>(
      `
    SELECT chat_id, username, first_name, last_name, language, question_count, created_at, updated_at
    FROM users
    ORDER BY updated_at DESC, chat_id ASC
  `
    )
    .all();
  return rows.map(toUserRecord);
}

/**
 * All logged questions in the order they were asked
 */
export function listQuestions(db: DB): QuestionRecord[] {
  const rows = db
    .prepare<[], QuestionRow>(
      `
    SELECT id, chat_id, question, answer, asked_at
    FROM questions
    ORDER BY id ASC
  `
    )
    .all();
  return rows.map((row) => ({
    id: row.id,
    chatId: row.chat_id,
    question: row.question,
    answer: row.answer,
    askedAt: row.asked_at,
  }));
}
