/**
 * Statistics Export
 *
 * One-shot dump of the statistics store to an xlsx workbook for the admin.
 */

import ExcelJS from "exceljs";
import { mkdir } from "fs/promises";
import { dirname } from "path";
import type { DB } from "./database.js";
import { formatTimestamp } from "./format.js";
import { listQuestions, listUsers } from "./operations.js";

export const USER_COLUMNS = [
  "chat_id",
  "username",
  "first_name",
  "last_name",
  "language",
  "question_count",
  "created_at",
  "updated_at",
] as const;

export const QUESTION_COLUMNS = ["id", "chat_id", "question", "answer", "asked_at"] as const;

/**
 * Build the statistics workbook: a "Users" sheet (most recently active
 * first) and a "Questions" sheet (oldest first)
 */
export function buildStatsWorkbook(db: DB): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();

  const users = workbook.addWorksheet("Users");
  users.addRow([...USER_COLUMNS]);
  for (const user of listUsers(db)) {
    users.addRow([
      user.chatId,
      user.username ?? "",
      user.firstName ?? "",
      user.lastName ?? "",
      user.language ?? "",
      user.questionCount,
      formatTimestamp(user.createdAt),
      formatTimestamp(user.updatedAt),
    ]);
  }

  const questions = workbook.addWorksheet("Questions");
  questions.addRow([...QUESTION_COLUMNS]);
  for (const question of listQuestions(db)) {
    questions.addRow([
      question.id,
      question.chatId,
      question.question,
      question.answer,
      formatTimestamp(question.askedAt),
    ]);
  }

  return workbook;
}

/**
 * Write the statistics workbook to `path`, creating its directory
 */
export async function exportStats(db: DB, path: string): Promise<string> {
  const workbook = buildStatsWorkbook(db);
  await mkdir(dirname(path), { recursive: true });
  await workbook.xlsx.writeFile(path);
  return path;
}
