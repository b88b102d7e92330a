/**
 * Type Definitions
 */

/** Reference document as read from disk; replaced wholesale when its bytes change */
export interface SourceDocument {
  path: string;
  bytes: Buffer;
  text: string;
  /** SHA-256 hex digest of `bytes` */
  fingerprint: string;
}

export interface Passage {
  /** 0-based position within the document */
  index: number;
  text: string;
}

export interface CacheEntry {
  passage: Passage;
  vector: number[];
}

/**
 * Passages of one document with their embeddings. Valid only while
 * fingerprint, model and chunking parameters match the current ones.
 */
export interface EmbeddingCache {
  fingerprint: string;
  model: string;
  chunkSize: number;
  chunkOverlap: number;
  dimension: number;
  createdAt: number;
  entries: CacheEntry[];
}

export interface ScoredPassage {
  passage: Passage;
  score: number;
}

export interface UserRecord {
  chatId: number;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  language: string | null;
  questionCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface QuestionRecord {
  id: number;
  chatId: number;
  question: string;
  answer: string;
  askedAt: number;
}
