/**
 * Document Chunking
 *
 * Splits document text into passages small enough for the embedding model,
 * breaking at paragraphs first, then sentences, then words.
 */

import type { Passage } from "../types.js";

export interface ChunkOptions {
  /** Upper bound on passage length, in characters */
  maxChars: number;
  /** Characters of the previous passage repeated at the start of the next */
  overlap: number;
}

const SENTENCE_BREAK = /(?<=[.!?…])\s+/;
const WHITESPACE = /\s+/;

/**
 * Split text into ordered passages of at most `maxChars` characters.
 * Same text and options always give the same passages.
 */
export function chunkText(text: string, options: ChunkOptions): Passage[] {
  const { maxChars, overlap } = options;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChars) {
    throw new RangeError(`overlap must be an integer in [0, ${maxChars}), got ${overlap}`);
  }

  const paragraphs = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const pieces = paragraphs.flatMap((paragraph) => splitToFit(paragraph, maxChars));

  return mergePieces(pieces, maxChars, overlap).map((chunk, index) => ({ index, text: chunk }));
}

/** Break one paragraph into pieces no longer than maxChars */
function splitToFit(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) return [text];

  const sentences = text.split(SENTENCE_BREAK).filter(Boolean);
  if (sentences.length > 1) {
    return pack(
      sentences.flatMap((sentence) => splitToFit(sentence, maxChars)),
      maxChars
    );
  }

  const words = text.split(WHITESPACE).filter(Boolean);
  if (words.length > 1) {
    return pack(
      words.flatMap((word) => hardSplit(word, maxChars)),
      maxChars
    );
  }

  return hardSplit(text, maxChars);
}

function hardSplit(text: string, maxChars: number): string[] {
  const parts: string[] = [];
  for (let i = 0; i < text.length; i += maxChars) {
    parts.push(text.slice(i, i + maxChars));
  }
  return parts;
}

/** Greedily join parts with spaces while they fit */
function pack(parts: string[], maxChars: number): string[] {
  const packed: string[] = [];
  let current = "";
  for (const part of parts) {
    if (current === "") {
      current = part;
    } else if (current.length + 1 + part.length <= maxChars) {
      current += " " + part;
    } else {
      packed.push(current);
      current = part;
    }
  }
  if (current !== "") packed.push(current);
  return packed;
}

/** Merge paragraph pieces into passages joined by newlines, with overlap */
function mergePieces(pieces: string[], maxChars: number, overlap: number): string[] {
  const chunks: string[] = [];
  let buffer: string[] = [];
  let length = 0;

  for (const piece of pieces) {
    const grown = buffer.length === 0 ? piece.length : length + 1 + piece.length;
    if (buffer.length > 0 && grown > maxChars) {
      const chunk = buffer.join("\n");
      chunks.push(chunk);

      const tail = overlapTail(chunk, overlap);
      if (tail && tail.length + 1 + piece.length <= maxChars) {
        buffer = [tail, piece];
        length = tail.length + 1 + piece.length;
      } else {
        buffer = [piece];
        length = piece.length;
      }
    } else {
      buffer.push(piece);
      length = grown;
    }
  }

  if (buffer.length > 0) chunks.push(buffer.join("\n"));
  return chunks;
}

/** Last `overlap` characters of a chunk, starting at a word boundary */
function overlapTail(chunk: string, overlap: number): string {
  if (overlap === 0) return "";
  let tail = chunk.slice(-overlap);
  if (chunk.length > overlap && !/\s/.test(chunk[chunk.length - overlap - 1])) {
    const boundary = tail.search(/\s/);
    tail = boundary === -1 ? "" : tail.slice(boundary + 1);
  }
  return tail.trim();
}
