import { vi } from "vitest";
import { fingerprint } from "../src/document/fingerprint.js";
import type { Embedder } from "../src/embeddings/types.js";
import type { SourceDocument } from "../src/types.js";

/** Keyword presence vector: [apple, pear, plum, bias] */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return [
    lower.includes("apple") ? 1 : 0,
    lower.includes("pear") ? 1 : 0,
    lower.includes("plum") ? 1 : 0,
    0.01,
  ];
}

export class FakeEmbedder implements Embedder {
  readonly embedBatch = vi.fn(async (texts: string[]) => texts.map((text) => this.vectorFor(text)));
  readonly embedText = vi.fn(async (text: string) => this.vectorFor(text));

  constructor(
    private readonly vectorFor: (text: string) => number[] = keywordVector,
    private readonly model: string = "fake-model"
  ) {}

  getDimension(): number | null {
    return 4;
  }

  getModelName(): string {
    return this.model;
  }
}

export function makeDocument(text: string, path: string = "/docs/orchard.txt"): SourceDocument {
  const bytes = Buffer.from(text, "utf8");
  return {
    path,
    bytes,
    text,
    fingerprint: fingerprint(bytes),
  };
}

export const ORCHARD_TEXT = [
  "First paragraph about apples.",
  "Second paragraph about pears.",
  "Third paragraph about plums.",
].join("\n");

export const SMALL_CHUNKING = { maxChars: 40, overlap: 0 };
