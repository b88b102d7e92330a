import { describe, it, expect } from "vitest";
import { chunkText } from "../src/document/chunker.js";

describe("chunkText", () => {
  it("returns no passages for empty or blank text", () => {
    expect(chunkText("", { maxChars: 100, overlap: 0 })).toEqual([]);
    expect(chunkText("  \n\n \t\n", { maxChars: 100, overlap: 0 })).toEqual([]);
  });

  it("keeps a short document whole, dropping blank lines", () => {
    expect(chunkText("alpha\n\nbeta\ngamma", { maxChars: 100, overlap: 0 })).toEqual([
      { index: 0, text: "alpha\nbeta\ngamma" },
    ]);
  });

  it("starts a new passage when the next paragraph does not fit", () => {
    expect(chunkText("alpha\nbeta\ngamma", { maxChars: 11, overlap: 0 })).toEqual([
      { index: 0, text: "alpha\nbeta" },
      { index: 1, text: "gamma" },
    ]);
  });

  it("repeats a word-aligned tail of the previous passage", () => {
    const text = "one two three\nfour five six\nseven";
    expect(chunkText(text, { maxChars: 20, overlap: 8 }).map((p) => p.text)).toEqual([
      "one two three",
      "three\nfour five six",
      "five six\nseven",
    ]);
  });

  it("splits long paragraphs at sentences, then words", () => {
    const text = "First sentence here. Second one is longer than twenty.";
    expect(chunkText(text, { maxChars: 20, overlap: 0 }).map((p) => p.text)).toEqual([
      "First sentence here.",
      "Second one is longer",
      "than twenty.",
    ]);
  });

  it("cuts a single word longer than the limit", () => {
    expect(chunkText("abcdefghij", { maxChars: 4, overlap: 0 }).map((p) => p.text)).toEqual([
      "abcd",
      "efgh",
      "ij",
    ]);
  });

  it("is deterministic and never exceeds the limit", () => {
    const paragraphs = Array.from(
      { length: 30 },
      (_, i) => `Paragraph ${i} talks about orchards. It has several sentences! Does it end? Yes, it does.`
    );
    const text = paragraphs.join("\n\n");
    const options = { maxChars: 120, overlap: 30 };

    const first = chunkText(text, options);
    const second = chunkText(text, options);

    expect(second).toEqual(first);
    expect(first.length).toBeGreaterThan(1);
    first.forEach((passage, i) => {
      expect(passage.index).toBe(i);
      expect(passage.text.length).toBeLessThanOrEqual(120);
    });
  });

  it("rejects invalid limits", () => {
    expect(() => chunkText("text", { maxChars: 0, overlap: 0 })).toThrow(RangeError);
    expect(() => chunkText("text", { maxChars: 10, overlap: 10 })).toThrow(RangeError);
    expect(() => chunkText("text", { maxChars: 10, overlap: -1 })).toThrow(RangeError);
  });
});
