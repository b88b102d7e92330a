import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CacheCorruptionError } from "../src/errors.js";
import { EmbeddingCacheStore } from "../src/retrieval/cache-store.js";
import type { EmbeddingCache } from "../src/types.js";

const renameControl = vi.hoisted(() => ({ fail: false }));

vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return {
    ...actual,
    rename: async (from: string, to: string) => {
      if (renameControl.fail) throw new Error("rename interrupted");
      return actual.rename(from, to);
    },
  };
});

function makeCache(fingerprint: string): EmbeddingCache {
  return {
    fingerprint,
    model: "fake-model",
    chunkSize: 40,
    chunkOverlap: 0,
    dimension: 3,
    createdAt: 1700000000000,
    entries: [
      { passage: { index: 0, text: "Apples are red." }, vector: [0.5, -1, 0.25] },
      { passage: { index: 1, text: "Pears are green." }, vector: [0, 0.75, -0.5] },
    ],
  };
}

describe("EmbeddingCacheStore", () => {
  let dir: string;
  let cachePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cache-store-"));
    cachePath = join(dir, "nested", "embeddings.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns null when there is no cache file", async () => {
    expect(await new EmbeddingCacheStore(cachePath).load()).toBeNull();
  });

  it("saves and loads a cache", async () => {
    const store = new EmbeddingCacheStore(cachePath);
    await store.save(makeCache("fp-1"));

    expect(await store.load()).toEqual(makeCache("fp-1"));
  });

  it("leaves no temporary files behind", async () => {
    const store = new EmbeddingCacheStore(cachePath);
    await store.save(makeCache("fp-1"));
    await store.save(makeCache("fp-2"));

    expect(readdirSync(join(dir, "nested"))).toEqual(["embeddings.json"]);
    expect((await store.load())?.fingerprint).toBe("fp-2");
  });

  it("keeps the previous cache byte for byte when the rename fails", async () => {
    const store = new EmbeddingCacheStore(cachePath);
    await store.save(makeCache("fp-1"));
    const before = readFileSync(cachePath);

    renameControl.fail = true;
    try {
      await expect(store.save(makeCache("fp-2"))).rejects.toThrow("rename interrupted");
    } finally {
      renameControl.fail = false;
    }

    expect(readFileSync(cachePath).equals(before)).toBe(true);
    expect((await store.load())?.fingerprint).toBe("fp-1");
    expect(readdirSync(join(dir, "nested"))).toEqual(["embeddings.json"]);
  });

  it("reports invalid JSON as corruption", async () => {
    const store = new EmbeddingCacheStore(cachePath);
    await store.save(makeCache("fp-1"));
    writeFileSync(cachePath, "{not json");

    await expect(store.load()).rejects.toBeInstanceOf(CacheCorruptionError);
  });

  it("reports a wrong shape as corruption", async () => {
    const store = new EmbeddingCacheStore(cachePath);
    await store.save(makeCache("fp-1"));
    writeFileSync(cachePath, JSON.stringify({ version: 1, meta: {}, passages: [] }));

    await expect(store.load()).rejects.toBeInstanceOf(CacheCorruptionError);
  });

  it("reports a vector of the wrong length as corruption", async () => {
    const store = new EmbeddingCacheStore(cachePath);
    await store.save(makeCache("fp-1"));
    const file = JSON.parse(readFileSync(cachePath, "utf8"));
    file.passages[1].emb = Buffer.alloc(8).toString("base64");
    writeFileSync(cachePath, JSON.stringify(file));

    await expect(store.load()).rejects.toThrow(/expected 12/);
  });

  it("creates the cache directory on save", async () => {
    await new EmbeddingCacheStore(cachePath).save(makeCache("fp-1"));

    expect(existsSync(cachePath)).toBe(true);
  });
});
