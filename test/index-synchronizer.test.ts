import { describe, expect, it, vi } from "vitest";
import { ChangeDetector } from "../src/change-detector";
import { chunk } from "../src/chunker";
import { IndexNotReadyError } from "../src/errors";
import { IndexSynchronizer } from "../src/index-synchronizer";
import { MemoryHashLedger } from "../src/ledger";
import type { TextChunk } from "../src/types";
import { LocalVectorIndex } from "../src/vector-store";
import { FakeEmbeddings, fastPolicy } from "./helpers";

const A = "fs:/docs@a.txt";
const B = "fs:/docs@b.txt";
const OTHER = "fs:/docs2@c.txt";

function embedded(ref: string, text: string, chunkSize = 4): TextChunk[] {
  return chunk(text, ref, { chunkSize, overlap: 0 }).map((c) => ({
    ...c,
    embedding: FakeEmbeddings.vectorOf(c.content),
  }));
}

function setup() {
  const index = new LocalVectorIndex({ modelName: "fake-model" });
  const ledger = new MemoryHashLedger();
  const detector = new ChangeDetector(ledger);
  const sync = new IndexSynchronizer(index, detector, { administrative: fastPolicy(), dataPath: fastPolicy() });
  return { index, ledger, detector, sync };
}

describe("IndexSynchronizer", () => {
  it("does not create the index for an empty chunk list", async () => {
    const { index, sync } = setup();
    await sync.ensureIndexed([]);
    expect(await index.exists()).toBe(false);
  });

  it("creates the index on first upsert and overwrites chunks by id", async () => {
    const { index, sync } = setup();
    await sync.ensureIndexed(embedded(A, "aaaaeeee"));
    expect(await index.exists()).toBe(true);
    expect(await index.size()).toBe(2);

    await sync.ensureIndexed(embedded(A, "oooooooo"));
    expect(await index.size()).toBe(2);
    const hits = await sync.search(FakeEmbeddings.vectorOf("o"), 5);
    expect(hits.map((h) => h.content)).toEqual(["oooo", "oooo"]);
  });

  it("replaces a document's chunks and leaves a sibling with a longer name alone", async () => {
    const { index, sync } = setup();
    const BAK = `${A}.bak`;
    await sync.ensureIndexed([...embedded(A, "aaaaeeeeoooo"), ...embedded(BAK, "eeeeeeee")]);
    expect(await index.size()).toBe(5);

    expect(await sync.indexDocument(A, embedded(A, "oooo"))).toBe(2);
    const refs = (await index.listByPrefix(A)).map((c) => c.documentReference).sort();
    expect(refs).toEqual([A, BAK, BAK]);
    expect(await sync.indexDocument(A, [])).toBe(1);
    expect(await index.size()).toBe(2);
  });

  it("indexDocument with no chunks does nothing before the index exists", async () => {
    const { index, sync } = setup();
    expect(await sync.indexDocument(A, [])).toBe(0);
    expect(await index.exists()).toBe(false);
  });

  it("reconcile is a no-op before the index exists", async () => {
    const { index, detector, ledger, sync } = setup();
    await detector.shouldSkip(B, "b");
    const listSpy = vi.spyOn(index, "listByPrefix");
    expect(await sync.reconcile("fs:/docs", [])).toEqual({ deletedChunks: 0, deletedReferences: [] });
    expect(listSpy).not.toHaveBeenCalled();
    expect(ledger.size()).toBe(1);
  });

  it("deletes chunks of documents missing from the current set, in one batch", async () => {
    const { index, detector, ledger, sync } = setup();
    await sync.ensureIndexed([...embedded(A, "aaaaeeee"), ...embedded(B, "bbbbcccc"), ...embedded(OTHER, "oooo")]);
    await detector.shouldSkip(A, "aaaaeeee");
    await detector.shouldSkip(B, "bbbbcccc");
    const deleteSpy = vi.spyOn(index, "deleteByIds");

    const result = await sync.reconcile("fs:/docs", [A]);

    expect(result).toEqual({ deletedChunks: 2, deletedReferences: [B] });
    expect(deleteSpy).toHaveBeenCalledTimes(1);
    const remaining = await index.listByPrefix("fs:/");
    expect(remaining.map((c) => c.documentReference).sort()).toEqual([A, A, OTHER].sort());
    expect(await ledger.get(B)).toBeUndefined();
    expect(await ledger.get(A)).toBeDefined();
  });

  it("leaves the index alone when every document is still present", async () => {
    const { index, sync } = setup();
    await sync.ensureIndexed(embedded(A, "aaaa"));
    const deleteSpy = vi.spyOn(index, "deleteByIds");
    expect(await sync.reconcile("fs:/docs", [A, B])).toEqual({ deletedChunks: 0, deletedReferences: [] });
    expect(deleteSpy).not.toHaveBeenCalled();
  });

  it("does not treat a longer prefix as part of the source", async () => {
    const { index, sync } = setup();
    await sync.ensureIndexed(embedded(OTHER, "oooo"));
    await sync.reconcile("fs:/docs", []);
    expect(await index.size()).toBe(1);
  });

  it("search fails with IndexNotReadyError before anything was indexed", async () => {
    const { sync } = setup();
    await expect(sync.search(FakeEmbeddings.vectorOf("a"))).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it("returns the closest chunks without embeddings, 3 by default", async () => {
    const { sync } = setup();
    await sync.ensureIndexed([
      ...embedded(A, "aaaa", 4),
      ...embedded(B, "eeee", 4),
      ...embedded(OTHER, "oooo", 4),
      ...embedded("fs:/docs@d.txt", "xxxx", 4),
    ]);
    const hits = await sync.search(FakeEmbeddings.vectorOf("ea"));
    expect(hits).toHaveLength(3);
    expect(hits.slice(0, 2).map((h) => h.documentReference).sort()).toEqual([A, B]);
    expect(hits.every((h) => h.embedding === undefined)).toBe(true);
  });
});
