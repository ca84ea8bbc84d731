import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IncompatibleIndexError, IndexNotReadyError } from "../src/errors";
import { LocalVectorIndex, cosine } from "../src/vector-store";

const chunks = [
  { id: "1", documentReference: "fs:/d@a.md", content: "alpha", embedding: new Float32Array([1, 0, 0]) },
  { id: "2", documentReference: "fs:/d@b.md", content: "beta", embedding: new Float32Array([0, 1, 0]) },
  { id: "3", documentReference: "fs:/e@c.md", content: "gamma", embedding: new Float32Array([0.25, -0.5, 0.125]) },
];

describe("cosine", () => {
  it("scores direction, not length", () => {
    expect(cosine(Float32Array.of(1, 0), Float32Array.of(3, 0))).toBeCloseTo(1);
    expect(cosine(Float32Array.of(1, 0), Float32Array.of(0, 2))).toBe(0);
    expect(cosine(Float32Array.of(0, 0), Float32Array.of(1, 1))).toBe(0);
  });
});

describe("LocalVectorIndex", () => {
  let dir: string;
  let storePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "index-"));
    storePath = path.join(dir, "index.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("refuses data operations before creation", async () => {
    const index = new LocalVectorIndex({ modelName: "m" });
    expect(await index.exists()).toBe(false);
    await expect(index.upsert(chunks)).rejects.toBeInstanceOf(IndexNotReadyError);
    await expect(index.listByPrefix("fs:/d@")).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it("lists chunks by reference prefix", async () => {
    const index = new LocalVectorIndex({ modelName: "m" });
    await index.createOrUpdate();
    await index.upsert(chunks);
    expect(await index.listByPrefix("fs:/d@")).toEqual([
      { id: "1", documentReference: "fs:/d@a.md" },
      { id: "2", documentReference: "fs:/d@b.md" },
    ]);
    await index.deleteByIds(["1", "missing"]);
    expect(await index.size()).toBe(2);
  });

  it("rejects chunks without embeddings", async () => {
    const index = new LocalVectorIndex({ modelName: "m" });
    await index.createOrUpdate();
    await expect(index.upsert([{ id: "x", documentReference: "fs:/d@x.md", content: "x" }])).rejects.toThrow(
      "has no embedding",
    );
  });

  it("persists and reloads chunks with exact embeddings", async () => {
    const first = new LocalVectorIndex({ modelName: "m", storePath });
    await first.createOrUpdate();
    await first.upsert(chunks);

    const second = new LocalVectorIndex({ modelName: "m", storePath });
    expect(await second.exists()).toBe(true);
    expect(await second.size()).toBe(3);
    const [best] = await second.search(new Float32Array([0.25, -0.5, 0.125]), 1);
    expect(best).toEqual({ id: "3", documentReference: "fs:/e@c.md", content: "gamma" });
  });

  it("persists an empty index once created", async () => {
    await new LocalVectorIndex({ modelName: "m", storePath }).createOrUpdate();
    expect(await new LocalVectorIndex({ modelName: "m", storePath }).exists()).toBe(true);
  });

  it("refuses a store built with another model", async () => {
    const first = new LocalVectorIndex({ modelName: "model-a", storePath });
    await first.createOrUpdate();
    const second = new LocalVectorIndex({ modelName: "model-b", storePath });
    await expect(second.open()).rejects.toBeInstanceOf(IncompatibleIndexError);
  });

  it("ignores a malformed store file", async () => {
    await fs.writeFile(storePath, "[1, 2", "utf8");
    const index = new LocalVectorIndex({ modelName: "m", storePath });
    expect(await index.exists()).toBe(false);
  });
});
