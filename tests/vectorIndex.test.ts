import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/domain/errors.js";
import { EmbeddingRecord } from "../src/domain/types.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import { PersistentVectorIndex } from "../src/infra/store/persistentVectorIndex.js";

const TEMP_DIR = path.resolve(".tmp-tests-vector-index");
const TEMP_FILE = path.join(TEMP_DIR, "vector-index.json");

function record(sourceId: string, position: number, vector: number[]): EmbeddingRecord {
  return {
    chunkId: `${sourceId}:${position}`,
    vector,
    text: `${sourceId} chunk ${position}`,
    metadata: { sourceId, originKind: "document", displayName: `${sourceId}.md`, position },
  };
}

describe("InMemoryVectorIndex", () => {
  it("ranks by cosine similarity, breaking ties by position", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([
      record("s1", 1, [1, 0]),
      record("s1", 0, [2, 0]),
      record("s2", 0, [0, 1]),
      record("s2", 1, [1, 1]),
    ]);

    const matches = await index.query([1, 0], 3);
    expect(matches.map((match) => match.chunkId)).toEqual(["s1:0", "s1:1", "s2:1"]);
    expect(matches[0].score).toBe(1);
    expect(matches[2].score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("filters by source", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([record("s1", 0, [1, 0]), record("s2", 0, [1, 0])]);

    const matches = await index.query([1, 0], 5, { sourceIds: ["s2"] });
    expect(matches.map((match) => match.chunkId)).toEqual(["s2:0"]);
  });

  it("deletes every vector of a source", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([record("s1", 0, [1, 0]), record("s1", 1, [1, 0]), record("s2", 0, [1, 0])]);

    expect(await index.deleteBySource("s1")).toBe(2);
    expect(await index.countBySource("s1")).toBe(0);
    expect(await index.countBySource("s2")).toBe(1);
  });

  it("swaps the vectors of one source", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([record("s1", 0, [1, 0]), record("s1", 1, [1, 0]), record("s2", 0, [1, 0])]);

    await index.replaceSource("s1", [{ ...record("s1", 0, [0, 1]), text: "rewritten" }]);

    const matches = await index.query([0, 1], 5, { sourceIds: ["s1"] });
    expect(matches.map((match) => [match.chunkId, match.text])).toEqual([["s1:0", "rewritten"]]);
    expect(await index.listChunkIds("s2")).toEqual(["s2:0"]);
  });

  it("clears a source replaced with nothing", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([record("s1", 0, [1, 0]), record("s2", 0, [1, 0])]);

    await index.replaceSource("s1", []);
    expect(await index.countBySource("s1")).toBe(0);
    expect(await index.countBySource("s2")).toBe(1);
  });

  it("keeps the old vectors when a replacement is rejected", async () => {
    const index = new InMemoryVectorIndex(2);
    await index.upsert([record("s1", 0, [1, 0])]);

    await expect(index.replaceSource("s1", [record("s2", 0, [1, 0])])).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    await expect(index.replaceSource("s1", [record("s1", 1, [1, 0, 0])])).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(await index.listChunkIds("s1")).toEqual(["s1:0"]);
  });

  it("rejects a batch with a mismatched dimension as a whole", async () => {
    const index = new InMemoryVectorIndex(2);

    await expect(
      index.upsert([record("s1", 0, [1, 0]), record("s1", 1, [1, 0, 0])]),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(await index.countBySource("s1")).toBe(0);
  });

  it("rejects a query vector of the wrong dimension", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert([record("s1", 0, [1, 0])]);

    expect(await index.dimension()).toBe(2);
    await expect(index.query([1, 0, 0], 3)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("returns nothing from an empty index", async () => {
    expect(await new InMemoryVectorIndex(3).query([1, 0, 0], 3)).toEqual([]);
  });
});

describe("PersistentVectorIndex", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("restores vectors after restart", async () => {
    const index1 = new PersistentVectorIndex(TEMP_FILE, 2, { maxBytes: 1_000_000 });
    await index1.initialize();
    await index1.upsert([record("s1", 0, [0.1, 0.2])]);
    await index1.close();

    const index2 = new PersistentVectorIndex(TEMP_FILE, 2, { maxBytes: 1_000_000 });
    await index2.initialize();
    const matches = await index2.query([0.1, 0.2], 3);
    expect(matches.map((match) => match.chunkId)).toEqual(["s1:0"]);
    expect(matches[0].text).toBe("s1 chunk 0");
  });

  it("persists a replaced source", async () => {
    const index1 = new PersistentVectorIndex(TEMP_FILE, 2, { maxBytes: 1_000_000 });
    await index1.initialize();
    await index1.upsert([record("s1", 0, [0.1, 0.2]), record("s1", 1, [0.1, 0.2])]);
    await index1.replaceSource("s1", [record("s1", 2, [0.2, 0.1])]);
    await index1.close();

    const index2 = new PersistentVectorIndex(TEMP_FILE, 2, { maxBytes: 1_000_000 });
    await index2.initialize();
    expect(await index2.listChunkIds("s1")).toEqual(["s1:2"]);
  });

  it("refuses a stored index of another dimension", async () => {
    const index1 = new PersistentVectorIndex(TEMP_FILE, 2, { maxBytes: 1_000_000 });
    await index1.initialize();
    await index1.upsert([record("s1", 0, [0.1, 0.2])]);
    await index1.close();

    const index2 = new PersistentVectorIndex(TEMP_FILE, 3, { maxBytes: 1_000_000 });
    await expect(index2.initialize()).rejects.toBeInstanceOf(ConfigurationError);
  });
});
