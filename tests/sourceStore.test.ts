import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { SourceNotFoundError, StateError } from "../src/domain/errors.js";
import { canTransition } from "../src/domain/sourceStore.js";
import { Source } from "../src/domain/types.js";
import { InMemorySourceStore } from "../src/infra/store/inMemorySourceStore.js";
import { PersistentSourceStore } from "../src/infra/store/persistentSourceStore.js";

const TEMP_DIR = path.resolve(".tmp-tests-source-store");
const TEMP_FILE = path.join(TEMP_DIR, "sources.json");

function makeSource(sourceId: string, createdAt: string): Source {
  return {
    sourceId,
    originKind: "document",
    displayName: `${sourceId}.txt`,
    location: `${sourceId}.txt`,
    contentHash: null,
    status: "pending",
    error: null,
    chunkCount: 0,
    attemptId: "attempt-1",
    attributes: {},
    createdAt,
    updatedAt: createdAt,
    completedAt: null,
  };
}

describe("source status transitions", () => {
  it("moves forward one stage at a time", () => {
    expect(canTransition("pending", "extracting")).toBe(true);
    expect(canTransition("extracting", "completed")).toBe(true);
    expect(canTransition("pending", "embedding")).toBe(false);
    expect(canTransition("embedding", "chunking")).toBe(false);
    expect(canTransition("chunking", "failed")).toBe(true);
    expect(canTransition("completed", "failed")).toBe(false);
  });
});

describe("InMemorySourceStore", () => {
  it("lists sources by creation time, then id", async () => {
    const store = new InMemorySourceStore();
    await store.put(makeSource("src_b", "2024-01-02T00:00:00.000Z"));
    await store.put(makeSource("src_c", "2024-01-01T00:00:00.000Z"));
    await store.put(makeSource("src_a", "2024-01-02T00:00:00.000Z"));

    const ids = (await store.list()).map((source) => source.sourceId);
    expect(ids).toEqual(["src_c", "src_a", "src_b"]);
  });

  it("rejects illegal transitions and missing sources", async () => {
    const store = new InMemorySourceStore();
    await store.put(makeSource("src_a", "2024-01-01T00:00:00.000Z"));

    await expect(store.updateStatus("src_a", "completed")).rejects.toBeInstanceOf(StateError);
    await expect(store.updateStatus("src_missing", "extracting")).rejects.toBeInstanceOf(
      SourceNotFoundError,
    );
    await expect(store.updateStatus("src_a", "failed")).rejects.toThrow(
      "requires an error message",
    );
  });

  it("sets the error only while failed", async () => {
    const store = new InMemorySourceStore();
    await store.put(makeSource("src_a", "2024-01-01T00:00:00.000Z"));

    await store.updateStatus("src_a", "extracting");
    const failed = await store.updateStatus("src_a", "failed", { error: "boom" });
    expect(failed.status).toBe("failed");
    expect(failed.error).toBe("boom");
  });

  it("hands out copies", async () => {
    const store = new InMemorySourceStore();
    await store.put(makeSource("src_a", "2024-01-01T00:00:00.000Z"));

    const copy = await store.get("src_a");
    if (!copy) {
      throw new Error("expected a source");
    }
    copy.attributes.title = "changed";
    expect((await store.get("src_a"))?.attributes).toEqual({});
  });
});

describe("PersistentSourceStore", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("restores sources after restart", async () => {
    const store1 = new PersistentSourceStore(TEMP_FILE, { maxBytes: 1_000_000 });
    await store1.initialize();
    await store1.put(makeSource("src_a", "2024-01-01T00:00:00.000Z"));
    await store1.updateStatus("src_a", "extracting");
    await store1.close();

    const store2 = new PersistentSourceStore(TEMP_FILE, { maxBytes: 1_000_000 });
    await store2.initialize();
    const restored = await store2.get("src_a");
    expect(restored?.status).toBe("extracting");
    expect(restored?.displayName).toBe("src_a.txt");

    const stored: unknown = JSON.parse(await fs.readFile(TEMP_FILE, "utf-8"));
    expect(stored).toMatchObject({ format_version: 1 });
  });

  it("enforces the snapshot size limit", async () => {
    const store = new PersistentSourceStore(TEMP_FILE, { maxBytes: 120 });
    await store.initialize();

    await expect(
      store.put(makeSource("src_oversize", "2024-01-01T00:00:00.000Z")),
    ).rejects.toThrow("exceeds size limit");
  });

  it("refuses a snapshot written by an unknown format version", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(
      TEMP_FILE,
      JSON.stringify({ format_version: 99, saved_at: "2024-01-01T00:00:00.000Z", snapshot: {} }),
    );

    const store = new PersistentSourceStore(TEMP_FILE, { maxBytes: 1_000_000 });
    await expect(store.initialize()).rejects.toThrow("Unsupported snapshot format version: 99");
  });
});
