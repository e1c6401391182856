import { EmbeddingRecord, QueryMatch } from "../../domain/types.js";
import { QueryFilter } from "../../domain/vectorIndex.js";
import { InMemoryVectorIndex, VectorSnapshot } from "./inMemoryVectorIndex.js";
import { PersistentStoreOptions } from "./persistentSourceStore.js";
import { vectorSnapshotSchema } from "./schemas.js";
import { SnapshotFile } from "./snapshotFile.js";

export class PersistentVectorIndex extends InMemoryVectorIndex {
  private initialized = false;

  private readonly file: SnapshotFile<VectorSnapshot>;

  constructor(filePath: string, dimension: number | null, options: PersistentStoreOptions) {
    super(dimension);
    this.file = new SnapshotFile(filePath, vectorSnapshotSchema, options.maxBytes);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    const snapshot = await this.file.read();
    if (snapshot) {
      this.importSnapshot(snapshot);
    }
    this.initialized = true;
  }

  async upsert(records: EmbeddingRecord[]): Promise<void> {
    await this.initialize();
    await super.upsert(records);
    if (records.length > 0) {
      await this.persist();
    }
  }

  async replaceSource(sourceId: string, records: EmbeddingRecord[]): Promise<void> {
    await this.initialize();
    await super.replaceSource(sourceId, records);
    await this.persist();
  }

  async deleteBySource(sourceId: string): Promise<number> {
    await this.initialize();
    const removed = await super.deleteBySource(sourceId);
    if (removed > 0) {
      await this.persist();
    }
    return removed;
  }

  async listChunkIds(sourceId: string): Promise<string[]> {
    await this.initialize();
    return super.listChunkIds(sourceId);
  }

  async query(vector: number[], topK: number, filter?: QueryFilter): Promise<QueryMatch[]> {
    await this.initialize();
    return super.query(vector, topK, filter);
  }

  async dimension(): Promise<number | null> {
    await this.initialize();
    return super.dimension();
  }

  async ping(): Promise<void> {
    await this.initialize();
  }

  async close(): Promise<void> {
    await this.file.flush();
  }

  private persist(): Promise<void> {
    return this.file.write(() => this.exportSnapshot());
  }
}
