import { SourcePatch } from "../../domain/sourceStore.js";
import { Source, SourceStatus } from "../../domain/types.js";
import { InMemorySourceStore, SourceSnapshot } from "./inMemorySourceStore.js";
import { sourceSnapshotSchema } from "./schemas.js";
import { SnapshotFile } from "./snapshotFile.js";

export interface PersistentStoreOptions {
  maxBytes: number;
}

/** In-memory source store mirrored to a JSON snapshot after every write. */
export class PersistentSourceStore extends InMemorySourceStore {
  private initialized = false;

  private readonly file: SnapshotFile<SourceSnapshot>;

  constructor(filePath: string, options: PersistentStoreOptions) {
    super();
    this.file = new SnapshotFile(filePath, sourceSnapshotSchema, options.maxBytes);
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

  async put(source: Source): Promise<void> {
    await this.initialize();
    await super.put(source);
    await this.persist();
  }

  async get(sourceId: string): Promise<Source | null> {
    await this.initialize();
    return super.get(sourceId);
  }

  async list(): Promise<Source[]> {
    await this.initialize();
    return super.list();
  }

  async updateStatus(
    sourceId: string,
    status: SourceStatus,
    patch?: SourcePatch,
  ): Promise<Source> {
    await this.initialize();
    const updated = await super.updateStatus(sourceId, status, patch);
    await this.persist();
    return updated;
  }

  async delete(sourceId: string): Promise<boolean> {
    await this.initialize();
    const removed = await super.delete(sourceId);
    if (removed) {
      await this.persist();
    }
    return removed;
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
