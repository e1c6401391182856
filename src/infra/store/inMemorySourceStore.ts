import {
  SourcePatch,
  SourceStore,
  applyStatusUpdate,
  compareSources,
} from "../../domain/sourceStore.js";
import { Source, SourceStatus } from "../../domain/types.js";

export interface SourceSnapshot {
  sources: Source[];
}

export class InMemorySourceStore implements SourceStore {
  protected readonly sources = new Map<string, Source>();

  async put(source: Source): Promise<void> {
    this.sources.set(source.sourceId, { ...source, attributes: { ...source.attributes } });
  }

  async get(sourceId: string): Promise<Source | null> {
    const source = this.sources.get(sourceId);
    return source ? { ...source, attributes: { ...source.attributes } } : null;
  }

  async list(): Promise<Source[]> {
    return [...this.sources.values()]
      .map((source) => ({ ...source, attributes: { ...source.attributes } }))
      .sort(compareSources);
  }

  async updateStatus(
    sourceId: string,
    status: SourceStatus,
    patch?: SourcePatch,
  ): Promise<Source> {
    // Read-check-write happens without an await in between, so it is atomic here.
    const next = applyStatusUpdate(this.sources.get(sourceId) ?? null, sourceId, status, patch);
    this.sources.set(sourceId, next);
    return { ...next, attributes: { ...next.attributes } };
  }

  async delete(sourceId: string): Promise<boolean> {
    return this.sources.delete(sourceId);
  }

  async ping(): Promise<void> {}

  protected exportSnapshot(): SourceSnapshot {
    return { sources: [...this.sources.values()] };
  }

  protected importSnapshot(snapshot: SourceSnapshot): void {
    this.sources.clear();
    for (const source of snapshot.sources) {
      this.sources.set(source.sourceId, source);
    }
  }
}
