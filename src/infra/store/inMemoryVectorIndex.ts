import { ConfigurationError } from "../../domain/errors.js";
import { EmbeddingRecord, QueryMatch } from "../../domain/types.js";
import { QueryFilter, VectorIndex, compareMatches } from "../../domain/vectorIndex.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface VectorSnapshot {
  dimension: number | null;
  records: EmbeddingRecord[];
}

export class InMemoryVectorIndex implements VectorIndex {
  protected readonly records = new Map<string, EmbeddingRecord>();

  protected fixedDimension: number | null;

  /** When `dimension` is null the first upsert fixes it. */
  constructor(dimension: number | null = null) {
    this.fixedDimension = dimension;
  }

  async upsert(records: EmbeddingRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    this.validateBatch(records);
    this.store(records);
  }

  async replaceSource(sourceId: string, records: EmbeddingRecord[]): Promise<void> {
    for (const record of records) {
      if (record.metadata.sourceId !== sourceId) {
        throw new ConfigurationError(
          `Record ${record.chunkId} belongs to ${record.metadata.sourceId}, not ${sourceId}.`,
        );
      }
    }
    if (records.length > 0) {
      this.validateBatch(records);
    }
    // no await between removal and insertion, so readers never see a mix
    this.removeSource(sourceId);
    this.store(records);
  }

  async deleteBySource(sourceId: string): Promise<number> {
    return this.removeSource(sourceId);
  }

  async countBySource(sourceId: string): Promise<number> {
    return (await this.listChunkIds(sourceId)).length;
  }

  async listChunkIds(sourceId: string): Promise<string[]> {
    const ids: string[] = [];
    for (const record of this.records.values()) {
      if (record.metadata.sourceId === sourceId) {
        ids.push(record.chunkId);
      }
    }
    return ids.sort();
  }

  async query(vector: number[], topK: number, filter: QueryFilter = {}): Promise<QueryMatch[]> {
    if (this.records.size === 0 || topK <= 0) {
      return [];
    }
    if (this.fixedDimension !== null) {
      this.assertDimension(vector, this.fixedDimension);
    }
    const scope = filter.sourceIds ? new Set(filter.sourceIds) : null;

    const matches: QueryMatch[] = [];
    for (const record of this.records.values()) {
      if (scope && !scope.has(record.metadata.sourceId)) {
        continue;
      }
      matches.push({
        chunkId: record.chunkId,
        score: cosineSimilarity(vector, record.vector),
        text: record.text,
        metadata: { ...record.metadata },
      });
    }

    return matches.sort(compareMatches).slice(0, topK);
  }

  async dimension(): Promise<number | null> {
    return this.fixedDimension;
  }

  async ping(): Promise<void> {}

  protected exportSnapshot(): VectorSnapshot {
    return { dimension: this.fixedDimension, records: [...this.records.values()] };
  }

  protected importSnapshot(snapshot: VectorSnapshot): void {
    this.records.clear();
    for (const record of snapshot.records) {
      this.records.set(record.chunkId, record);
    }
    if (snapshot.dimension !== null) {
      if (this.fixedDimension !== null && this.fixedDimension !== snapshot.dimension) {
        throw new ConfigurationError(
          `Stored index has dimension ${snapshot.dimension} but ${this.fixedDimension} is configured.`,
          { stored: snapshot.dimension, configured: this.fixedDimension },
        );
      }
      this.fixedDimension = snapshot.dimension;
    }
  }

  /** Checks every vector up front so a batch lands as a whole or not at all. */
  private validateBatch(records: EmbeddingRecord[]): void {
    const dimension = this.fixedDimension ?? records[0].vector.length;
    for (const record of records) {
      this.assertDimension(record.vector, dimension);
    }
    this.fixedDimension = dimension;
  }

  private store(records: EmbeddingRecord[]): void {
    for (const record of records) {
      this.records.set(record.chunkId, {
        ...record,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }
  }

  private removeSource(sourceId: string): number {
    let removed = 0;
    for (const [chunkId, record] of this.records) {
      if (record.metadata.sourceId === sourceId) {
        this.records.delete(chunkId);
        removed += 1;
      }
    }
    return removed;
  }

  private assertDimension(vector: number[], expected: number): void {
    if (vector.length !== expected) {
      throw new ConfigurationError(
        `Vector dimension ${vector.length} does not match index dimension ${expected}.`,
        { expected, actual: vector.length },
      );
    }
  }
}
