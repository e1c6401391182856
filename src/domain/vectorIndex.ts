import { EmbeddingRecord, QueryMatch } from "./types.js";

export interface QueryFilter {
  sourceIds?: string[];
}

export interface VectorIndex {
  /** Idempotent by chunkId. Records of one call become visible together. */
  upsert(records: EmbeddingRecord[]): Promise<void>;
  /**
   * Swaps every vector of `sourceId` for `records` in one step: a concurrent query sees
   * either the old set or the new one, never a mix.
   */
  replaceSource(sourceId: string, records: EmbeddingRecord[]): Promise<void>;
  deleteBySource(sourceId: string): Promise<number>;
  countBySource(sourceId: string): Promise<number>;
  listChunkIds(sourceId: string): Promise<string[]>;
  /** Cosine similarity, descending; ties broken by position then chunkId. */
  query(
    vector: number[],
    topK: number,
    filter?: QueryFilter,
  ): Promise<QueryMatch[]>;
  /** Dimension of the stored vectors, or null when the index is empty/unconstrained. */
  dimension(): Promise<number | null>;
  ping(): Promise<void>;
}

export function compareMatches(a: QueryMatch, b: QueryMatch): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.metadata.position !== b.metadata.position) {
    return a.metadata.position - b.metadata.position;
  }
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}
