import { Chunk, SourceAttributes } from "./types.js";

/** Output of extraction and chunking, kept so a retry can resume at embedding. */
export interface ChunkArtifact {
  sourceId: string;
  contentHash: string;
  displayName: string;
  attributes: SourceAttributes;
  chunks: Chunk[];
  createdAt: string;
}

export interface ChunkArtifactStore {
  save(artifact: ChunkArtifact): Promise<void>;
  load(sourceId: string): Promise<ChunkArtifact | null>;
  delete(sourceId: string): Promise<void>;
}

/** Raw bytes of uploaded documents, kept until the source is deleted so failed runs can be retried. */
export interface UploadStore {
  save(sourceId: string, content: Buffer): Promise<void>;
  load(sourceId: string): Promise<Buffer | null>;
  delete(sourceId: string): Promise<void>;
}
