export const ORIGIN_KINDS = ["document", "web_page", "video"] as const;
export type OriginKind = (typeof ORIGIN_KINDS)[number];

export const SOURCE_STATUSES = [
  "pending",
  "extracting",
  "chunking",
  "embedding",
  "completed",
  "failed",
] as const;
export type SourceStatus = (typeof SOURCE_STATUSES)[number];

export const TERMINAL_STATUSES: readonly SourceStatus[] = ["completed", "failed"];

export function isTerminalStatus(status: SourceStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type SourceAttributes = Record<string, string>;

export interface Source {
  sourceId: string;
  originKind: OriginKind;
  displayName: string;
  location: string;
  contentHash: string | null;
  status: SourceStatus;
  error: string | null;
  chunkCount: number;
  attemptId: string;
  attributes: SourceAttributes;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface Chunk {
  chunkId: string;
  sourceId: string;
  text: string;
  tokenCount: number;
  position: number;
  startOffset: number;
  endOffset: number;
}

export interface VectorMetadata {
  sourceId: string;
  originKind: OriginKind;
  displayName: string;
  position: number;
}

export interface EmbeddingRecord {
  chunkId: string;
  vector: number[];
  text: string;
  metadata: VectorMetadata;
}

export interface QueryMatch {
  chunkId: string;
  score: number;
  text: string;
  metadata: VectorMetadata;
}

export interface Citation {
  number: number;
  sourceId: string;
  originKind: OriginKind;
  displayName: string;
  location: string | null;
  score: number;
  chunkCount: number;
  chunkIds: string[];
  positions: number[];
  preview: string;
}

export interface ContextPassage {
  chunkId: string;
  position: number;
  text: string;
}

export interface ContextBlock {
  number: number;
  displayName: string;
  originKind: OriginKind;
  passages: ContextPassage[];
}

export const ANSWER_STATUSES = [
  "answered",
  "insufficient_context",
  "degraded",
] as const;
export type AnswerStatus = (typeof ANSWER_STATUSES)[number];

export interface AnswerResult {
  answer: string;
  reasoning: string | null;
  citations: Citation[];
  status: AnswerStatus;
  unknownCitations: number[];
  latencyMs: number;
}

export type ComponentHealth = "ok" | "unavailable";

export interface HealthReport {
  status: "ok" | "degraded";
  components: {
    vectorIndex: ComponentHealth;
    sourceStore: ComponentHealth;
    embeddingProvider: ComponentHealth;
    generationProvider: ComponentHealth;
  };
}
