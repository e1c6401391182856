import { z } from "zod";
import { ORIGIN_KINDS, SOURCE_STATUSES } from "../../domain/types.js";

export const sourceSchema = z.object({
  sourceId: z.string(),
  originKind: z.enum(ORIGIN_KINDS),
  displayName: z.string(),
  location: z.string(),
  contentHash: z.string().nullable(),
  status: z.enum(SOURCE_STATUSES),
  error: z.string().nullable(),
  chunkCount: z.number().int().nonnegative(),
  attemptId: z.string(),
  attributes: z.record(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
});

export const vectorMetadataSchema = z.object({
  sourceId: z.string(),
  originKind: z.enum(ORIGIN_KINDS),
  displayName: z.string(),
  position: z.number().int().nonnegative(),
});

export const embeddingRecordSchema = z.object({
  chunkId: z.string(),
  vector: z.array(z.number()),
  text: z.string(),
  metadata: vectorMetadataSchema,
});

export const chunkSchema = z.object({
  chunkId: z.string(),
  sourceId: z.string(),
  text: z.string(),
  tokenCount: z.number().int().nonnegative(),
  position: z.number().int().nonnegative(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
});

export const chunkArtifactSchema = z.object({
  sourceId: z.string(),
  contentHash: z.string(),
  displayName: z.string(),
  attributes: z.record(z.string()),
  chunks: z.array(chunkSchema),
  createdAt: z.string(),
});

export const sourceSnapshotSchema = z.object({
  sources: z.array(sourceSchema),
});

export const vectorSnapshotSchema = z.object({
  dimension: z.number().int().positive().nullable(),
  records: z.array(embeddingRecordSchema),
});
