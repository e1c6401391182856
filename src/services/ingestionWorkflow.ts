import { ChunkArtifact, ChunkArtifactStore, UploadStore } from "../domain/chunkArtifacts.js";
import {
  ConfigurationError,
  ConsistencyViolation,
  ExtractionError,
  SourceNotFoundError,
  errorMessage,
} from "../domain/errors.js";
import { SourceStore } from "../domain/sourceStore.js";
import { Chunk, EmbeddingRecord, Source, isTerminalStatus } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingProvider } from "../infra/ai/types.js";
import { ExtractorRegistry } from "../infra/extractors/types.js";
import { Logger, getLogger } from "../infra/log/logger.js";
import { cleanText } from "../pipelines/cleaning.js";
import { TokenCounter, chunkText, toSourceChunks } from "../pipelines/chunking.js";
import { withRetry } from "../utils/retry.js";
import { sha256Hex } from "../utils/text.js";

export interface IngestionJob {
  sourceId: string;
  attemptId: string;
  /** Resume from the cached chunk artifact instead of extracting again. */
  resume: boolean;
  /** Outcome of the last completed run, used to skip unchanged content. */
  previous: { contentHash: string; chunkCount: number } | null;
}

export type IngestionOutcome =
  | { status: "completed"; source: Source; unchanged: boolean }
  | { status: "failed"; source: Source | null; error: string }
  | { status: "abandoned"; reason: "deleted" | "superseded" };

export interface IngestionWorkflowDeps {
  sourceStore: SourceStore;
  vectorIndex: VectorIndex;
  artifacts: ChunkArtifactStore;
  uploads: UploadStore;
  extractors: ExtractorRegistry;
  embedding: EmbeddingProvider;
}

export interface IngestionWorkflowOptions {
  maxTokens: number;
  overlapTokens: number;
  embeddingBatchSize: number;
  maxAttempts: number;
  backoffMs: number;
  countTokens?: TokenCounter;
}

class SourceRemoved extends Error {}

export class IngestionWorkflow {
  private readonly log: Logger;

  constructor(
    private readonly deps: IngestionWorkflowDeps,
    private readonly options: IngestionWorkflowOptions,
    logger: Logger = getLogger({ module: "ingestion" }),
  ) {
    this.log = logger;
  }

  /**
   * Drives one source from `pending` to a terminal status. Never leaves the record
   * in a non-terminal status; rethrows configuration errors after recording them.
   */
  async run(job: IngestionJob): Promise<IngestionOutcome> {
    const log = this.log.child({ sourceId: job.sourceId, attemptId: job.attemptId });
    const startedAt = Date.now();
    let stage = "extraction";

    try {
      const source = await this.requireCurrent(job);
      await this.deps.sourceStore.updateStatus(job.sourceId, "extracting");

      let artifact = job.resume ? await this.deps.artifacts.load(job.sourceId) : null;
      if (artifact) {
        log.info({ chunks: artifact.chunks.length }, "resuming from cached chunks");
        await this.deps.sourceStore.updateStatus(job.sourceId, "chunking", {
          displayName: artifact.displayName,
          attributes: artifact.attributes,
          contentHash: artifact.contentHash,
        });
      } else {
        const extracted = await this.deps.extractors[source.originKind].extract({
          sourceId: source.sourceId,
          location: source.location,
          content:
            source.originKind === "document"
              ? await this.deps.uploads.load(source.sourceId)
              : null,
        });
        const cleaned = cleanText(extracted.text);
        const contentHash = sha256Hex(cleaned);

        if (await this.isUnchanged(job, contentHash)) {
          const completed = await this.deps.sourceStore.updateStatus(job.sourceId, "completed", {
            displayName: extracted.displayName,
            attributes: extracted.attributes,
            contentHash,
            chunkCount: job.previous?.chunkCount ?? 0,
            completedAt: new Date().toISOString(),
          });
          log.info("content unchanged, keeping existing vectors");
          return { status: "completed", source: completed, unchanged: true };
        }
        await this.logDuplicateContent(job.sourceId, contentHash, log);

        stage = "chunking";
        await this.deps.sourceStore.updateStatus(job.sourceId, "chunking", {
          displayName: extracted.displayName,
          attributes: extracted.attributes,
          contentHash,
        });
        artifact = await this.chunkAndCache(job.sourceId, cleaned, contentHash, extracted);
      }

      stage = "embedding";
      await this.deps.sourceStore.updateStatus(job.sourceId, "embedding");
      const records = await this.embedChunks(source, artifact, log);

      stage = "indexing";
      await this.requireCurrent(job);
      await this.commitVectors(job.sourceId, records);

      const latest = await this.deps.sourceStore.get(job.sourceId);
      if (!latest) {
        throw new SourceRemoved();
      }
      if (latest.attemptId !== job.attemptId) {
        log.info("superseded by a newer attempt");
        return { status: "abandoned", reason: "superseded" };
      }
      const completed = await this.deps.sourceStore.updateStatus(job.sourceId, "completed", {
        chunkCount: records.length,
        completedAt: new Date().toISOString(),
      });
      log.info(
        { chunks: records.length, latencyMs: Date.now() - startedAt },
        "ingestion completed",
      );
      return { status: "completed", source: completed, unchanged: false };
    } catch (error) {
      if (error instanceof SourceRemoved || error instanceof SourceNotFoundError) {
        await this.rollbackVectors(job.sourceId, log);
        await this.discardArtifact(job.sourceId, log);
        log.info("source deleted during ingestion, rolled back");
        return { status: "abandoned", reason: "deleted" };
      }
      return this.fail(job, stage, error, log);
    }
  }

  private async requireCurrent(job: IngestionJob): Promise<Source> {
    const source = await this.deps.sourceStore.get(job.sourceId);
    if (!source) {
      throw new SourceRemoved();
    }
    return source;
  }

  private async isUnchanged(job: IngestionJob, contentHash: string): Promise<boolean> {
    if (!job.previous || job.previous.contentHash !== contentHash) {
      return false;
    }
    const stored = await this.deps.vectorIndex.countBySource(job.sourceId);
    return stored === job.previous.chunkCount && stored > 0;
  }

  private async logDuplicateContent(sourceId: string, contentHash: string, log: Logger) {
    const sources = await this.deps.sourceStore.list();
    const duplicate = sources.find(
      (other) => other.sourceId !== sourceId && other.contentHash === contentHash,
    );
    if (duplicate) {
      log.info(
        { duplicateOf: duplicate.sourceId },
        "identical content already ingested under another source",
      );
    }
  }

  private async chunkAndCache(
    sourceId: string,
    cleaned: string,
    contentHash: string,
    extracted: { displayName: string; attributes: Record<string, string> },
  ): Promise<ChunkArtifact> {
    const pieces = chunkText(cleaned, {
      maxTokens: this.options.maxTokens,
      overlapTokens: this.options.overlapTokens,
      countTokens: this.options.countTokens,
    });
    if (pieces.length === 0) {
      throw new ExtractionError("No extractable text.");
    }

    const artifact: ChunkArtifact = {
      sourceId,
      contentHash,
      displayName: extracted.displayName,
      attributes: extracted.attributes,
      chunks: toSourceChunks(sourceId, pieces),
      createdAt: new Date().toISOString(),
    };
    await this.deps.artifacts.save(artifact);
    return artifact;
  }

  /** Every chunk is embedded before anything is written, so a failure commits nothing. */
  private async embedChunks(
    source: Source,
    artifact: ChunkArtifact,
    log: Logger,
  ): Promise<EmbeddingRecord[]> {
    const chunks = artifact.chunks;
    const vectors: number[][] = [];
    const batchSize = this.options.embeddingBatchSize;

    for (let offset = 0; offset < chunks.length; offset += batchSize) {
      const batch = chunks.slice(offset, offset + batchSize);
      try {
        const embedded = await withRetry(
          () => this.deps.embedding.embedTexts(batch.map((chunk) => chunk.text)),
          {
            maxAttempts: this.options.maxAttempts,
            baseDelayMs: this.options.backoffMs,
            onRetry: (error, attempt, delayMs) => {
              log.warn(
                { err: error, attempt, delayMs, chunk: offset + 1 },
                "embedding batch failed, retrying",
              );
            },
          },
        );
        if (embedded.length !== batch.length) {
          throw new ConsistencyViolation(
            `Embedding provider returned ${embedded.length} vectors for ${batch.length} chunks.`,
          );
        }
        vectors.push(...embedded);
      } catch (error) {
        throw new EmbeddingStageError(
          `Embedding failed at chunk ${offset + 1} of ${chunks.length}: ${errorMessage(error)}`,
          error,
        );
      }
    }

    return chunks.map((chunk, index) => toRecord(source, artifact, chunk, vectors[index]));
  }

  private async commitVectors(sourceId: string, records: EmbeddingRecord[]): Promise<void> {
    const expected = records.map((record) => record.chunkId);
    await this.deps.vectorIndex.replaceSource(sourceId, records);

    const stored = await this.deps.vectorIndex.listChunkIds(sourceId);
    const expectedSet = new Set(expected);
    const matches =
      stored.length === expectedSet.size && stored.every((chunkId) => expectedSet.has(chunkId));
    if (!matches) {
      throw new ConsistencyViolation(
        `Vector index holds ${stored.length} chunks for ${sourceId}, expected ${expectedSet.size}.`,
        { sourceId, stored: stored.length, expected: expectedSet.size },
      );
    }
  }

  private async fail(
    job: IngestionJob,
    stage: string,
    error: unknown,
    log: Logger,
  ): Promise<IngestionOutcome> {
    const cause = error instanceof EmbeddingStageError ? error.cause : error;
    const message =
      error instanceof EmbeddingStageError
        ? error.message
        : `${capitalize(stage)} failed: ${errorMessage(error)}`;
    log.warn({ err: cause, stage }, "ingestion failed");

    await this.rollbackVectors(job.sourceId, log);

    let failed: Source | null = null;
    try {
      const current = await this.deps.sourceStore.get(job.sourceId);
      if (current && current.attemptId === job.attemptId && !isTerminalStatus(current.status)) {
        failed = await this.deps.sourceStore.updateStatus(job.sourceId, "failed", {
          error: message,
        });
      }
    } catch (recordError) {
      log.error({ err: recordError }, "could not record ingestion failure");
    }

    if (cause instanceof ConfigurationError) {
      throw cause;
    }
    return { status: "failed", source: failed, error: message };
  }

  private async rollbackVectors(sourceId: string, log: Logger): Promise<void> {
    try {
      await this.deps.vectorIndex.deleteBySource(sourceId);
    } catch (error) {
      log.error({ err: error }, "vector rollback failed");
    }
  }

  /** The deletion may have run before this attempt cached its chunks. */
  private async discardArtifact(sourceId: string, log: Logger): Promise<void> {
    try {
      await this.deps.artifacts.delete(sourceId);
    } catch (error) {
      log.error({ err: error }, "chunk artifact cleanup failed");
    }
  }
}

class EmbeddingStageError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

function toRecord(
  source: Source,
  artifact: ChunkArtifact,
  chunk: Chunk,
  vector: number[],
): EmbeddingRecord {
  return {
    chunkId: chunk.chunkId,
    vector,
    text: chunk.text,
    metadata: {
      sourceId: source.sourceId,
      originKind: source.originKind,
      displayName: artifact.displayName,
      position: chunk.position,
    },
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
