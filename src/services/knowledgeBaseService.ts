import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ChunkArtifactStore, UploadStore } from "../domain/chunkArtifacts.js";
import {
  ConfigurationError,
  SourceBusyError,
  SourceNotFoundError,
  ValidationError,
  errorMessage,
} from "../domain/errors.js";
import {
  createSourceId,
  documentIdentity,
  normalizeVideoUrl,
  normalizeWebUrl,
} from "../domain/sourceIdentity.js";
import { SourceStore } from "../domain/sourceStore.js";
import {
  AnswerResult,
  ComponentHealth,
  HealthReport,
  OriginKind,
  Source,
  SourceStatus,
  isTerminalStatus,
} from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingProvider, GenerationProvider } from "../infra/ai/types.js";
import { ExtractorRegistry } from "../infra/extractors/types.js";
import { Logger, getLogger } from "../infra/log/logger.js";
import { TokenCounter } from "../pipelines/chunking.js";
import { DeletionWorkflow } from "./deletionWorkflow.js";
import { IngestionJob, IngestionWorkflow } from "./ingestionWorkflow.js";
import { IngestionScheduler } from "./ingestionScheduler.js";
import { MAX_TOP_K, RetrievalEngine } from "./retrievalEngine.js";

export const submitSourceSchema = z.union([
  z.object({
    originKind: z.literal("document"),
    filename: z.string().trim().min(1),
    contentBase64: z.string().min(1),
  }),
  z.object({
    originKind: z.literal("document"),
    path: z.string().trim().min(1),
  }),
  z.object({
    originKind: z.literal("web_page"),
    url: z.string().trim().min(1),
  }),
  z.object({
    originKind: z.literal("video"),
    url: z.string().trim().min(1),
  }),
]);

export type SubmitSourceInput = z.infer<typeof submitSourceSchema>;

export const queryInputSchema = z.object({
  question: z.string().trim().min(1),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
  sourceIds: z.array(z.string().min(1)).optional(),
});

export type QueryInput = z.infer<typeof queryInputSchema> & { signal?: AbortSignal };

export interface SubmitSourceResult {
  sourceId: string;
  status: SourceStatus;
  /** False when identical content was already ingested and nothing was queued. */
  queued: boolean;
}

export interface RetryFailedResult {
  retried: string[];
  skipped: Array<{ sourceId: string; reason: "not_found" | "not_failed" | "busy" }>;
}

export interface KnowledgeBaseDeps {
  sourceStore: SourceStore;
  vectorIndex: VectorIndex;
  artifacts: ChunkArtifactStore;
  uploads: UploadStore;
  extractors: ExtractorRegistry;
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
}

export interface KnowledgeBaseOptions {
  maxChunkTokens: number;
  chunkOverlapTokens: number;
  embeddingBatchSize: number;
  providerMaxAttempts: number;
  providerBackoffMs: number;
  ingestionConcurrency: number;
  defaultTopK: number;
  minSimilarity: number;
  countTokens?: TokenCounter;
}

interface ResolvedSubmission {
  originKind: OriginKind;
  identity: string;
  location: string;
  displayName: string;
  content: Buffer | null;
}

export class KnowledgeBaseService {
  private readonly scheduler: IngestionScheduler;
  private readonly ingestion: IngestionWorkflow;
  private readonly deletion: DeletionWorkflow;
  private readonly retrieval: RetrievalEngine;
  private readonly log: Logger;

  constructor(
    private readonly deps: KnowledgeBaseDeps,
    options: KnowledgeBaseOptions,
    logger: Logger = getLogger({ module: "knowledgeBase" }),
  ) {
    this.log = logger;
    this.ingestion = new IngestionWorkflow(deps, {
      maxTokens: options.maxChunkTokens,
      overlapTokens: options.chunkOverlapTokens,
      embeddingBatchSize: options.embeddingBatchSize,
      maxAttempts: options.providerMaxAttempts,
      backoffMs: options.providerBackoffMs,
      countTokens: options.countTokens,
    });
    this.scheduler = new IngestionScheduler(
      (job) => this.ingestion.run(job),
      options.ingestionConcurrency,
    );
    this.deletion = new DeletionWorkflow(deps);
    this.retrieval = new RetrievalEngine(deps, {
      defaultTopK: options.defaultTopK,
      minSimilarity: options.minSimilarity,
      maxAttempts: options.providerMaxAttempts,
      backoffMs: options.providerBackoffMs,
    });
  }

  /** Startup checks: stored vectors must match the embedding model, and stale runs are closed out. */
  async start(): Promise<void> {
    const stored = await this.deps.vectorIndex.dimension();
    const expected = this.deps.embedding.expectedDimension();
    if (stored !== null && expected !== null && stored !== expected) {
      throw new ConfigurationError(
        `Vector index holds ${stored}-dimensional vectors but ${this.deps.embedding.embeddingModel} produces ${expected}.`,
        { stored, expected },
      );
    }
    const recovered = await this.recoverInterrupted();
    if (recovered.length > 0) {
      this.log.warn({ sources: recovered }, "marked interrupted ingestions as failed");
    }
  }

  async submitSource(input: SubmitSourceInput): Promise<SubmitSourceResult> {
    const submission = await resolveSubmission(input);
    const sourceId = createSourceId(submission.originKind, submission.identity);
    const job = await this.scheduler.submit(sourceId, async () => {
      const existing = await this.deps.sourceStore.get(sourceId);
      // document ids are content addressed, so a completed one cannot change
      if (existing?.originKind === "document" && existing.status === "completed") {
        return null;
      }
      if (submission.content) {
        await this.deps.uploads.save(sourceId, submission.content);
      }

      const now = new Date().toISOString();
      const attemptId = randomUUID();
      await this.deps.sourceStore.put({
        sourceId,
        originKind: submission.originKind,
        displayName: existing?.displayName ?? submission.displayName,
        location: submission.location,
        contentHash: null,
        status: "pending",
        error: null,
        chunkCount: 0,
        attemptId,
        attributes: existing?.attributes ?? {},
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
        completedAt: null,
      });

      return {
        sourceId,
        attemptId,
        resume: false,
        previous:
          existing?.status === "completed" && existing.contentHash
            ? { contentHash: existing.contentHash, chunkCount: existing.chunkCount }
            : null,
      } satisfies IngestionJob;
    });

    if (!job) {
      this.log.info({ sourceId }, "identical document already ingested");
      return { sourceId, status: "completed", queued: false };
    }
    this.log.info({ sourceId, originKind: submission.originKind }, "source queued");
    return { sourceId, status: "pending", queued: true };
  }

  async getStatus(sourceId: string): Promise<Source> {
    const source = await this.deps.sourceStore.get(sourceId);
    if (!source) {
      throw new SourceNotFoundError(sourceId);
    }
    return source;
  }

  listSources(): Promise<Source[]> {
    return this.deps.sourceStore.list();
  }

  async deleteSource(sourceId: string): Promise<"deleted" | "not_found"> {
    const result = await this.deletion.delete(sourceId);
    return result.status;
  }

  query(input: QueryInput): Promise<AnswerResult> {
    return this.retrieval.answer(input.question, {
      topK: input.topK,
      sourceIds: input.sourceIds,
      signal: input.signal,
    });
  }

  async health(): Promise<HealthReport> {
    const [vectorIndex, sourceStore, embeddingProvider, generationProvider] =
      await Promise.all([
        this.checkComponent("vectorIndex", () => this.deps.vectorIndex.ping()),
        this.checkComponent("sourceStore", () => this.deps.sourceStore.ping()),
        this.checkComponent("embeddingProvider", () => this.deps.embedding.ping()),
        this.checkComponent("generationProvider", () => this.deps.generation.ping()),
      ]);
    const components = { vectorIndex, sourceStore, embeddingProvider, generationProvider };
    const degraded = Object.values(components).some((value) => value !== "ok");
    return { status: degraded ? "degraded" : "ok", components };
  }

  /**
   * Re-queues failed sources, all of them or the given ids. Runs resume from the
   * cached chunk artifact when one exists, so only embedding is repeated.
   */
  async retryFailedSources(sourceIds?: string[]): Promise<RetryFailedResult> {
    const candidates = sourceIds ?? (await this.failedSourceIds());
    const result: RetryFailedResult = { retried: [], skipped: [] };

    for (const sourceId of candidates) {
      const skip: { reason: "not_found" | "not_failed" } = { reason: "not_failed" };
      try {
        const job = await this.scheduler.submit(sourceId, async () => {
          const current = await this.deps.sourceStore.get(sourceId);
          if (!current || current.status !== "failed") {
            skip.reason = current ? "not_failed" : "not_found";
            return null;
          }
          const attemptId = randomUUID();
          await this.deps.sourceStore.put({
            ...current,
            status: "pending",
            error: null,
            attemptId,
            updatedAt: new Date().toISOString(),
            completedAt: null,
          });
          return { sourceId, attemptId, resume: true, previous: null } satisfies IngestionJob;
        });
        if (job) {
          result.retried.push(sourceId);
        } else {
          result.skipped.push({ sourceId, reason: skip.reason });
        }
      } catch (error) {
        if (!(error instanceof SourceBusyError)) {
          throw error;
        }
        result.skipped.push({ sourceId, reason: "busy" });
      }
    }

    if (result.retried.length > 0) {
      this.log.info({ sources: result.retried }, "failed sources re-queued");
    }
    return result;
  }

  /** Marks records a crashed process left mid-ingestion as failed and drops their vectors. */
  async recoverInterrupted(): Promise<string[]> {
    const recovered: string[] = [];
    for (const source of await this.deps.sourceStore.list()) {
      if (isTerminalStatus(source.status) || this.scheduler.isBusy(source.sourceId)) {
        continue;
      }
      await this.deps.vectorIndex.deleteBySource(source.sourceId);
      await this.deps.sourceStore.updateStatus(source.sourceId, "failed", {
        error: "Ingestion interrupted",
      });
      recovered.push(source.sourceId);
    }
    return recovered;
  }

  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  private async failedSourceIds(): Promise<string[]> {
    const sources = await this.deps.sourceStore.list();
    return sources.filter((source) => source.status === "failed").map((source) => source.sourceId);
  }

  private async checkComponent(component: string, ping: () => Promise<void>): Promise<ComponentHealth> {
    try {
      await ping();
      return "ok";
    } catch (error) {
      this.log.warn({ component, err: error }, "health check failed");
      return "unavailable";
    }
  }
}

async function resolveSubmission(input: SubmitSourceInput): Promise<ResolvedSubmission> {
  if (input.originKind === "web_page") {
    const url = normalizeWebUrl(input.url);
    return { originKind: "web_page", identity: url, location: url, displayName: url, content: null };
  }
  if (input.originKind === "video") {
    const url = normalizeVideoUrl(input.url);
    return { originKind: "video", identity: url, location: url, displayName: url, content: null };
  }
  if ("contentBase64" in input) {
    const content = Buffer.from(input.contentBase64, "base64");
    if (content.length === 0) {
      throw new ValidationError("Uploaded document is empty.", [
        { field: "contentBase64", message: "Decoded content is empty" },
      ]);
    }
    const filename = path.basename(input.filename);
    return {
      originKind: "document",
      identity: documentIdentity(content),
      location: filename,
      displayName: filename,
      content,
    };
  }

  const absolutePath = path.resolve(input.path);
  let content: Buffer;
  try {
    content = await fs.readFile(absolutePath);
  } catch (error) {
    throw new ValidationError(`Cannot read ${absolutePath}: ${errorMessage(error)}`, [
      { field: "path", message: "File is not readable" },
    ]);
  }
  return {
    originKind: "document",
    identity: documentIdentity(content),
    location: absolutePath,
    displayName: path.basename(absolutePath),
    content,
  };
}
