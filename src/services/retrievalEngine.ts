import {
  ConfigurationError,
  QueryCancelledError,
  StateError,
  ValidationError,
} from "../domain/errors.js";
import { SourceStore } from "../domain/sourceStore.js";
import { AnswerResult, Citation, QueryMatch } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingProvider, GenerationProvider } from "../infra/ai/types.js";
import { Logger, getLogger } from "../infra/log/logger.js";
import {
  DEGRADED_ANSWER,
  INSUFFICIENT_CONTEXT_ANSWER,
  SourceDetails,
  aggregateCitations,
  buildGroundedPrompt,
  findUnknownCitations,
  parseGeneratedAnswer,
} from "../pipelines/answering.js";
import { withRetry } from "../utils/retry.js";

export interface QueryOptions {
  topK?: number;
  /** Restrict retrieval to these sources. */
  sourceIds?: string[];
  signal?: AbortSignal;
}

export interface RetrievalEngineDeps {
  sourceStore: SourceStore;
  vectorIndex: VectorIndex;
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
}

export interface RetrievalEngineOptions {
  defaultTopK: number;
  minSimilarity: number;
  maxAttempts: number;
  backoffMs: number;
  temperature?: number;
}

export const MAX_TOP_K = 50;

export class RetrievalEngine {
  private readonly log: Logger;

  constructor(
    private readonly deps: RetrievalEngineDeps,
    private readonly options: RetrievalEngineOptions,
    logger: Logger = getLogger({ module: "retrieval" }),
  ) {
    this.log = logger;
  }

  async answer(question: string, options: QueryOptions = {}): Promise<AnswerResult> {
    const startedAt = Date.now();
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ValidationError("Question must not be empty.", [
        { field: "question", message: "Required" },
      ]);
    }
    const topK = options.topK ?? this.options.defaultTopK;
    if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
      throw new ValidationError(`topK must be an integer between 1 and ${MAX_TOP_K}.`, [
        { field: "topK", message: "Out of range" },
      ]);
    }
    const { signal } = options;
    const retry = {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.backoffMs,
      signal,
    };
    const finish = (result: Omit<AnswerResult, "latencyMs">): AnswerResult => ({
      ...result,
      latencyMs: Date.now() - startedAt,
    });
    const degraded = (citations: Citation[]): AnswerResult =>
      finish({
        answer: DEGRADED_ANSWER,
        reasoning: null,
        citations,
        status: "degraded",
        unknownCitations: [],
      });

    throwIfCancelled(signal);
    let queryVector: number[];
    try {
      queryVector = await withRetry(
        () => this.deps.embedding.embedQuery(trimmed, { signal }),
        {
          ...retry,
          onRetry: (error, attempt) => {
            this.log.warn({ err: error, attempt }, "query embedding failed, retrying");
          },
        },
      );
    } catch (error) {
      rethrowIfFatal(error);
      this.log.warn({ err: error }, "query embedding unavailable, answering degraded");
      return degraded([]);
    }

    throwIfCancelled(signal);
    let matches: QueryMatch[];
    try {
      matches = await withRetry(
        () => this.deps.vectorIndex.query(queryVector, topK, { sourceIds: options.sourceIds }),
        {
          ...retry,
          onRetry: (error, attempt) => {
            this.log.warn({ err: error, attempt }, "vector search failed, retrying");
          },
        },
      );
    } catch (error) {
      rethrowIfFatal(error);
      this.log.warn({ err: error }, "vector index unavailable, answering degraded");
      return degraded([]);
    }

    const relevant = matches.filter((match) => match.score >= this.options.minSimilarity);
    const { kept, details } = await this.resolveSources(relevant);

    const { citations, contexts } = aggregateCitations(kept, details);
    if (citations.length === 0) {
      this.log.info({ candidates: matches.length }, "no relevant context");
      return finish({
        answer: INSUFFICIENT_CONTEXT_ANSWER,
        reasoning: null,
        citations: [],
        status: "insufficient_context",
        unknownCitations: [],
      });
    }

    throwIfCancelled(signal);
    let raw: string;
    try {
      raw = await withRetry(
        () =>
          this.deps.generation.generate(buildGroundedPrompt(trimmed, contexts), {
            signal,
            temperature: this.options.temperature,
          }),
        {
          ...retry,
          onRetry: (error, attempt) => {
            this.log.warn({ err: error, attempt }, "generation failed, retrying");
          },
        },
      );
    } catch (error) {
      rethrowIfFatal(error);
      this.log.warn({ err: error }, "generation unavailable, returning retrieved sources");
      return degraded(citations);
    }

    const parsed = parseGeneratedAnswer(raw);
    const unknownCitations = findUnknownCitations(parsed.answer, citations.length);
    if (unknownCitations.length > 0) {
      this.log.warn({ unknownCitations }, "answer cites sources that were not provided");
    }
    const result = finish({
      answer: parsed.answer,
      reasoning: parsed.reasoning,
      citations,
      status: "answered",
      unknownCitations,
    });
    this.log.info(
      { citations: citations.length, latencyMs: result.latencyMs },
      "question answered",
    );
    return result;
  }

  /**
   * Drops matches whose source was deleted after its vectors were read. If the store
   * cannot be reached the vector metadata stands in for the record.
   */
  private async resolveSources(
    matches: QueryMatch[],
  ): Promise<{ kept: QueryMatch[]; details: Map<string, SourceDetails> }> {
    const details = new Map<string, SourceDetails>();
    const missing = new Set<string>();

    for (const sourceId of new Set(matches.map((match) => match.metadata.sourceId))) {
      try {
        const source = await this.deps.sourceStore.get(sourceId);
        if (source) {
          details.set(sourceId, {
            displayName: source.displayName,
            originKind: source.originKind,
            location: source.location,
          });
        } else {
          missing.add(sourceId);
        }
      } catch (error) {
        this.log.warn({ err: error, sourceId }, "source store unavailable, using vector metadata");
      }
    }

    return {
      kept: matches.filter((match) => !missing.has(match.metadata.sourceId)),
      details,
    };
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new QueryCancelledError();
  }
}

function rethrowIfFatal(error: unknown): void {
  if (
    error instanceof ConfigurationError ||
    error instanceof StateError ||
    error instanceof QueryCancelledError
  ) {
    throw error;
  }
}
