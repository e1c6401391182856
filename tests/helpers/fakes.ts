import { ChatMessage, EmbeddingProvider, GenerationProvider } from "../../src/infra/ai/types.js";
import { DocumentExtractor } from "../../src/infra/extractors/documentExtractor.js";
import {
  ExtractedContent,
  ExtractionRequest,
  Extractor,
  ExtractorRegistry,
} from "../../src/infra/extractors/types.js";
import { InMemoryChunkArtifactStore, InMemoryUploadStore } from "../../src/infra/store/fileStores.js";
import { InMemorySourceStore } from "../../src/infra/store/inMemorySourceStore.js";
import { InMemoryVectorIndex } from "../../src/infra/store/inMemoryVectorIndex.js";
import { TokenCounter } from "../../src/pipelines/chunking.js";
import { KnowledgeBaseService } from "../../src/services/knowledgeBaseService.js";

export const KEYWORDS = ["deploy", "incident", "billing", "video"];

/** Word count, so chunk boundaries in tests are easy to reason about. */
export const countWords: TokenCounter = (text) => text.split(/\s+/).filter(Boolean).length;

/** One dimension per keyword, holding the number of times the keyword occurs. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((keyword) => lower.split(keyword).length - 1);
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = "fake";
  readonly embeddingModel = "fake-embedding";
  embedCalls = 0;
  queryCalls = 0;
  failure: ((call: number) => Error | null) | null = null;
  pingError: Error | null = null;

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.embedCalls += 1;
    const error = this.failure?.(this.embedCalls);
    if (error) {
      throw error;
    }
    return texts.map(keywordVector);
  }

  async embedQuery(text: string): Promise<number[]> {
    this.queryCalls += 1;
    return keywordVector(text);
  }

  expectedDimension(): number {
    return KEYWORDS.length;
  }

  async ping(): Promise<void> {
    if (this.pingError) {
      throw this.pingError;
    }
  }
}

export class FakeGenerationProvider implements GenerationProvider {
  readonly name = "fake";
  readonly chatModel = "fake-chat";
  calls: ChatMessage[][] = [];
  reply: string | Error = "Final Answer: No answer configured.";
  pingError: Error | null = null;

  async generate(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }

  async ping(): Promise<void> {
    if (this.pingError) {
      throw this.pingError;
    }
  }
}

/** Serves canned content per location; an Error entry is thrown instead. */
export class StaticExtractor implements Extractor {
  calls = 0;
  gate: Promise<void> | null = null;

  constructor(readonly pages: Map<string, ExtractedContent | Error> = new Map()) {}

  async extract(request: ExtractionRequest): Promise<ExtractedContent> {
    this.calls += 1;
    if (this.gate) {
      await this.gate;
    }
    const page = this.pages.get(request.location);
    if (!page) {
      throw new Error(`no fixture for ${request.location}`);
    }
    if (page instanceof Error) {
      throw page;
    }
    return page;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export interface HarnessOptions {
  dimension?: number | null;
  embeddingBatchSize?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const sourceStore = new InMemorySourceStore();
  const vectorIndex = new InMemoryVectorIndex(options.dimension ?? null);
  const artifacts = new InMemoryChunkArtifactStore();
  const uploads = new InMemoryUploadStore();
  const embedding = new FakeEmbeddingProvider();
  const generation = new FakeGenerationProvider();
  const web = new StaticExtractor();
  const video = new StaticExtractor();
  const extractors: ExtractorRegistry = {
    document: new DocumentExtractor(),
    web_page: web,
    video,
  };

  const service = new KnowledgeBaseService(
    { sourceStore, vectorIndex, artifacts, uploads, extractors, embedding, generation },
    {
      maxChunkTokens: 10,
      chunkOverlapTokens: 2,
      embeddingBatchSize: options.embeddingBatchSize ?? 64,
      providerMaxAttempts: 2,
      providerBackoffMs: 0,
      ingestionConcurrency: 2,
      defaultTopK: 6,
      minSimilarity: 0.2,
      countTokens: countWords,
    },
  );

  return { service, sourceStore, vectorIndex, artifacts, uploads, embedding, generation, web, video };
}

export const DEPLOY_URL = "https://docs.example.com/deploy";

export const DEPLOY_PAGE: ExtractedContent = {
  text: "Deploy guide.\n\nTo deploy run the pipeline. Deploy takes five minutes.",
  displayName: "Deploy Guide",
  attributes: { domain: "docs.example.com" },
};
