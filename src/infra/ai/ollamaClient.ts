import { z } from "zod";
import { ProviderError } from "../../domain/errors.js";
import { requestJson } from "./http.js";
import {
  CallOptions,
  ChatMessage,
  EmbeddingProvider,
  GenerateOptions,
  GenerationProvider,
} from "./types.js";

export interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  timeoutMs: number;
}

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  get embeddingModel(): string {
    return this.options.embeddingModel;
  }

  get chatModel(): string {
    return this.options.chatModel;
  }

  expectedDimension(): number | null {
    return null;
  }

  async embedTexts(texts: string[], options?: CallOptions): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index], options);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(text: string, options: CallOptions = {}): Promise<number[]> {
    const data = await requestJson(
      {
        provider: this.name,
        operation: "embeddings",
        url: `${this.options.baseUrl}/api/embeddings`,
        body: { model: this.options.embeddingModel, prompt: text },
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
      },
      embeddingResponseSchema,
    );
    if (!data.embedding || data.embedding.length === 0) {
      throw new ProviderError("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<string> {
    const data = await requestJson(
      {
        provider: this.name,
        operation: "chat",
        url: `${this.options.baseUrl}/api/chat`,
        body: {
          model: this.options.chatModel,
          stream: false,
          keep_alive: "30m",
          options: {
            temperature: options.temperature ?? 0.1,
            top_p: 0.9,
          },
          messages,
        },
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
      },
      chatResponseSchema,
    );
    return data.message?.content?.trim() ?? "";
  }

  async ping(): Promise<void> {
    await requestJson(
      {
        provider: this.name,
        operation: "tags",
        url: `${this.options.baseUrl}/api/tags`,
        method: "GET",
        timeoutMs: Math.min(this.options.timeoutMs, 10_000),
      },
      z.object({ models: z.array(z.unknown()) }),
    );
  }
}
