import { z } from "zod";
import { ConfigurationError } from "../../domain/errors.js";
import { requestJson } from "./http.js";
import {
  CallOptions,
  ChatMessage,
  EmbeddingProvider,
  GenerateOptions,
  GenerationProvider,
} from "./types.js";

export interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
}

const MODEL_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export class OpenAiClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "openai";

  constructor(private readonly options: OpenAiClientOptions) {}

  get embeddingModel(): string {
    return this.options.embeddingModel;
  }

  get chatModel(): string {
    return this.options.chatModel;
  }

  expectedDimension(): number | null {
    return MODEL_DIMENSIONS[this.options.embeddingModel] ?? null;
  }

  async embedTexts(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const data = await requestJson(
      {
        provider: this.name,
        operation: "embeddings",
        url: `${this.options.baseUrl}/embeddings`,
        headers: this.authHeaders(),
        body: { model: this.options.embeddingModel, input: texts },
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
      },
      embeddingResponseSchema,
    );

    return [...data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  async embedQuery(text: string, options?: CallOptions): Promise<number[]> {
    const [embedding] = await this.embedTexts([text], options);
    return embedding ?? [];
  }

  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<string> {
    const data = await requestJson(
      {
        provider: this.name,
        operation: "chat",
        url: `${this.options.baseUrl}/chat/completions`,
        headers: this.authHeaders(),
        body: {
          model: this.options.chatModel,
          temperature: options.temperature ?? 0.1,
          messages,
        },
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
      },
      chatResponseSchema,
    );
    return data.choices[0]?.message.content?.trim() ?? "";
  }

  async ping(): Promise<void> {
    await requestJson(
      {
        provider: this.name,
        operation: "models",
        url: `${this.options.baseUrl}/models`,
        method: "GET",
        headers: this.authHeaders(),
        timeoutMs: Math.min(this.options.timeoutMs, 10_000),
      },
      z.object({ data: z.array(z.unknown()) }),
    );
  }

  private authHeaders(): Record<string, string> {
    if (!this.options.apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
