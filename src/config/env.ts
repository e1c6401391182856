import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const booleanFlag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: booleanFlag,
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  PERSIST_INMEMORY_INDEX: booleanFlag,
  DATA_DIR: z.string().default(".data"),
  MAX_INMEMORY_INDEX_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(256 * 1024 * 1024),

  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  GENERATION_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o"),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),

  MAX_CHUNK_TOKENS: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP_TOKENS: z.coerce.number().int().nonnegative().default(50),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
  PROVIDER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  PROVIDER_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  INGESTION_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DEFAULT_TOP_K: z.coerce.number().int().positive().max(50).default(6),
  MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(0.2),

  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  LOG_PRETTY: booleanFlag,
});

export type ProviderKind = "openai" | "ollama";

export interface AppConfig {
  enablePgvector: boolean;
  databaseUrl: string | null;
  vectorDimension: number;
  persistInMemoryIndex: boolean;
  dataDir: string;
  maxInMemoryIndexBytes: number;

  embeddingProvider: ProviderKind;
  generationProvider: ProviderKind;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;

  maxChunkTokens: number;
  chunkOverlapTokens: number;
  embeddingBatchSize: number;
  providerMaxAttempts: number;
  providerBackoffMs: number;
  providerTimeoutMs: number;
  ingestionConcurrency: number;
  defaultTopK: number;
  minSimilarity: number;

  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`, {
      issues,
    });
  }
  const parsed = result.data;
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new ConfigurationError("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }
  if (parsed.CHUNK_OVERLAP_TOKENS >= parsed.MAX_CHUNK_TOKENS) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP_TOKENS (${parsed.CHUNK_OVERLAP_TOKENS}) must be smaller than MAX_CHUNK_TOKENS (${parsed.MAX_CHUNK_TOKENS}).`,
    );
  }
  const usesOpenAi =
    parsed.EMBEDDING_PROVIDER === "openai" ||
    parsed.GENERATION_PROVIDER === "openai";
  if (usesOpenAi && !parsed.OPENAI_API_KEY) {
    throw new ConfigurationError(
      "OPENAI_API_KEY is required when an OpenAI provider is selected.",
    );
  }

  return {
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorDimension: parsed.VECTOR_DIMENSION,
    persistInMemoryIndex: parsed.PERSIST_INMEMORY_INDEX !== "false",
    dataDir: parsed.DATA_DIR,
    maxInMemoryIndexBytes: parsed.MAX_INMEMORY_INDEX_BYTES,

    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    generationProvider: parsed.GENERATION_PROVIDER,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,

    maxChunkTokens: parsed.MAX_CHUNK_TOKENS,
    chunkOverlapTokens: parsed.CHUNK_OVERLAP_TOKENS,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    providerMaxAttempts: parsed.PROVIDER_MAX_ATTEMPTS,
    providerBackoffMs: parsed.PROVIDER_BACKOFF_MS,
    providerTimeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    ingestionConcurrency: parsed.INGESTION_CONCURRENCY,
    defaultTopK: parsed.DEFAULT_TOP_K,
    minSimilarity: parsed.MIN_SIMILARITY,

    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
