import { AppConfig } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingProvider, GenerationProvider } from "./types.js";

export interface AiProviders {
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
}

export function createAiProviders(config: AppConfig): AiProviders {
  const openAi = new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.openaiEmbeddingModel,
    chatModel: config.openaiChatModel,
    timeoutMs: config.providerTimeoutMs,
  });
  const ollama = new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
    timeoutMs: config.providerTimeoutMs,
  });

  const embedding = config.embeddingProvider === "openai" ? openAi : ollama;
  const expected = embedding.expectedDimension();
  if (expected !== null && expected !== config.vectorDimension) {
    throw new ConfigurationError(
      `${embedding.embeddingModel} produces ${expected}-dimensional vectors but VECTOR_DIMENSION=${config.vectorDimension}.`,
      { model: embedding.embeddingModel, expected, configured: config.vectorDimension },
    );
  }

  return {
    embedding,
    generation: config.generationProvider === "openai" ? openAi : ollama,
  };
}
