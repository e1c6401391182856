export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GenerateOptions extends CallOptions {
  temperature?: number;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly embeddingModel: string;
  embedTexts(texts: string[], options?: CallOptions): Promise<number[][]>;
  embedQuery(text: string, options?: CallOptions): Promise<number[]>;
  /** Known output dimension of the configured model, if any. */
  expectedDimension(): number | null;
  ping(): Promise<void>;
}

export interface GenerationProvider {
  readonly name: string;
  readonly chatModel: string;
  generate(messages: ChatMessage[], options?: GenerateOptions): Promise<string>;
  ping(): Promise<void>;
}
