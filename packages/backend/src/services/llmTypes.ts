export type PromptRole = "system" | "user" | "assistant";

export type PromptMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface CompletionPrompt {
  system: string;
  messages: PromptMessage[];
}

export interface CompletionConstraints {
  maxOutputTokens: number;
  responseFormat?: "text" | "json";
  temperature?: number;
  /** Evidence ids the answer is expected to cite. */
  citeEvidenceIds?: string[];
}

export type TokenUsagePhase = "answer" | "rewrite" | "extraction" | "embedding";

export interface ProviderCallOptions {
  signal?: AbortSignal;
  phase?: TokenUsagePhase;
  documentId?: string;
  /** Provider-level retries for this call; the rate limiter's setting applies when unset. */
  retries?: number;
}

export interface EmbeddingProvider {
  readonly embeddingModel: string;
  embed(text: string, options?: ProviderCallOptions): Promise<number[]>;
  embedBatch(texts: string[], options?: ProviderCallOptions): Promise<number[][]>;
}

export interface LanguageModel {
  complete(
    prompt: CompletionPrompt,
    constraints: CompletionConstraints,
    options?: ProviderCallOptions
  ): Promise<string>;
  estimateTokens?(text: string): number;
}

export interface LLMServiceLike extends EmbeddingProvider, LanguageModel {}

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  embeddingDimensions?: number;
  temperature?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface TokenUsageRecord {
  documentId?: string;
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  timestamp: Date;
}

export interface UsageLike {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface ChatCompletionRequest {
  model: string;
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" | "text" };
  messages: PromptMessage[];
}

export interface ChatCompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
  usage?: UsageLike | null;
}

export interface EmbeddingRequest {
  model: string;
  input: string | string[];
  dimensions?: number;
}

export interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
  usage?: UsageLike | null;
}

export interface ClientRequestOptions {
  signal?: AbortSignal;
}

export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest, options?: ClientRequestOptions): Promise<ChatCompletionResponse>;
    };
  };
  embeddings: {
    create(body: EmbeddingRequest, options?: ClientRequestOptions): Promise<EmbeddingResponse>;
  };
}
