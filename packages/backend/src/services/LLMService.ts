import { appConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import { createOpenAIClient } from "./openaiClient.js";
import type {
  ChatCompletionRequest,
  CompletionConstraints,
  CompletionPrompt,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  ProviderCallOptions,
  TokenUsagePhase,
  TokenUsageRecord,
  UsageLike
} from "./llmTypes.js";

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

export class EmbeddingShapeError extends Error {
  constructor(expected: number, received: number) {
    super(`Embedding provider returned ${received} vectors for ${expected} inputs`);
    this.name = "EmbeddingShapeError";
  }
}

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;
  private readonly chatCredentialsMissing: boolean;
  private readonly embeddingCredentialsMissing: boolean;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      temperature: config.temperature ?? 0,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 30_000
    };

    this.client = deps?.client ?? createOpenAIClient(this.config.apiKey, this.config.baseURL);
    this.chatCredentialsMissing = !deps?.client && this.config.apiKey.trim().length === 0;

    // Use a separate client for embeddings if configured
    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
      this.embeddingCredentialsMissing = false;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = createOpenAIClient(config.embeddingApiKey, config.embeddingBaseURL);
      this.embeddingCredentialsMissing = false;
    } else {
      this.embeddingClient = this.client;
      this.embeddingCredentialsMissing = this.chatCredentialsMissing;
    }

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const config: LLMConfig = {
      apiKey: appConfig.OPENAI_API_KEY,
      baseURL: appConfig.OPENAI_BASE_URL,
      chatModel: appConfig.OPENAI_CHAT_MODEL,
      embeddingModel: appConfig.OPENAI_EMBEDDING_MODEL,
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS,
      temperature: 0
    };

    if (appConfig.EMBEDDING_API_KEY) {
      config.embeddingApiKey = appConfig.EMBEDDING_API_KEY;
    }
    if (appConfig.EMBEDDING_BASE_URL) {
      config.embeddingBaseURL = appConfig.EMBEDDING_BASE_URL;
    }

    return new LLMService(config);
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  get chatModel(): string {
    return this.config.chatModel;
  }

  async complete(
    prompt: CompletionPrompt,
    constraints: CompletionConstraints,
    options: ProviderCallOptions = {}
  ): Promise<string> {
    if (this.chatCredentialsMissing) {
      throw new ConfigurationError("OPENAI_API_KEY is not set; the language model cannot be called");
    }

    const body: ChatCompletionRequest = {
      model: this.config.chatModel,
      temperature: constraints.temperature ?? this.config.temperature,
      max_tokens: constraints.maxOutputTokens,
      messages: [{ role: "system", content: prompt.system }, ...prompt.messages]
    };
    if (constraints.responseFormat === "json") {
      body.response_format = { type: "json_object" };
    }

    const response = await this.rateLimiter.run(
      () => this.client.chat.completions.create(body, { signal: options.signal }),
      { signal: options.signal, maxRetries: options.retries }
    );

    this.recordUsage(options.phase ?? "answer", this.config.chatModel, response.usage, options.documentId);
    return response.choices[0]?.message?.content ?? "";
  }

  async embed(text: string, options: ProviderCallOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    return vector ?? [];
  }

  async embedBatch(texts: string[], options: ProviderCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (this.embeddingCredentialsMissing) {
      throw new ConfigurationError("No embedding API key is set; the embedding provider cannot be called");
    }

    const response = await this.rateLimiter.run(
      () =>
        this.embeddingClient.embeddings.create(
          {
            model: this.config.embeddingModel,
            input: texts,
            ...(this.config.embeddingDimensions ? { dimensions: this.config.embeddingDimensions } : {})
          },
          { signal: options.signal }
        ),
      { signal: options.signal, maxRetries: options.retries }
    );

    this.recordUsage("embedding", this.config.embeddingModel, response.usage, options.documentId);

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== texts.length) {
      throw new EmbeddingShapeError(texts.length, ordered.length);
    }
    return ordered.map((item) => item.embedding);
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  clearUsageRecords(): void {
    this.usageRecords.length = 0;
  }

  estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }

  private recordUsage(
    phase: TokenUsagePhase,
    model: string,
    usage: UsageLike | null | undefined,
    documentId?: string
  ): void {
    const record: TokenUsageRecord = {
      phase,
      model,
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      timestamp: new Date()
    };
    if (documentId !== undefined) {
      record.documentId = documentId;
    }
    this.usageRecords.push(record);
  }
}
