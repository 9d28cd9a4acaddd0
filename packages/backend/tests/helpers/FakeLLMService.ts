import { OperationCancelledError } from "../../src/errors.js";
import type {
  CompletionConstraints,
  CompletionPrompt,
  LLMServiceLike,
  ProviderCallOptions
} from "../../src/services/llmTypes.js";

export type CompletionHandler = (
  prompt: CompletionPrompt,
  constraints: CompletionConstraints
) => string | Promise<string>;

export interface RecordedCompletion {
  prompt: CompletionPrompt;
  constraints: CompletionConstraints;
  options: ProviderCallOptions;
}

interface FakeLLMServiceOptions {
  embeddingModel?: string;
  dimensions?: number;
  responses?: Array<string | Error>;
  onComplete?: CompletionHandler;
  embedder?: (text: string) => number[];
  failEmbedding?: (texts: string[]) => boolean;
}

/** Bag-of-words vector: each lowercase token adds one to a hashed slot. */
export function embedText(text: string, dimensions = 64): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let hash = 0;
    for (const char of token) {
      hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
    }
    const slot = hash % dimensions;
    vector[slot] = (vector[slot] ?? 0) + 1;
  }
  return vector;
}

export class FakeLLMService implements LLMServiceLike {
  readonly embeddingModel: string;
  readonly completions: RecordedCompletion[] = [];
  readonly embedCalls: string[][] = [];

  private readonly responses: Array<string | Error>;
  private readonly onComplete: CompletionHandler | undefined;
  private readonly embedder: (text: string) => number[];
  private readonly failEmbedding: (texts: string[]) => boolean;

  constructor(options: FakeLLMServiceOptions = {}) {
    this.embeddingModel = options.embeddingModel ?? "fake-embedding-v1";
    this.responses = [...(options.responses ?? [])];
    this.onComplete = options.onComplete;
    const dimensions = options.dimensions ?? 64;
    this.embedder = options.embedder ?? ((text) => embedText(text, dimensions));
    this.failEmbedding = options.failEmbedding ?? (() => false);
  }

  queueResponse(...responses: Array<string | Error>): void {
    this.responses.push(...responses);
  }

  async complete(
    prompt: CompletionPrompt,
    constraints: CompletionConstraints,
    options: ProviderCallOptions = {}
  ): Promise<string> {
    this.completions.push({ prompt, constraints, options });
    if (options.signal?.aborted) {
      throw new OperationCancelledError();
    }
    if (this.onComplete) {
      return this.onComplete(prompt, constraints);
    }

    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error("no scripted completion left");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async embed(text: string, options: ProviderCallOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    return vector ?? [];
  }

  async embedBatch(texts: string[], options: ProviderCallOptions = {}): Promise<number[][]> {
    this.embedCalls.push([...texts]);
    if (options.signal?.aborted) {
      throw new OperationCancelledError();
    }
    if (this.failEmbedding(texts)) {
      throw new Error("embedding provider unavailable");
    }
    return texts.map((text) => this.embedder(text));
  }
}
