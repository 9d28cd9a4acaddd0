import type { DocumentChunk, IndexRecord, VectorIndex } from "@finscope/shared";
import { appConfig } from "../config.js";
import { ConfigurationError, errorMessage, isFatalError, throwIfCancelled } from "../errors.js";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import type { IndexerOptions, IndexingResult, RunOptions } from "./types.js";

const defaultOptions: IndexerOptions = {
  batchSize: appConfig.EMBEDDING_BATCH_SIZE,
  maxAttempts: appConfig.EMBEDDING_MAX_ATTEMPTS,
  retryDelayMs: appConfig.EMBEDDING_RETRY_DELAY_MS
};

export class Indexer {
  private readonly options: IndexerOptions;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly vectorIndex: VectorIndex,
    options: Partial<IndexerOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };

    if (!Number.isInteger(this.options.batchSize) || this.options.batchSize < 1) {
      throw new ConfigurationError(`Embedding batch size must be a positive integer, got ${this.options.batchSize}`);
    }
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new ConfigurationError(`Embedding attempts must be a positive integer, got ${this.options.maxAttempts}`);
    }
  }

  async index(chunks: DocumentChunk[], runOptions: RunOptions = {}): Promise<IndexingResult> {
    const result: IndexingResult = { indexed: [], unindexed: [], warnings: [] };
    if (chunks.length === 0) {
      return result;
    }

    await this.assertModelMatches();

    const batches = toBatches(chunks, this.options.batchSize);
    for (const [batchIndex, batch] of batches.entries()) {
      throwIfCancelled(runOptions.signal);

      let vectors: number[][];
      try {
        vectors = await this.embedWithRetry(batch, runOptions.signal);
      } catch (error) {
        if (isFatalError(error)) {
          throw error;
        }

        const message = `batch ${batchIndex + 1}/${batches.length}: embedding failed after ${this.options.maxAttempts} attempts (${errorMessage(error)})`;
        logger.warn(
          { documentId: batch[0]?.documentId, batch: batchIndex + 1, chunkCount: batch.length, err: error },
          "Embedding batch failed; chunks left unindexed"
        );
        result.warnings.push(message);
        result.unindexed.push(...batch.map((chunk) => chunk.id));
        continue;
      }

      for (const [offset, chunk] of batch.entries()) {
        const vector = vectors[offset];
        if (!vector) {
          result.unindexed.push(chunk.id);
          continue;
        }
        await this.vectorIndex.upsert(this.toRecord(chunk, vector));
        result.indexed.push(chunk.id);
      }
    }

    return result;
  }

  private async assertModelMatches(): Promise<void> {
    const info = await this.vectorIndex.describe();
    if (info.embeddingModel !== null && info.embeddingModel !== this.embeddings.embeddingModel) {
      throw new ConfigurationError(
        `Vector index was built with ${info.embeddingModel} but the embedding provider uses ${this.embeddings.embeddingModel}`
      );
    }
  }

  /** The only retry layer for ingestion embeddings: each attempt is one provider call. */
  private async embedWithRetry(batch: DocumentChunk[], signal?: AbortSignal): Promise<number[][]> {
    const texts = batch.map((chunk) => chunk.content);
    let attempt = 0;

    while (true) {
      attempt += 1;
      try {
        const vectors = await this.embeddings.embedBatch(texts, {
          signal,
          phase: "embedding",
          documentId: batch[0]?.documentId,
          retries: 0
        });
        if (vectors.length !== texts.length) {
          throw new Error(`Embedding provider returned ${vectors.length} vectors for ${texts.length} inputs`);
        }
        return vectors;
      } catch (error) {
        if (isFatalError(error) || attempt >= this.options.maxAttempts) {
          throw error;
        }
        await sleep(this.options.retryDelayMs * 2 ** (attempt - 1), signal);
      }
    }
  }

  private toRecord(chunk: DocumentChunk, vector: number[]): IndexRecord {
    return {
      id: chunk.id,
      vector,
      metadata: {
        documentId: chunk.documentId,
        documentTitle: chunk.documentTitle,
        pageNumber: chunk.pageNumber,
        embeddingModel: this.embeddings.embeddingModel
      }
    };
  }
}

function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}
