import type { ChunkStore, RetrievalFilter, RetrievedChunk, VectorIndex, VectorMatch } from "@finscope/shared";
import { appConfig } from "../config.js";
import { ConfigurationError, throwIfCancelled } from "../errors.js";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import type { RunOptions } from "../pipeline/types.js";

export const MIN_TOP_K = 1;
export const MAX_TOP_K = 20;

export interface RetrieverOptions {
  defaultTopK: number;
}

const defaultOptions: RetrieverOptions = {
  defaultTopK: appConfig.RETRIEVAL_TOP_K
};

export function clampTopK(k: number | undefined, fallback: number): number {
  const value = k === undefined || !Number.isFinite(k) ? fallback : Math.floor(k);
  return Math.min(MAX_TOP_K, Math.max(MIN_TOP_K, value));
}

/** Score desc, then page asc, then position in the document, then chunk id. */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  return (
    b.score - a.score ||
    a.chunk.pageNumber - b.chunk.pageNumber ||
    a.chunk.index - b.chunk.index ||
    a.chunk.id.localeCompare(b.chunk.id)
  );
}

function tiedAtCutoff(matches: VectorMatch[], topK: number): boolean {
  const cutoff = matches[topK - 1];
  const last = matches[matches.length - 1];
  return cutoff !== undefined && last !== undefined && last.score === cutoff.score;
}

export class Retriever {
  private readonly options: RetrieverOptions;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly vectorIndex: VectorIndex,
    private readonly store: ChunkStore,
    options: Partial<RetrieverOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async retrieve(
    query: string,
    filter: RetrievalFilter = {},
    k?: number,
    runOptions: RunOptions = {}
  ): Promise<RetrievedChunk[]> {
    const topK = clampTopK(k, this.options.defaultTopK);
    const info = await this.vectorIndex.describe();
    if (info.recordCount === 0 || query.trim().length === 0) {
      return [];
    }
    if (info.embeddingModel !== null && info.embeddingModel !== this.embeddings.embeddingModel) {
      throw new ConfigurationError(
        `Vector index was built with ${info.embeddingModel} but queries are embedded with ${this.embeddings.embeddingModel}`
      );
    }

    throwIfCancelled(runOptions.signal);
    const vector = await this.embeddings.embed(query, { signal: runOptions.signal, phase: "embedding" });
    throwIfCancelled(runOptions.signal);

    const documentIds = filter.documentIds?.filter((id) => id.length > 0) ?? [];
    const indexFilter = documentIds.length > 0 ? { documentIds } : undefined;

    // One extra match shows whether the score at the cutoff is tied past it; while it
    // is, widen the fetch so the page and position tie-break sees the whole tied group.
    let fetchK = topK + 1;
    let matches = await this.vectorIndex.query(vector, fetchK, indexFilter);
    while (matches.length === fetchK && fetchK < info.recordCount && tiedAtCutoff(matches, topK)) {
      throwIfCancelled(runOptions.signal);
      fetchK = Math.min(fetchK * 2, info.recordCount);
      matches = await this.vectorIndex.query(vector, fetchK, indexFilter);
    }
    if (matches.length === 0) {
      return [];
    }

    const chunks = await this.store.getChunksByIds(matches.map((match) => match.id));
    const byId = new Map(chunks.map((chunk) => [chunk.id, chunk] as const));

    const results: RetrievedChunk[] = [];
    for (const match of matches) {
      const chunk = byId.get(match.id);
      if (!chunk) {
        continue;
      }
      results.push({ chunk, score: match.score });
    }

    return results.sort(compareRetrieved).slice(0, topK);
  }
}
