import type {
  ChunkStore,
  Document,
  DocumentChunk,
  IndexRecord,
  StoreLifecycle,
  VectorIndex,
  VectorIndexInfo,
  VectorMatch,
  VectorQueryFilter
} from "@finscope/shared";
import { ConfigurationError } from "../errors.js";
import { cosineSimilarity } from "./similarity.js";

/**
 * Process-local chunk store and vector index. Every write replaces a whole entry in a
 * single Map.set, so an upsert is never observed half-applied and the last writer wins.
 */
export class InMemoryStore implements ChunkStore, VectorIndex, StoreLifecycle {
  private readonly documents = new Map<string, Document>();
  private readonly chunks = new Map<string, DocumentChunk>();
  private readonly records = new Map<string, IndexRecord>();
  private embeddingModel: string | null = null;
  private dimensions: number | null = null;

  async connect(): Promise<void> {}
  async disconnect(): Promise<void> {}
  async healthCheck(): Promise<boolean> {
    return true;
  }

  async saveDocument(doc: Document): Promise<void> {
    this.documents.set(doc.id, { ...doc, metadata: { ...doc.metadata } });
  }

  async getDocuments(): Promise<Document[]> {
    return [...this.documents.values()].sort(
      (a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime() || a.id.localeCompare(b.id)
    );
  }

  async getDocumentById(id: string): Promise<Document | null> {
    return this.documents.get(id) ?? null;
  }

  async saveChunks(chunks: DocumentChunk[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, { ...chunk });
    }
  }

  async getChunksByDocument(docId: string): Promise<DocumentChunk[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.documentId === docId)
      .sort((a, b) => a.index - b.index);
  }

  async getChunksByIds(ids: string[]): Promise<DocumentChunk[]> {
    return ids
      .map((id) => this.chunks.get(id))
      .filter((chunk): chunk is DocumentChunk => chunk !== undefined);
  }

  async deleteDocument(docId: string): Promise<string[]> {
    const removed = [...this.chunks.values()]
      .filter((chunk) => chunk.documentId === docId)
      .map((chunk) => chunk.id);
    await this.deleteChunks(removed);
    for (const record of [...this.records.values()]) {
      if (record.metadata.documentId === docId) {
        this.records.delete(record.id);
      }
    }
    this.documents.delete(docId);
    return removed;
  }

  async deleteChunks(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.chunks.delete(id);
      this.records.delete(id);
    }
  }

  async upsert(record: IndexRecord): Promise<void> {
    const populated = this.records.size > 0 && !(this.records.size === 1 && this.records.has(record.id));
    if (populated && record.metadata.embeddingModel !== this.embeddingModel) {
      throw new ConfigurationError(
        `Index holds ${this.embeddingModel} vectors; refusing to write ${record.metadata.embeddingModel}`
      );
    }
    if (populated && record.vector.length !== this.dimensions) {
      throw new ConfigurationError(
        `Index dimension is ${this.dimensions}; received a vector of ${record.vector.length}`
      );
    }

    this.embeddingModel = record.metadata.embeddingModel;
    this.dimensions = record.vector.length;
    this.records.set(record.id, {
      id: record.id,
      vector: [...record.vector],
      metadata: { ...record.metadata }
    });
  }

  async query(vector: number[], k: number, filter?: VectorQueryFilter): Promise<VectorMatch[]> {
    if (vector.length === 0 || k <= 0) {
      return [];
    }

    const allowed = filter?.documentIds && filter.documentIds.length > 0 ? new Set(filter.documentIds) : null;
    const matches: VectorMatch[] = [];
    for (const record of this.records.values()) {
      if (allowed && !allowed.has(record.metadata.documentId)) {
        continue;
      }
      matches.push({
        id: record.id,
        score: cosineSimilarity(vector, record.vector),
        metadata: { ...record.metadata }
      });
    }

    return matches
      .sort((a, b) => b.score - a.score || a.metadata.pageNumber - b.metadata.pageNumber || a.id.localeCompare(b.id))
      .slice(0, k);
  }

  async delete(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.records.delete(id);
    }
  }

  async describe(): Promise<VectorIndexInfo> {
    return {
      embeddingModel: this.records.size > 0 ? this.embeddingModel : null,
      dimensions: this.records.size > 0 ? this.dimensions : null,
      recordCount: this.records.size
    };
  }

  hasRecord(id: string): boolean {
    return this.records.has(id);
  }
}
