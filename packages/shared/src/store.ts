import type { Document, DocumentChunk } from "./types/document.js";

export interface IndexRecordMetadata {
  documentId: string;
  documentTitle: string;
  pageNumber: number;
  embeddingModel: string;
}

export interface IndexRecord {
  id: string;
  vector: number[];
  metadata: IndexRecordMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: IndexRecordMetadata;
}

export interface VectorQueryFilter {
  documentIds?: string[];
}

export interface VectorIndexInfo {
  embeddingModel: string | null;
  dimensions: number | null;
  recordCount: number;
}

export interface VectorIndex {
  upsert(record: IndexRecord): Promise<void>;
  query(vector: number[], k: number, filter?: VectorQueryFilter): Promise<VectorMatch[]>;
  delete(ids: string[]): Promise<void>;
  describe(): Promise<VectorIndexInfo>;
}

export interface ChunkStore {
  saveDocument(doc: Document): Promise<void>;
  getDocuments(): Promise<Document[]>;
  getDocumentById(id: string): Promise<Document | null>;
  saveChunks(chunks: DocumentChunk[]): Promise<void>;
  getChunksByDocument(docId: string): Promise<DocumentChunk[]>;
  getChunksByIds(ids: string[]): Promise<DocumentChunk[]>;
  /** Removes the document and its chunks, returning the removed chunk ids. */
  deleteDocument(docId: string): Promise<string[]>;
  deleteChunks(ids: string[]): Promise<void>;
}

export interface StoreLifecycle {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
}

/** A backend that keeps chunks and their vectors side by side. */
export type DocumentStore = ChunkStore & VectorIndex & StoreLifecycle;
