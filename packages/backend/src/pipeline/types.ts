import type { DocumentChunk, DocumentFileType, IngestionReport } from "@finscope/shared";

export type PipelinePhase = "parsing" | "chunking" | "indexing" | "completed" | "error";

export interface PipelineStatusEvent {
  documentId: string;
  phase: PipelinePhase;
  progress: number;
  message?: string;
  report?: IngestionReport;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkingResult {
  chunks: DocumentChunk[];
  warnings: string[];
}

export interface IndexerOptions {
  batchSize: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface IndexingResult {
  indexed: string[];
  unindexed: string[];
  warnings: string[];
}

export interface IngestionInput {
  filename: string;
  fileType: DocumentFileType;
  buffer: Buffer;
}

export interface IngestionPipelineOptions {
  concurrency: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}
