export type DocumentFileType = "pdf" | "txt";

export type DocumentStatus = "uploading" | "parsing" | "chunking" | "indexing" | "completed" | "error";

export type PageTableRow = string[];

export interface PageTable {
  rows: PageTableRow[];
}

export interface Page {
  pageNumber: number;
  text: string;
  tables?: PageTable[];
}

export interface SourceDocument {
  id: string;
  title: string;
  pages: Page[];
}

export interface Document {
  id: string;
  filename: string;
  fileType: DocumentFileType;
  fileSize: number;
  status: DocumentStatus;
  uploadedAt: Date;
  ingestedAt?: Date;
  metadata: {
    pageCount?: number;
    chunkCount?: number;
    unindexedCount?: number;
    warningCount?: number;
  };
  errorMessage?: string;
}

export type ChunkKind = "text" | "table";

export interface DocumentChunk {
  id: string;
  documentId: string;
  documentTitle: string;
  pageNumber: number;
  kind: ChunkKind;
  /** Sequence number within the document. */
  index: number;
  /** Start offset (inclusive) in the page text, or in the serialized table for table chunks. */
  start: number;
  /** End offset (exclusive). */
  end: number;
  content: string;
  length: number;
  tableIndex?: number;
}

export type IngestionStatus = "success" | "partial" | "failed";

export interface IngestionReport {
  documentId: string;
  title: string;
  chunksCreated: number;
  indexed: number;
  unindexed: string[];
  warnings: string[];
  status: IngestionStatus;
  error?: string;
}
