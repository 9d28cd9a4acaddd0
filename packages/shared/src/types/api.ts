import type { ChatMessage, ChatSession } from "./chat.js";
import type { Document, DocumentChunk, IngestionReport } from "./document.js";
import type { ExtractedMetric, MetricExportRow, MetricSpec } from "./metrics.js";
import type { AnsweredQuery, ConversationTurn } from "./query.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface UploadDocumentResponse {
  message: string;
  documentId: string;
  file: {
    originalName: string;
    mimeType: string;
    size: number;
  };
}

export interface ListDocumentsResponse {
  documents: Document[];
}

export interface GetDocumentResponse {
  document: Document;
}

export interface DocumentStatusResponse {
  id: string;
  status: Document["status"];
  report?: IngestionReport;
}

export interface ListDocumentChunksResponse {
  documentId: string;
  chunks: DocumentChunk[];
}

export interface AskRequest {
  query: string;
  documentIds?: string[];
  history?: ConversationTurn[];
  k?: number;
}

export interface AskResponse {
  result: AnsweredQuery;
}

export interface CreateChatSessionRequest {
  title?: string;
  documentIds?: string[];
}

export interface CreateChatSessionResponse {
  session: ChatSession;
}

export interface ListChatSessionsResponse {
  sessions: ChatSession[];
}

export interface ChatSessionDetailResponse {
  session: ChatSession & {
    messages: ChatMessage[];
  };
}

export interface CreateChatMessageRequest {
  content: string;
}

export interface CreateChatMessageResponse {
  sessionId: string;
  message: ChatMessage;
  result: AnsweredQuery;
}

export interface ExtractMetricsRequest {
  documentIds: string[];
  metrics: MetricSpec[];
}

export interface ExtractMetricsResponse {
  metrics: ExtractedMetric[];
  rows: MetricExportRow[];
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    vectorStore: ServiceConnectionStatus;
    llm: ServiceConnectionStatus;
  };
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
