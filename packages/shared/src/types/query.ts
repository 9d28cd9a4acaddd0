import type { DocumentChunk } from "./document.js";

export interface Citation {
  documentId: string;
  documentTitle: string;
  pageNumber: number;
  chunkId: string;
  quote?: string;
}

export interface RetrievedChunk {
  chunk: DocumentChunk;
  score: number;
}

export interface RetrievalScore {
  chunkId: string;
  documentId: string;
  pageNumber: number;
  score: number;
}

export type AnswerStatus = "answered" | "insufficient_evidence" | "degraded";

export interface AnsweredQuery {
  query: string;
  rewrittenQuery?: string;
  answer: string;
  citations: Citation[];
  scores: RetrievalScore[];
  status: AnswerStatus;
  groundingViolation: boolean;
  droppedReferences: string[];
  warnings: string[];
}

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface RetrievalFilter {
  documentIds?: string[];
}
