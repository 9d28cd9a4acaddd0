import type { AnswerStatus, Citation, ConversationRole } from "./query.js";

export interface ChatSession {
  id: string;
  title: string;
  documentIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatMessage {
  id: string;
  sessionId: string;
  role: ConversationRole;
  content: string;
  citations?: Citation[];
  status?: AnswerStatus;
  groundingViolation?: boolean;
  createdAt: Date;
}
