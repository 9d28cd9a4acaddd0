import { randomUUID } from "node:crypto";
import type { ChatMessage, ChatSession } from "@finscope/shared";
import { ChatSessionNotFoundError } from "../errors.js";
import type { AddChatMessageInput, AssistantReply, ChatExchange, ChatStoreLike } from "./ChatStore.js";

interface SessionRecord {
  session: ChatSession;
  messages: ChatMessage[];
}

/** Process-local chat store used when SQLite cannot be opened, and in tests. */
export class InMemoryChatStore implements ChatStoreLike {
  private readonly records = new Map<string, SessionRecord>();

  close(): void {
    this.records.clear();
  }

  createSession(input: { title: string; documentIds?: string[]; id?: string }): ChatSession {
    const now = new Date();
    const session: ChatSession = {
      id: input.id ?? randomUUID(),
      title: input.title,
      documentIds: [...new Set(input.documentIds ?? [])],
      createdAt: now,
      updatedAt: now
    };

    this.records.set(session.id, { session, messages: [] });
    return { ...session };
  }

  listSessions(limit = 100): ChatSession[] {
    return [...this.records.values()]
      .map((record) => ({ ...record.session }))
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, Math.max(1, limit));
  }

  getSessionById(id: string): ChatSession | null {
    const record = this.records.get(id);
    return record ? { ...record.session } : null;
  }

  deleteSession(id: string): boolean {
    return this.records.delete(id);
  }

  addMessage(input: AddChatMessageInput): ChatMessage {
    const record = this.records.get(input.sessionId);
    if (!record) {
      throw new ChatSessionNotFoundError(input.sessionId);
    }

    const message: ChatMessage = {
      id: input.id ?? randomUUID(),
      sessionId: input.sessionId,
      role: input.role,
      content: input.content,
      createdAt: new Date()
    };
    if (input.citations) {
      message.citations = input.citations.map((citation) => ({ ...citation }));
    }
    if (input.status) {
      message.status = input.status;
    }
    if (input.groundingViolation !== undefined) {
      message.groundingViolation = input.groundingViolation;
    }

    record.messages.push(message);
    record.session = { ...record.session, updatedAt: message.createdAt };
    return message;
  }

  addExchange(sessionId: string, question: string, reply: AssistantReply): ChatExchange {
    return {
      question: this.addMessage({ sessionId, role: "user", content: question }),
      answer: this.addMessage({ sessionId, role: "assistant", ...reply })
    };
  }

  listMessagesBySession(sessionId: string): ChatMessage[] {
    return [...(this.records.get(sessionId)?.messages ?? [])];
  }

  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null {
    const record = this.records.get(sessionId);
    if (!record) {
      return null;
    }

    return { session: { ...record.session }, messages: [...record.messages] };
  }
}
