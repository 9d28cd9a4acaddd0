import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { AnswerStatus, ChatMessage, ChatSession, Citation, ConversationRole } from "@finscope/shared";
import { ChatSessionNotFoundError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface ChatStoreOptions {
  dbPath?: string;
}

export interface AddChatMessageInput {
  sessionId: string;
  role: ConversationRole;
  content: string;
  citations?: Citation[];
  status?: AnswerStatus;
  groundingViolation?: boolean;
  id?: string;
}

export interface AssistantReply {
  content: string;
  citations: Citation[];
  status: AnswerStatus;
  groundingViolation: boolean;
}

export interface ChatExchange {
  question: ChatMessage;
  answer: ChatMessage;
}

export interface ChatStoreLike {
  close(): void;
  createSession(input: { title: string; documentIds?: string[]; id?: string }): ChatSession;
  listSessions(limit?: number): ChatSession[];
  getSessionById(id: string): ChatSession | null;
  deleteSession(id: string): boolean;
  addMessage(input: AddChatMessageInput): ChatMessage;
  /** Stores a question and its answer together; neither is kept if the other fails. */
  addExchange(sessionId: string, question: string, reply: AssistantReply): ChatExchange;
  listMessagesBySession(sessionId: string): ChatMessage[];
  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null;
}

interface ChatSessionRow {
  id: string;
  title: string;
  document_ids_json: string;
  created_at: string;
  updated_at: string;
}

interface ChatMessageRow {
  id: string;
  session_id: string;
  role: ConversationRole;
  content: string;
  citations_json: string | null;
  status: string | null;
  grounding_violation: number | null;
  created_at: string;
}

const documentIdsSchema = z.array(z.string());

const citationsSchema = z.array(
  z.object({
    documentId: z.string(),
    documentTitle: z.string(),
    pageNumber: z.number().int(),
    chunkId: z.string(),
    quote: z.string().optional()
  })
);

const answerStatusSchema = z.enum(["answered", "insufficient_evidence", "degraded"]);

const SCHEMA_VERSION = 1;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS chat_sessions (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    document_ids_json TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS chat_messages (
    id TEXT PRIMARY KEY,
    session_id TEXT NOT NULL REFERENCES chat_sessions(id) ON DELETE CASCADE,
    role TEXT NOT NULL CHECK(role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    citations_json TEXT,
    status TEXT,
    grounding_violation INTEGER,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_chat_messages_session_id
    ON chat_messages(session_id, created_at);

  CREATE INDEX IF NOT EXISTS idx_chat_sessions_updated_at
    ON chat_sessions(updated_at DESC);
`;

const SESSION_COLUMNS = "id, title, document_ids_json, created_at, updated_at";
const MESSAGE_COLUMNS = "id, session_id, role, content, citations_json, status, grounding_violation, created_at";

function prepareStatements(db: Database.Database) {
  return {
    insertSession: db.prepare<ChatSessionRow>(
      `INSERT INTO chat_sessions (${SESSION_COLUMNS})
       VALUES (@id, @title, @document_ids_json, @created_at, @updated_at)`
    ),
    listSessions: db.prepare<[number], ChatSessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM chat_sessions ORDER BY updated_at DESC, created_at DESC LIMIT ?`
    ),
    getSession: db.prepare<[string], ChatSessionRow>(`SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE id = ?`),
    deleteSession: db.prepare<[string]>("DELETE FROM chat_sessions WHERE id = ?"),
    touchSession: db.prepare<[string, string]>("UPDATE chat_sessions SET updated_at = ? WHERE id = ?"),
    insertMessage: db.prepare<ChatMessageRow>(
      `INSERT INTO chat_messages (${MESSAGE_COLUMNS})
       VALUES (@id, @session_id, @role, @content, @citations_json, @status, @grounding_violation, @created_at)`
    ),
    listMessages: db.prepare<[string], ChatMessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM chat_messages WHERE session_id = ? ORDER BY created_at ASC, rowid ASC`
    )
  };
}

/** SQLite-backed chat history. Messages cascade with their session. */
export class ChatStore implements ChatStoreLike {
  private readonly db: Database.Database;
  private readonly statements: ReturnType<typeof prepareStatements>;

  constructor(options: ChatStoreOptions = {}) {
    const dbPath = options.dbPath === ":memory:" ? ":memory:" : resolve(options.dbPath ?? "data/chat.db");
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("journal_mode = WAL");
    this.migrate();
    this.statements = prepareStatements(this.db);
  }

  close(): void {
    this.db.close();
  }

  createSession(input: { title: string; documentIds?: string[]; id?: string }): ChatSession {
    const now = new Date().toISOString();
    const row: ChatSessionRow = {
      id: input.id ?? randomUUID(),
      title: input.title,
      document_ids_json: JSON.stringify([...new Set(input.documentIds ?? [])]),
      created_at: now,
      updated_at: now
    };
    this.statements.insertSession.run(row);
    return toSession(row);
  }

  listSessions(limit = 100): ChatSession[] {
    return this.statements.listSessions.all(Math.max(1, limit)).map(toSession);
  }

  getSessionById(id: string): ChatSession | null {
    const row = this.statements.getSession.get(id);
    return row ? toSession(row) : null;
  }

  deleteSession(id: string): boolean {
    return this.statements.deleteSession.run(id).changes > 0;
  }

  addMessage(input: AddChatMessageInput): ChatMessage {
    return this.db.transaction(() => {
      this.requireSession(input.sessionId);
      const now = new Date().toISOString();
      const message = this.insertMessage(input, now);
      this.statements.touchSession.run(now, input.sessionId);
      return message;
    })();
  }

  addExchange(sessionId: string, question: string, reply: AssistantReply): ChatExchange {
    return this.db.transaction(() => {
      this.requireSession(sessionId);
      const now = new Date().toISOString();
      const exchange: ChatExchange = {
        question: this.insertMessage({ sessionId, role: "user", content: question }, now),
        answer: this.insertMessage({ sessionId, role: "assistant", ...reply }, now)
      };
      this.statements.touchSession.run(now, sessionId);
      return exchange;
    })();
  }

  listMessagesBySession(sessionId: string): ChatMessage[] {
    return this.statements.listMessages.all(sessionId).map(toMessage);
  }

  getSessionWithMessages(sessionId: string): { session: ChatSession; messages: ChatMessage[] } | null {
    const session = this.getSessionById(sessionId);
    if (!session) {
      return null;
    }

    return { session, messages: this.listMessagesBySession(sessionId) };
  }

  private requireSession(sessionId: string): void {
    if (!this.statements.getSession.get(sessionId)) {
      throw new ChatSessionNotFoundError(sessionId);
    }
  }

  private insertMessage(input: AddChatMessageInput, createdAt: string): ChatMessage {
    const row: ChatMessageRow = {
      id: input.id ?? randomUUID(),
      session_id: input.sessionId,
      role: input.role,
      content: input.content,
      citations_json: input.citations ? JSON.stringify(input.citations) : null,
      status: input.status ?? null,
      grounding_violation: input.groundingViolation === undefined ? null : Number(input.groundingViolation),
      created_at: createdAt
    };
    this.statements.insertMessage.run(row);
    return toMessage(row);
  }

  private migrate(): void {
    const version = this.db.pragma("user_version", { simple: true });
    if (version === SCHEMA_VERSION) {
      return;
    }

    this.db.exec(SCHEMA_SQL);
    this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
    logger.info({ from: version, to: SCHEMA_VERSION }, "Chat store schema initialized");
  }
}

function parseJsonColumn<T>(raw: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  if (raw === null) {
    return undefined;
  }

  try {
    const result = schema.safeParse(JSON.parse(raw));
    return result.success ? result.data : undefined;
  } catch (error) {
    logger.warn({ err: error }, "Ignoring unreadable chat store column");
    return undefined;
  }
}

function toSession(row: ChatSessionRow): ChatSession {
  return {
    id: row.id,
    title: row.title,
    documentIds: parseJsonColumn(row.document_ids_json, documentIdsSchema) ?? [],
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function toMessage(row: ChatMessageRow): ChatMessage {
  const message: ChatMessage = {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    createdAt: new Date(row.created_at)
  };

  const citations = parseJsonColumn(row.citations_json, citationsSchema);
  if (citations) {
    message.citations = citations;
  }
  const status = answerStatusSchema.safeParse(row.status);
  if (status.success) {
    message.status = status.data;
  }
  if (row.grounding_violation !== null) {
    message.groundingViolation = row.grounding_violation === 1;
  }

  return message;
}
