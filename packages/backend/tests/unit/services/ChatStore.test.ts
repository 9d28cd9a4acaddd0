import { randomUUID } from "node:crypto";
import { rmSync } from "node:fs";
import { resolve } from "node:path";
import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { ChatSessionNotFoundError } from "../../../src/errors.js";
import type { AssistantReply, ChatStoreLike } from "../../../src/services/ChatStore.js";
import { InMemoryChatStore } from "../../../src/services/InMemoryChatStore.js";

const runSqliteTests = process.env.RUN_SQLITE_TESTS === "true";

const createdDbFiles: string[] = [];

afterEach(() => {
  for (const path of createdDbFiles.splice(0)) {
    rmSync(path, { force: true });
    rmSync(`${path}-shm`, { force: true });
    rmSync(`${path}-wal`, { force: true });
  }
});

function exerciseStore(store: ChatStoreLike): void {
  const session = store.createSession({ title: "Acme 2023", documentIds: ["acme-2023"] });
  expect(session.title).toBe("Acme 2023");
  expect(session.documentIds).toEqual(["acme-2023"]);

  store.addMessage({
    sessionId: session.id,
    role: "user",
    content: "What was Acme's revenue?"
  });
  store.addMessage({
    sessionId: session.id,
    role: "assistant",
    content: "Revenue was $4.2 billion.",
    citations: [{ documentId: "acme-2023", documentTitle: "acme.pdf", pageNumber: 1, chunkId: "acme-2023:p1:c0" }],
    status: "answered",
    groundingViolation: false
  });

  const reply: AssistantReply = {
    content: "Margin was 14.5%.",
    citations: [],
    status: "answered",
    groundingViolation: false
  };
  const exchange = store.addExchange(session.id, "And the operating margin?", reply);
  expect(exchange.question).toMatchObject({ role: "user", content: "And the operating margin?" });
  expect(exchange.answer).toMatchObject({ role: "assistant", content: "Margin was 14.5%.", status: "answered" });
  expect(() => store.addExchange("missing-session", "Anything?", reply)).toThrow(ChatSessionNotFoundError);

  expect(store.listSessions()).toHaveLength(1);

  const sessionDetail = store.getSessionWithMessages(session.id);
  expect(sessionDetail?.session.documentIds).toEqual(["acme-2023"]);
  expect(sessionDetail?.messages.map((message) => message.role)).toEqual(["user", "assistant", "user", "assistant"]);
  expect(sessionDetail?.messages[1]).toMatchObject({
    status: "answered",
    groundingViolation: false,
    citations: [{ documentId: "acme-2023", documentTitle: "acme.pdf", pageNumber: 1, chunkId: "acme-2023:p1:c0" }]
  });

  expect(store.deleteSession(session.id)).toBe(true);
  expect(store.deleteSession(session.id)).toBe(false);
  expect(store.getSessionById(session.id)).toBeNull();
  expect(store.listMessagesBySession(session.id)).toEqual([]);
}

describe("InMemoryChatStore", () => {
  it("creates sessions, persists messages, and deletes them together", () => {
    exerciseStore(new InMemoryChatStore());
  });
});

describe.skipIf(!runSqliteTests)("ChatStore", () => {
  let ChatStore: typeof import("../../../src/services/ChatStore.js").ChatStore;
  let sqliteAvailable = true;
  let sqliteUnavailableReason = "";

  beforeAll(async () => {
    try {
      ({ ChatStore } = await import("../../../src/services/ChatStore.js"));
      const checkPath = resolve("tmp", `chat-store-check-${randomUUID()}.db`);
      createdDbFiles.push(checkPath);
      const checkStore = new ChatStore({ dbPath: checkPath });
      checkStore.close();
    } catch (error) {
      sqliteAvailable = false;
      sqliteUnavailableReason = error instanceof Error ? error.message : String(error);
    }
  });

  it("creates sessions, persists messages, and cascades deletes", () => {
    if (!sqliteAvailable) {
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const dbPath = resolve("tmp", `chat-store-${randomUUID()}.db`);
    createdDbFiles.push(dbPath);

    const store = new ChatStore({ dbPath });
    try {
      exerciseStore(store);
    } finally {
      store.close();
    }
  });

  it("works against an in-memory database", () => {
    if (!sqliteAvailable) {
      return;
    }

    const store = new ChatStore({ dbPath: ":memory:" });
    try {
      exerciseStore(store);
    } finally {
      store.close();
    }
  });
});
