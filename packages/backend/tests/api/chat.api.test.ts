import express from "express";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { createChatRouter } from "../../src/routes/chat.js";
import { InMemoryChatStore } from "../../src/services/InMemoryChatStore.js";
import { annualReport } from "../helpers/fixtures.js";
import { createTestCore, type TestCore } from "../helpers/testCore.js";

describe("chat api", () => {
  let testCore: TestCore;
  let app: ReturnType<typeof express>;

  beforeEach(async () => {
    testCore = createTestCore();
    await testCore.core.ingestDocument(annualReport);

    app = express();
    app.use(express.json());
    app.use(
      "/api/chat",
      createChatRouter({
        chatStore: new InMemoryChatStore(),
        answerer: testCore.core.queryService,
        ensureStoreConnected: async () => {}
      })
    );
  });

  it("creates a session, answers messages and keeps the transcript", async () => {
    const createResponse = await request(app)
      .post("/api/chat/sessions")
      .send({ title: "Acme 2023", documentIds: ["acme-2023"] });
    expect(createResponse.status).toBe(201);
    const sessionId: string = createResponse.body.session.id;
    expect(createResponse.body.session.documentIds).toEqual(["acme-2023"]);

    testCore.llm.queueResponse("Revenue was $4.2 billion [cite:acme-2023:p1:c0].");
    const messageResponse = await request(app)
      .post(`/api/chat/sessions/${sessionId}/messages`)
      .send({ content: "What was revenue?" });
    expect(messageResponse.status).toBe(201);
    expect(messageResponse.body.sessionId).toBe(sessionId);
    expect(messageResponse.body.message).toMatchObject({
      role: "assistant",
      content: "Revenue was $4.2 billion.",
      status: "answered"
    });
    expect(messageResponse.body.result.citations).toHaveLength(1);

    const detailResponse = await request(app).get(`/api/chat/sessions/${sessionId}`);
    expect(detailResponse.status).toBe(200);
    expect(detailResponse.body.session.messages.map((message: { role: string }) => message.role)).toEqual([
      "user",
      "assistant"
    ]);

    const listResponse = await request(app).get("/api/chat/sessions").query({ limit: 10 });
    expect(listResponse.body.sessions).toHaveLength(1);
  });

  it("sends follow-up questions through the rewriter", async () => {
    const createResponse = await request(app).post("/api/chat/sessions").send({});
    const sessionId: string = createResponse.body.session.id;
    expect(createResponse.body.session.title).toBe("New Session");

    testCore.llm.queueResponse("Revenue was $4.2 billion [cite:acme-2023:p1:c0].");
    await request(app).post(`/api/chat/sessions/${sessionId}/messages`).send({ content: "What was revenue?" });

    testCore.llm.queueResponse("Acme operating margin 2023", "Margin was 14.5% [cite:acme-2023:p2:c0].");
    const followUp = await request(app)
      .post(`/api/chat/sessions/${sessionId}/messages`)
      .send({ content: "And the margin?" });

    expect(followUp.status).toBe(201);
    expect(followUp.body.result.rewrittenQuery).toBe("Acme operating margin 2023");
    expect(testCore.llm.completions.map((completion) => completion.options.phase)).toEqual([
      "answer",
      "rewrite",
      "answer"
    ]);
  });

  it("returns 404 for unknown sessions", async () => {
    const messageResponse = await request(app)
      .post("/api/chat/sessions/missing/messages")
      .send({ content: "Hello" });
    expect(messageResponse.status).toBe(404);

    const detailResponse = await request(app).get("/api/chat/sessions/missing");
    expect(detailResponse.status).toBe(404);
  });

  it("deletes sessions", async () => {
    const createResponse = await request(app).post("/api/chat/sessions").send({ title: "Temp" });
    const sessionId: string = createResponse.body.session.id;

    const deleteResponse = await request(app).delete(`/api/chat/sessions/${sessionId}`);
    expect(deleteResponse.status).toBe(204);

    const repeatResponse = await request(app).delete(`/api/chat/sessions/${sessionId}`);
    expect(repeatResponse.status).toBe(404);
  });

  it("validates message content", async () => {
    const createResponse = await request(app).post("/api/chat/sessions").send({ title: "Temp" });
    const sessionId: string = createResponse.body.session.id;

    const response = await request(app).post(`/api/chat/sessions/${sessionId}/messages`).send({ content: "" });
    expect(response.status).toBe(400);
  });
});
