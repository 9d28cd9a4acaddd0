import { randomUUID } from "node:crypto";
import { existsSync, rmSync } from "node:fs";
import { resolve } from "node:path";
import express from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { computeDocumentId } from "../../src/pipeline/IngestionPipeline.js";
import { createDocumentsRouter } from "../../src/routes/documents.js";
import { createTestCore, waitFor, type TestCore } from "../helpers/testCore.js";

const reportText = "Acme Corp revenue was $4.2 billion in 2023.\fHeadcount reached 12,400 employees.";

describe("documents api", () => {
  let testCore: TestCore;
  let app: ReturnType<typeof express>;
  let uploadsDir: string;
  const cleanupDirs: string[] = [];

  beforeEach(() => {
    testCore = createTestCore();
    uploadsDir = resolve("tmp", `api-docs-uploads-${randomUUID()}`);
    cleanupDirs.push(uploadsDir);

    app = express();
    app.use(express.json());
    app.use(
      "/api/documents",
      createDocumentsRouter({
        core: testCore.core,
        ensureStoreConnected: async () => {},
        uploadsDir
      })
    );
  });

  afterEach(() => {
    for (const path of cleanupDirs.splice(0)) {
      rmSync(path, { recursive: true, force: true });
    }
  });

  async function uploadReport(): Promise<string> {
    const buffer = Buffer.from(reportText, "utf8");
    const uploadResponse = await request(app).post("/api/documents/upload").attach("file", buffer, {
      filename: "acme report.txt",
      contentType: "text/plain"
    });

    expect(uploadResponse.status).toBe(202);
    expect(uploadResponse.body.message).toBe("File upload accepted");
    const documentId = computeDocumentId("acme_report.txt", buffer);
    expect(uploadResponse.headers["x-document-id"]).toBe(documentId);
    expect(uploadResponse.body.documentId).toBe(documentId);

    await waitFor(async () => {
      const statusResponse = await request(app).get(`/api/documents/${documentId}/status`);
      return statusResponse.body.status === "completed";
    });
    return documentId;
  }

  it("uploads a document and serves list, detail, chunk and status endpoints", async () => {
    const documentId = await uploadReport();
    expect(existsSync(resolve(uploadsDir, documentId, "acme_report.txt"))).toBe(true);

    const listResponse = await request(app).get("/api/documents").query({ page: 1, pageSize: 10 });
    expect(listResponse.status).toBe(200);
    expect(listResponse.headers["x-total-count"]).toBe("1");
    expect(listResponse.headers["x-page-size"]).toBe("10");
    expect(listResponse.body.documents).toHaveLength(1);

    const detailResponse = await request(app).get(`/api/documents/${documentId}`);
    expect(detailResponse.status).toBe(200);
    expect(detailResponse.body.document).toMatchObject({
      id: documentId,
      filename: "acme_report.txt",
      fileType: "txt",
      status: "completed"
    });

    const chunksResponse = await request(app).get(`/api/documents/${documentId}/chunks`);
    expect(chunksResponse.status).toBe(200);
    expect(chunksResponse.body.chunks.map((chunk: { id: string }) => chunk.id)).toEqual([
      `${documentId}:p1:c0`,
      `${documentId}:p2:c0`
    ]);

    const statusResponse = await request(app).get(`/api/documents/${documentId}/status`);
    expect(statusResponse.status).toBe(200);
    expect(statusResponse.body).toMatchObject({
      id: documentId,
      status: "completed",
      report: { documentId, chunksCreated: 2, indexed: 2, unindexed: [], status: "success" }
    });
  });

  it("streams a terminal status as a single server-sent event", async () => {
    const documentId = await uploadReport();

    const response = await request(app)
      .get(`/api/documents/${documentId}/status`)
      .set("Accept", "text/event-stream");

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toBe("text/event-stream; charset=utf-8");
    expect(response.text.startsWith("event: status\n")).toBe(true);
    expect(response.text).toContain('"status":"completed"');
  });

  it("filters the list by status", async () => {
    await uploadReport();

    const response = await request(app).get("/api/documents").query({ status: "error" });
    expect(response.status).toBe(200);
    expect(response.headers["x-total-count"]).toBe("0");
    expect(response.body.documents).toEqual([]);

    const invalid = await request(app).get("/api/documents").query({ pageSize: 0 });
    expect(invalid.status).toBe(400);
    expect(invalid.body.error).toBe("Validation failed");
  });

  it("deletes a document together with its upload", async () => {
    const documentId = await uploadReport();

    const deleteResponse = await request(app).delete(`/api/documents/${documentId}`);
    expect(deleteResponse.status).toBe(204);
    expect(existsSync(resolve(uploadsDir, documentId))).toBe(false);
    expect((await testCore.store.describe()).recordCount).toBe(0);

    const detailResponse = await request(app).get(`/api/documents/${documentId}`);
    expect(detailResponse.status).toBe(404);

    const repeatResponse = await request(app).delete(`/api/documents/${documentId}`);
    expect(repeatResponse.status).toBe(404);
  });

  it("rejects unsupported and missing files", async () => {
    const unsupported = await request(app)
      .post("/api/documents/upload")
      .attach("file", Buffer.from("PK"), { filename: "notes.docx", contentType: "application/octet-stream" });
    expect(unsupported.status).toBe(400);
    expect(unsupported.body.error).toBe("Unsupported file extension. Only .pdf and .txt are allowed.");

    const missing = await request(app).post("/api/documents/upload");
    expect(missing.status).toBe(400);
    expect(missing.body.error).toBe("No file uploaded");
  });

  it("reports an unknown document", async () => {
    const response = await request(app).get("/api/documents/missing/status");
    expect(response.status).toBe(404);
    expect(response.body.error).toBe("Document not found");
  });

  it("returns 503 when the store cannot be reached", async () => {
    const unavailable = express();
    unavailable.use(
      "/api/documents",
      createDocumentsRouter({
        core: testCore.core,
        ensureStoreConnected: async () => {
          throw new Error("connection refused");
        },
        uploadsDir
      })
    );

    const response = await request(unavailable).get("/api/documents");
    expect(response.status).toBe(503);
    expect(response.body.error).toBe("Document store unavailable");
  });
});
