import { describe, expect, it } from "vitest";
import type { DocumentChunk, VectorIndex, VectorMatch } from "@finscope/shared";
import { ConfigurationError } from "../../../src/errors.js";
import { clampTopK, Retriever } from "../../../src/retrieval/Retriever.js";
import { InMemoryStore } from "../../../src/store/InMemoryStore.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";
import { makeChunk } from "../../helpers/fixtures.js";

async function seed(
  store: InMemoryStore,
  chunks: DocumentChunk[],
  vector: (chunk: DocumentChunk) => number[],
  model = "fake-embedding-v1"
): Promise<void> {
  await store.saveChunks(chunks);
  for (const chunk of chunks) {
    await store.upsert({
      id: chunk.id,
      vector: vector(chunk),
      metadata: {
        documentId: chunk.documentId,
        documentTitle: chunk.documentTitle,
        pageNumber: chunk.pageNumber,
        embeddingModel: model
      }
    });
  }
}

describe("clampTopK", () => {
  it("clamps k into [1, 20] and falls back to the default", () => {
    expect(clampTopK(undefined, 6)).toBe(6);
    expect(clampTopK(0, 6)).toBe(1);
    expect(clampTopK(50, 6)).toBe(20);
    expect(clampTopK(3.7, 6)).toBe(3);
  });
});

describe("Retriever", () => {
  it("returns nothing for an empty index without embedding the query", async () => {
    const store = new InMemoryStore();
    const llm = new FakeLLMService();
    const retriever = new Retriever(llm, store, store, { defaultTopK: 5 });

    expect(await retriever.retrieve("What was revenue?")).toEqual([]);
    expect(llm.embedCalls).toEqual([]);
  });

  it("ranks by score and breaks ties by page, position and id", async () => {
    const store = new InMemoryStore();
    const chunks = [
      makeChunk({ id: "doc-a:p2:c0", pageNumber: 2, index: 3, content: "Liquidity" }),
      makeChunk({ id: "doc-a:p1:c1", pageNumber: 1, index: 1, content: "Margin" }),
      makeChunk({ id: "doc-a:p1:c0", pageNumber: 1, index: 0, content: "Revenue" }),
      makeChunk({ id: "doc-a:p1:c2", pageNumber: 1, index: 2, content: "Outlook" })
    ];
    await seed(store, chunks, (chunk) => (chunk.id === "doc-a:p1:c2" ? [0, 1] : [1, 0]));
    const retriever = new Retriever(new FakeLLMService({ embedder: () => [1, 0] }), store, store);

    const results = await retriever.retrieve("revenue", {}, 10);

    expect(results.map((result) => [result.chunk.id, result.score])).toEqual([
      ["doc-a:p1:c0", 1],
      ["doc-a:p1:c1", 1],
      ["doc-a:p2:c0", 1],
      ["doc-a:p1:c2", 0]
    ]);
  });

  it("keeps the earlier page when tied scores straddle k", async () => {
    const store = new InMemoryStore();
    await seed(
      store,
      [
        makeChunk({ id: "doc-a:p10:c0", pageNumber: 10, index: 5, content: "Revenue restated" }),
        makeChunk({ id: "doc-a:p2:c0", pageNumber: 2, index: 1, content: "Revenue" })
      ],
      () => [1, 0]
    );
    const retriever = new Retriever(new FakeLLMService({ embedder: () => [1, 0] }), store, store);

    const results = await retriever.retrieve("q", {}, 1);

    expect(results.map((result) => result.chunk.id)).toEqual(["doc-a:p2:c0"]);
  });

  it("widens the fetch while the cutoff score is tied past k", async () => {
    const store = new InMemoryStore();
    const chunks = [
      makeChunk({ id: "doc-a:p10:c0", pageNumber: 10, index: 5, content: "Revenue restated" }),
      makeChunk({ id: "doc-a:p2:c0", pageNumber: 2, index: 1, content: "Revenue" }),
      makeChunk({ id: "doc-a:p3:c0", pageNumber: 3, index: 2, content: "Revenue by segment" })
    ];
    await store.saveChunks(chunks);
    const requestedK: number[] = [];
    // Orders ties by id only, so page 10 sorts before page 2.
    const index: VectorIndex = {
      upsert: async () => undefined,
      delete: async () => undefined,
      describe: async () => ({ embeddingModel: "fake-embedding-v1", dimensions: 2, recordCount: chunks.length }),
      query: async (_vector, k) => {
        requestedK.push(k);
        const matches: VectorMatch[] = chunks
          .map((chunk) => ({
            id: chunk.id,
            score: 1,
            metadata: {
              documentId: chunk.documentId,
              documentTitle: chunk.documentTitle,
              pageNumber: chunk.pageNumber,
              embeddingModel: "fake-embedding-v1"
            }
          }))
          .sort((a, b) => a.id.localeCompare(b.id));
        return matches.slice(0, k);
      }
    };
    const retriever = new Retriever(new FakeLLMService({ embedder: () => [1, 0] }), index, store);

    const results = await retriever.retrieve("q", {}, 1);

    expect(results.map((result) => result.chunk.id)).toEqual(["doc-a:p2:c0"]);
    expect(requestedK).toEqual([2, 3]);
  });

  it("restricts results to the requested documents and k", async () => {
    const store = new InMemoryStore();
    await seed(
      store,
      [
        makeChunk({ id: "doc-a:p1:c0", content: "A revenue" }),
        makeChunk({ id: "doc-b:p1:c0", documentId: "doc-b", content: "B revenue" }),
        makeChunk({ id: "doc-b:p2:c0", documentId: "doc-b", pageNumber: 2, content: "B margin" })
      ],
      () => [1, 0]
    );
    const retriever = new Retriever(new FakeLLMService({ embedder: () => [1, 0] }), store, store);

    const results = await retriever.retrieve("revenue", { documentIds: ["doc-b"] }, 1);

    expect(results.map((result) => result.chunk.id)).toEqual(["doc-b:p1:c0"]);
  });

  it("skips index records whose chunk is gone", async () => {
    const store = new InMemoryStore();
    const kept = makeChunk({ id: "doc-a:p1:c0", content: "Revenue" });
    await seed(store, [kept], () => [1, 0]);
    await store.upsert({
      id: "doc-a:p9:c0",
      vector: [1, 0],
      metadata: { documentId: "doc-a", documentTitle: "Annual Report A", pageNumber: 9, embeddingModel: "fake-embedding-v1" }
    });
    const retriever = new Retriever(new FakeLLMService({ embedder: () => [1, 0] }), store, store);

    const results = await retriever.retrieve("revenue");

    expect(results.map((result) => result.chunk.id)).toEqual(["doc-a:p1:c0"]);
  });

  it("rejects queries embedded with a different model than the index", async () => {
    const store = new InMemoryStore();
    await seed(store, [makeChunk({ id: "doc-a:p1:c0", content: "Revenue" })], () => [1, 0], "other-model");
    const retriever = new Retriever(new FakeLLMService(), store, store);

    await expect(retriever.retrieve("revenue")).rejects.toBeInstanceOf(ConfigurationError);
  });
});
