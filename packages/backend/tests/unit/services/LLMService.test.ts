import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../../../src/errors.js";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";
import { EmbeddingShapeError, LLMService } from "../../../src/services/LLMService.js";

function createRateLimiter(): LLMRateLimiter {
  return new LLMRateLimiter({
    maxConcurrent: 5,
    maxRetries: 0,
    retryDelayMs: 1,
    requestsPerMinute: 200,
    timeoutMs: 5000
  });
}

function createClient(content: string | null, embeddings: Array<{ embedding: number[]; index: number }> = []) {
  return {
    chat: {
      completions: {
        create: vi.fn().mockResolvedValue({
          choices: [{ message: { content } }],
          usage: { prompt_tokens: 10, completion_tokens: 20 }
        })
      }
    },
    embeddings: {
      create: vi.fn().mockResolvedValue({
        data: embeddings,
        usage: { prompt_tokens: 4 }
      })
    }
  };
}

const config = {
  apiKey: "test-secret",
  chatModel: "gpt-4o-mini",
  embeddingModel: "text-embedding-3-small"
};

describe("LLMService", () => {
  it("sends the system prompt first and records usage per phase", async () => {
    const client = createClient("Revenue was $4.2 billion [cite:c1].");
    const service = new LLMService(config, { client, rateLimiter: createRateLimiter() });

    const answer = await service.complete(
      { system: "Use only the evidence.", messages: [{ role: "user", content: "Question: revenue?" }] },
      { maxOutputTokens: 256, responseFormat: "text" },
      { phase: "answer" }
    );

    expect(answer).toBe("Revenue was $4.2 billion [cite:c1].");
    expect(client.chat.completions.create.mock.calls[0]?.[0]).toEqual({
      model: "gpt-4o-mini",
      temperature: 0,
      max_tokens: 256,
      messages: [
        { role: "system", content: "Use only the evidence." },
        { role: "user", content: "Question: revenue?" }
      ]
    });
    expect(service.getUsageRecords()).toMatchObject([
      { phase: "answer", model: "gpt-4o-mini", promptTokens: 10, completionTokens: 20 }
    ]);
  });

  it("requests JSON output when asked", async () => {
    const client = createClient(null);
    const service = new LLMService(config, { client, rateLimiter: createRateLimiter() });

    const output = await service.complete(
      { system: "Extract metrics.", messages: [{ role: "user", content: "Revenue" }] },
      { maxOutputTokens: 128, responseFormat: "json", temperature: 0.2 },
      { phase: "extraction", documentId: "acme-2023" }
    );

    expect(output).toBe("");
    expect(client.chat.completions.create.mock.calls[0]?.[0]).toMatchObject({
      temperature: 0.2,
      response_format: { type: "json_object" }
    });
    expect(service.getUsageRecords()[0]).toMatchObject({ phase: "extraction", documentId: "acme-2023" });
  });

  it("returns embeddings in input order", async () => {
    const client = createClient("", [
      { embedding: [0, 1], index: 1 },
      { embedding: [1, 0], index: 0 }
    ]);
    const service = new LLMService(
      { ...config, embeddingDimensions: 2 },
      { client, rateLimiter: createRateLimiter() }
    );

    await expect(service.embedBatch(["revenue", "margin"])).resolves.toEqual([
      [1, 0],
      [0, 1]
    ]);
    expect(client.embeddings.create.mock.calls[0]?.[0]).toEqual({
      model: "text-embedding-3-small",
      input: ["revenue", "margin"],
      dimensions: 2
    });
    expect(service.getUsageRecords()[0]).toMatchObject({ phase: "embedding", promptTokens: 4 });
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const client = createClient("", [{ embedding: [1, 0], index: 0 }]);
    const service = new LLMService(config, { client, rateLimiter: createRateLimiter() });

    await expect(service.embedBatch(["a", "b"])).rejects.toBeInstanceOf(EmbeddingShapeError);
  });

  it("skips the provider for an empty batch", async () => {
    const client = createClient("");
    const service = new LLMService(config, { client, rateLimiter: createRateLimiter() });

    await expect(service.embedBatch([])).resolves.toEqual([]);
    expect(client.embeddings.create).not.toHaveBeenCalled();
  });

  it("uses a separate embedding client when given one", async () => {
    const client = createClient("");
    const embeddingClient = createClient("", [{ embedding: [0.5], index: 0 }]);
    const service = new LLMService(config, {
      client,
      embeddingClient,
      rateLimiter: createRateLimiter()
    });

    await expect(service.embed("revenue")).resolves.toEqual([0.5]);
    expect(client.embeddings.create).not.toHaveBeenCalled();
    expect(embeddingClient.embeddings.create).toHaveBeenCalledTimes(1);
  });

  it("estimates tokens from text length", () => {
    const service = new LLMService(config, { client: createClient(""), rateLimiter: createRateLimiter() });

    expect(service.estimateTokens("abcdefghi")).toBe(3);
    expect(service.embeddingModel).toBe("text-embedding-3-small");
  });

  it("refuses provider calls without an API key", async () => {
    const service = new LLMService({ ...config, apiKey: "" }, { rateLimiter: createRateLimiter() });

    await expect(
      service.complete({ system: "s", messages: [] }, { maxOutputTokens: 16 })
    ).rejects.toBeInstanceOf(ConfigurationError);
    await expect(service.embed("revenue")).rejects.toBeInstanceOf(ConfigurationError);
  });
});
