import { beforeEach, describe, expect, it } from "vitest";
import type { MetricSpec, SourceDocument } from "@finscope/shared";
import { ConfigurationError } from "../../../src/errors.js";
import { FinScopeCore } from "../../../src/services/FinScopeCore.js";
import { flagConflicts } from "../../../src/services/MetricExtractor.js";
import { InMemoryStore } from "../../../src/store/InMemoryStore.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";
import { annualReport } from "../../helpers/fixtures.js";

const betaReport: SourceDocument = {
  id: "beta-2023",
  title: "Beta Holdings 2023",
  pages: [{ pageNumber: 1, text: "Beta Holdings revenue was $3.9 billion in fiscal 2023." }]
};

const revenue: MetricSpec = { name: "Revenue", kind: "currency", period: "FY2023", unit: "USD" };

function candidates(...items: Array<Record<string, unknown>>): string {
  return JSON.stringify({ candidates: items });
}

describe("MetricExtractor", () => {
  let llm: FakeLLMService;
  let core: FinScopeCore;

  beforeEach(async () => {
    llm = new FakeLLMService();
    const store = new InMemoryStore();
    core = new FinScopeCore(store, store, llm, {
      indexer: { maxAttempts: 1, retryDelayMs: 1 },
      synthesizer: { minRelevanceScore: -1 }
    });
    await core.ingestDocument(annualReport);
    await core.ingestDocument(betaReport);
  });

  it("accepts a grounded value and normalizes it", async () => {
    llm.queueResponse(
      candidates({
        value: "$4.2 billion",
        unit: null,
        period: "FY2023",
        chunk_ids: ["acme-2023:p1:c0"],
        quote: "total revenue of $4.2 billion"
      })
    );

    const [metric] = await core.extractMetrics(["acme-2023"], [revenue]);

    expect(metric).toEqual({
      id: "acme-2023:0:revenue-fy2023:0",
      documentId: "acme-2023",
      metric: "Revenue",
      kind: "currency",
      period: "FY2023",
      rawValue: "$4.2 billion",
      normalized: { type: "number", value: 4_200_000_000, unit: "USD" },
      citations: [
        {
          documentId: "acme-2023",
          documentTitle: "Acme Annual Report 2023",
          pageNumber: 1,
          chunkId: "acme-2023:p1:c0",
          quote: "total revenue of $4.2 billion"
        }
      ],
      status: "valid",
      notes: []
    });
    expect(llm.completions[0]?.constraints.responseFormat).toBe("json");
    expect(llm.completions[0]?.options).toMatchObject({ phase: "extraction", documentId: "acme-2023" });
  });

  it("rejects values that cite nothing in the evidence", async () => {
    llm.queueResponse(candidates({ value: "$4.2 billion", chunk_ids: ["other:p1:c0"] }));

    const [metric] = await core.extractMetrics(["acme-2023"], [revenue]);

    expect(metric?.status).toBe("rejected:ungrounded");
    expect(metric?.citations).toEqual([]);
    expect(metric?.notes).toEqual(["dropped references outside the evidence: other:p1:c0"]);
  });

  it("keeps a value whose quote cannot be found but notes it", async () => {
    llm.queueResponse(
      candidates({ value: "$4.2 billion", chunk_ids: ["acme-2023:p1:c0"], quote: "revenue of $9 billion" })
    );

    const [metric] = await core.extractMetrics(["acme-2023"], [revenue]);

    expect(metric?.status).toBe("valid");
    expect(metric?.citations[0]?.quote).toBeUndefined();
    expect(metric?.notes).toEqual(["quote not found in the cited chunks"]);
  });

  it("rejects type mismatches and out of range values", async () => {
    llm.queueResponse(
      candidates({ value: "$14.5", chunk_ids: ["acme-2023:p2:c0"] }),
      candidates({ value: "12,400", unit: "employees", chunk_ids: ["acme-2023:p2:c0"] })
    );

    const metrics = await core.extractMetrics(
      ["acme-2023"],
      [
        { name: "Operating margin", kind: "percentage" },
        { name: "Headcount", kind: "count", bounds: { max: 10_000 } }
      ]
    );

    expect(metrics.map((metric) => [metric.id, metric.status, metric.notes])).toEqual([
      ["acme-2023:0:operating-margin:0", "rejected:type_mismatch", ['"$14.5" is not a percentage']],
      ["acme-2023:1:headcount:0", "rejected:out_of_range", ["12400 is above the maximum 10000"]]
    ]);
    expect(metrics[1]?.normalized).toEqual({ type: "number", value: 12_400, unit: "" });
  });

  it("reports metrics the model could not find", async () => {
    llm.queueResponse(candidates({ value: null, chunk_ids: [] }));

    const [metric] = await core.extractMetrics(["acme-2023"], [revenue]);

    expect(metric).toMatchObject({
      id: "acme-2023:0:revenue-fy2023:0",
      rawValue: null,
      normalized: null,
      status: "rejected:not_found",
      notes: ["metric not reported in the evidence"]
    });
  });

  it("skips the model for documents without evidence", async () => {
    const [metric] = await core.extractMetrics(["missing-doc"], [revenue]);

    expect(metric?.status).toBe("rejected:not_found");
    expect(metric?.notes).toEqual(["no relevant evidence in document"]);
    expect(llm.completions).toHaveLength(0);
  });

  it("marks malformed output and provider failures as unverified", async () => {
    llm.queueResponse("Revenue was $4.2 billion", new Error("request timed out"));

    const metrics = await core.extractMetrics(["acme-2023", "beta-2023"], [revenue]);

    expect(metrics.map((metric) => [metric.status, metric.notes])).toEqual([
      ["unverified", ["language model returned malformed output"]],
      ["unverified", ["language model unavailable: request timed out"]]
    ]);
  });

  it("downgrades conflicting values across documents", async () => {
    llm.queueResponse(
      candidates({ value: "$4.2 billion", chunk_ids: ["acme-2023:p1:c0"] }),
      candidates({ value: "$3.9 billion", chunk_ids: ["beta-2023:p1:c0"] })
    );

    const metrics = await core.extractMetrics(["acme-2023", "beta-2023"], [revenue]);

    expect(metrics.map((metric) => metric.status)).toEqual(["unverified", "unverified"]);
    expect(metrics[0]?.notes).toEqual(["conflicting values: acme-2023=4200000000; beta-2023=3900000000"]);
  });

  it("gives every requested metric its own id", async () => {
    const notFound = candidates({ value: null, chunk_ids: [] });
    llm.queueResponse(notFound, notFound, notFound);

    const metrics = await core.extractMetrics(
      ["acme-2023"],
      [
        { name: "Revenue", kind: "currency", period: "Q3" },
        { name: "Revenue", kind: "currency", period: "Q4" },
        { name: "营业收入", kind: "currency" }
      ]
    );

    expect(metrics.map((metric) => metric.id)).toEqual([
      "acme-2023:0:revenue-q3:0",
      "acme-2023:1:revenue-q4:0",
      "acme-2023:2:metric:0"
    ]);
  });

  it("marks metrics unverified when retrieval is unavailable", async () => {
    let failing = false;
    const flaky = new FakeLLMService({ failEmbedding: () => failing });
    const store = new InMemoryStore();
    const flakyCore = new FinScopeCore(store, store, flaky, { indexer: { maxAttempts: 1, retryDelayMs: 1 } });
    await flakyCore.ingestDocument(annualReport);
    await flakyCore.ingestDocument(betaReport);
    failing = true;

    const metrics = await flakyCore.extractMetrics(["acme-2023", "beta-2023"], [revenue]);

    expect(metrics.map((metric) => [metric.documentId, metric.status, metric.notes])).toEqual([
      ["acme-2023", "unverified", ["retrieval unavailable: embedding provider unavailable"]],
      ["beta-2023", "unverified", ["retrieval unavailable: embedding provider unavailable"]]
    ]);
    expect(flaky.completions).toHaveLength(0);
  });

  it("rethrows configuration errors", async () => {
    llm.queueResponse(new ConfigurationError("OPENAI_API_KEY is required"));

    await expect(core.extractMetrics(["acme-2023"], [revenue])).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("flagConflicts", () => {
  it("leaves agreeing values valid", () => {
    const metrics = flagConflicts([
      {
        id: "a:revenue:0",
        documentId: "a",
        metric: "Revenue",
        kind: "currency",
        period: "FY2023",
        rawValue: "$4.2bn",
        normalized: { type: "number", value: 4.2e9, unit: "USD" },
        citations: [],
        status: "valid",
        notes: []
      },
      {
        id: "b:revenue:0",
        documentId: "b",
        metric: "revenue",
        kind: "currency",
        period: "fy2023",
        rawValue: "$4,200 million",
        normalized: { type: "number", value: 4.2e9, unit: "USD" },
        citations: [],
        status: "valid",
        notes: []
      }
    ]);

    expect(metrics.map((metric) => metric.status)).toEqual(["valid", "valid"]);
  });
});
