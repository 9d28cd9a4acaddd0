import { z } from "zod";
import type {
  Citation,
  DocumentChunk,
  ExtractedMetric,
  MetricSpec,
  NormalizedValue,
  RetrievedChunk
} from "@finscope/shared";
import { appConfig } from "../config.js";
import { errorMessage, isFatalError, throwIfCancelled } from "../errors.js";
import type { RunOptions } from "../pipeline/types.js";
import { buildMetricExtractionSystemPrompt, buildMetricExtractionUserPrompt } from "../prompts/extraction.js";
import type { Retriever } from "../retrieval/Retriever.js";
import { logger } from "../utils/logger.js";
import { quoteAppearsIn } from "./citationParser.js";
import type { LanguageModel } from "./llmTypes.js";
import { checkBounds, formatNormalizedValue, normalizeMetricValue, sameNormalizedValue } from "./metricNormalization.js";

const candidateSchema = z.object({
  value: z.union([z.string(), z.number()]).nullish(),
  unit: z.string().nullish(),
  period: z.string().nullish(),
  chunk_ids: z.array(z.string()).default([]),
  quote: z.string().nullish()
});

const extractionResponseSchema = z.object({
  candidates: z.array(candidateSchema).default([])
});

type MetricCandidate = z.infer<typeof candidateSchema>;

export interface MetricExtractorOptions {
  topK: number;
  minRelevanceScore: number;
  maxOutputTokens: number;
}

const defaultOptions: MetricExtractorOptions = {
  topK: appConfig.RETRIEVAL_TOP_K,
  minRelevanceScore: appConfig.MIN_RELEVANCE_SCORE,
  maxOutputTokens: appConfig.ANSWER_MAX_TOKENS
};

export class MetricExtractor {
  private readonly options: MetricExtractorOptions;

  constructor(
    private readonly retriever: Retriever,
    private readonly llm: LanguageModel,
    options: Partial<MetricExtractorOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async extract(documentIds: string[], specs: MetricSpec[], runOptions: RunOptions = {}): Promise<ExtractedMetric[]> {
    const results: ExtractedMetric[] = [];

    for (const [specIndex, spec] of specs.entries()) {
      const key = metricKey(spec, specIndex);
      for (const documentId of documentIds) {
        throwIfCancelled(runOptions.signal);
        results.push(...(await this.extractForDocument(documentId, spec, key, runOptions)));
      }
    }

    return flagConflicts(results);
  }

  private async extractForDocument(
    documentId: string,
    spec: MetricSpec,
    key: string,
    runOptions: RunOptions
  ): Promise<ExtractedMetric[]> {
    let retrieved: RetrievedChunk[];
    try {
      retrieved = await this.retriever.retrieve(
        buildRetrievalQuery(spec),
        { documentIds: [documentId] },
        this.options.topK,
        runOptions
      );
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      logger.warn({ documentId, metric: spec.name, err: error }, "Metric retrieval failed");
      return [this.emptyResult(documentId, spec, key, "unverified", `retrieval unavailable: ${errorMessage(error)}`)];
    }
    const evidence = retrieved
      .filter((result) => result.score >= this.options.minRelevanceScore)
      .map((result) => result.chunk);

    if (evidence.length === 0) {
      return [this.emptyResult(documentId, spec, key, "rejected:not_found", "no relevant evidence in document")];
    }

    let raw: string;
    try {
      raw = await this.llm.complete(
        {
          system: buildMetricExtractionSystemPrompt(evidence),
          messages: [{ role: "user", content: buildMetricExtractionUserPrompt(spec) }]
        },
        {
          maxOutputTokens: this.options.maxOutputTokens,
          responseFormat: "json",
          citeEvidenceIds: evidence.map((chunk) => chunk.id)
        },
        { signal: runOptions.signal, phase: "extraction", documentId }
      );
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      logger.warn({ documentId, metric: spec.name, err: error }, "Metric extraction call failed");
      return [this.emptyResult(documentId, spec, key, "unverified", `language model unavailable: ${errorMessage(error)}`)];
    }

    const candidates = parseCandidates(raw);
    if (candidates === null) {
      logger.warn({ documentId, metric: spec.name }, "Metric extraction returned malformed JSON");
      return [this.emptyResult(documentId, spec, key, "unverified", "language model returned malformed output")];
    }

    const usable = candidates.filter((candidate) => candidate.value !== null && candidate.value !== undefined);
    if (usable.length === 0) {
      return [this.emptyResult(documentId, spec, key, "rejected:not_found", "metric not reported in the evidence")];
    }

    return usable.map((candidate, position) => this.validateCandidate(documentId, spec, key, candidate, position, evidence));
  }

  private validateCandidate(
    documentId: string,
    spec: MetricSpec,
    key: string,
    candidate: MetricCandidate,
    position: number,
    evidence: DocumentChunk[]
  ): ExtractedMetric {
    const rawValue = String(candidate.value ?? "").trim();
    const period = nonEmpty(candidate.period) ?? spec.period;
    const metric: ExtractedMetric = {
      id: `${documentId}:${key}:${position}`,
      documentId,
      metric: spec.name,
      kind: spec.kind,
      rawValue,
      normalized: null,
      citations: [],
      status: "valid",
      notes: []
    };
    if (period !== undefined) {
      metric.period = period;
    }

    const evidenceIds = new Set(evidence.map((chunk) => chunk.id));
    const cited = evidence.filter((chunk) => candidate.chunk_ids.includes(chunk.id));
    const outside = candidate.chunk_ids.filter((id) => !evidenceIds.has(id));
    if (outside.length > 0) {
      metric.notes.push(`dropped references outside the evidence: ${outside.join(", ")}`);
    }
    if (cited.length === 0) {
      metric.status = "rejected:ungrounded";
      return metric;
    }

    const quote = nonEmpty(candidate.quote);
    const quoteChunk = quote === undefined ? undefined : cited.find((chunk) => quoteAppearsIn(quote, chunk.content));
    if (quote !== undefined && !quoteChunk) {
      metric.notes.push("quote not found in the cited chunks");
    }
    metric.citations = cited.map((chunk) => toCitation(chunk, chunk === quoteChunk ? quote : undefined));

    const normalized = normalizeMetricValue(spec.kind, rawValue, nonEmpty(candidate.unit) ?? null, spec.unit);
    if (!normalized.ok) {
      metric.status = "rejected:type_mismatch";
      metric.notes.push(normalized.reason);
      return metric;
    }
    metric.normalized = normalized.value;

    const boundsViolation = checkBounds(spec.kind, normalized.value, spec.bounds);
    if (boundsViolation) {
      metric.status = "rejected:out_of_range";
      metric.notes.push(boundsViolation);
    }

    return metric;
  }

  private emptyResult(
    documentId: string,
    spec: MetricSpec,
    key: string,
    status: ExtractedMetric["status"],
    note: string
  ): ExtractedMetric {
    const metric: ExtractedMetric = {
      id: `${documentId}:${key}:0`,
      documentId,
      metric: spec.name,
      kind: spec.kind,
      rawValue: null,
      normalized: null,
      citations: [],
      status,
      notes: [note]
    };
    if (spec.period !== undefined) {
      metric.period = spec.period;
    }
    return metric;
  }
}

/**
 * Valid values of the same metric and period that disagree are all downgraded to
 * `unverified`; nothing decides which one is right.
 */
export function flagConflicts(metrics: ExtractedMetric[]): ExtractedMetric[] {
  const groups = new Map<string, ExtractedMetric[]>();
  for (const metric of metrics) {
    if (metric.status !== "valid" || !metric.normalized) {
      continue;
    }
    const key = `${normalizeKey(metric.metric)}\u0000${normalizeKey(metric.period ?? "")}`;
    const group = groups.get(key) ?? [];
    group.push(metric);
    groups.set(key, group);
  }

  for (const group of groups.values()) {
    const values = group.map((metric) => metric.normalized).filter((value): value is NormalizedValue => value !== null);
    const first = values[0];
    if (!first || values.every((value) => sameNormalizedValue(first, value))) {
      continue;
    }

    const summary = group
      .map((metric) => `${metric.documentId}=${metric.normalized ? formatNormalizedValue(metric.normalized) : ""}`)
      .join("; ");
    for (const metric of group) {
      metric.status = "unverified";
      metric.notes.push(`conflicting values: ${summary}`);
    }
  }

  return metrics;
}

function parseCandidates(raw: string): MetricCandidate[] | null {
  const text = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  const result = extractionResponseSchema.safeParse(parsed);
  return result.success ? result.data.candidates : null;
}

function buildRetrievalQuery(spec: MetricSpec): string {
  return [spec.name, spec.period, spec.description]
    .filter((part): part is string => part !== undefined && part.trim().length > 0)
    .join(" ");
}

function toCitation(chunk: DocumentChunk, quote?: string): Citation {
  const citation: Citation = {
    documentId: chunk.documentId,
    documentTitle: chunk.documentTitle,
    pageNumber: chunk.pageNumber,
    chunkId: chunk.id
  };
  if (quote !== undefined) {
    citation.quote = quote;
  }
  return citation;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeKey(value: string): string {
  return value.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Position in the request plus readable name and period, so ids stay unique within one run. */
function metricKey(spec: MetricSpec, specIndex: number): string {
  const readable = [spec.name, spec.period ?? ""].map(slugify).filter((part) => part.length > 0).join("-");
  return `${specIndex}:${readable || "metric"}`;
}

function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
