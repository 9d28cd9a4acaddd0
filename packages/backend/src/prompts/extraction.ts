import type { DocumentChunk, MetricSpec } from "@finscope/shared";
import { formatEvidenceBlock } from "./answer.js";

const kindGuidance: Record<MetricSpec["kind"], string> = {
  currency: "a monetary amount; keep the currency symbol or code and any scale word (e.g. \"$1.2 billion\")",
  percentage: "a percentage or basis-point figure; keep the % sign or the word percent/bps",
  date: "a calendar date or month as written in the evidence",
  count: "a whole number of items (employees, shares, stores, ...)"
};

export function buildMetricExtractionSystemPrompt(evidence: DocumentChunk[]): string {
  return `
You extract financial metrics from report excerpts and answer strictly in JSON.

Evidence:
${evidence.map(formatEvidenceBlock).join("\n\n")}

Output JSON format:
{
  "candidates": [
    {
      "value": "value exactly as written in the evidence",
      "unit": "currency code, %, or null",
      "period": "reporting period the value refers to, or null",
      "chunk_ids": ["chunk id the value was read from"],
      "quote": "short verbatim excerpt containing the value"
    }
  ]
}

Rules:
1. Only report values stated in the evidence. Never compute or estimate.
2. chunk_ids must name chunks from the evidence above.
3. If the metric is not present, return {"candidates": []}.
4. Return JSON only, without any other text.
`.trim();
}

export function buildMetricExtractionUserPrompt(spec: MetricSpec): string {
  const lines = [`Metric: ${spec.name}`, `Expected value: ${kindGuidance[spec.kind]}`];
  if (spec.period) {
    lines.push(`Period: ${spec.period}`);
  }
  if (spec.unit) {
    lines.push(`Expected unit: ${spec.unit}`);
  }
  if (spec.description) {
    lines.push(`Definition: ${spec.description}`);
  }
  return lines.join("\n");
}
